/* eslint-disable no-console */
import fs from 'node:fs'
import { Worker } from 'node:worker_threads'
import type { SolverConfig } from '../config'
import type { GameStatus } from '../game/state'
import { summarize, type BatchSummary, type SimulationRecord } from '../game/batch'
import type { Word } from '../solver/word'
import { track } from '../telemetry'
import type { Output } from './render'
import { runShard, shardSolutions, type BatchJob, type ShardResult } from './shard'

function isShardResult(v: unknown): v is ShardResult {
  return (
    !!v &&
    typeof v === 'object' &&
    'shard' in v &&
    typeof v.shard === 'number' &&
    'records' in v &&
    Array.isArray(v.records) &&
    'ms' in v &&
    typeof v.ms === 'number'
  )
}

function runInWorker(job: BatchJob): Promise<ShardResult> {
  return new Promise<ShardResult>((resolve, reject) => {
    const worker = new Worker(new URL('./worker.ts', import.meta.url), {
      // Preload tsx so the worker (and everything it imports) loads as TypeScript.
      execArgv: ['--import', 'tsx'],
      workerData: job,
    })
    worker.once('message', (msg: unknown) => {
      if (msg && typeof msg === 'object' && 'result' in msg && isShardResult(msg.result)) {
        resolve(msg.result)
      } else if (msg && typeof msg === 'object' && 'error' in msg) {
        reject(new Error(`shard ${job.shard}: ${String(msg.error)}`))
      } else {
        reject(new Error(`shard ${job.shard}: unexpected worker message`))
      }
    })
    worker.once('error', reject)
    worker.once('exit', (code) => {
      if (code !== 0) reject(new Error(`shard ${job.shard}: worker exited with code ${code}`))
    })
  })
}

function shardDone(result: ShardResult): ShardResult {
  track({
    name: 'batch_shard_done',
    props: { shard: result.shard, games: result.records.length, ms: result.ms },
  })
  return result
}

/** Run shards on a pool of at most `concurrency` worker threads. */
export async function runJobs(jobs: BatchJob[], concurrency: number): Promise<ShardResult[]> {
  const results: ShardResult[] = []
  let idx = 0
  const lane = async () => {
    while (idx < jobs.length) {
      const job = jobs[idx++]
      results.push(shardDone(await runInWorker(job)))
    }
  }
  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, jobs.length)) }, lane)
  await Promise.all(lanes)
  return results.sort((a, b) => a.shard - b.shard)
}

const LOSS_LABEL: Record<GameStatus, string> = {
  'in-progress': '',
  won: '',
  'lost-empty': ' (no candidates left)',
  'lost-rounds': ' (rounds exhausted)',
}

export function formatGameLine(r: SimulationRecord): string {
  return `Game (${r.solution}): ${r.guesses.join(', ')} -> ${r.rounds}${LOSS_LABEL[r.status]}`
}

export function formatSummary(s: BatchSummary): string {
  const out: string[] = []
  out.push(`Games:   ${s.games}`)
  out.push(`Solved:  ${s.solved}`)
  out.push(`Failed:  ${s.failed}`)
  out.push(`Average rounds (solved): ${s.avgRoundsSolved.toFixed(4)}`)
  out.push(`Average rounds (all):    ${s.avgRoundsAll.toFixed(4)}`)
  const last = s.histogram.length - 1
  const labels = s.histogram.map((_, i) => (i < last ? String(i + 1) : 'X'))
  out.push(labels.map((l) => l.padStart(6)).join(' '))
  out.push(s.histogram.map((c) => String(c).padStart(6)).join(' '))
  return out.join('\n')
}

export interface BatchCommandOpts {
  words: readonly Word[]
  solutions: readonly Word[]
  config: SolverConfig
  out: Output
  reportFile?: string
}

export async function runBatchCommand(opts: BatchCommandOpts): Promise<BatchSummary> {
  const { config, out } = opts
  const known = new Set(opts.words.map((w) => w.text))
  const missing = opts.solutions.filter((s) => !known.has(s.text))
  if (missing.length) {
    console.warn(
      `[warn] ${missing.length} solution(s) not in the word list:`,
      missing
        .slice(0, 5)
        .map((w) => w.text)
        .join(','),
    )
  }
  const words = opts.words.map((w) => w.text)
  const jobs: BatchJob[] = shardSolutions(
    opts.solutions.map((s) => s.text),
    config.concurrency,
  ).map((solutions, shard) => ({
    shard,
    length: config.wordLength,
    maxRounds: config.maxRounds,
    opening: config.opening,
    words,
    solutions,
  }))

  const shards =
    jobs.length > 1
      ? await runJobs(jobs, config.concurrency)
      : jobs.map((job) => shardDone(runShard(job)))
  const records = shards.flatMap((s) => s.records)
  for (const r of records) out.write(formatGameLine(r) + '\n')
  const summary = summarize(records, config.maxRounds)
  out.write('\n' + formatSummary(summary) + '\n')

  if (opts.reportFile) {
    const report = {
      meta: {
        timestamp: new Date().toISOString(),
        words: words.length,
        opening: config.opening,
        maxRounds: config.maxRounds,
        shards: jobs.length,
      },
      summary,
      games: records,
    }
    fs.writeFileSync(opts.reportFile, JSON.stringify(report, null, 2) + '\n', 'utf8')
    out.write(`Results written to: ${opts.reportFile}\n`)
  }
  return summary
}
