import { runBatch, type SimulationRecord } from '../game/batch'
import { Word } from '../solver/word'

/** One slice of a batch run; plain data so it can be handed to a worker thread. */
export interface BatchJob {
  shard: number
  length: number
  maxRounds: number
  opening: string
  words: string[]
  solutions: string[]
}

export interface ShardResult {
  shard: number
  records: SimulationRecord[]
  ms: number
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string')
}

export function isBatchJob(v: unknown): v is BatchJob {
  if (!v || typeof v !== 'object') return false
  return (
    'shard' in v &&
    typeof v.shard === 'number' &&
    'length' in v &&
    typeof v.length === 'number' &&
    'maxRounds' in v &&
    typeof v.maxRounds === 'number' &&
    'opening' in v &&
    typeof v.opening === 'string' &&
    'words' in v &&
    isStringArray(v.words) &&
    'solutions' in v &&
    isStringArray(v.solutions)
  )
}

/** Split solutions into at most `shards` contiguous, non-empty slices. */
export function shardSolutions(solutions: readonly string[], shards: number): string[][] {
  const n = Math.max(1, Math.min(shards, solutions.length))
  const size = Math.ceil(solutions.length / n)
  const out: string[][] = []
  for (let start = 0; start < solutions.length; start += size) {
    out.push(solutions.slice(start, start + size))
  }
  return out
}

export function runShard(job: BatchJob): ShardResult {
  const start = Date.now()
  const words = job.words.map((w) => Word.parse(w, job.length))
  const solutions = job.solutions.map((w) => Word.parse(w, job.length))
  const records = runBatch(words, solutions, {
    opening: Word.parse(job.opening, job.length),
    maxRounds: job.maxRounds,
  })
  return { shard: job.shard, records, ms: Date.now() - start }
}
