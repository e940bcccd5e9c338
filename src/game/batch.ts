import type { Word } from '../solver/word'
import { roundsExhausted, simulateGame, type SimulationResult } from './simulate'
import { DEFAULT_MAX_ROUNDS, type GameStatus } from './state'

export interface BatchOpts {
  opening: Word
  maxRounds?: number
}

/** Plain, structured-clone friendly form of a simulation (crosses worker boundaries). */
export interface SimulationRecord {
  solution: string
  guesses: string[]
  rounds: number
  status: GameStatus
}

export interface BatchSummary {
  games: number
  solved: number
  failed: number
  histogram: number[] // index r-1 = solved in r rounds (r <= maxRounds + 1), last index = failures
  avgRoundsSolved: number
  avgRoundsAll: number // failures counted as maxRounds + 1
}

export function toRecord(r: SimulationResult): SimulationRecord {
  return {
    solution: r.solution.text,
    guesses: r.guesses.map((g) => g.text),
    rounds: r.rounds,
    status: r.status,
  }
}

/** Simulate every solution with its own game; only the master list is shared. */
export function runBatch(
  words: readonly Word[],
  solutions: readonly Word[],
  opts: BatchOpts,
  onResult?: (record: SimulationRecord, index: number) => void,
): SimulationRecord[] {
  const out: SimulationRecord[] = []
  solutions.forEach((solution, i) => {
    const record = toRecord(
      simulateGame(words, solution, { opening: opts.opening, maxRounds: opts.maxRounds }),
    )
    out.push(record)
    onResult?.(record, i)
  })
  return out
}

export function summarize(
  records: readonly SimulationRecord[],
  maxRounds: number = DEFAULT_MAX_ROUNDS,
): BatchSummary {
  const failSlot = maxRounds + 1
  const histogram = new Array<number>(failSlot + 1).fill(0)
  let solved = 0
  let roundsSolved = 0
  let roundsAll = 0
  for (const r of records) {
    if (r.status === 'won') {
      solved++
      roundsSolved += r.rounds
      roundsAll += r.rounds
      histogram[Math.min(r.rounds, failSlot) - 1]++
    } else {
      roundsAll += roundsExhausted(maxRounds)
      histogram[failSlot]++
    }
  }
  const games = records.length
  return {
    games,
    solved,
    failed: games - solved,
    histogram,
    avgRoundsSolved: solved > 0 ? roundsSolved / solved : 0,
    avgRoundsAll: games > 0 ? roundsAll / games : 0,
  }
}
