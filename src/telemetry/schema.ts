export type GameMode = 'assist' | 'play' | 'solve' | 'batch'

export type TelemetryEvent =
  | { name: 'game_started'; props: { mode: GameMode; words: number; length: number } }
  | {
      name: 'round_played'
      props: { mode: GameMode; round: number; guess: string; pattern: string; remaining: number }
    }
  | { name: 'game_finished'; props: { mode: GameMode; status: string; rounds: number } }
  | { name: 'batch_shard_done'; props: { shard: number; games: number; ms: number } }

export type TelemetrySink = (line: string) => void

export interface TelemetryConfig {
  enabled: boolean // off unless an events file (or sink) is configured
  sink?: TelemetrySink | null
  appVersion?: string
}

export function scrubProps<T extends Record<string, unknown>>(p: T): Record<string, unknown> {
  // Keep primitives only; strings capped at 64 chars.
  const out: Record<string, unknown> = {}
  for (const k of Object.keys(p)) {
    const v = p[k]
    if (v == null) continue
    if (typeof v === 'string') {
      out[k] = v.slice(0, 64)
    } else if (typeof v === 'number' || typeof v === 'boolean') out[k] = v
  }
  return out
}
