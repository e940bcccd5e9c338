import fs from 'node:fs'
import type { TelemetryConfig, TelemetryEvent, TelemetrySink } from './schema'
import { scrubProps } from './schema'

let cfg: TelemetryConfig = { enabled: false, sink: null, appVersion: undefined }

/** Sink appending one line per event to a file. */
export function fileSink(file: string): TelemetrySink {
  return (line) => fs.appendFileSync(file, line + '\n', 'utf8')
}

export function initTelemetry(initial?: Partial<TelemetryConfig>) {
  cfg = {
    enabled: false,
    sink: null,
    appVersion: process.env.npm_package_version,
    ...initial,
  }
}

export function telemetryEnabled(): boolean {
  return cfg.enabled && !!cfg.sink
}

export function track(e: TelemetryEvent) {
  const sink = cfg.sink
  if (!cfg.enabled || !sink) return
  const payload = {
    v: 1,
    ver: cfg.appVersion,
    t: Date.now(),
    name: e.name,
    props: scrubProps(e.props),
  }
  sink(JSON.stringify(payload))
}
