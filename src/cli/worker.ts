import { parentPort, workerData } from 'node:worker_threads'
import { isBatchJob, runShard } from './shard'

function main() {
  if (!parentPort) return
  const job: unknown = workerData
  if (!isBatchJob(job)) {
    parentPort.postMessage({ error: 'invalid batch job' })
    return
  }
  try {
    parentPort.postMessage({ result: runShard(job) })
  } catch (err) {
    parentPort.postMessage({ error: err instanceof Error ? err.message : String(err) })
  }
}

main()
