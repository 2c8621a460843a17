import path from 'node:path'
import { createPipelineRuntime } from './job-engine'
import { toErrorMessage } from './job-engine/errors'
import { log, logError, logInfo, logWarn } from './logger'

function readEnvSettings(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const patch: Record<string, unknown> = {}
  if (env.OPENAI_API_KEY) {
    patch.openaiApiKey = env.OPENAI_API_KEY
  }
  if (env.OPENAI_BASE_URL) {
    patch.openaiApiBaseUrl = env.OPENAI_BASE_URL
  }
  if (env.REEL_WORKER_CONCURRENCY) {
    patch.workerConcurrency = Number(env.REEL_WORKER_CONCURRENCY)
  }
  return patch
}

async function main(): Promise<void> {
  const dataRoot = path.resolve(process.env.REEL_DATA_ROOT ?? path.join(process.cwd(), '.reel-data'))
  const runtime = createPipelineRuntime({ dataRoot, settings: readEnvSettings(process.env), keepAlive: true })
  const { engine, dispatcher, context } = runtime

  for (const problem of context.settingsDao.validateProviderSettings()) {
    logWarn('settings_incomplete', { problem })
  }

  engine.on('log', (payload) => log(payload.level, 'job_log', payload))
  engine.on('status', (payload) => logInfo('job_status', payload))
  engine.on('awaitingInput', (payload) => logInfo('job_awaiting_input', payload))
  engine.on('completed', (payload) => logInfo('job_completed', { jobId: payload.jobId, artifacts: payload.artifacts.length }))
  engine.on('failed', (payload) => logError('job_failed', payload))
  dispatcher.on('queueUpdated', (payload) => logInfo('queue_updated', { ...payload }))

  // Nothing else dispatches from this data root while the process runs.
  const report = runtime.start({ releaseAll: true })
  logInfo('runtime_started', { dataRoot, workerId: dispatcher.workerId, requeued: report.requeued.length })

  const sourceUrl = process.argv[2]
  if (sourceUrl) {
    const jobId = engine.submit({ sourceUrl })
    logInfo('job_submitted', { jobId, sourceUrl })
  }

  let stopping = false
  const stop = (signal: NodeJS.Signals): void => {
    if (stopping) return
    stopping = true
    logInfo('runtime_stopping', { signal })
    runtime
      .shutdown()
      .then(() => logInfo('runtime_stopped'))
      .catch((error: unknown) => {
        logError('runtime_stop_failed', { error: toErrorMessage(error) })
        process.exitCode = 1
      })
  }
  process.on('SIGINT', stop)
  process.on('SIGTERM', stop)
}

main().catch((error: unknown) => {
  logError('runtime_start_failed', { error: toErrorMessage(error) })
  process.exitCode = 1
})
