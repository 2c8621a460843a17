import path from 'node:path'
import { ArtifactStore } from '../artifacts/ArtifactStore'
import { closeDatabase, type DatabaseContext, openDatabase } from '../db'
import type { StageName } from '../db/types'
import { JobEngine } from './JobEngine'
import type { FetchLike } from './providers/openai'
import { Dispatcher } from './queue/Dispatcher'
import { type RecoveryOptions, type RecoveryReport, ResumeCoordinator } from './queue/ResumeCoordinator'
import { createDefaultStages } from './stages'
import type { Stage, StageRegistry } from './types'

export interface PipelineRuntimeOptions {
  dataRoot: string
  /** Defaults to `<dataRoot>/pipeline.db`; `:memory:` for throwaway runs. */
  dbPath?: string
  /** Settings patch persisted before the dispatcher reads its configuration. */
  settings?: Record<string, unknown>
  /** Replace individual production stages. */
  stages?: Partial<Record<StageName, Stage>>
  workerId?: string
  fetchImpl?: FetchLike
  /** Keep the process alive while the dispatcher runs. */
  keepAlive?: boolean
}

export interface PipelineRuntime {
  context: DatabaseContext
  store: ArtifactStore
  engine: JobEngine
  dispatcher: Dispatcher
  coordinator: ResumeCoordinator
  stages: StageRegistry
  /** Recover persisted state, then start dispatching. */
  start(options?: RecoveryOptions): RecoveryReport
  shutdown(): Promise<void>
}

/**
 * Build every component of the pipeline over one database and data root.
 */
export function createPipelineRuntime(options: PipelineRuntimeOptions): PipelineRuntime {
  const context = openDatabase({ dataRoot: options.dataRoot, dbPath: options.dbPath })
  if (options.settings) {
    context.settingsDao.upsertSettings(options.settings)
  }
  const settings = context.settingsDao.getSettings()

  const store = new ArtifactStore({
    artifactsRoot: path.join(options.dataRoot, 'artifacts'),
    artifactDao: context.artifactDao,
  })
  const engine = new JobEngine({
    db: context.db,
    jobDao: context.jobDao,
    jobQueueDao: context.jobQueueDao,
    stageAttemptDao: context.stageAttemptDao,
    artifactDao: context.artifactDao,
    settingsDao: context.settingsDao,
    artifactStore: store,
  })
  const stages = createDefaultStages({ fetchImpl: options.fetchImpl }, options.stages)
  const dispatcher = new Dispatcher({
    engine,
    jobQueueDao: context.jobQueueDao,
    artifactStore: store,
    stages,
    settings,
    workRoot: path.join(options.dataRoot, 'work'),
    workerId: options.workerId,
    keepAlive: options.keepAlive,
  })
  const coordinator = new ResumeCoordinator({
    db: context.db,
    engine,
    jobDao: context.jobDao,
    jobQueueDao: context.jobQueueDao,
    stageAttemptDao: context.stageAttemptDao,
    artifactDao: context.artifactDao,
  })

  let closed = false
  return {
    context,
    store,
    engine,
    dispatcher,
    coordinator,
    stages,
    start: (recoveryOptions = {}) => {
      const report = coordinator.recover(recoveryOptions)
      dispatcher.start()
      return report
    },
    shutdown: async () => {
      if (closed) return
      closed = true
      await dispatcher.stop()
      closeDatabase(context)
    },
  }
}

export { JobEngine } from './JobEngine'
export { Dispatcher } from './queue/Dispatcher'
export { ResumeCoordinator } from './queue/ResumeCoordinator'
export type { RecoveryOptions, RecoveryReport } from './queue/ResumeCoordinator'
export * from './errors'
export type * from './types'
