import { EventEmitter } from 'node:events'
import type { ArtifactStore } from '../../artifacts/ArtifactStore'
import type { JobQueueDao } from '../../db/dao'
import type { AppSettings, StageName } from '../../db/types'
import { logError } from '../../logger'
import { toErrorMessage } from '../errors'
import type { JobEngine } from '../JobEngine'
import type { ApplyOutcome, StageRegistry, StageSettledMessage } from '../types'
import { buildWorkerId } from '../utils'
import { SHUTDOWN_ABORT_REASON, StageWorker } from './StageWorker'
import { WorkerPool } from './WorkerPool'

export interface QueueUpdatedPayload {
  running: number
  capacity: number
  runningJobIds: string[]
  updatedAt: string
}

export interface StageStartedPayload {
  jobId: string
  stage: StageName
  workerId: string
  slot: number
}

export interface StageSettledPayload {
  message: StageSettledMessage
  result: ApplyOutcome
}

interface DispatcherEvents {
  queueUpdated: QueueUpdatedPayload
  stageStarted: StageStartedPayload
  stageSettled: StageSettledPayload
}

type DispatcherEventName = keyof DispatcherEvents
type DispatcherListener<T extends DispatcherEventName> = (payload: DispatcherEvents[T]) => void

/**
 * Pulls claimable jobs, runs their next stage on a bounded worker pool and
 * hands each settled result back to the engine.
 */
export class Dispatcher {
  private readonly emitter = new EventEmitter()
  private readonly workerPool: WorkerPool
  private readonly worker: StageWorker
  private readonly inFlight = new Map<string, Promise<void>>()
  private readonly delayTimers = new Set<NodeJS.Timeout>()
  private shutdownController = new AbortController()
  private pollTimer: NodeJS.Timeout | null = null
  private unsubscribeEngine: (() => void) | null = null
  private started = false
  private scheduleQueued = false
  readonly workerId: string

  constructor(
    private readonly deps: {
      engine: JobEngine
      jobQueueDao: JobQueueDao
      artifactStore: ArtifactStore
      stages: StageRegistry
      settings: AppSettings
      workRoot: string
      workerId?: string
      /** Let the poll timer hold the process open, for a standalone dispatcher. */
      keepAlive?: boolean
    },
  ) {
    this.workerId = deps.workerId ?? buildWorkerId()
    this.workerPool = new WorkerPool(deps.settings.workerConcurrency)
    this.worker = new StageWorker({
      engine: deps.engine,
      artifactStore: deps.artifactStore,
      workRoot: deps.workRoot,
      workerId: this.workerId,
      settings: deps.settings,
    })
  }

  on<T extends DispatcherEventName>(event: T, listener: DispatcherListener<T>): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  start(): void {
    if (this.started) return
    this.started = true
    this.shutdownController = new AbortController()

    this.unsubscribeEngine = this.deps.engine.onWorkAvailable(({ delayMs }) => {
      if (delayMs > 0) {
        this.scheduleAfterDelay(delayMs)
      } else {
        this.schedule()
      }
    })

    this.pollTimer = setInterval(() => this.schedule(), this.deps.settings.pollIntervalMs)
    if (!this.deps.keepAlive) {
      this.pollTimer.unref()
    }

    this.emitQueueUpdated()
    this.schedule()
  }

  /**
   * Stop taking work, abort running stages and wait until they have settled.
   */
  async stop(): Promise<void> {
    if (!this.started) return
    this.started = false
    this.unsubscribeEngine?.()
    this.unsubscribeEngine = null
    if (this.pollTimer) {
      clearInterval(this.pollTimer)
      this.pollTimer = null
    }
    for (const timer of this.delayTimers) {
      clearTimeout(timer)
    }
    this.delayTimers.clear()

    this.shutdownController.abort(SHUTDOWN_ABORT_REASON)
    await this.drain()
  }

  /** Wait until no stage is running in this dispatcher. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values())
    }
  }

  isRunning(jobId: string): boolean {
    return this.workerPool.isRunning(jobId)
  }

  schedule(): void {
    if (!this.started || this.scheduleQueued) {
      return
    }

    this.scheduleQueued = true
    queueMicrotask(() => {
      this.scheduleQueued = false
      this.dispatchJobs()
    })
  }

  private scheduleAfterDelay(delayMs: number): void {
    if (!this.started) return
    const timer = setTimeout(() => {
      this.delayTimers.delete(timer)
      this.schedule()
    }, Math.max(1, delayMs))
    timer.unref()
    this.delayTimers.add(timer)
  }

  private dispatchJobs(): void {
    if (!this.started) return

    const { engine, jobQueueDao, settings } = this.deps
    const skipped = new Set<string>()

    while (this.workerPool.hasCapacity()) {
      const candidates = jobQueueDao
        .listClaimable(this.workerPool.capacity() + skipped.size + 1)
        .filter((entry) => !skipped.has(entry.jobId) && !this.workerPool.isRunning(entry.jobId))
      const next = candidates[0]
      if (!next) {
        break
      }

      const slot = this.workerPool.acquire(next.jobId)
      if (slot === null) {
        break
      }

      let dispatched = false
      try {
        dispatched = this.dispatchOne(next.jobId, slot, settings.leaseTimeoutMs)
      } catch (error) {
        logError('dispatch_failed', { jobId: next.jobId, workerId: this.workerId, error: toErrorMessage(error) })
        engine.releaseClaim(next.jobId, this.workerId)
      }
      if (!dispatched) {
        this.workerPool.releaseByJob(next.jobId)
        skipped.add(next.jobId)
      }
    }

    this.emitQueueUpdated()
  }

  /** Claim one job and start its next stage. Returns false when nothing was started. */
  private dispatchOne(jobId: string, slot: number, leaseMs: number): boolean {
    const { engine, stages } = this.deps
    const claimed = engine.claim(jobId, this.workerId, slot, leaseMs)
    if (!claimed) {
      return false
    }

    const action = engine.planNext(jobId)
    if (action.type === 'complete') {
      if (!engine.finalize(jobId)) {
        engine.releaseClaim(jobId, this.workerId)
      }
      return false
    }
    if (action.type !== 'run') {
      engine.releaseClaim(jobId, this.workerId)
      return false
    }

    const stage = stages.get(action.stage)
    if (!stage) {
      engine.releaseClaim(jobId, this.workerId)
      throw new Error(`No stage registered for ${action.stage}`)
    }

    this.emitter.emit('stageStarted', {
      jobId,
      stage: action.stage,
      workerId: this.workerId,
      slot,
    } satisfies StageStartedPayload)

    const task = this.runStage(jobId, stage.name, () =>
      this.worker.run(
        {
          jobId,
          stage,
          inputSpec: claimed.job.inputSpec,
          editableSpec: claimed.job.editableSpec,
        },
        this.shutdownController.signal,
      ),
    )
    this.inFlight.set(jobId, task)
    return true
  }

  private async runStage(
    jobId: string,
    stageName: StageName,
    execute: () => Promise<StageSettledMessage | null>,
  ): Promise<void> {
    try {
      const message = await execute()
      if (!message) {
        this.deps.engine.releaseClaim(jobId, this.workerId)
        return
      }
      const result = this.deps.engine.applyStageOutcome(message)
      this.emitter.emit('stageSettled', { message, result } satisfies StageSettledPayload)
    } catch (error) {
      logError('stage_settle_failed', {
        jobId,
        stage: stageName,
        workerId: this.workerId,
        error: toErrorMessage(error),
      })
      this.deps.engine.emitLog(jobId, stageName, 'error', `Failed to record stage result: ${toErrorMessage(error)}`)
    } finally {
      this.workerPool.releaseByJob(jobId)
      this.inFlight.delete(jobId)
      this.emitQueueUpdated()
      this.schedule()
    }
  }

  private emitQueueUpdated(): void {
    this.emitter.emit('queueUpdated', {
      running: this.workerPool.runningCount(),
      capacity: this.workerPool.capacity(),
      runningJobIds: this.workerPool.runningJobIds(),
      updatedAt: new Date().toISOString(),
    } satisfies QueueUpdatedPayload)
  }
}
