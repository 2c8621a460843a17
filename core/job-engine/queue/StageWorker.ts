import fs from 'node:fs/promises'
import path from 'node:path'
import type { ArtifactStore } from '../../artifacts/ArtifactStore'
import type { AppSettings, EditableSpec, InputSpec, StageAttemptRecord, StageName } from '../../db/types'
import { logError } from '../../logger'
import { LEASE_LOST_ABORT_REASON, TIMEOUT_ABORT_REASON } from '../constants'
import {
  normalizeStageError,
  ResourceError,
  StageCancelledError,
  toErrorMessage,
  TransientError,
} from '../errors'
import type { JobEngine } from '../JobEngine'
import type { Stage, StageContext, StageOutcome, StageResult, StageSettledMessage } from '../types'

export const SHUTDOWN_ABORT_REASON = 'shutdown'

class StageAbandonedError extends Error {
  constructor(graceMs: number) {
    super(`Stage still running ${graceMs}ms after abort`)
    this.name = 'StageAbandonedError'
  }
}

/** Rejects `graceMs` after the signal aborts; never settles otherwise. */
function startGraceOnAbort(signal: AbortSignal, graceMs: number): { expired: Promise<never>; dispose(): void } {
  let timer: NodeJS.Timeout | null = null
  let onAbort: () => void = () => undefined
  const expired = new Promise<never>((_, reject) => {
    onAbort = () => {
      timer = setTimeout(() => reject(new StageAbandonedError(graceMs)), graceMs)
    }
  })
  // Awaited through the race in execute; this handler covers an expiry before the stage starts.
  expired.catch(() => undefined)
  if (signal.aborted) {
    onAbort()
  } else {
    signal.addEventListener('abort', onAbort, { once: true })
  }
  return {
    expired,
    dispose: () => {
      signal.removeEventListener('abort', onAbort)
      if (timer) clearTimeout(timer)
    },
  }
}

export interface StageWorkItem {
  jobId: string
  stage: Stage
  inputSpec: InputSpec
  editableSpec: EditableSpec | null
}

function resolveStageTimeoutMs(settings: AppSettings, stageName: StageName): number {
  return settings.stageTimeoutOverrides[stageName] ?? settings.stageTimeoutMs
}

/**
 * Runs one stage attempt for a claimed job: opens the attempt, keeps the lease
 * alive, enforces the stage timeout and turns whatever happens into a single
 * StageSettledMessage. It never touches job status itself.
 */
export class StageWorker {
  constructor(
    private readonly deps: {
      engine: JobEngine
      artifactStore: ArtifactStore
      workRoot: string
      workerId: string
      settings: AppSettings
    },
  ) {}

  /**
   * Returns null when the attempt could not be opened because the claim was
   * lost before the stage started.
   */
  async run(item: StageWorkItem, shutdownSignal: AbortSignal): Promise<StageSettledMessage | null> {
    const { engine, workerId, settings } = this.deps
    const stageName = item.stage.name
    const attempt = engine.beginAttempt(item.jobId, stageName, workerId)
    if (!attempt) {
      return null
    }

    const controller = new AbortController()
    const unregister = engine.registerInFlight(item.jobId, controller)
    const onShutdown = (): void => controller.abort(SHUTDOWN_ABORT_REASON)
    if (shutdownSignal.aborted) {
      onShutdown()
    } else {
      shutdownSignal.addEventListener('abort', onShutdown, { once: true })
    }

    const timeoutMs = resolveStageTimeoutMs(settings, stageName)
    const timeoutTimer = setTimeout(() => controller.abort(TIMEOUT_ABORT_REASON), timeoutMs)
    const heartbeat = setInterval(() => {
      try {
        if (!engine.renewLease(item.jobId, workerId, settings.leaseTimeoutMs)) {
          controller.abort(LEASE_LOST_ABORT_REASON)
        }
      } catch (error) {
        logError('lease_renew_failed', { jobId: item.jobId, workerId, error: toErrorMessage(error) })
        controller.abort(LEASE_LOST_ABORT_REASON)
      }
    }, settings.heartbeatIntervalMs)

    const workDir = path.join(this.deps.workRoot, item.jobId, String(attempt.id))
    const base = { jobId: item.jobId, stageName, attemptId: attempt.id, workerId }
    const grace = startGraceOnAbort(controller.signal, settings.abortGraceMs)

    try {
      await fs.mkdir(workDir, { recursive: true }).catch((error: unknown) => {
        throw new ResourceError(`Failed to create work directory: ${toErrorMessage(error)}`, { cause: error })
      })
      const ctx = this.buildContext(item, attempt, controller.signal, workDir)
      const result = await this.execute(item, ctx, grace.expired)
      return { ...base, ...this.toOutcome(result, controller.signal, timeoutMs) }
    } catch (error) {
      if (error instanceof StageAbandonedError) {
        logError('stage_abandoned', { jobId: item.jobId, stage: stageName, workerId, graceMs: settings.abortGraceMs })
        return { ...base, abandoned: true, ...this.abortOutcome(controller.signal, timeoutMs) }
      }
      return { ...base, ...this.toFailureOutcome(error, controller.signal, timeoutMs) }
    } finally {
      grace.dispose()
      clearTimeout(timeoutTimer)
      clearInterval(heartbeat)
      shutdownSignal.removeEventListener('abort', onShutdown)
      unregister()
      await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        logError('work_dir_cleanup_failed', { jobId: item.jobId, workDir, error: toErrorMessage(error) })
      })
    }
  }

  /**
   * Wait for the stage body. After an abort the claim and heartbeat stay up
   * until the body settles, or until `abandon` fires at the end of the grace
   * period.
   */
  private async execute(item: StageWorkItem, ctx: StageContext, abandon: Promise<never>): Promise<StageResult> {
    const prior = this.deps.engine.loadPriorArtifacts(item.jobId)
    const running = item.stage.execute(ctx, item.inputSpec, item.editableSpec, prior)
    running.catch((error: unknown) => {
      if (ctx.signal.aborted) {
        ctx.log('warn', `Stage settled after abort: ${toErrorMessage(error)}`)
      }
    })
    return await Promise.race([running, abandon])
  }

  private toOutcome(
    result: StageResult,
    signal: AbortSignal,
    timeoutMs: number,
  ): StageOutcome {
    if (signal.aborted) {
      return this.abortOutcome(signal, timeoutMs)
    }
    if (result.success) {
      return { outcome: 'success', output: result.output, artifactRefs: result.artifactRefs }
    }
    return { outcome: 'error', error: result.error, retryable: result.retryable }
  }

  private toFailureOutcome(
    error: unknown,
    signal: AbortSignal,
    timeoutMs: number,
  ): StageOutcome {
    if (signal.aborted) {
      return this.abortOutcome(signal, timeoutMs)
    }
    const normalized = normalizeStageError(error)
    if (normalized instanceof StageCancelledError) {
      return { outcome: 'cancelled' }
    }
    return {
      outcome: 'error',
      error: normalized,
      retryable: normalized.kind === 'transient' || normalized.kind === 'resource',
    }
  }

  private abortOutcome(
    signal: AbortSignal,
    timeoutMs: number,
  ): StageOutcome {
    if (signal.reason === TIMEOUT_ABORT_REASON) {
      return {
        outcome: 'error',
        error: new TransientError('timeout', `Stage timed out after ${timeoutMs}ms`),
        retryable: true,
      }
    }
    if (signal.reason === LEASE_LOST_ABORT_REASON) {
      return { outcome: 'lease_lost' }
    }
    // Cancellation and shutdown both settle as cancelled; the engine tells them
    // apart from the persisted job status.
    return { outcome: 'cancelled' }
  }

  private buildContext(
    item: StageWorkItem,
    attempt: StageAttemptRecord,
    signal: AbortSignal,
    workDir: string,
  ): StageContext {
    const { engine, artifactStore, settings } = this.deps
    const stageName = item.stage.name
    return {
      jobId: item.jobId,
      stageName,
      attempt: attempt.attempt,
      attemptId: attempt.id,
      signal,
      throwIfCancelled: () => {
        if (signal.aborted) {
          throw new StageCancelledError(item.jobId)
        }
      },
      artifacts: artifactStore.createWriter(item.jobId, stageName, attempt.id),
      readArtifact: (locator) => artifactStore.get(locator),
      artifactPath: (locator) => artifactStore.resolveLocator(locator),
      workDir,
      settings,
      log: (level, text) => engine.emitLog(item.jobId, stageName, level, text),
      progress: (percent, message) =>
        engine.emitProgress({
          jobId: item.jobId,
          stage: stageName,
          percent: Math.max(0, Math.min(100, Math.round(percent))),
          message,
        }),
    }
  }
}
