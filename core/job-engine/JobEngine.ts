import { EventEmitter } from 'node:events'
import type { ArtifactStore } from '../artifacts/ArtifactStore'
import type Database from 'better-sqlite3'
import type { ArtifactDao, JobDao, JobPatch, JobQueueDao, SettingsDao, StageAttemptDao } from '../db/dao'
import type {
  ArtifactRecord,
  ClaimedJob,
  HistoryListResult,
  HistoryQuery,
  JobRecord,
  JobStatus,
  StageAttemptRecord,
  StageName,
} from '../db/types'
import { createEditableSpec, parseEditableSpec, parseInputSpec } from '../../shared/specs'
import { CANCEL_ABORT_REASON, DISPATCHABLE_STATUSES, PAUSE_AFTER_STAGES } from './constants'
import {
  FatalError,
  JobNotFoundError,
  type PipelineError,
  TransientError,
  ValidationError,
} from './errors'
import { RetryPolicy } from './retry/RetryPolicy'
import { assertTransition, isTerminalStatus, nextAction, type NextAction } from './stateMachine'
import type {
  ActionResult,
  ApplyOutcome,
  ArtifactSummary,
  EventName,
  JobEngineEvents,
  JobSnapshot,
  Listener,
  PriorArtifacts,
  StageSettledMessage,
} from './types'
import { nowIso } from './utils'

interface JobEngineEventsInternal extends JobEngineEvents {
  workAvailable: { jobId: string; delayMs: number }
}

type InternalEventName = keyof JobEngineEventsInternal

function toSummary(artifact: ArtifactRecord): ArtifactSummary {
  return {
    stageName: artifact.stageName,
    artifactType: artifact.artifactType,
    name: artifact.name,
    locator: artifact.locator,
    version: artifact.version,
    fileSize: artifact.fileSize,
  }
}

/**
 * Authoritative owner of job state. Every status change goes through
 * `transitionJob` inside a SQLite transaction; events are emitted only after
 * the transaction commits.
 */
export class JobEngine {
  private readonly emitter = new EventEmitter()
  private readonly inFlight = new Map<string, AbortController>()

  constructor(
    private readonly deps: {
      db: Database.Database
      jobDao: JobDao
      jobQueueDao: JobQueueDao
      stageAttemptDao: StageAttemptDao
      artifactDao: ArtifactDao
      settingsDao: SettingsDao
      artifactStore: ArtifactStore
    },
  ) {}

  /** Register a typed event listener and return an unsubscribe callback. */
  on<T extends EventName>(event: T, listener: Listener<T>): () => void {
    return this.subscribe(event, listener)
  }

  /** Fired when a job becomes dispatchable; `delayMs` is the retry backoff. */
  onWorkAvailable(listener: (payload: JobEngineEventsInternal['workAvailable']) => void): () => void {
    return this.subscribe('workAvailable', listener)
  }

  submit(draft: unknown): string {
    const parsed = parseInputSpec(draft)
    if (!parsed.ok) {
      throw new ValidationError(parsed.reason)
    }

    const create = this.deps.db.transaction(() => {
      const job = this.deps.jobDao.createJob(parsed.value)
      this.deps.jobQueueDao.ensureEnqueued(job.id)
      return job
    })
    const job = create()

    this.emitLog(job.id, 'engine', 'info', `Job submitted: ${job.inputSpec.sourceUrl}`)
    this.emit('workAvailable', { jobId: job.id, delayMs: 0 })
    return job.id
  }

  getStatus(jobId: string): JobSnapshot {
    const job = this.requireJob(jobId)
    const artifacts: Partial<Record<StageName, ArtifactSummary[]>> = {}
    for (const artifact of this.deps.artifactDao.listArtifacts(jobId, 'complete')) {
      const list = artifacts[artifact.stageName] ?? []
      list.push(toSummary(artifact))
      artifacts[artifact.stageName] = list
    }

    return {
      id: job.id,
      status: job.status,
      currentStage: job.currentStage,
      attempts: this.deps.stageAttemptDao.latestAttemptNumbers(jobId),
      inputSpec: job.inputSpec,
      editableSpec: job.editableSpec,
      artifacts,
      errorKind: job.errorKind,
      errorMessage: job.errorMessage,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
      completedAt: job.completedAt,
    }
  }

  listJobs(query: HistoryQuery = {}): HistoryListResult {
    return this.deps.jobDao.listJobs(query)
  }

  listAttempts(jobId: string): StageAttemptRecord[] {
    this.requireJob(jobId)
    return this.deps.stageAttemptDao.listAttempts(jobId)
  }

  async readArtifact(locator: string): Promise<Buffer> {
    return await this.deps.artifactStore.get(locator)
  }

  updateEditableSpec(jobId: string, draft: unknown): ActionResult {
    const update = this.deps.db.transaction((): ActionResult => {
      const job = this.deps.jobDao.findJobById(jobId)
      if (!job) {
        return { accepted: false, reason: `Job not found: ${jobId}` }
      }
      if (job.status !== 'awaiting_input') {
        return { accepted: false, reason: `Job is ${job.status}; edits are accepted only while awaiting_input` }
      }
      const parsed = parseEditableSpec(draft)
      if (!parsed.ok) {
        return { accepted: false, reason: parsed.reason }
      }
      this.deps.jobDao.updateJob(jobId, { editableSpec: parsed.value })
      return { accepted: true }
    })

    const result = update()
    if (result.accepted) {
      this.emitLog(jobId, 'engine', 'info', 'Editable spec updated')
    }
    return result
  }

  resume(jobId: string): ActionResult {
    const run = this.deps.db.transaction((): ActionResult => {
      const job = this.deps.jobDao.findJobById(jobId)
      if (!job) {
        return { accepted: false, reason: `Job not found: ${jobId}` }
      }
      if (job.status !== 'awaiting_input') {
        return { accepted: false, reason: `Job is ${job.status}; only awaiting_input jobs can resume` }
      }
      if (!job.editableSpec) {
        return { accepted: false, reason: 'Job has no editable spec to resume with' }
      }
      this.transitionJob(jobId, 'running')
      this.deps.jobQueueDao.ensureEnqueued(jobId)
      return { accepted: true }
    })

    const result = run()
    if (result.accepted) {
      this.emitStatus(jobId, 'running', 'awaiting_input')
      this.emitLog(jobId, 'engine', 'info', 'Job resumed')
      this.emit('workAvailable', { jobId, delayMs: 0 })
    }
    return result
  }

  /**
   * Cancel any non-terminal job. An in-flight stage is signalled to abort; its
   * pending artifacts are discarded when it settles.
   */
  cancel(jobId: string): ActionResult {
    const run = this.deps.db.transaction((): { result: ActionResult; previous?: JobStatus } => {
      const job = this.deps.jobDao.findJobById(jobId)
      if (!job) {
        return { result: { accepted: false, reason: `Job not found: ${jobId}` } }
      }
      if (isTerminalStatus(job.status)) {
        return { result: { accepted: false, reason: `Job is already ${job.status}` } }
      }
      this.transitionJob(jobId, 'cancelled', { completedAt: nowIso() })
      if (!this.deps.jobQueueDao.findByJobId(jobId)?.claimedBy) {
        this.deps.jobQueueDao.remove(jobId)
      }
      return { result: { accepted: true }, previous: job.status }
    })

    const { result, previous } = run()
    if (previous) {
      this.inFlight.get(jobId)?.abort(CANCEL_ABORT_REASON)
      this.emitStatus(jobId, 'cancelled', previous)
      this.emitLog(jobId, 'engine', 'warn', 'Job canceled')
    }
    return result
  }

  /**
   * Move a job along a state-machine edge. Throws IllegalTransitionError and
   * writes nothing when the edge does not exist.
   */
  transitionJob(jobId: string, to: JobStatus, patch: Omit<JobPatch, 'status'> = {}): JobRecord {
    const job = this.requireJob(jobId)
    assertTransition(jobId, job.status, to)
    return this.deps.jobDao.updateJob(jobId, { ...patch, status: to })
  }

  /** Pure next-step derivation over the persisted job. */
  planNext(jobId: string): NextAction {
    const job = this.requireJob(jobId)
    const completed = new Set(this.deps.artifactDao.listCompletedStages(jobId))
    return nextAction(job.status, completed, job.editableSpec !== null)
  }

  /**
   * Atomically take the dispatch claim. A queued job moves to running in the
   * same transaction; attempts left running by a previous holder are closed.
   */
  claim(jobId: string, workerId: string, workerSlot: number | null, leaseMs: number): ClaimedJob | null {
    const run = this.deps.db.transaction((): ClaimedJob | null => {
      if (!this.deps.jobQueueDao.tryClaim(jobId, workerId, leaseMs, workerSlot)) {
        return null
      }
      const job = this.requireJob(jobId)
      if (!DISPATCHABLE_STATUSES.has(job.status)) {
        this.deps.jobQueueDao.release(jobId, workerId)
        return null
      }

      for (const attempt of this.deps.stageAttemptDao.interruptRunningAttempts(jobId)) {
        this.deps.artifactDao.discardAttempt(attempt.id)
      }

      const claimedFrom = job.status === 'queued' ? 'queued' : 'running'
      const current = claimedFrom === 'queued' ? this.transitionJob(jobId, 'running') : job
      return {
        job: current,
        queue: this.deps.jobQueueDao.getByJobId(jobId),
        claimedFrom,
      }
    })

    const claimed = run()
    if (claimed?.claimedFrom === 'queued') {
      this.emitStatus(jobId, 'running', 'queued')
    }
    return claimed
  }

  renewLease(jobId: string, workerId: string, leaseMs: number): boolean {
    return this.deps.jobQueueDao.renewLease(jobId, workerId, leaseMs)
  }

  releaseClaim(jobId: string, workerId: string): void {
    this.deps.jobQueueDao.release(jobId, workerId)
  }

  /**
   * Open an attempt row for the claimed job. Returns null when the claim is no
   * longer held or the job left running in the meantime.
   */
  beginAttempt(jobId: string, stageName: StageName, workerId: string): StageAttemptRecord | null {
    const run = this.deps.db.transaction((): StageAttemptRecord | null => {
      const job = this.requireJob(jobId)
      if (job.status !== 'running' || !this.deps.jobQueueDao.isClaimedBy(jobId, workerId)) {
        return null
      }
      this.deps.jobDao.updateJob(jobId, { currentStage: stageName })
      return this.deps.stageAttemptDao.startAttempt(jobId, stageName, workerId)
    })

    const attempt = run()
    if (attempt) {
      this.emitLog(jobId, stageName, 'info', `Starting ${stageName} (attempt ${attempt.attempt})`)
      this.emit('stageProgress', { jobId, stage: stageName, percent: 0, message: `Starting ${stageName}` })
    }
    return attempt
  }

  loadPriorArtifacts(jobId: string): PriorArtifacts {
    const prior: PriorArtifacts = {}
    for (const artifact of this.deps.artifactDao.listLatestComplete(jobId)) {
      const list = prior[artifact.stageName] ?? []
      list.push(artifact)
      prior[artifact.stageName] = list
    }
    return prior
  }

  /** Track the abort controller of a running attempt so `cancel` can reach it. */
  registerInFlight(jobId: string, controller: AbortController): () => void {
    this.inFlight.set(jobId, controller)
    return () => {
      if (this.inFlight.get(jobId) === controller) {
        this.inFlight.delete(jobId)
      }
    }
  }

  /**
   * Fold a settled stage attempt into the job record: commit or discard its
   * artifacts, move the status and release or drop the dispatch claim, all in
   * one transaction.
   */
  applyStageOutcome(message: StageSettledMessage): ApplyOutcome {
    const deferred: Array<() => void> = []
    const run = this.deps.db.transaction((): ApplyOutcome => {
      const { jobId, stageName, attemptId, workerId } = message
      const attempt = this.deps.stageAttemptDao.getAttempt(attemptId)
      if (attempt.status !== 'running') {
        this.deps.artifactDao.discardAttempt(attemptId)
        return { type: 'stale' }
      }

      const job = this.requireJob(jobId)
      if (job.status === 'cancelled') {
        this.deps.stageAttemptDao.finishAttempt(attemptId, 'cancelled')
        this.deps.artifactDao.discardAttempt(attemptId)
        this.deps.jobQueueDao.remove(jobId)
        deferred.push(() => this.emitLog(jobId, stageName, 'warn', `${stageName} discarded after cancellation`))
        return { type: 'cancelled' }
      }

      const holdsClaim = this.deps.jobQueueDao.isClaimedBy(jobId, workerId)
      if (job.status !== 'running' || !holdsClaim || message.outcome === 'lease_lost') {
        this.deps.stageAttemptDao.finishAttempt(attemptId, 'interrupted', {
          kind: 'transient',
          reason: 'unavailable',
          message: 'Dispatch claim lost before the stage settled',
        })
        this.deps.artifactDao.discardAttempt(attemptId)
        deferred.push(() => this.emitLog(jobId, stageName, 'warn', `${stageName} result dropped: claim lost`))
        return { type: 'stale' }
      }

      if (message.outcome === 'cancelled') {
        // Aborted without a job cancellation, e.g. on shutdown. Runs again later.
        this.deps.stageAttemptDao.finishAttempt(attemptId, 'interrupted', {
          kind: 'transient',
          reason: 'unavailable',
          message: 'Stage interrupted',
        })
        this.deps.artifactDao.discardAttempt(attemptId)
        const delayMs = message.abandoned ? this.deps.settingsDao.getSettings().leaseTimeoutMs : 0
        if (!message.abandoned) {
          this.deps.jobQueueDao.release(jobId, workerId)
        }
        deferred.push(() => {
          this.emitLog(jobId, stageName, 'warn', `${stageName} interrupted`)
          this.emit('workAvailable', { jobId, delayMs })
        })
        return { type: 'interrupted' }
      }

      if (message.outcome === 'error') {
        return this.applyFailure(
          job,
          attempt,
          message.error,
          message.retryable,
          workerId,
          deferred,
          message.abandoned === true,
        )
      }

      const pending = this.deps.artifactDao.listByAttempt(attemptId).filter((artifact) => artifact.state === 'pending')
      if (pending.length === 0) {
        return this.applyFailure(
          job,
          attempt,
          new FatalError(`${stageName} reported success without producing an artifact`),
          false,
          workerId,
          deferred,
        )
      }

      if (PAUSE_AFTER_STAGES.has(stageName)) {
        const scenes = message.output.scenes
        const editable = scenes
          ? parseEditableSpec(createEditableSpec(scenes))
          : { ok: false as const, reason: 'no scenes returned' }
        if (!editable.ok) {
          return this.applyFailure(
            job,
            attempt,
            new FatalError(`${stageName} produced an invalid scene list: ${editable.reason}`),
            false,
            workerId,
            deferred,
          )
        }

        this.deps.stageAttemptDao.finishAttempt(attemptId, 'success')
        const version = this.deps.artifactDao.commitAttempt(jobId, stageName, attemptId)
        this.transitionJob(jobId, 'awaiting_input', {
          editableSpec: editable.value,
          errorKind: null,
          errorMessage: null,
        })
        this.deps.jobQueueDao.remove(jobId)
        deferred.push(() => {
          this.emitStageDone(jobId, stageName, version)
          this.emitStatus(jobId, 'awaiting_input', 'running')
          this.emit('awaitingInput', { jobId, sceneCount: editable.value.scenes.length })
        })
        return { type: 'awaiting_input' }
      }

      this.deps.stageAttemptDao.finishAttempt(attemptId, 'success')
      const version = this.deps.artifactDao.commitAttempt(jobId, stageName, attemptId)
      deferred.push(() => this.emitStageDone(jobId, stageName, version))

      const next = this.planNext(jobId)
      if (next.type === 'complete') {
        this.transitionJob(jobId, 'completed', {
          completedAt: nowIso(),
          errorKind: null,
          errorMessage: null,
        })
        this.deps.jobQueueDao.remove(jobId)
        const artifacts = this.deps.artifactDao.listLatestComplete(jobId).map(toSummary)
        deferred.push(() => {
          this.emitStatus(jobId, 'completed', 'running')
          this.emit('completed', { jobId, artifacts })
        })
        return { type: 'completed' }
      }
      if (next.type !== 'run') {
        throw new FatalError(`Unexpected next action after ${stageName}: ${next.type}`)
      }

      this.transitionJob(jobId, 'running', { errorKind: null, errorMessage: null })
      this.deps.jobQueueDao.release(jobId, workerId)
      deferred.push(() => this.emit('workAvailable', { jobId, delayMs: 0 }))
      return { type: 'advanced', nextStage: next.stage }
    })

    const outcome = run()
    for (const emitDeferred of deferred) {
      emitDeferred()
    }
    return outcome
  }

  /**
   * Close out a job whose every stage already succeeded, as found after a
   * restart between the last commit and finalization.
   */
  finalize(jobId: string): boolean {
    const run = this.deps.db.transaction((): boolean => {
      const job = this.requireJob(jobId)
      if (job.status !== 'running' || this.planNext(jobId).type !== 'complete') {
        return false
      }
      this.transitionJob(jobId, 'completed', { completedAt: nowIso(), errorKind: null, errorMessage: null })
      this.deps.jobQueueDao.remove(jobId)
      return true
    })

    const finalized = run()
    if (finalized) {
      this.emitStatus(jobId, 'completed', 'running')
      this.emit('completed', {
        jobId,
        artifacts: this.deps.artifactDao.listLatestComplete(jobId).map(toSummary),
      })
    }
    return finalized
  }

  private applyFailure(
    job: JobRecord,
    attempt: StageAttemptRecord,
    error: PipelineError,
    retryable: boolean,
    workerId: string,
    deferred: Array<() => void>,
    abandoned = false,
  ): ApplyOutcome {
    const reason = error instanceof TransientError ? error.reason : null
    this.deps.stageAttemptDao.finishAttempt(attempt.id, 'failed', {
      kind: error.kind,
      reason,
      message: error.message,
    })
    this.deps.artifactDao.discardAttempt(attempt.id)

    const settings = this.deps.settingsDao.getSettings()
    const decision = retryable
      ? new RetryPolicy(settings.retryPolicy).decide({
        kind: error.kind,
        reason,
        attempt: this.deps.stageAttemptDao.countFailuresSinceSuccess(job.id, attempt.stageName),
        timeouts: this.deps.stageAttemptDao.countTimeoutsSinceSuccess(job.id, attempt.stageName),
      })
      : { action: 'fail' as const }

    if (decision.action === 'retry') {
      this.transitionJob(job.id, 'running', { errorKind: error.kind, errorMessage: error.message })
      // An abandoned stage may still be running; its claim blocks the retry until the lease runs out.
      const delayMs = abandoned ? Math.max(decision.delayMs, settings.leaseTimeoutMs) : decision.delayMs
      const nextAttemptAt = new Date(Date.now() + delayMs).toISOString()
      if (!abandoned) {
        this.deps.jobQueueDao.release(job.id, workerId, nextAttemptAt)
      }
      deferred.push(() => {
        this.emitLog(
          job.id,
          attempt.stageName,
          'warn',
          `${attempt.stageName} failed (${error.kind}${reason ? `/${reason}` : ''}), retry in ${delayMs}ms: ${error.message}`,
        )
        this.emit('workAvailable', { jobId: job.id, delayMs })
      })
      return { type: 'retry_scheduled', delayMs, nextAttemptAt }
    }

    this.transitionJob(job.id, 'failed', {
      errorKind: error.kind,
      errorMessage: error.message,
      completedAt: nowIso(),
    })
    this.deps.jobQueueDao.remove(job.id)
    deferred.push(() => {
      this.emitLog(job.id, attempt.stageName, 'error', `${attempt.stageName} failed: ${error.message}`)
      this.emitStatus(job.id, 'failed', 'running')
      this.emit('failed', {
        jobId: job.id,
        stage: attempt.stageName,
        errorKind: error.kind,
        errorMessage: error.message,
      })
    })
    return { type: 'failed' }
  }

  private requireJob(jobId: string): JobRecord {
    const job = this.deps.jobDao.findJobById(jobId)
    if (!job) {
      throw new JobNotFoundError(jobId)
    }
    return job
  }

  private emitStageDone(jobId: string, stage: StageName, version: number): void {
    this.emit('stageProgress', { jobId, stage, percent: 100, message: `${stage} done` })
    this.emitLog(jobId, stage, 'info', `Stage completed: ${stage} (artifact version ${version})`)
  }

  private emitStatus(jobId: string, status: JobStatus, previous: JobStatus): void {
    this.emit('status', { jobId, status, previous, timestamp: nowIso() })
  }

  emitLog(
    jobId: string,
    stage: JobEngineEvents['log']['stage'],
    level: JobEngineEvents['log']['level'],
    text: string,
  ): void {
    this.emit('log', { jobId, stage, level, text, timestamp: nowIso() })
  }

  emitProgress(payload: JobEngineEvents['stageProgress']): void {
    this.emit('stageProgress', payload)
  }

  private subscribe<T extends InternalEventName>(
    event: T,
    listener: (payload: JobEngineEventsInternal[T]) => void,
  ): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  private emit<T extends InternalEventName>(event: T, payload: JobEngineEventsInternal[T]): void {
    this.emitter.emit(event, payload)
  }
}
