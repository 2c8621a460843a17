import type {
  AppSettings,
  ArtifactRecord,
  ArtifactType,
  EditableSpec,
  ErrorKind,
  InputSpec,
  JobStatus,
  Scene,
  StageName,
  TransientReason,
} from '../db/types'
import type { LogLevel } from '../logger'
import type { PipelineError } from './errors'

/**
 * JobEngine event definitions.
 */
export interface JobEngineEvents {
  status: {
    jobId: string
    status: JobStatus
    previous: JobStatus
    timestamp: string
  }
  stageProgress: {
    jobId: string
    stage: StageName
    percent: number
    message: string
  }
  log: {
    jobId: string
    stage: StageName | 'engine'
    level: LogLevel
    text: string
    timestamp: string
  }
  awaitingInput: {
    jobId: string
    sceneCount: number
  }
  completed: {
    jobId: string
    artifacts: ArtifactSummary[]
  }
  failed: {
    jobId: string
    stage: StageName
    errorKind: ErrorKind
    errorMessage: string
  }
}

export type EventName = keyof JobEngineEvents

export type Listener<T extends EventName> = (payload: JobEngineEvents[T]) => void

export interface ArtifactSummary {
  stageName: StageName
  artifactType: ArtifactType
  name: string
  locator: string
  version: number | null
  fileSize: number
}

export interface JobSnapshot {
  id: string
  status: JobStatus
  currentStage: StageName | null
  /** Attempt number of each stage's latest execution. */
  attempts: Partial<Record<StageName, number>>
  inputSpec: InputSpec
  editableSpec: EditableSpec | null
  artifacts: Partial<Record<StageName, ArtifactSummary[]>>
  errorKind: ErrorKind | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  completedAt: string | null
}

export type ActionResult = { accepted: boolean; reason?: string }

/** Latest complete artifacts of every stage that has succeeded. */
export type PriorArtifacts = Partial<Record<StageName, ArtifactRecord[]>>

export interface ArtifactWriteInput {
  artifactType: ArtifactType
  name: string
  data: Buffer | string
  mimeType?: string
}

/**
 * Artifact writer bound to one job, stage and attempt. Everything written is
 * pending until the engine commits the attempt.
 */
export interface StageArtifactWriter {
  write(input: ArtifactWriteInput): Promise<ArtifactRecord>
  writeJson(artifactType: ArtifactType, name: string, value: unknown): Promise<ArtifactRecord>
  /** Adopt a file a subprocess produced in the attempt work directory. */
  adopt(input: { artifactType: ArtifactType; name: string; filePath: string; mimeType?: string }): Promise<ArtifactRecord>
  written(): ArtifactRecord[]
}

export interface StageContext {
  jobId: string
  stageName: StageName
  attempt: number
  attemptId: number
  signal: AbortSignal
  /** Cancellation checkpoint. */
  throwIfCancelled(): void
  artifacts: StageArtifactWriter
  readArtifact(locator: string): Promise<Buffer>
  /** Absolute path of an artifact, for subprocesses that read files. */
  artifactPath(locator: string): string
  /** Scratch directory for subprocess outputs; removed after the attempt settles. */
  workDir: string
  settings: AppSettings
  log(level: LogLevel, text: string): void
  progress(percent: number, message: string): void
}

export interface StageOutput {
  /** Scene list produced by a pausing stage; becomes the editable snapshot. */
  scenes?: Scene[]
  summary?: string
}

export type StageResult =
  | { success: true; output: StageOutput; artifactRefs: ArtifactRecord[] }
  | { success: false; error: PipelineError; retryable: boolean }

export interface Stage {
  readonly name: StageName
  execute(
    ctx: StageContext,
    inputSpec: InputSpec,
    editableSpec: EditableSpec | null,
    priorArtifacts: PriorArtifacts,
  ): Promise<StageResult>
}

export type StageRegistry = ReadonlyMap<StageName, Stage>

export type StageOutcome =
  | { outcome: 'success'; output: StageOutput; artifactRefs: ArtifactRecord[] }
  | { outcome: 'error'; error: PipelineError; retryable: boolean }
  | { outcome: 'cancelled' }
  | { outcome: 'lease_lost' }

/** Result message a stage worker posts when an attempt has settled. */
export type StageSettledMessage = {
  jobId: string
  stageName: StageName
  attemptId: number
  workerId: string
  /**
   * The stage body was still running when the abort grace period ran out.
   * Its claim is left to expire instead of being released.
   */
  abandoned?: boolean
} & StageOutcome

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail' }

export interface RetryInput {
  kind: ErrorKind
  reason?: TransientReason | null
  /** Failed attempts of this stage since its last success, including this one. */
  attempt: number
  /** Timed-out attempts of this stage so far, including this one. */
  timeouts: number
}

export type ApplyOutcome =
  | { type: 'advanced'; nextStage: StageName }
  | { type: 'awaiting_input' }
  | { type: 'completed' }
  | { type: 'retry_scheduled'; delayMs: number; nextAttemptAt: string }
  | { type: 'failed' }
  | { type: 'cancelled' }
  | { type: 'interrupted' }
  | { type: 'stale' }
