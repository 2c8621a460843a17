export type JobStatus =
  | 'queued'
  | 'running'
  | 'awaiting_input'
  | 'completed'
  | 'failed'
  | 'cancelled'

export type StageName =
  | 'download'
  | 'transcribe'
  | 'translate'
  | 'segment_and_prompt'
  | 'synthesize_images'
  | 'compose_video'

export type AttemptStatus = 'running' | 'success' | 'failed' | 'cancelled' | 'interrupted'

export type ArtifactType =
  | 'audio'
  | 'transcript'
  | 'translation'
  | 'scenes'
  | 'image'
  | 'final_video'
  | 'subtitles'

export type ArtifactState = 'pending' | 'complete' | 'discarded'

export type ErrorKind = 'validation' | 'transient' | 'resource' | 'fatal'
export type TransientReason = 'network' | 'rate_limit' | 'timeout' | 'unavailable'

export type SubtitleMode = 'none' | 'orig' | 'en' | 'both'
export type AspectRatio = '9:16' | '16:9' | '1:1'
export type ImageStyle =
  | 'default'
  | 'photorealistic'
  | 'cartoon'
  | 'abstract'
  | 'pixel_art'
  | 'line_art'
  | 'fantasy'
  | 'anime'

export interface InputSpec {
  sourceUrl: string
  targetDurationSec: number
  subtitleMode: SubtitleMode
  aspectRatio: AspectRatio
  targetLanguage: string
}

export interface Scene {
  index: number
  text: string
  startTime: number
  endTime: number
  imagePrompt: string
}

export interface EditableSpec {
  scenes: Scene[]
  imageStyle: ImageStyle
  positiveKeywords: string[]
  negativeKeywords: string[]
  artistInfluences: string[]
}

export interface JobRecord {
  id: string
  status: JobStatus
  currentStage: StageName | null
  inputSpec: InputSpec
  editableSpec: EditableSpec | null
  errorKind: ErrorKind | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  completedAt: string | null
}

export interface StageAttemptRecord {
  id: number
  jobId: string
  stageName: StageName
  attempt: number
  status: AttemptStatus
  workerId: string
  startedAt: string
  endedAt: string | null
  durationMs: number | null
  errorKind: ErrorKind | null
  errorReason: TransientReason | null
  errorMessage: string | null
}

export interface ArtifactRecord {
  id: number
  jobId: string
  stageName: StageName
  attemptId: number
  artifactType: ArtifactType
  name: string
  locator: string
  fileSize: number
  mimeType: string | null
  state: ArtifactState
  version: number | null
  createdAt: string
}

export interface QueueEntryRecord {
  jobId: string
  queueIndex: number
  enqueuedAt: string
  claimedBy: string | null
  claimedAt: string | null
  heartbeatAt: string | null
  leaseExpiresAt: string | null
  nextAttemptAt: string | null
  workerSlot: number | null
}

export interface ClaimedJob {
  job: JobRecord
  queue: QueueEntryRecord
  /** Previous status, so the caller can tell a first claim from a continuation. */
  claimedFrom: Extract<JobStatus, 'queued' | 'running'>
}

export interface HistoryQuery {
  page?: number
  pageSize?: number
  status?: JobStatus
}

export interface HistoryListResult {
  items: JobRecord[]
  total: number
  page: number
  pageSize: number
}

export interface RetrySettings {
  maxAttempts: number
  maxTimeoutAttempts: number
  resourceMaxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export interface AppSettings {
  // OpenAI-compatible provider used by transcribe/translate/prompt/image stages
  openaiApiKey: string
  openaiApiBaseUrl: string
  transcribeModelId: string
  chatModelId: string
  imageModelId: string
  requestTimeoutMs: number

  // Local binaries
  ytDlpPath: string
  ffmpegPath: string

  // Scene splitting
  wordsPerScene: number

  // Dispatcher
  workerConcurrency: number
  leaseTimeoutMs: number
  heartbeatIntervalMs: number
  pollIntervalMs: number
  stageTimeoutMs: number
  stageTimeoutOverrides: Partial<Record<StageName, number>>
  /** How long an aborted stage may keep running before its claim is abandoned. */
  abortGraceMs: number
  retryPolicy: RetrySettings
}
