import { PIPELINE_STAGES } from '../../shared/specs'
import type { JobStatus, StageName } from '../db/types'

/**
 * Pipeline stages in execution order.
 */
export const STAGES: readonly StageName[] = PIPELINE_STAGES

/**
 * Stages after whose successful commit the job parks in `awaiting_input`.
 * Only scene review pauses today; adding a stage here adds a pause point.
 */
export const PAUSE_AFTER_STAGES: ReadonlySet<StageName> = new Set<StageName>(['segment_and_prompt'])

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'completed',
  'failed',
  'cancelled',
])

/** Statuses the dispatcher may claim. */
export const DISPATCHABLE_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['queued', 'running'])

// Scene splitting
export const DEFAULT_WORDS_PER_SCENE = 20
export const SCENE_WORD_SLACK = 5
export const LONG_SEGMENT_FACTOR = 1.5

// Provider defaults
export const PROMPT_TEMPERATURE = 0.5
export const TRANSLATE_TEMPERATURE = 0.3
export const IMAGE_SIZE_BY_ASPECT = {
  '9:16': '1024x1792',
  '16:9': '1792x1024',
  '1:1': '1024x1024',
} as const

// Composition
export const VIDEO_FPS = 30
export const VIDEO_RESOLUTION_BY_ASPECT = {
  '9:16': { width: 1080, height: 1920 },
  '16:9': { width: 1920, height: 1080 },
  '1:1': { width: 1080, height: 1080 },
} as const

// Dispatcher
export const LEASE_LOST_ABORT_REASON = 'lease_lost'
export const TIMEOUT_ABORT_REASON = 'timeout'
export const CANCEL_ABORT_REASON = 'cancelled'
