import type { JobStatus, StageName } from '../db/types'
import { PAUSE_AFTER_STAGES, STAGES, TERMINAL_STATUSES } from './constants'
import { IllegalTransitionError } from './errors'

/**
 * Legal status edges. Terminal statuses have none.
 */
export const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['running', 'cancelled'],
  running: ['running', 'awaiting_input', 'completed', 'failed', 'cancelled'],
  awaiting_input: ['running', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(jobId, from, to)
  }
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

export type NextAction =
  | { type: 'run'; stage: StageName }
  | { type: 'await_input' }
  | { type: 'complete' }
  | { type: 'none' }

/**
 * Derive what a job needs next from persisted facts only.
 *
 * A pausing stage counts as done only once the editable snapshot exists, so a
 * job that lost its snapshot regenerates it instead of running past the pause.
 */
export function nextAction(
  status: JobStatus,
  completedStages: ReadonlySet<StageName>,
  hasEditableSpec: boolean,
): NextAction {
  if (isTerminalStatus(status)) {
    return { type: 'none' }
  }
  if (status === 'awaiting_input') {
    return { type: 'await_input' }
  }

  for (const stage of STAGES) {
    if (!completedStages.has(stage)) {
      return { type: 'run', stage }
    }
    if (PAUSE_AFTER_STAGES.has(stage) && !hasEditableSpec) {
      return { type: 'run', stage }
    }
  }

  return { type: 'complete' }
}

/** Stage following `stage`, or null after the last one. */
export function stageAfter(stage: StageName): StageName | null {
  const index = STAGES.indexOf(stage)
  return index >= 0 && index + 1 < STAGES.length ? STAGES[index + 1] : null
}
