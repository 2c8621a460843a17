import type { ErrorKind, JobStatus, TransientReason } from '../db/types'

/**
 * Base of every error a stage may report. The dispatcher decides retry or
 * failure from `kind` (and `reason` for transient errors) only.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad input. Never retried. */
export class ValidationError extends PipelineError {
  readonly kind = 'validation'
}

export class TransientError extends PipelineError {
  readonly kind = 'transient'

  constructor(
    readonly reason: TransientReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** Artifact store or subprocess failure. */
export class ResourceError extends PipelineError {
  readonly kind = 'resource'
}

/** Contract violation or unrecoverable configuration problem. */
export class FatalError extends PipelineError {
  readonly kind = 'fatal'
}

export class StageCancelledError extends Error {
  constructor(readonly jobId: string) {
    super('Stage canceled')
    this.name = 'StageCancelledError'
  }
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Illegal transition for job ${jobId}: ${from} -> ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`)
    this.name = 'JobNotFoundError'
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Bring whatever a stage threw onto the pipeline taxonomy.
 */
export function normalizeStageError(error: unknown): PipelineError | StageCancelledError {
  if (error instanceof PipelineError || error instanceof StageCancelledError) {
    return error
  }
  return new FatalError(`Unexpected stage error: ${toErrorMessage(error)}`, { cause: error })
}
