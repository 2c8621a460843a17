import type { RetrySettings } from '../../db/types'
import type { RetryDecision, RetryInput } from '../types'

/**
 * Single place that turns an error classification and attempt counter into a
 * retry or a terminal failure.
 */
export class RetryPolicy {
  constructor(private readonly settings: RetrySettings) {}

  decide(input: RetryInput): RetryDecision {
    const attempt = Math.max(1, Math.floor(input.attempt))

    switch (input.kind) {
      case 'validation':
      case 'fatal':
        return { action: 'fail' }
      case 'resource':
        if (attempt >= this.settings.resourceMaxAttempts) return { action: 'fail' }
        return { action: 'retry', delayMs: this.backoff(attempt) }
      case 'transient':
        if (attempt >= this.settings.maxAttempts) return { action: 'fail' }
        if (input.reason === 'timeout' && input.timeouts >= this.settings.maxTimeoutAttempts) {
          return { action: 'fail' }
        }
        return { action: 'retry', delayMs: this.backoff(attempt) }
    }
  }

  /** `baseDelayMs * 2^(attempt-1)`, capped at `maxDelayMs`. */
  backoff(attempt: number): number {
    const exponent = Math.max(0, attempt - 1)
    return Math.min(this.settings.maxDelayMs, this.settings.baseDelayMs * 2 ** exponent)
  }
}
