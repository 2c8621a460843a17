import type Database from 'better-sqlite3'
import type {
  AttemptStatus,
  ErrorKind,
  StageAttemptRecord,
  StageName,
  TransientReason,
} from '../types'

interface StageAttemptRow {
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

const ATTEMPT_COLUMNS = `
  id,
  job_id AS jobId,
  stage_name AS stageName,
  attempt,
  status,
  worker_id AS workerId,
  started_at AS startedAt,
  ended_at AS endedAt,
  duration_ms AS durationMs,
  error_kind AS errorKind,
  error_reason AS errorReason,
  error_message AS errorMessage
`

function mapAttempt(row: StageAttemptRow): StageAttemptRecord {
  return {
    id: row.id,
    jobId: row.jobId,
    stageName: row.stageName,
    attempt: row.attempt,
    status: row.status,
    workerId: row.workerId,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    durationMs: row.durationMs,
    errorKind: row.errorKind,
    errorReason: row.errorReason,
    errorMessage: row.errorMessage,
  }
}

function calculateDurationMs(startedAt: string, endedAt: string): number | null {
  const startMs = Date.parse(startedAt)
  const endMs = Date.parse(endedAt)
  if (Number.isNaN(startMs) || Number.isNaN(endMs)) return null
  return Math.max(0, endMs - startMs)
}

export interface AttemptError {
  kind: ErrorKind
  reason?: TransientReason | null
  message: string
}

export class StageAttemptDao {
  constructor(private readonly db: Database.Database) {}

  /**
   * Executions of the stage since it last succeeded, interrupted ones
   * included. Numbers the next attempt.
   */
  countAttemptsSinceSuccess(jobId: string, stageName: StageName): number {
    return this.countSinceSuccess(jobId, stageName, '')
  }

  /** Failed executions since the last success; the retry budget. */
  countFailuresSinceSuccess(jobId: string, stageName: StageName): number {
    return this.countSinceSuccess(jobId, stageName, "AND status = 'failed'")
  }

  countTimeoutsSinceSuccess(jobId: string, stageName: StageName): number {
    return this.countSinceSuccess(jobId, stageName, "AND status = 'failed' AND error_reason = 'timeout'")
  }

  private countSinceSuccess(jobId: string, stageName: StageName, filter: string): number {
    const row = this.db
      .prepare(
        `
        SELECT COUNT(1) AS total
        FROM stage_attempts
        WHERE job_id = ?
          AND stage_name = ?
          ${filter}
          AND id > COALESCE(
            (SELECT MAX(id) FROM stage_attempts WHERE job_id = ? AND stage_name = ? AND status = 'success'),
            0
          )
      `,
      )
      .get(jobId, stageName, jobId, stageName) as { total: number }

    return row.total
  }

  /** Attempt number of the latest execution of every stage that has run. */
  latestAttemptNumbers(jobId: string): Partial<Record<StageName, number>> {
    const rows = this.db
      .prepare(
        `
        SELECT stage_name AS stageName, MAX(attempt) AS attempt
        FROM stage_attempts
        WHERE job_id = ?
        GROUP BY stage_name
      `,
      )
      .all(jobId) as Array<{ stageName: StageName; attempt: number }>

    const result: Partial<Record<StageName, number>> = {}
    for (const row of rows) {
      result[row.stageName] = row.attempt
    }
    return result
  }

  startAttempt(jobId: string, stageName: StageName, workerId: string): StageAttemptRecord {
    const attempt = this.countAttemptsSinceSuccess(jobId, stageName) + 1
    const now = new Date().toISOString()
    const info = this.db
      .prepare(
        `
        INSERT INTO stage_attempts(
          job_id, stage_name, attempt, status, worker_id, started_at,
          ended_at, duration_ms, error_kind, error_reason, error_message
        ) VALUES (?, ?, ?, 'running', ?, ?, NULL, NULL, NULL, NULL, NULL)
      `,
      )
      .run(jobId, stageName, attempt, workerId, now)

    return this.getAttempt(Number(info.lastInsertRowid))
  }

  finishAttempt(
    attemptId: number,
    status: Exclude<AttemptStatus, 'running'>,
    error?: AttemptError | null,
  ): StageAttemptRecord {
    const current = this.getAttempt(attemptId)
    const endedAt = new Date().toISOString()

    this.db
      .prepare(
        `
        UPDATE stage_attempts
        SET status = ?, ended_at = ?, duration_ms = ?, error_kind = ?, error_reason = ?, error_message = ?
        WHERE id = ?
      `,
      )
      .run(
        status,
        endedAt,
        calculateDurationMs(current.startedAt, endedAt),
        error?.kind ?? null,
        error?.reason ?? null,
        error?.message ?? null,
        attemptId,
      )

    return this.getAttempt(attemptId)
  }

  /** Close attempts left `running` by a worker that is gone. */
  interruptRunningAttempts(jobId: string): StageAttemptRecord[] {
    const rows = this.db
      .prepare(`SELECT ${ATTEMPT_COLUMNS} FROM stage_attempts WHERE job_id = ? AND status = 'running'`)
      .all(jobId) as StageAttemptRow[]

    return rows.map((row) =>
      this.finishAttempt(row.id, 'interrupted', {
        kind: 'transient',
        reason: 'unavailable',
        message: 'Worker lease expired before the stage settled',
      }),
    )
  }

  listAttempts(jobId: string): StageAttemptRecord[] {
    const rows = this.db
      .prepare(`SELECT ${ATTEMPT_COLUMNS} FROM stage_attempts WHERE job_id = ? ORDER BY id ASC`)
      .all(jobId) as StageAttemptRow[]

    return rows.map(mapAttempt)
  }

  getAttempt(attemptId: number): StageAttemptRecord {
    const row = this.db
      .prepare(`SELECT ${ATTEMPT_COLUMNS} FROM stage_attempts WHERE id = ?`)
      .get(attemptId) as StageAttemptRow | undefined

    if (!row) {
      throw new Error(`Stage attempt not found: ${attemptId}`)
    }

    return mapAttempt(row)
  }
}
