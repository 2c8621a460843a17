import type Database from 'better-sqlite3'
import type { QueueEntryRecord } from '../types'

interface QueueEntryRow {
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

const QUEUE_COLUMNS = `
  q.job_id AS jobId,
  q.queue_index AS queueIndex,
  q.enqueued_at AS enqueuedAt,
  q.claimed_by AS claimedBy,
  q.claimed_at AS claimedAt,
  q.heartbeat_at AS heartbeatAt,
  q.lease_expires_at AS leaseExpiresAt,
  q.next_attempt_at AS nextAttemptAt,
  q.worker_slot AS workerSlot
`

function mapQueueEntry(row: QueueEntryRow): QueueEntryRecord {
  return {
    jobId: row.jobId,
    queueIndex: row.queueIndex,
    enqueuedAt: row.enqueuedAt,
    claimedBy: row.claimedBy,
    claimedAt: row.claimedAt,
    heartbeatAt: row.heartbeatAt,
    leaseExpiresAt: row.leaseExpiresAt,
    nextAttemptAt: row.nextAttemptAt,
    workerSlot: row.workerSlot,
  }
}

/**
 * Dispatch queue and claim table. A row exists while a job may still need a
 * worker; claims are leased and taken with a single conditional UPDATE so that
 * concurrent dispatchers (in this or another process) cannot both win.
 */
export class JobQueueDao {
  constructor(private readonly db: Database.Database) {}

  ensureEnqueued(jobId: string, now: Date = new Date()): QueueEntryRecord {
    const run = this.db.transaction(() => {
      const existed = this.findByJobId(jobId)
      if (existed) return

      const maxIndexRow = this.db
        .prepare('SELECT COALESCE(MAX(queue_index), -1) AS maxIndex FROM job_queue')
        .get() as { maxIndex: number }

      this.db
        .prepare(
          `
          INSERT INTO job_queue(
            job_id, queue_index, enqueued_at, claimed_by, claimed_at,
            heartbeat_at, lease_expires_at, next_attempt_at, worker_slot
          ) VALUES (?, ?, ?, NULL, NULL, NULL, NULL, NULL, NULL)
        `,
        )
        .run(jobId, maxIndexRow.maxIndex + 1, now.toISOString())
    })

    run()
    return this.getByJobId(jobId)
  }

  /**
   * Entries a dispatcher may try to claim right now: dispatchable job status,
   * no live claim, and any retry backoff elapsed. First-come order.
   */
  listClaimable(limit: number, now: Date = new Date()): QueueEntryRecord[] {
    const safeLimit = Math.max(1, Math.min(100, Math.floor(limit)))
    const nowIso = now.toISOString()
    const rows = this.db
      .prepare(
        `
        SELECT ${QUEUE_COLUMNS}
        FROM job_queue q
        INNER JOIN jobs j ON j.id = q.job_id
        WHERE j.status IN ('queued', 'running')
          AND (q.claimed_by IS NULL OR q.lease_expires_at < ?)
          AND (q.next_attempt_at IS NULL OR q.next_attempt_at <= ?)
        ORDER BY q.queue_index ASC
        LIMIT ?
      `,
      )
      .all(nowIso, nowIso, safeLimit) as QueueEntryRow[]

    return rows.map(mapQueueEntry)
  }

  /** Compare-and-set claim. Returns true only for the single winning caller. */
  tryClaim(
    jobId: string,
    workerId: string,
    leaseMs: number,
    workerSlot: number | null,
    now: Date = new Date(),
  ): boolean {
    const nowIso = now.toISOString()
    const leaseExpiresAt = new Date(now.getTime() + Math.max(1, leaseMs)).toISOString()
    const info = this.db
      .prepare(
        `
        UPDATE job_queue
        SET
          claimed_by = ?,
          claimed_at = ?,
          heartbeat_at = ?,
          lease_expires_at = ?,
          worker_slot = ?
        WHERE job_id = ?
          AND (claimed_by IS NULL OR lease_expires_at < ?)
          AND (next_attempt_at IS NULL OR next_attempt_at <= ?)
          AND EXISTS (
            SELECT 1 FROM jobs j WHERE j.id = job_queue.job_id AND j.status IN ('queued', 'running')
          )
      `,
      )
      .run(workerId, nowIso, nowIso, leaseExpiresAt, workerSlot, jobId, nowIso, nowIso)

    return info.changes === 1
  }

  renewLease(jobId: string, workerId: string, leaseMs: number, now: Date = new Date()): boolean {
    const leaseExpiresAt = new Date(now.getTime() + Math.max(1, leaseMs)).toISOString()
    const info = this.db
      .prepare(
        `
        UPDATE job_queue
        SET heartbeat_at = ?, lease_expires_at = ?
        WHERE job_id = ? AND claimed_by = ?
      `,
      )
      .run(now.toISOString(), leaseExpiresAt, jobId, workerId)

    return info.changes === 1
  }

  isClaimedBy(jobId: string, workerId: string): boolean {
    const row = this.db
      .prepare('SELECT claimed_by AS claimedBy FROM job_queue WHERE job_id = ?')
      .get(jobId) as { claimedBy: string | null } | undefined

    return row?.claimedBy === workerId
  }

  /**
   * Drop the claim held by this worker. `nextAttemptAt` parks the entry until a
   * retry backoff elapses.
   */
  release(jobId: string, workerId: string, nextAttemptAt: string | null = null): boolean {
    const info = this.db
      .prepare(
        `
        UPDATE job_queue
        SET
          claimed_by = NULL,
          claimed_at = NULL,
          heartbeat_at = NULL,
          lease_expires_at = NULL,
          worker_slot = NULL,
          next_attempt_at = ?
        WHERE job_id = ? AND claimed_by = ?
      `,
      )
      .run(nextAttemptAt, jobId, workerId)

    return info.changes === 1
  }

  /** Clear claims whose lease ran out. With `releaseAll` every claim is cleared. */
  releaseExpiredClaims(now: Date = new Date(), releaseAll = false): string[] {
    const run = this.db.transaction(() => {
      const rows = (
        releaseAll
          ? this.db.prepare('SELECT job_id AS jobId FROM job_queue WHERE claimed_by IS NOT NULL').all()
          : this.db
            .prepare(
              'SELECT job_id AS jobId FROM job_queue WHERE claimed_by IS NOT NULL AND lease_expires_at < ?',
            )
            .all(now.toISOString())
      ) as Array<{ jobId: string }>

      const clear = this.db.prepare(
        `
        UPDATE job_queue
        SET claimed_by = NULL, claimed_at = NULL, heartbeat_at = NULL, lease_expires_at = NULL, worker_slot = NULL
        WHERE job_id = ?
      `,
      )
      for (const row of rows) {
        clear.run(row.jobId)
      }
      return rows.map((row) => row.jobId)
    })

    return run()
  }

  /** Earliest pending retry time among unclaimed entries, if any. */
  nextDueAt(): string | null {
    const row = this.db
      .prepare(
        `
        SELECT MIN(q.next_attempt_at) AS nextDueAt
        FROM job_queue q
        INNER JOIN jobs j ON j.id = q.job_id
        WHERE q.claimed_by IS NULL
          AND q.next_attempt_at IS NOT NULL
          AND j.status IN ('queued', 'running')
      `,
      )
      .get() as { nextDueAt: string | null } | undefined

    return row?.nextDueAt ?? null
  }

  /** Drop entries of jobs that reached a terminal status. */
  removeTerminal(): string[] {
    const run = this.db.transaction(() => {
      const rows = this.db
        .prepare(
          `
          SELECT q.job_id AS jobId
          FROM job_queue q
          INNER JOIN jobs j ON j.id = q.job_id
          WHERE j.status IN ('completed', 'failed', 'cancelled')
        `,
        )
        .all() as Array<{ jobId: string }>
      const remove = this.db.prepare('DELETE FROM job_queue WHERE job_id = ?')
      for (const row of rows) {
        remove.run(row.jobId)
      }
      return rows.map((row) => row.jobId)
    })

    return run()
  }

  remove(jobId: string): boolean {
    const info = this.db.prepare('DELETE FROM job_queue WHERE job_id = ?').run(jobId)
    return info.changes > 0
  }

  findByJobId(jobId: string): QueueEntryRecord | null {
    const row = this.db
      .prepare(`SELECT ${QUEUE_COLUMNS} FROM job_queue q WHERE q.job_id = ?`)
      .get(jobId) as QueueEntryRow | undefined

    return row ? mapQueueEntry(row) : null
  }

  getByJobId(jobId: string): QueueEntryRecord {
    const entry = this.findByJobId(jobId)
    if (!entry) {
      throw new Error(`Queue entry not found: ${jobId}`)
    }
    return entry
  }

  listAll(): QueueEntryRecord[] {
    const rows = this.db
      .prepare(`SELECT ${QUEUE_COLUMNS} FROM job_queue q ORDER BY q.queue_index ASC`)
      .all() as QueueEntryRow[]

    return rows.map(mapQueueEntry)
  }
}
