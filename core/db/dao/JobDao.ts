import { randomUUID } from 'node:crypto'
import type Database from 'better-sqlite3'
import { parseEditableSpec, parseInputSpec } from '../../../shared/specs'
import type {
  EditableSpec,
  ErrorKind,
  HistoryListResult,
  HistoryQuery,
  InputSpec,
  JobRecord,
  JobStatus,
  StageName,
} from '../types'

interface JobRow {
  id: string
  status: JobStatus
  currentStage: StageName | null
  inputSpec: string
  editableSpec: string | null
  errorKind: ErrorKind | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  completedAt: string | null
}

const JOB_COLUMNS = `
  id,
  status,
  current_stage AS currentStage,
  input_spec AS inputSpec,
  editable_spec AS editableSpec,
  error_kind AS errorKind,
  error_message AS errorMessage,
  created_at AS createdAt,
  updated_at AS updatedAt,
  completed_at AS completedAt
`

function decodeInputSpec(jobId: string, raw: string): InputSpec {
  const parsed = parseInputSpec(JSON.parse(raw))
  if (!parsed.ok) {
    throw new Error(`Corrupt input spec for job ${jobId}: ${parsed.reason}`)
  }
  return parsed.value
}

function decodeEditableSpec(jobId: string, raw: string | null): EditableSpec | null {
  if (!raw) return null
  const parsed = parseEditableSpec(JSON.parse(raw))
  if (!parsed.ok) {
    throw new Error(`Corrupt editable spec for job ${jobId}: ${parsed.reason}`)
  }
  return parsed.value
}

function sanitizePagination(page?: number, pageSize?: number): { page: number; pageSize: number } {
  const safePage = typeof page === 'number' && Number.isFinite(page) ? Math.max(1, Math.floor(page)) : 1
  const safePageSize =
    typeof pageSize === 'number' && Number.isFinite(pageSize)
      ? Math.min(100, Math.max(1, Math.floor(pageSize)))
      : 20
  return { page: safePage, pageSize: safePageSize }
}

function mapJob(row: JobRow): JobRecord {
  return {
    id: row.id,
    status: row.status,
    currentStage: row.currentStage,
    inputSpec: decodeInputSpec(row.id, row.inputSpec),
    editableSpec: decodeEditableSpec(row.id, row.editableSpec),
    errorKind: row.errorKind,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    completedAt: row.completedAt,
  }
}

export interface JobPatch {
  status?: JobStatus
  currentStage?: StageName | null
  editableSpec?: EditableSpec | null
  errorKind?: ErrorKind | null
  errorMessage?: string | null
  completedAt?: string | null
}

export class JobDao {
  constructor(private readonly db: Database.Database) {}

  createJob(inputSpec: InputSpec): JobRecord {
    const id = randomUUID()
    const now = new Date().toISOString()

    this.db
      .prepare(
        `
        INSERT INTO jobs(
          id, status, current_stage, input_spec, editable_spec,
          error_kind, error_message, created_at, updated_at, completed_at
        )
        VALUES (?, 'queued', NULL, ?, NULL, NULL, NULL, ?, ?, NULL)
      `,
      )
      .run(id, JSON.stringify(inputSpec), now, now)

    return this.getJobById(id)
  }

  /**
   * Write the given fields. Transition legality is checked by the caller; this
   * is the raw persistence step.
   */
  updateJob(jobId: string, patch: JobPatch): JobRecord {
    const current = this.getJobById(jobId)
    const now = new Date().toISOString()

    const editableSpec =
      patch.editableSpec !== undefined ? patch.editableSpec : current.editableSpec

    this.db
      .prepare(
        `
        UPDATE jobs
        SET
          status = ?,
          current_stage = ?,
          editable_spec = ?,
          error_kind = ?,
          error_message = ?,
          completed_at = ?,
          updated_at = ?
        WHERE id = ?
      `,
      )
      .run(
        patch.status ?? current.status,
        patch.currentStage !== undefined ? patch.currentStage : current.currentStage,
        editableSpec ? JSON.stringify(editableSpec) : null,
        patch.errorKind !== undefined ? patch.errorKind : current.errorKind,
        patch.errorMessage !== undefined ? patch.errorMessage : current.errorMessage,
        patch.completedAt !== undefined ? patch.completedAt : current.completedAt,
        now,
        jobId,
      )

    return this.getJobById(jobId)
  }

  findJobById(jobId: string): JobRecord | null {
    const row = this.db
      .prepare(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = ?`)
      .get(jobId) as JobRow | undefined

    return row ? mapJob(row) : null
  }

  getJobById(jobId: string): JobRecord {
    const job = this.findJobById(jobId)
    if (!job) {
      throw new Error(`Job not found: ${jobId}`)
    }
    return job
  }

  listNonTerminalJobs(): JobRecord[] {
    const rows = this.db
      .prepare(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs
        WHERE status IN ('queued', 'running', 'awaiting_input')
        ORDER BY created_at ASC
      `,
      )
      .all() as JobRow[]

    return rows.map(mapJob)
  }

  listJobs(query: HistoryQuery = {}): HistoryListResult {
    const { page, pageSize } = sanitizePagination(query.page, query.pageSize)
    const where = query.status ? 'WHERE status = ?' : ''
    const params: unknown[] = query.status ? [query.status] : []

    const totalRow = this.db
      .prepare(`SELECT COUNT(1) AS total FROM jobs ${where}`)
      .get(...params) as { total: number }

    const rows = this.db
      .prepare(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs
        ${where}
        ORDER BY created_at DESC, id DESC
        LIMIT ? OFFSET ?
      `,
      )
      .all(...params, pageSize, (page - 1) * pageSize) as JobRow[]

    return {
      items: rows.map(mapJob),
      total: totalRow.total,
      page,
      pageSize,
    }
  }
}
