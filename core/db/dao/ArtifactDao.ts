import type Database from 'better-sqlite3'
import type { ArtifactRecord, ArtifactState, ArtifactType, StageName } from '../types'

interface ArtifactRow {
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

const ARTIFACT_COLUMNS = `
  id,
  job_id AS jobId,
  stage_name AS stageName,
  attempt_id AS attemptId,
  artifact_type AS artifactType,
  name,
  locator,
  file_size AS fileSize,
  mime_type AS mimeType,
  state,
  version,
  created_at AS createdAt
`

function mapArtifact(row: ArtifactRow): ArtifactRecord {
  return {
    id: row.id,
    jobId: row.jobId,
    stageName: row.stageName,
    attemptId: row.attemptId,
    artifactType: row.artifactType,
    name: row.name,
    locator: row.locator,
    fileSize: row.fileSize,
    mimeType: row.mimeType,
    state: row.state,
    version: row.version,
    createdAt: row.createdAt,
  }
}

export class ArtifactDao {
  constructor(private readonly db: Database.Database) {}

  addPending(input: {
    jobId: string
    stageName: StageName
    attemptId: number
    artifactType: ArtifactType
    name: string
    locator: string
    fileSize: number
    mimeType?: string | null
  }): ArtifactRecord {
    const now = new Date().toISOString()
    const info = this.db
      .prepare(
        `
        INSERT INTO artifacts(
          job_id, stage_name, attempt_id, artifact_type, name, locator,
          file_size, mime_type, state, version, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', NULL, ?)
      `,
      )
      .run(
        input.jobId,
        input.stageName,
        input.attemptId,
        input.artifactType,
        input.name,
        input.locator,
        input.fileSize,
        input.mimeType ?? null,
        now,
      )

    return this.getArtifactById(Number(info.lastInsertRowid))
  }

  /**
   * Promote the pending artifacts of an attempt. They all share the next
   * version number of their stage; earlier versions stay untouched.
   */
  commitAttempt(jobId: string, stageName: StageName, attemptId: number): number {
    const row = this.db
      .prepare(
        `
        SELECT COALESCE(MAX(version), 0) AS latest
        FROM artifacts
        WHERE job_id = ? AND stage_name = ? AND state = 'complete'
      `,
      )
      .get(jobId, stageName) as { latest: number }

    const version = row.latest + 1
    this.db
      .prepare(
        `
        UPDATE artifacts
        SET state = 'complete', version = ?
        WHERE attempt_id = ? AND state = 'pending'
      `,
      )
      .run(version, attemptId)

    return version
  }

  discardAttempt(attemptId: number): number {
    const info = this.db
      .prepare(`UPDATE artifacts SET state = 'discarded' WHERE attempt_id = ? AND state = 'pending'`)
      .run(attemptId)
    return info.changes
  }

  /** Discard pending artifacts whose attempt is no longer running. */
  discardSettledPending(): number {
    const info = this.db
      .prepare(
        `
        UPDATE artifacts
        SET state = 'discarded'
        WHERE state = 'pending'
          AND attempt_id IN (SELECT id FROM stage_attempts WHERE status != 'running')
      `,
      )
      .run()
    return info.changes
  }

  /** Stages with at least one complete artifact version. */
  listCompletedStages(jobId: string): StageName[] {
    const rows = this.db
      .prepare(
        `
        SELECT DISTINCT stage_name AS stageName
        FROM artifacts
        WHERE job_id = ? AND state = 'complete'
      `,
      )
      .all(jobId) as Array<{ stageName: StageName }>

    return rows.map((row) => row.stageName)
  }

  /** Complete artifacts of the newest version of every stage. */
  listLatestComplete(jobId: string): ArtifactRecord[] {
    const rows = this.db
      .prepare(
        `
        SELECT ${ARTIFACT_COLUMNS}
        FROM artifacts a
        WHERE a.job_id = ?
          AND a.state = 'complete'
          AND a.version = (
            SELECT MAX(b.version) FROM artifacts b
            WHERE b.job_id = a.job_id AND b.stage_name = a.stage_name AND b.state = 'complete'
          )
        ORDER BY a.id ASC
      `,
      )
      .all(jobId) as ArtifactRow[]

    return rows.map(mapArtifact)
  }

  listArtifacts(jobId: string, state?: ArtifactState): ArtifactRecord[] {
    const rows = (
      state
        ? this.db
          .prepare(`SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE job_id = ? AND state = ? ORDER BY id ASC`)
          .all(jobId, state)
        : this.db
          .prepare(`SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE job_id = ? ORDER BY id ASC`)
          .all(jobId)
    ) as ArtifactRow[]

    return rows.map(mapArtifact)
  }

  listByAttempt(attemptId: number): ArtifactRecord[] {
    const rows = this.db
      .prepare(`SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE attempt_id = ? ORDER BY id ASC`)
      .all(attemptId) as ArtifactRow[]

    return rows.map(mapArtifact)
  }

  findByLocator(locator: string): ArtifactRecord | null {
    const row = this.db
      .prepare(`SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE locator = ?`)
      .get(locator) as ArtifactRow | undefined

    return row ? mapArtifact(row) : null
  }

  private getArtifactById(id: number): ArtifactRecord {
    const row = this.db
      .prepare(`SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE id = ?`)
      .get(id) as ArtifactRow | undefined

    if (!row) {
      throw new Error(`Artifact not found: ${id}`)
    }

    return mapArtifact(row)
  }
}
