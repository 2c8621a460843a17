import type Database from 'better-sqlite3'
import { ATTEMPT_INDEXES_SQL, SCHEMA_SQL } from './schema'

interface Migration {
  version: number
  sql: string
}

const MIGRATIONS: readonly Migration[] = [
  { version: 1, sql: SCHEMA_SQL },
  { version: 2, sql: ATTEMPT_INDEXES_SQL },
]

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version

export function getSchemaVersion(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `)
  const row = db.prepare('SELECT COALESCE(MAX(version), 0) AS version FROM schema_migrations').get() as {
    version: number
  }
  return row.version
}

/**
 * Bring the database up to the latest schema. Each step runs in its own
 * transaction together with its version row.
 */
export function runMigrations(db: Database.Database): number {
  const current = getSchemaVersion(db)
  if (current > LATEST_SCHEMA_VERSION) {
    throw new Error(`Database schema version ${current} is newer than supported (${LATEST_SCHEMA_VERSION})`)
  }

  const record = db.prepare('INSERT INTO schema_migrations(version, applied_at) VALUES (?, ?)')
  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue
    db.transaction(() => {
      db.exec(migration.sql)
      record.run(migration.version, new Date().toISOString())
    })()
  }
  return LATEST_SCHEMA_VERSION
}
