import Database from 'better-sqlite3'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { getSchemaVersion, LATEST_SCHEMA_VERSION, runMigrations } from '../migrate'

describe('runMigrations', () => {
  let db: Database.Database

  beforeEach(() => {
    db = new Database(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('applies every version once', () => {
    expect(runMigrations(db)).toBe(2)
    expect(runMigrations(db)).toBe(2)

    const versions = db.prepare('SELECT version FROM schema_migrations ORDER BY version').pluck().all()
    expect(versions).toEqual([1, 2])
    expect(getSchemaVersion(db)).toBe(LATEST_SCHEMA_VERSION)
  })

  it('refuses a database from a newer release', () => {
    runMigrations(db)
    db.prepare('INSERT INTO schema_migrations(version, applied_at) VALUES (?, ?)').run(99, '2026-01-01T00:00:00.000Z')

    expect(() => runMigrations(db)).toThrow('Database schema version 99 is newer than supported (2)')
  })
})
