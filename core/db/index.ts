import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrate'
import { ArtifactDao, JobDao, JobQueueDao, SettingsDao, StageAttemptDao } from './dao'

export interface DatabaseContext {
  dbPath: string
  db: Database.Database
  jobDao: JobDao
  jobQueueDao: JobQueueDao
  stageAttemptDao: StageAttemptDao
  artifactDao: ArtifactDao
  settingsDao: SettingsDao
}

export interface DatabaseOptions {
  dataRoot?: string
  /** Explicit file path, or `:memory:` for a throwaway database. */
  dbPath?: string
}

export function resolveDatabasePath(options: DatabaseOptions): string {
  if (options.dbPath) return options.dbPath
  if (!options.dataRoot) {
    throw new Error('Either dataRoot or dbPath is required')
  }
  return path.join(options.dataRoot, 'pipeline.db')
}

export function openDatabase(options: DatabaseOptions): DatabaseContext {
  const dbPath = resolveDatabasePath(options)
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 5000')

  runMigrations(db)

  const settingsDao = new SettingsDao(db)
  settingsDao.initializeDefaults()

  return {
    dbPath,
    db,
    jobDao: new JobDao(db),
    jobQueueDao: new JobQueueDao(db),
    stageAttemptDao: new StageAttemptDao(db),
    artifactDao: new ArtifactDao(db),
    settingsDao,
  }
}

export function closeDatabase(context: DatabaseContext): void {
  if (context.db.open) {
    context.db.close()
  }
}
