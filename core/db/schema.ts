export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS jobs (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  current_stage TEXT,
  input_spec TEXT NOT NULL,
  editable_spec TEXT,
  error_kind TEXT,
  error_message TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE TABLE IF NOT EXISTS job_queue (
  job_id TEXT PRIMARY KEY,
  queue_index INTEGER NOT NULL,
  enqueued_at TEXT NOT NULL,
  claimed_by TEXT,
  claimed_at TEXT,
  heartbeat_at TEXT,
  lease_expires_at TEXT,
  next_attempt_at TEXT,
  worker_slot INTEGER,
  FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS stage_attempts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  job_id TEXT NOT NULL,
  stage_name TEXT NOT NULL,
  attempt INTEGER NOT NULL,
  status TEXT NOT NULL,
  worker_id TEXT NOT NULL,
  started_at TEXT NOT NULL,
  ended_at TEXT,
  duration_ms INTEGER,
  error_kind TEXT,
  error_reason TEXT,
  error_message TEXT,
  FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS artifacts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  job_id TEXT NOT NULL,
  stage_name TEXT NOT NULL,
  attempt_id INTEGER NOT NULL,
  artifact_type TEXT NOT NULL,
  name TEXT NOT NULL,
  locator TEXT NOT NULL UNIQUE,
  file_size INTEGER NOT NULL,
  mime_type TEXT,
  state TEXT NOT NULL,
  version INTEGER,
  created_at TEXT NOT NULL,
  FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE,
  FOREIGN KEY(attempt_id) REFERENCES stage_attempts(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at DESC);
CREATE INDEX IF NOT EXISTS idx_job_queue_index ON job_queue(queue_index);
CREATE INDEX IF NOT EXISTS idx_stage_attempts_job_stage ON stage_attempts(job_id, stage_name);
CREATE INDEX IF NOT EXISTS idx_artifacts_job_stage ON artifacts(job_id, stage_name);
`

/** Lookups by attempt and by retry due time. */
export const ATTEMPT_INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_artifacts_attempt ON artifacts(attempt_id, state);
CREATE INDEX IF NOT EXISTS idx_stage_attempts_status ON stage_attempts(status);
CREATE INDEX IF NOT EXISTS idx_job_queue_next_attempt ON job_queue(next_attempt_at);
`
