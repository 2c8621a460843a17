import type Database from 'better-sqlite3'
import { PIPELINE_STAGES } from '../../../shared/specs'
import type { AppSettings, RetrySettings, StageName } from '../types'

interface SettingRow {
  key: string
  value: string
}

const DEFAULT_SETTINGS: AppSettings = {
  openaiApiKey: '',
  openaiApiBaseUrl: 'https://api.openai.com/v1',
  transcribeModelId: 'whisper-1',
  chatModelId: 'gpt-4o-mini',
  imageModelId: 'dall-e-3',
  requestTimeoutMs: 120_000,
  ytDlpPath: 'yt-dlp',
  ffmpegPath: 'ffmpeg',
  wordsPerScene: 20,
  workerConcurrency: 2,
  leaseTimeoutMs: 60_000,
  heartbeatIntervalMs: 15_000,
  pollIntervalMs: 5_000,
  stageTimeoutMs: 10 * 60 * 1000,
  stageTimeoutOverrides: {},
  abortGraceMs: 30_000,
  retryPolicy: {
    maxAttempts: 3,
    maxTimeoutAttempts: 2,
    resourceMaxAttempts: 2,
    baseDelayMs: 2_000,
    maxDelayMs: 60_000,
  },
}

function decodeSettingValue(value: string): unknown {
  try {
    return JSON.parse(value)
  } catch {
    return value
  }
}

function encodeSettingValue(value: unknown): string {
  return JSON.stringify(value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStageName(value: string): value is StageName {
  return PIPELINE_STAGES.some((stage) => stage === value)
}

function assertString(value: unknown, key: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string`)
  }
}

function assertNonEmptyString(value: unknown, key: string): asserts value is string {
  assertString(value, key)
  if (!value.trim()) {
    throw new Error(`${key} cannot be empty`)
  }
}

function assertPositiveInteger(value: unknown, key: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer`)
  }
}

function assertBaseUrl(value: unknown): asserts value is string {
  assertNonEmptyString(value, 'openaiApiBaseUrl')
  try {
    const parsed = new URL(value)
    if (parsed.protocol === 'http:' || parsed.protocol === 'https:') return
  } catch {
    throw new Error('openaiApiBaseUrl must be a valid URL')
  }
  throw new Error('openaiApiBaseUrl must use http or https')
}

function parseStageTimeoutOverrides(value: unknown): Partial<Record<StageName, number>> {
  if (!isRecord(value)) {
    throw new Error('stageTimeoutOverrides must be an object')
  }
  const overrides: Partial<Record<StageName, number>> = {}
  for (const [key, timeout] of Object.entries(value)) {
    if (!isStageName(key)) {
      throw new Error(`stageTimeoutOverrides has unknown stage: ${key}`)
    }
    assertPositiveInteger(timeout, `stageTimeoutOverrides.${key}`)
    overrides[key] = timeout
  }
  return overrides
}

function parseRetryPolicy(value: unknown, base: RetrySettings): RetrySettings {
  if (!isRecord(value)) {
    throw new Error('retryPolicy must be an object')
  }
  const merged: RetrySettings = { ...base }
  const { maxAttempts, maxTimeoutAttempts, resourceMaxAttempts, baseDelayMs, maxDelayMs } = value
  if (maxAttempts !== undefined) {
    assertPositiveInteger(maxAttempts, 'retryPolicy.maxAttempts')
    merged.maxAttempts = maxAttempts
  }
  if (maxTimeoutAttempts !== undefined) {
    assertPositiveInteger(maxTimeoutAttempts, 'retryPolicy.maxTimeoutAttempts')
    merged.maxTimeoutAttempts = maxTimeoutAttempts
  }
  if (resourceMaxAttempts !== undefined) {
    assertPositiveInteger(resourceMaxAttempts, 'retryPolicy.resourceMaxAttempts')
    merged.resourceMaxAttempts = resourceMaxAttempts
  }
  if (baseDelayMs !== undefined) {
    assertPositiveInteger(baseDelayMs, 'retryPolicy.baseDelayMs')
    merged.baseDelayMs = baseDelayMs
  }
  if (maxDelayMs !== undefined) {
    assertPositiveInteger(maxDelayMs, 'retryPolicy.maxDelayMs')
    merged.maxDelayMs = maxDelayMs
  }
  if (merged.maxDelayMs < merged.baseDelayMs) {
    throw new Error('retryPolicy.maxDelayMs must be >= retryPolicy.baseDelayMs')
  }
  return merged
}

/**
 * Validate a partial settings object field by field and merge it over `base`.
 * Unknown keys are rejected.
 */
function applySettingsPatch(base: AppSettings, patch: Record<string, unknown>): AppSettings {
  const next: AppSettings = {
    ...base,
    stageTimeoutOverrides: { ...base.stageTimeoutOverrides },
    retryPolicy: { ...base.retryPolicy },
  }

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue
    switch (key) {
      case 'openaiApiKey':
        assertString(value, key)
        next.openaiApiKey = value.trim()
        break
      case 'openaiApiBaseUrl':
        assertBaseUrl(value)
        next.openaiApiBaseUrl = value.trim().replace(/\/+$/, '')
        break
      case 'transcribeModelId':
      case 'chatModelId':
      case 'imageModelId':
      case 'ytDlpPath':
      case 'ffmpegPath':
        assertNonEmptyString(value, key)
        next[key] = value.trim()
        break
      case 'requestTimeoutMs':
      case 'wordsPerScene':
      case 'workerConcurrency':
      case 'leaseTimeoutMs':
      case 'heartbeatIntervalMs':
      case 'pollIntervalMs':
      case 'stageTimeoutMs':
      case 'abortGraceMs':
        assertPositiveInteger(value, key)
        next[key] = value
        break
      case 'stageTimeoutOverrides':
        next.stageTimeoutOverrides = parseStageTimeoutOverrides(value)
        break
      case 'retryPolicy':
        next.retryPolicy = parseRetryPolicy(value, next.retryPolicy)
        break
      default:
        throw new Error(`Unknown setting: ${key}`)
    }
  }

  if (next.heartbeatIntervalMs >= next.leaseTimeoutMs) {
    throw new Error('heartbeatIntervalMs must be shorter than leaseTimeoutMs')
  }

  return next
}

export class SettingsDao {
  constructor(private readonly db: Database.Database) {}

  initializeDefaults(): AppSettings {
    const now = new Date().toISOString()
    const statement = this.db.prepare(
      `
      INSERT INTO settings(key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO NOTHING
    `,
    )

    for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
      statement.run(key, encodeSettingValue(value), now)
    }

    return this.getSettings()
  }

  getSettings(): AppSettings {
    const rows = this.db.prepare('SELECT key, value FROM settings').all() as SettingRow[]
    const persisted: Record<string, unknown> = {}
    for (const row of rows) {
      persisted[row.key] = decodeSettingValue(row.value)
    }
    return applySettingsPatch(DEFAULT_SETTINGS, persisted)
  }

  upsertSettings(patch: Record<string, unknown>): AppSettings {
    const candidate = applySettingsPatch(this.getSettings(), patch)

    const now = new Date().toISOString()
    const statement = this.db.prepare(`
      INSERT INTO settings(key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `)

    const write = this.db.transaction(() => {
      for (const [key, value] of Object.entries(candidate)) {
        if (patch[key] === undefined) continue
        statement.run(key, encodeSettingValue(value), now)
      }
    })
    write()

    return this.getSettings()
  }

  /** Problems that keep the provider-backed stages from running. */
  validateProviderSettings(settings: AppSettings = this.getSettings()): string[] {
    const errors: string[] = []
    if (!settings.openaiApiKey) {
      errors.push('openaiApiKey is required')
    }
    if (!settings.openaiApiBaseUrl) {
      errors.push('openaiApiBaseUrl is required')
    }
    return errors
  }
}

export { DEFAULT_SETTINGS }
