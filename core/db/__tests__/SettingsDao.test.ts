import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { closeDatabase, type DatabaseContext, openDatabase } from '..'

describe('SettingsDao', () => {
  let context: DatabaseContext

  beforeEach(() => {
    context = openDatabase({ dbPath: ':memory:' })
  })

  afterEach(() => {
    closeDatabase(context)
  })

  it('starts from the defaults', () => {
    const settings = context.settingsDao.getSettings()

    expect(settings.workerConcurrency).toBe(2)
    expect(settings.openaiApiBaseUrl).toBe('https://api.openai.com/v1')
    expect(settings.retryPolicy.maxAttempts).toBe(3)
    expect(settings.abortGraceMs).toBe(30_000)
  })

  it('persists a validated patch and merges retry settings', () => {
    const updated = context.settingsDao.upsertSettings({
      openaiApiBaseUrl: 'http://localhost:8080/v1/',
      retryPolicy: { maxAttempts: 5 },
      stageTimeoutOverrides: { compose_video: 900_000 },
    })

    expect(updated.openaiApiBaseUrl).toBe('http://localhost:8080/v1')
    expect(updated.retryPolicy).toEqual({
      maxAttempts: 5,
      maxTimeoutAttempts: 2,
      resourceMaxAttempts: 2,
      baseDelayMs: 2_000,
      maxDelayMs: 60_000,
    })
    expect(context.settingsDao.getSettings().stageTimeoutOverrides).toEqual({ compose_video: 900_000 })
  })

  it('rejects unknown keys and invalid values without writing', () => {
    expect(() => context.settingsDao.upsertSettings({ colorTheme: 'dark' })).toThrow('Unknown setting: colorTheme')
    expect(() => context.settingsDao.upsertSettings({ workerConcurrency: 0 })).toThrow(
      'workerConcurrency must be a positive integer',
    )
    expect(() => context.settingsDao.upsertSettings({ openaiApiBaseUrl: 'ftp://example.test' })).toThrow(
      'openaiApiBaseUrl must use http or https',
    )
    expect(() => context.settingsDao.upsertSettings({ stageTimeoutOverrides: { render: 10 } })).toThrow(
      'stageTimeoutOverrides has unknown stage: render',
    )
    expect(context.settingsDao.getSettings().workerConcurrency).toBe(2)
  })

  it('requires the heartbeat to be shorter than the lease', () => {
    expect(() => context.settingsDao.upsertSettings({ heartbeatIntervalMs: 60_000 })).toThrow(
      'heartbeatIntervalMs must be shorter than leaseTimeoutMs',
    )
    expect(context.settingsDao.upsertSettings({ heartbeatIntervalMs: 100, leaseTimeoutMs: 500 }).leaseTimeoutMs).toBe(
      500,
    )
  })

  it('reports missing provider configuration', () => {
    expect(context.settingsDao.validateProviderSettings()).toEqual(['openaiApiKey is required'])

    context.settingsDao.upsertSettings({ openaiApiKey: 'test-secret' })
    expect(context.settingsDao.validateProviderSettings()).toEqual([])
  })
})
