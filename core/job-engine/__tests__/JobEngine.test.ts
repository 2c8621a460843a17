import fs from 'node:fs/promises'
import path from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { FatalError, IllegalTransitionError, StageCancelledError, TransientError } from '../errors'
import type { PipelineRuntime } from '..'
import type { StageResult } from '../types'
import { StageWorker } from '../queue/StageWorker'
import {
  createTestRuntime,
  deferred,
  defaultStubStages,
  EXPECTED_FINAL_VIDEO,
  generatedPrompt,
  makeDataRoot,
  readFinalVideo,
  sleep,
  stubStage,
  TEST_SETTINGS,
  waitForStatus,
} from './pipelineHarness'

const SOURCE = { sourceUrl: 'https://video.example/watch?v=harbor', subtitleMode: 'none' }

describe('JobEngine', () => {
  const runtimes: PipelineRuntime[] = []
  const roots: string[] = []

  const setup = async (
    overrides: Parameters<typeof createTestRuntime>[1] = {},
    settings: Record<string, unknown> = {},
  ): Promise<PipelineRuntime> => {
    const root = await makeDataRoot()
    roots.push(root)
    const runtime = createTestRuntime(root, overrides, 'test-worker', settings)
    runtimes.push(runtime)
    return runtime
  }

  afterEach(async () => {
    for (const runtime of runtimes.splice(0)) {
      await runtime.shutdown()
    }
    for (const root of roots.splice(0)) {
      await fs.rm(root, { recursive: true, force: true })
    }
  })

  const runToReview = async (runtime: PipelineRuntime): Promise<string> => {
    const jobId = runtime.engine.submit(SOURCE)
    await waitForStatus(runtime, jobId, 'awaiting_input')
    return jobId
  }

  describe('submit', () => {
    it('creates a queued job with defaults filled in', async () => {
      const runtime = await setup()
      const jobId = runtime.engine.submit(SOURCE)

      const snapshot = runtime.engine.getStatus(jobId)
      expect(snapshot.status).toBe('queued')
      expect(snapshot.currentStage).toBeNull()
      expect(snapshot.inputSpec).toEqual({
        sourceUrl: 'https://video.example/watch?v=harbor',
        targetDurationSec: 60,
        subtitleMode: 'none',
        aspectRatio: '9:16',
        targetLanguage: 'en',
      })
      expect(runtime.context.jobQueueDao.findByJobId(jobId)?.claimedBy).toBeNull()
    })

    it('rejects an invalid input spec', async () => {
      const runtime = await setup()

      expect(() => runtime.engine.submit({ sourceUrl: 'not a url' })).toThrow('sourceUrl must be an http(s) URL')
      expect(runtime.engine.listJobs().total).toBe(0)
    })
  })

  it('pauses for review with one generated prompt per scene', async () => {
    const runtime = await setup()
    runtime.start()

    const snapshot = runtime.engine.getStatus(await runToReview(runtime))

    expect(snapshot.currentStage).toBe('segment_and_prompt')
    expect(snapshot.editableSpec?.scenes).toHaveLength(3)
    expect(snapshot.editableSpec?.scenes.map((scene) => scene.imagePrompt)).toEqual([
      generatedPrompt(0),
      generatedPrompt(1),
      generatedPrompt(2),
    ])
    expect(Object.keys(snapshot.artifacts).sort()).toEqual(['download', 'segment_and_prompt', 'transcribe', 'translate'])
    expect(runtime.context.jobQueueDao.findByJobId(snapshot.id)).toBeNull()
  })

  it('renders images from the edited prompt after resume', async () => {
    const runtime = await setup()
    runtime.start()
    const jobId = await runToReview(runtime)
    const review = runtime.engine.getStatus(jobId).editableSpec
    if (!review) throw new Error('missing editable spec')

    const scenes = review.scenes.map((scene) =>
      scene.index === 1 ? { ...scene, imagePrompt: 'a lighthouse at dusk, watercolor' } : scene,
    )
    expect(runtime.engine.updateEditableSpec(jobId, { ...review, scenes })).toEqual({ accepted: true })
    expect(runtime.engine.resume(jobId)).toEqual({ accepted: true })

    const done = await waitForStatus(runtime, jobId, 'completed')
    const image = done.artifacts.synthesize_images?.find((artifact) => artifact.name === 'scene_1.png')
    if (!image) throw new Error('missing scene image')

    expect((await runtime.engine.readArtifact(image.locator)).toString('utf8')).toBe('a lighthouse at dusk, watercolor')
    expect(await readFinalVideo(runtime, done)).toBe(
      `${generatedPrompt(0)}|a lighthouse at dusk, watercolor|${generatedPrompt(2)}`,
    )
    expect(done.completedAt).not.toBeNull()
  })

  it('retries transient image failures and records the attempt count', async () => {
    let calls = 0
    const images = defaultStubStages().synthesize_images
    const runtime = await setup({
      synthesize_images: stubStage('synthesize_images', async (ctx, inputSpec, editableSpec, prior) => {
        calls += 1
        if (calls <= 2) {
          return { success: false, error: new TransientError('rate_limit', 'slow down'), retryable: true }
        }
        return await images.execute(ctx, inputSpec, editableSpec, prior)
      }),
    })
    runtime.start()
    const jobId = await runToReview(runtime)
    runtime.engine.resume(jobId)

    const done = await waitForStatus(runtime, jobId, 'completed')

    expect(done.attempts.synthesize_images).toBe(3)
    expect(done.errorKind).toBeNull()
    expect(
      runtime.engine
        .listAttempts(jobId)
        .filter((attempt) => attempt.stageName === 'synthesize_images')
        .map((attempt) => [attempt.status, attempt.errorReason]),
    ).toEqual([
      ['failed', 'rate_limit'],
      ['failed', 'rate_limit'],
      ['success', null],
    ])
  })

  it('fails when transient errors exhaust the retry ceiling', async () => {
    const runtime = await setup({
      download: stubStage('download', async () => {
        throw new TransientError('network', 'connection reset')
      }),
    })
    runtime.start()
    const jobId = runtime.engine.submit(SOURCE)

    const failed = await waitForStatus(runtime, jobId, 'failed')

    expect(failed.attempts.download).toBe(TEST_SETTINGS.retryPolicy.maxAttempts)
    expect(failed.errorKind).toBe('transient')
    expect(failed.errorMessage).toBe('connection reset')
  })

  it('fails a fatal compose error without retrying', async () => {
    let calls = 0
    const runtime = await setup({
      compose_video: stubStage('compose_video', async () => {
        calls += 1
        throw new FatalError('encoder rejected the scene timeline')
      }),
    })
    runtime.start()
    const jobId = await runToReview(runtime)
    runtime.engine.resume(jobId)

    const failed = await waitForStatus(runtime, jobId, 'failed')

    expect(calls).toBe(1)
    expect(failed.errorKind).toBe('fatal')
    expect(failed.errorMessage).toBe('encoder rejected the scene timeline')
    expect(failed.attempts.compose_video).toBe(1)
    expect(runtime.context.jobQueueDao.findByJobId(jobId)).toBeNull()
  })

  it('cancels a running compose without committing the video', async () => {
    const started = deferred()
    const runtime = await setup({
      compose_video: stubStage('compose_video', async (ctx) => {
        await ctx.artifacts.write({ artifactType: 'final_video', name: 'final.mp4', data: 'partial' })
        started.resolve()
        return await new Promise<StageResult>((_resolve, reject) => {
          ctx.signal.addEventListener('abort', () => reject(new StageCancelledError(ctx.jobId)), { once: true })
        })
      }),
    })
    runtime.start()
    const jobId = await runToReview(runtime)
    runtime.engine.resume(jobId)
    await started.promise

    expect(runtime.engine.cancel(jobId)).toEqual({ accepted: true })
    await runtime.dispatcher.drain()

    const snapshot = runtime.engine.getStatus(jobId)
    expect(snapshot.status).toBe('cancelled')
    expect(snapshot.artifacts.compose_video).toBeUndefined()
    expect(
      runtime.store
        .listByJob(jobId)
        .filter((artifact) => artifact.artifactType === 'final_video')
        .map((artifact) => artifact.state),
    ).toEqual(['discarded'])
    expect(
      runtime.engine
        .listAttempts(jobId)
        .filter((attempt) => attempt.stageName === 'compose_video')
        .map((attempt) => attempt.status),
    ).toEqual(['cancelled'])
    expect(runtime.engine.cancel(jobId)).toEqual({ accepted: false, reason: 'Job is already cancelled' })
  })

  describe('stage deadlines and leases', () => {
    const downloadAttempts = (runtime: PipelineRuntime, jobId: string): Array<[string, string | null]> =>
      runtime.engine
        .listAttempts(jobId)
        .filter((attempt) => attempt.stageName === 'download')
        .map((attempt): [string, string | null] => [attempt.status, attempt.errorReason])

    it('keeps a timed-out stage exclusive until it stops, then fails at the timeout limit', async () => {
      let calls = 0
      let live = 0
      let maxLive = 0
      const runtime = await setup(
        {
          download: stubStage('download', async (ctx) => {
            calls += 1
            live += 1
            maxLive = Math.max(maxLive, live)
            try {
              await sleep(300)
            } finally {
              live -= 1
            }
            await ctx.artifacts.write({ artifactType: 'audio', name: 'audio.mp3', data: 'late audio' })
            return { success: true, output: {}, artifactRefs: ctx.artifacts.written() }
          }),
        },
        { stageTimeoutOverrides: { download: 100 } },
      )
      runtime.start()
      const jobId = runtime.engine.submit(SOURCE)

      const failed = await waitForStatus(runtime, jobId, 'failed')

      expect(calls).toBe(2)
      expect(maxLive).toBe(1)
      expect(failed.errorKind).toBe('transient')
      expect(failed.errorMessage).toBe('Stage timed out after 100ms')
      expect(failed.artifacts.download).toBeUndefined()
      expect(downloadAttempts(runtime, jobId)).toEqual([
        ['failed', 'timeout'],
        ['failed', 'timeout'],
      ])
    })

    it('leaves the claim to expire when a stage outlives the abort grace period', async () => {
      let calls = 0
      const download = defaultStubStages().download
      const runtime = await setup(
        {
          download: stubStage('download', async (ctx, inputSpec, editableSpec, prior) => {
            calls += 1
            if (calls === 1) {
              await sleep(300)
              return { success: false, error: new FatalError('finished too late'), retryable: false }
            }
            return await download.execute(ctx, inputSpec, editableSpec, prior)
          }),
        },
        {
          stageTimeoutOverrides: { download: 100 },
          abortGraceMs: 50,
          leaseTimeoutMs: 400,
          heartbeatIntervalMs: 100,
        },
      )
      runtime.start()
      const jobId = runtime.engine.submit(SOURCE)

      await vi.waitFor(
        () => {
          expect(runtime.engine.listAttempts(jobId)[0]?.status).toBe('failed')
        },
        { timeout: 2_000, interval: 5 },
      )
      expect(runtime.context.jobQueueDao.findByJobId(jobId)?.claimedBy).toBe('test-worker')
      expect(runtime.context.jobQueueDao.listClaimable(10)).toEqual([])

      await waitForStatus(runtime, jobId, 'awaiting_input')
      expect(calls).toBe(2)
      expect(downloadAttempts(runtime, jobId)).toEqual([
        ['failed', 'timeout'],
        ['success', null],
      ])
    })

    it('drops the result of a stage whose lease was taken over', async () => {
      let calls = 0
      let takeOver: (jobId: string) => void = () => undefined
      const download = defaultStubStages().download
      const runtime = await setup({
        download: stubStage('download', async (ctx, inputSpec, editableSpec, prior) => {
          calls += 1
          if (calls > 1) {
            return await download.execute(ctx, inputSpec, editableSpec, prior)
          }
          await ctx.artifacts.write({ artifactType: 'audio', name: 'audio.mp3', data: 'first take' })
          takeOver(ctx.jobId)
          await new Promise<void>((resolve) => {
            ctx.signal.addEventListener('abort', () => resolve(), { once: true })
          })
          return { success: true, output: {}, artifactRefs: ctx.artifacts.written() }
        }),
      })
      takeOver = (jobId) => {
        const queue = runtime.context.jobQueueDao
        queue.releaseExpiredClaims(new Date(), true)
        queue.tryClaim(jobId, 'other-worker', 300, null)
      }
      const settled: string[] = []
      runtime.dispatcher.on('stageSettled', ({ message, result }) => {
        if (message.stageName === 'download') settled.push(result.type)
      })
      runtime.start()
      const jobId = runtime.engine.submit(SOURCE)

      await waitForStatus(runtime, jobId, 'awaiting_input')

      expect(settled).toEqual(['stale', 'advanced'])
      expect(downloadAttempts(runtime, jobId)).toEqual([
        ['interrupted', 'unavailable'],
        ['success', null],
      ])
      const [dropped] = runtime.engine.listAttempts(jobId)
      if (!dropped) throw new Error('no attempts recorded')
      expect(runtime.context.artifactDao.listByAttempt(dropped.id).map((artifact) => artifact.state)).toEqual([
        'discarded',
      ])
    })
  })

  it('cancels a queued job before it is dispatched', async () => {
    const runtime = await setup()
    const jobId = runtime.engine.submit(SOURCE)

    expect(runtime.engine.cancel(jobId)).toEqual({ accepted: true })
    expect(runtime.engine.getStatus(jobId).status).toBe('cancelled')
    expect(runtime.context.jobQueueDao.findByJobId(jobId)).toBeNull()
  })

  describe('edit boundary', () => {
    it('rejects edits while the job is queued or running', async () => {
      const gate = deferred()
      const entered = deferred()
      const download = defaultStubStages().download
      const runtime = await setup({
        download: stubStage('download', async (ctx, inputSpec, editableSpec, prior) => {
          entered.resolve()
          await gate.promise
          return await download.execute(ctx, inputSpec, editableSpec, prior)
        }),
      })
      const jobId = runtime.engine.submit(SOURCE)
      const edit = { scenes: [{ index: 0, text: 't', startTime: 0, endTime: 1, imagePrompt: 'p' }] }

      expect(runtime.engine.updateEditableSpec(jobId, edit)).toEqual({
        accepted: false,
        reason: 'Job is queued; edits are accepted only while awaiting_input',
      })

      runtime.start()
      await entered.promise
      expect(runtime.engine.getStatus(jobId).status).toBe('running')
      expect(runtime.engine.updateEditableSpec(jobId, edit)).toEqual({
        accepted: false,
        reason: 'Job is running; edits are accepted only while awaiting_input',
      })
      expect(runtime.engine.getStatus(jobId).editableSpec).toBeNull()

      gate.resolve()
      await waitForStatus(runtime, jobId, 'awaiting_input')
    })

    it('rejects an invalid snapshot and keeps the previous one', async () => {
      const runtime = await setup()
      runtime.start()
      const jobId = await runToReview(runtime)
      const before = runtime.engine.getStatus(jobId).editableSpec

      expect(runtime.engine.updateEditableSpec(jobId, { scenes: [] })).toEqual({
        accepted: false,
        reason: 'scenes must be a non-empty list',
      })
      expect(runtime.engine.getStatus(jobId).editableSpec).toEqual(before)
    })

    it('reports unknown jobs', async () => {
      const runtime = await setup()

      expect(runtime.engine.resume('missing')).toEqual({ accepted: false, reason: 'Job not found: missing' })
      expect(() => runtime.engine.getStatus('missing')).toThrow('Job not found: missing')
    })
  })

  it('rejects an illegal transition and leaves the job untouched', async () => {
    const runtime = await setup()
    const jobId = runtime.engine.submit(SOURCE)
    const before = runtime.engine.getStatus(jobId)

    expect(() => runtime.engine.transitionJob(jobId, 'completed')).toThrow(IllegalTransitionError)
    expect(() => runtime.engine.transitionJob(jobId, 'awaiting_input')).toThrow(
      `Illegal transition for job ${jobId}: queued -> awaiting_input`,
    )
    expect(runtime.engine.resume(jobId)).toEqual({
      accepted: false,
      reason: 'Job is queued; only awaiting_input jobs can resume',
    })
    expect(runtime.engine.getStatus(jobId)).toEqual(before)
  })

  it('lets exactly one of many racing workers claim a queued job', async () => {
    const runtime = await setup()
    const jobId = runtime.engine.submit(SOURCE)

    const claims = ['w1', 'w2', 'w3', 'w4'].map((workerId) => runtime.engine.claim(jobId, workerId, 0, 5_000))

    expect(claims.filter((claim) => claim !== null)).toHaveLength(1)
    expect(claims[0]?.claimedFrom).toBe('queued')
    expect(runtime.engine.getStatus(jobId).status).toBe('running')
  })

  it('versions a re-run stage without changing the final output', async () => {
    const runtime = await setup()
    const { engine, store, stages } = runtime
    const jobId = engine.submit(SOURCE)
    const worker = new StageWorker({
      engine,
      artifactStore: store,
      workRoot: path.join(path.dirname(runtime.context.dbPath), 'manual-work'),
      workerId: 'manual-worker',
      settings: runtime.context.settingsDao.getSettings(),
    })
    const runOnce = async (stageName: 'download' | 'transcribe'): Promise<void> => {
      const claimed = engine.claim(jobId, 'manual-worker', 0, 5_000)
      const stage = stages.get(stageName)
      if (!claimed || !stage) throw new Error('claim failed')
      const message = await worker.run(
        { jobId, stage, inputSpec: claimed.job.inputSpec, editableSpec: claimed.job.editableSpec },
        new AbortController().signal,
      )
      if (!message) throw new Error('attempt not opened')
      engine.applyStageOutcome(message)
    }

    await runOnce('download')
    await runOnce('transcribe')
    await runOnce('transcribe')

    expect(
      engine.getStatus(jobId).artifacts.transcribe?.map((artifact) => artifact.version),
    ).toEqual([1, 2])
    expect(engine.loadPriorArtifacts(jobId).transcribe?.map((artifact) => artifact.version)).toEqual([2])

    runtime.start()
    await waitForStatus(runtime, jobId, 'awaiting_input')
    engine.resume(jobId)
    const done = await waitForStatus(runtime, jobId, 'completed')

    expect(await readFinalVideo(runtime, done)).toBe(EXPECTED_FINAL_VIDEO)
  })

  it('lists jobs newest first with status filtering', async () => {
    const runtime = await setup()
    const first = runtime.engine.submit(SOURCE)
    const second = runtime.engine.submit(SOURCE)
    runtime.engine.cancel(first)

    expect(runtime.engine.listJobs({ status: 'cancelled' }).items.map((job) => job.id)).toEqual([first])
    expect(runtime.engine.listJobs().total).toBe(2)
    expect(runtime.engine.listJobs({ status: 'queued' }).items.map((job) => job.id)).toEqual([second])
  })
})
