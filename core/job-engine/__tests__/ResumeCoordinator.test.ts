import fs from 'node:fs/promises'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { TransientError } from '../errors'
import type { PipelineRuntime } from '..'
import {
  createTestRuntime,
  defaultStubStages,
  EXPECTED_FINAL_VIDEO,
  makeDataRoot,
  readFinalVideo,
  stubStage,
  untilAborted,
  waitForStatus,
} from './pipelineHarness'

const SOURCE = { sourceUrl: 'https://video.example/watch?v=harbor' }

describe('ResumeCoordinator', () => {
  const runtimes: PipelineRuntime[] = []
  let root = ''

  const open = (): PipelineRuntime => {
    const runtime = createTestRuntime(root)
    runtimes.push(runtime)
    return runtime
  }

  afterEach(async () => {
    for (const runtime of runtimes.splice(0)) {
      await runtime.shutdown()
    }
    await fs.rm(root, { recursive: true, force: true })
  })

  it('finishes a job interrupted mid-stage with the same result as a clean run', async () => {
    root = await makeDataRoot()
    const crashed = open()
    const jobId = crashed.engine.submit(SOURCE)
    expect(crashed.engine.claim(jobId, 'dead-worker', 0, 60_000)).not.toBeNull()
    const attempt = crashed.engine.beginAttempt(jobId, 'download', 'dead-worker')
    if (!attempt) throw new Error('attempt not opened')
    const partial = await crashed.store
      .createWriter(jobId, 'download', attempt.id)
      .write({ artifactType: 'audio', name: 'audio.mp3', data: 'half an mp3' })
    await crashed.shutdown()

    const restarted = open()
    const report = restarted.start({ releaseAll: true })

    expect(report.releasedClaims).toEqual([jobId])
    expect(report.interruptedAttempts).toBe(1)
    expect(report.requeued).toEqual([jobId])

    await waitForStatus(restarted, jobId, 'awaiting_input')
    restarted.engine.resume(jobId)
    const done = await waitForStatus(restarted, jobId, 'completed')

    expect(await readFinalVideo(restarted, done)).toBe(EXPECTED_FINAL_VIDEO)
    expect(restarted.context.artifactDao.findByLocator(partial.locator)?.state).toBe('discarded')
    expect(
      restarted.engine
        .listAttempts(jobId)
        .filter((entry) => entry.stageName === 'download')
        .map((entry) => entry.status),
    ).toEqual(['interrupted', 'success'])
  })

  it('does not charge restarts against the retry budget', async () => {
    root = await makeDataRoot()
    let calls = 0
    const download = defaultStubStages().download
    const overrides = {
      download: stubStage('download', async (ctx, inputSpec, editableSpec, prior) => {
        calls += 1
        if (calls <= 2) {
          return await untilAborted(ctx)
        }
        if (calls === 3) {
          throw new TransientError('network', 'blip')
        }
        return await download.execute(ctx, inputSpec, editableSpec, prior)
      }),
    }
    const boot = (): PipelineRuntime => {
      const runtime = createTestRuntime(root, overrides)
      runtimes.push(runtime)
      runtime.start({ releaseAll: true })
      return runtime
    }

    const first = boot()
    const jobId = first.engine.submit(SOURCE)
    await vi.waitFor(() => expect(calls).toBe(1))
    await first.shutdown()

    const second = boot()
    await vi.waitFor(() => expect(calls).toBe(2))
    await second.shutdown()

    const third = boot()
    const paused = await waitForStatus(third, jobId, 'awaiting_input')

    expect(paused.attempts.download).toBe(4)
    expect(
      third.engine
        .listAttempts(jobId)
        .filter((entry) => entry.stageName === 'download')
        .map((entry) => [entry.status, entry.errorReason]),
    ).toEqual([
      ['interrupted', 'unavailable'],
      ['interrupted', 'unavailable'],
      ['failed', 'network'],
      ['success', null],
    ])
  })

  it('leaves live claims alone unless their lease expired', async () => {
    root = await makeDataRoot()
    const runtime = open()
    const jobId = runtime.engine.submit(SOURCE)
    runtime.engine.claim(jobId, 'other-process', 0, 60_000)

    const live = runtime.coordinator.recover()
    expect(live.releasedClaims).toEqual([])
    expect(live.interruptedAttempts).toBe(0)
    expect(runtime.context.jobQueueDao.findByJobId(jobId)?.claimedBy).toBe('other-process')

    const later = runtime.coordinator.recover({ now: new Date(Date.now() + 120_000) })
    expect(later.releasedClaims).toEqual([jobId])
    expect(runtime.context.jobQueueDao.findByJobId(jobId)?.claimedBy).toBeNull()
  })

  it('keeps paused jobs off the queue and drops terminal entries', async () => {
    root = await makeDataRoot()
    const runtime = open()
    runtime.start()
    const paused = runtime.engine.submit(SOURCE)
    await waitForStatus(runtime, paused, 'awaiting_input')
    await runtime.dispatcher.stop()

    const finished = runtime.engine.submit(SOURCE)
    runtime.context.jobDao.updateJob(finished, { status: 'failed' })

    const report = runtime.coordinator.recover()

    expect(report.awaitingInput).toEqual([paused])
    expect(report.droppedQueueEntries).toEqual([finished])
    expect(runtime.context.jobQueueDao.listAll()).toEqual([])
  })
})
