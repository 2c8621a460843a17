import { describe, expect, it } from 'vitest'
import type { JobStatus, StageName } from '../../db/types'
import { IllegalTransitionError } from '../errors'
import { assertTransition, canTransition, nextAction, stageAfter, TRANSITIONS } from '../stateMachine'

const ALL_STATUSES: JobStatus[] = ['queued', 'running', 'awaiting_input', 'completed', 'failed', 'cancelled']

describe('transition table', () => {
  it('allows exactly the documented edges', () => {
    const allowed = ALL_STATUSES.flatMap((from) =>
      ALL_STATUSES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`),
    )

    expect(allowed.sort()).toEqual(
      [
        'queued->running',
        'queued->cancelled',
        'running->running',
        'running->awaiting_input',
        'running->completed',
        'running->failed',
        'running->cancelled',
        'awaiting_input->running',
        'awaiting_input->cancelled',
      ].sort(),
    )
  })

  it('has no outgoing edges from terminal statuses', () => {
    expect(TRANSITIONS.completed).toEqual([])
    expect(TRANSITIONS.failed).toEqual([])
    expect(TRANSITIONS.cancelled).toEqual([])
  })

  it('throws IllegalTransitionError for a missing edge', () => {
    expect(() => assertTransition('job-1', 'queued', 'awaiting_input')).toThrow(IllegalTransitionError)
    expect(() => assertTransition('job-1', 'completed', 'running')).toThrow(
      'Illegal transition for job job-1: completed -> running',
    )
    expect(() => assertTransition('job-1', 'awaiting_input', 'running')).not.toThrow()
  })
})

describe('nextAction', () => {
  const done = (...stages: StageName[]): Set<StageName> => new Set(stages)

  it('runs download first for a fresh job', () => {
    expect(nextAction('queued', done(), false)).toEqual({ type: 'run', stage: 'download' })
  })

  it('runs the first stage without a complete artifact', () => {
    expect(nextAction('running', done('download', 'transcribe'), false)).toEqual({ type: 'run', stage: 'translate' })
  })

  it('reruns the pausing stage when its snapshot is missing', () => {
    expect(
      nextAction('running', done('download', 'transcribe', 'translate', 'segment_and_prompt'), false),
    ).toEqual({ type: 'run', stage: 'segment_and_prompt' })
  })

  it('continues past the pause once the snapshot exists', () => {
    expect(
      nextAction('running', done('download', 'transcribe', 'translate', 'segment_and_prompt'), true),
    ).toEqual({ type: 'run', stage: 'synthesize_images' })
  })

  it('waits while awaiting input', () => {
    expect(nextAction('awaiting_input', done('download'), true)).toEqual({ type: 'await_input' })
  })

  it('completes when every stage has an artifact', () => {
    const all = done('download', 'transcribe', 'translate', 'segment_and_prompt', 'synthesize_images', 'compose_video')
    expect(nextAction('running', all, true)).toEqual({ type: 'complete' })
  })

  it('does nothing for terminal jobs', () => {
    for (const status of ['completed', 'failed', 'cancelled'] as const) {
      expect(nextAction(status, done(), false)).toEqual({ type: 'none' })
    }
  })
})

describe('stageAfter', () => {
  it('walks the pipeline order', () => {
    expect(stageAfter('download')).toBe('transcribe')
    expect(stageAfter('segment_and_prompt')).toBe('synthesize_images')
    expect(stageAfter('compose_video')).toBeNull()
  })
})
