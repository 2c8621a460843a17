import { describe, expect, it } from 'vitest'
import { WorkerPool } from '../queue/WorkerPool'

describe('WorkerPool', () => {
  it('hands out the lowest free slot and tracks capacity', () => {
    const pool = new WorkerPool(2)

    expect(pool.acquire('job-a')).toBe(0)
    expect(pool.acquire('job-b')).toBe(1)
    expect(pool.hasCapacity()).toBe(false)
    expect(pool.acquire('job-c')).toBeNull()

    expect(pool.releaseByJob('job-a')).toBe(0)
    expect(pool.acquire('job-c')).toBe(0)
    expect(pool.runningJobIds().sort()).toEqual(['job-b', 'job-c'])
  })

  it('never runs the same job in two slots', () => {
    const pool = new WorkerPool(3)

    expect(pool.acquire('job-a')).toBe(0)
    expect(pool.acquire('job-a')).toBeNull()
    expect(pool.runningCount()).toBe(1)
    expect(pool.isRunning('job-a')).toBe(true)
  })

  it('falls back to one slot for invalid sizes', () => {
    expect(new WorkerPool(0).capacity()).toBe(1)
    expect(new WorkerPool(2.7).capacity()).toBe(2)
  })

  it('returns null when releasing an unknown job', () => {
    expect(new WorkerPool(1).releaseByJob('missing')).toBeNull()
  })
})
