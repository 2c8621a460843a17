/**
 * Numbered execution slots. One slot runs one job's current stage.
 */
export class WorkerPool {
  private readonly maxConcurrency: number
  private readonly runningBySlot = new Map<number, string>()

  constructor(workerConcurrency: number) {
    this.maxConcurrency = Math.max(1, Math.floor(workerConcurrency || 1))
  }

  capacity(): number {
    return this.maxConcurrency
  }

  runningCount(): number {
    return this.runningBySlot.size
  }

  hasCapacity(): boolean {
    return this.runningBySlot.size < this.maxConcurrency
  }

  isRunning(jobId: string): boolean {
    for (const runningJobId of this.runningBySlot.values()) {
      if (runningJobId === jobId) return true
    }
    return false
  }

  acquire(jobId: string): number | null {
    if (!this.hasCapacity() || this.isRunning(jobId)) return null
    for (let slot = 0; slot < this.maxConcurrency; slot += 1) {
      if (!this.runningBySlot.has(slot)) {
        this.runningBySlot.set(slot, jobId)
        return slot
      }
    }
    return null
  }

  releaseByJob(jobId: string): number | null {
    for (const [slot, runningJobId] of this.runningBySlot.entries()) {
      if (runningJobId === jobId) {
        this.runningBySlot.delete(slot)
        return slot
      }
    }
    return null
  }

  runningJobIds(): string[] {
    return Array.from(this.runningBySlot.values())
  }
}
