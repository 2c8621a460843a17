import type Database from 'better-sqlite3'
import type { ArtifactDao, JobDao, JobQueueDao, StageAttemptDao } from '../../db/dao'
import { logInfo, logWarn } from '../../logger'
import { toErrorMessage } from '../errors'
import type { JobEngine } from '../JobEngine'

export interface RecoveryOptions {
  /**
   * Clear every claim, not only expired ones. Safe only when no other process
   * dispatches from the same database.
   */
  releaseAll?: boolean
  now?: Date
}

export interface RecoveryReport {
  releasedClaims: string[]
  droppedQueueEntries: string[]
  interruptedAttempts: number
  requeued: string[]
  finalized: string[]
  awaitingInput: string[]
  discardedArtifacts: number
}

/**
 * Brings persisted state back to something the dispatcher can act on after a
 * restart: dead claims are released, orphaned attempts closed and every
 * non-terminal job gets its queue entry back from its completed stages.
 */
export class ResumeCoordinator {
  constructor(
    private readonly deps: {
      db: Database.Database
      engine: JobEngine
      jobDao: JobDao
      jobQueueDao: JobQueueDao
      stageAttemptDao: StageAttemptDao
      artifactDao: ArtifactDao
    },
  ) {}

  recover(options: RecoveryOptions = {}): RecoveryReport {
    const { db, engine, jobDao, jobQueueDao, stageAttemptDao, artifactDao } = this.deps
    const report: RecoveryReport = {
      releasedClaims: jobQueueDao.releaseExpiredClaims(options.now ?? new Date(), options.releaseAll ?? false),
      droppedQueueEntries: jobQueueDao.removeTerminal(),
      interruptedAttempts: 0,
      requeued: [],
      finalized: [],
      awaitingInput: [],
      discardedArtifacts: 0,
    }

    for (const job of jobDao.listNonTerminalJobs()) {
      try {
        const closeOrphans = db.transaction((): number => {
          if (jobQueueDao.findByJobId(job.id)?.claimedBy) {
            return 0
          }
          const interrupted = stageAttemptDao.interruptRunningAttempts(job.id)
          for (const attempt of interrupted) {
            artifactDao.discardAttempt(attempt.id)
          }
          return interrupted.length
        })
        report.interruptedAttempts += closeOrphans()

        const action = engine.planNext(job.id)
        switch (action.type) {
          case 'run':
            jobQueueDao.ensureEnqueued(job.id)
            report.requeued.push(job.id)
            break
          case 'complete':
            if (engine.finalize(job.id)) {
              report.finalized.push(job.id)
            } else {
              jobQueueDao.ensureEnqueued(job.id)
              report.requeued.push(job.id)
            }
            break
          case 'await_input':
            jobQueueDao.remove(job.id)
            report.awaitingInput.push(job.id)
            break
          case 'none':
            break
        }
      } catch (error) {
        logWarn('job_recovery_failed', { jobId: job.id, error: toErrorMessage(error) })
      }
    }

    report.discardedArtifacts = artifactDao.discardSettledPending()

    logInfo('recovery_completed', {
      releasedClaims: report.releasedClaims.length,
      droppedQueueEntries: report.droppedQueueEntries.length,
      interruptedAttempts: report.interruptedAttempts,
      requeued: report.requeued.length,
      finalized: report.finalized.length,
      awaitingInput: report.awaitingInput.length,
      discardedArtifacts: report.discardedArtifacts,
    })
    return report
  }
}
