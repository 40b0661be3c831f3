/**
 * Reminder Timer
 *
 * One-shot job scheduler owned by whoever builds it (the worker process).
 * Jobs fire no earlier than their timestamp and run one at a time, in fire
 * order, so sends never overlap. Jobs are in-memory only; the durable copy of
 * a reminder is `next_reminder_at` on the contact.
 */

import { logger } from '../utils/logger.js'

// setTimeout clamps anything above this to 1ms
const MAX_TIMEOUT_MS = 2_147_483_647

export interface ScheduledJob {
  jobId: string
  fireAt: Date
}

interface ArmedJob extends ScheduledJob {
  seq: number
  run: () => unknown
  handle: ReturnType<typeof setTimeout> | null
}

type TimerState = 'idle' | 'running' | 'stopped'

export class ReminderTimer {
  private readonly jobs = new Map<number, ArmedJob>()
  private chain: Promise<void> = Promise.resolve()
  private inFlight = 0
  private nextSeq = 0
  private state: TimerState = 'idle'
  private idleWaiters: Array<() => void> = []

  get isRunning(): boolean {
    return this.state === 'running'
  }

  /**
   * Arm every job registered so far and accept new ones
   */
  start(): void {
    if (this.state === 'stopped') {
      throw new Error('ReminderTimer cannot be restarted after shutdown')
    }
    if (this.state === 'running') return

    this.state = 'running'
    for (const job of this.jobs.values()) {
      this.arm(job)
    }
  }

  /**
   * Register a one-shot job. Duplicate ids are allowed; the id is only used
   * for cancel() and bookkeeping.
   * @returns The scheduled job, or null once the timer has shut down
   */
  scheduleAt<A extends unknown[]>(
    fireAt: Date,
    jobId: string,
    callback: (...args: A) => unknown,
    args: A
  ): ScheduledJob | null {
    if (this.state === 'stopped') {
      logger.warn('Timer is shut down, job not scheduled', { jobId })
      return null
    }

    const job: ArmedJob = {
      seq: ++this.nextSeq,
      jobId,
      fireAt,
      run: () => callback(...args),
      handle: null,
    }
    this.jobs.set(job.seq, job)

    if (this.state === 'running') {
      this.arm(job)
    }

    return { jobId, fireAt }
  }

  /**
   * Drop every pending job with this id
   * @returns Number of jobs removed
   */
  cancel(jobId: string): number {
    return this.cancelWhere(job => job.jobId === jobId)
  }

  /**
   * Drop every pending job the predicate matches
   * @returns Number of jobs removed
   */
  cancelWhere(matches: (job: ScheduledJob) => boolean): number {
    let removed = 0
    for (const job of [...this.jobs.values()]) {
      if (!matches(job)) continue
      if (job.handle) clearTimeout(job.handle)
      this.jobs.delete(job.seq)
      removed++
    }
    this.notifyIfIdle()
    return removed
  }

  /**
   * Pending jobs, soonest first
   */
  pending(): ScheduledJob[] {
    return [...this.jobs.values()]
      .sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime() || a.seq - b.seq)
      .map(({ jobId, fireAt }) => ({ jobId, fireAt }))
  }

  /**
   * Wait for every job that has already fired to finish running
   */
  async flush(): Promise<void> {
    for (;;) {
      const current = this.chain
      await current
      if (current === this.chain) return
    }
  }

  /**
   * Resolves once nothing is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  /**
   * Stop accepting jobs, drop the pending and queued ones and wait for the
   * running one
   */
  async shutdown(): Promise<void> {
    if (this.state === 'stopped') return
    this.state = 'stopped'

    const dropped = this.jobs.size
    for (const job of this.jobs.values()) {
      if (job.handle) clearTimeout(job.handle)
    }
    this.jobs.clear()

    await this.flush()
    this.notifyIfIdle()

    logger.info('Reminder timer stopped', { droppedJobs: dropped })
  }

  private arm(job: ArmedJob): void {
    const delay = Math.max(0, job.fireAt.getTime() - Date.now())

    job.handle = setTimeout(() => {
      job.handle = null
      // Long delays are armed in steps; also guards against early wakeups
      if (Date.now() < job.fireAt.getTime()) {
        this.arm(job)
        return
      }
      this.dispatch(job)
    }, Math.min(delay, MAX_TIMEOUT_MS))
  }

  private dispatch(job: ArmedJob): void {
    this.jobs.delete(job.seq)
    this.inFlight++

    this.chain = this.chain.then(async () => {
      try {
        // Fired but still queued behind another job when shutdown began
        if (this.state === 'stopped') return
        await job.run()
      } catch (err) {
        logger.error('Scheduled job failed', err, { jobId: job.jobId })
      } finally {
        this.inFlight--
        this.notifyIfIdle()
      }
    })
  }

  private isIdle(): boolean {
    return this.jobs.size === 0 && this.inFlight === 0
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }
}
