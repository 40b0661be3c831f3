/**
 * Weekly Campaign Trigger
 *
 * Computes the next `day hour:minute` occurrence in server-local time and
 * keeps one job armed on the reminder timer, re-arming after every run.
 */

import { addDays, addWeeks, getDay, set } from 'date-fns'
import type { ReminderTimer, ScheduledJob } from '../lib/scheduler.js'
import { logger } from '../utils/logger.js'

export const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const

export type Weekday = (typeof WEEKDAYS)[number]

export interface WeeklySchedule {
  day: Weekday
  hour: number
  minute: number
}

export const WEEKLY_JOB_ID = 'email_campaign'

/**
 * Next occurrence strictly after `from`
 */
export function nextWeeklyRun(from: Date, schedule: WeeklySchedule): Date {
  const atTime = set(from, { hours: schedule.hour, minutes: schedule.minute, seconds: 0, milliseconds: 0 })
  const daysAhead = (WEEKDAYS.indexOf(schedule.day) - getDay(from) + 7) % 7
  const candidate = addDays(atTime, daysAhead)

  return candidate.getTime() > from.getTime() ? candidate : addWeeks(candidate, 1)
}

export function formatWeeklySchedule(schedule: WeeklySchedule): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `every ${schedule.day} at ${pad(schedule.hour)}:${pad(schedule.minute)}`
}

/**
 * Arm `task` for the next occurrence; each run arms the one after it
 */
export function scheduleWeekly(
  timer: ReminderTimer,
  schedule: WeeklySchedule,
  task: () => Promise<unknown>,
  jobId: string = WEEKLY_JOB_ID
): ScheduledJob | null {
  const fireAt = nextWeeklyRun(new Date(), schedule)

  const run = async () => {
    try {
      await task()
    } finally {
      if (timer.isRunning) {
        scheduleWeekly(timer, schedule, task, jobId)
      }
    }
  }

  const job = timer.scheduleAt(fireAt, jobId, run, [])
  if (job) {
    logger.info('Weekly campaign scheduled', { jobId, fireAt: fireAt.toISOString() })
  }
  return job
}
