/**
 * Worker command line
 *
 *   now [intervalMinutes]
 *   schedule <day> <hour> [minute] [intervalMinutes]
 */

import { z } from 'zod'
import { WEEKDAYS, type WeeklySchedule } from './weekly.js'

export type WorkerCommand =
  | { kind: 'now'; intervalMinutes: number }
  | { kind: 'schedule'; schedule: WeeklySchedule; intervalMinutes: number }

export type ParseResult = { ok: true; command: WorkerCommand } | { ok: false; error: string }

export const USAGE = [
  'Usage:',
  '  worker now [intervalMinutes]',
  '  worker schedule <day> <hour> [minute] [intervalMinutes]',
  '',
  `  day: ${WEEKDAYS.join('|')}  hour: 0-23  minute: 0-59`,
].join('\n')

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max))

const nowArgs = z.object({
  intervalMinutes: integer(1).optional(),
})

const scheduleArgs = z.object({
  day: z.string().toLowerCase().pipe(z.enum(WEEKDAYS)),
  hour: integer(0, 23),
  minute: integer(0, 59).optional(),
  intervalMinutes: integer(1).optional(),
})

function describe(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
}

/**
 * Parse the worker's arguments (without the node and script entries)
 */
export function parseWorkerCommand(argv: string[], defaultIntervalMinutes: number): ParseResult {
  const name: string | undefined = argv[0]
  const rest = argv.slice(1)

  switch (name) {
    case 'now': {
      if (rest.length > 1) return { ok: false, error: 'Too many arguments' }
      const parsed = nowArgs.safeParse({ intervalMinutes: rest[0] })
      if (!parsed.success) return { ok: false, error: describe(parsed.error) }
      return {
        ok: true,
        command: { kind: 'now', intervalMinutes: parsed.data.intervalMinutes ?? defaultIntervalMinutes },
      }
    }

    case 'schedule': {
      if (rest.length > 4) return { ok: false, error: 'Too many arguments' }
      const [day, hour, minute, intervalMinutes] = rest
      const parsed = scheduleArgs.safeParse({ day, hour, minute, intervalMinutes })
      if (!parsed.success) return { ok: false, error: describe(parsed.error) }
      const args = parsed.data
      return {
        ok: true,
        command: {
          kind: 'schedule',
          schedule: { day: args.day, hour: args.hour, minute: args.minute ?? 0 },
          intervalMinutes: args.intervalMinutes ?? defaultIntervalMinutes,
        },
      }
    }

    case undefined:
      return { ok: false, error: 'Missing command' }

    default:
      return { ok: false, error: `Unknown command: ${name}` }
  }
}
