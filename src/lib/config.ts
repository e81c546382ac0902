import { z } from 'zod'
import { ScheduleError, issue } from '@/lib/errors'
import { LOG_LEVELS, type LogLevel } from '@/lib/log'

export type Config = {
  jsonIndent: number
  logLevel: LogLevel
}

const EnvSchema = z.object({
  TIMETABLE_JSON_INDENT: z.coerce.number().int().min(0).max(8).default(2),
  TIMETABLE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.safeParse({
    TIMETABLE_JSON_INDENT: env.TIMETABLE_JSON_INDENT || undefined,
    TIMETABLE_LOG_LEVEL: env.TIMETABLE_LOG_LEVEL || undefined,
  })
  if (!parsed.success) {
    throw new ScheduleError(issue('INVALID_CONFIG', 'Invalid configuration: ' + parsed.error.message))
  }
  return {
    jsonIndent: parsed.data.TIMETABLE_JSON_INDENT,
    logLevel: parsed.data.TIMETABLE_LOG_LEVEL,
  }
}
