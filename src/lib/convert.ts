import { readFile, writeFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { buildCourses } from '@/features/timetable/lib/courses'
import { serializeCourses } from '@/lib/api'
import type { Config } from '@/lib/config'
import { ScheduleError, formatIssue, type Result, type ScheduleIssue } from '@/lib/errors'
import { createLogger, type Logger } from '@/lib/log'
import { readWorkbook } from '@/lib/workbook'
import type { Courses } from '@/types/schedule'

export function convertWorkbook(data: Buffer, logger: Logger): Result<Courses, ScheduleIssue[]> {
  const sheets = readWorkbook(data)
  logger.debug(`Read ${sheets.length} sheets: ${sheets.map((s) => s.name).join(', ')}`)
  const result = buildCourses(sheets)
  if (!result.ok) {
    for (const problem of result.error) logger.error(formatIssue(problem))
  }
  return result
}

export function defaultOutputPath(input: string) {
  const ext = extname(input)
  return (ext ? input.slice(0, -ext.length) : input) + '.json'
}

// Writes the parsed workbook next to the input unless an output path is given
export async function convertWorkbookFile(input: string, output: string | undefined, config: Config): Promise<string> {
  const logger = createLogger(config.logLevel)
  const target = output ?? defaultOutputPath(input)
  const result = convertWorkbook(await readFile(input), logger)
  if (!result.ok) throw new ScheduleError(result.error)
  await writeFile(target, serializeCourses(result.data, config.jsonIndent))
  logger.info(`Converted ${input} -> ${target}`)
  return target
}
