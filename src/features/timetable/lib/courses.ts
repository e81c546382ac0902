import { parseSheet } from '@/features/timetable/lib/sheetAssembler'
import { fail, issue, ok, type Result, type ScheduleIssue } from '@/lib/errors'
import type { Course, Courses, Sheet } from '@/types/schedule'

// Every timetable workbook carries one sheet per course year
export const SHEETS_PER_WORKBOOK = 4

export type SheetResult = { sheet: string; result: Result<Course> }

function toCourses(list: Course[]): Courses | null {
  if (list.length !== SHEETS_PER_WORKBOOK) return null
  const [first, second, third, fourth] = list
  return [first, second, third, fourth]
}

/**
 * Parses each sheet on its own; a malformed sheet only fails its own slot.
 * Sheets share no state, so the order they run in does not matter.
 */
export function parseSheets(sheets: Sheet[]): Result<SheetResult[]> {
  if (sheets.length !== SHEETS_PER_WORKBOOK) {
    return fail(
      issue('WRONG_SHEET_COUNT', `Workbook has ${sheets.length} sheets, expected ${SHEETS_PER_WORKBOOK}`, {
        expected: SHEETS_PER_WORKBOOK,
        actual: sheets.length,
      })
    )
  }
  return ok(sheets.map((sheet) => ({ sheet: sheet.name, result: parseSheet(sheet) })))
}

export function buildCourses(sheets: Sheet[]): Result<Courses, ScheduleIssue[]> {
  const parsed = parseSheets(sheets)
  if (!parsed.ok) return fail([parsed.error])

  const courses: Course[] = []
  const issues: ScheduleIssue[] = []
  for (const { result } of parsed.data) {
    if (result.ok) courses.push(result.data)
    else issues.push(result.error)
  }
  if (issues.length) return fail(issues)

  const all = toCourses(courses)
  if (!all) {
    return fail([
      issue('WRONG_SHEET_COUNT', `Parsed ${courses.length} courses, expected ${SHEETS_PER_WORKBOOK}`, {
        expected: SHEETS_PER_WORKBOOK,
        actual: courses.length,
      }),
    ])
  }
  return ok(all)
}
