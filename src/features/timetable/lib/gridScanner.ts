import { parseClass } from '@/features/timetable/lib/classCell'
import { fail, issue, ok, type Result } from '@/lib/errors'
import {
  DAYS_PER_WEEK,
  HEADER_ROWS,
  MAX_LESSON_PAIRS,
  descriptionColumn,
  emptyWeek,
  expectedRowLength,
  lessonSlotAt,
  roomColumn,
} from '@/lib/schedule'
import type { Cell, Week } from '@/types/schedule'

export type RowPair = { upper: Cell[]; lower: Cell[]; upperIndex: number }

// Non-overlapping (upper, lower) pairs; a trailing row without a partner is dropped
export function pairRows(rows: Cell[][], firstRowIndex = HEADER_ROWS): RowPair[] {
  const pairs: RowPair[] = []
  for (let i = 0; i + 1 < rows.length; i += 2) {
    pairs.push({ upper: rows[i], lower: rows[i + 1], upperIndex: firstRowIndex + i })
  }
  return pairs
}

function checkRowLength(row: Cell[], rowIndex: number, weekColumns: number): Result<null> {
  const expected = expectedRowLength(weekColumns)
  if (row.length === expected) return ok(null)
  return fail(
    issue(
      'ROW_COLUMN_COUNT_MISMATCH',
      `Row has ${row.length} cells, expected ${expected} for ${weekColumns} week columns`,
      { row: rowIndex, expected, actual: row.length }
    )
  )
}

/**
 * Fills one week per column from the body rows, which come in
 * (upper, lower) pairs: seven lessons for Monday, then seven for Tuesday…
 */
export function scanBody(rows: Cell[][], weekColumns: number, firstRowIndex = HEADER_ROWS): Result<Week[]> {
  const weeks: Week[] = Array.from({ length: weekColumns }, emptyWeek)

  const pairs = pairRows(rows, firstRowIndex)
  for (let k = 0; k < pairs.length; k++) {
    const { upper, lower, upperIndex } = pairs[k]
    const { day, lesson } = lessonSlotAt(k)
    if (day >= DAYS_PER_WEEK) {
      return fail(
        issue('TOO_MANY_ROWS', `Sheet has ${pairs.length} lesson row pairs, at most ${MAX_LESSON_PAIRS} fit in a week`, {
          row: upperIndex,
          expected: MAX_LESSON_PAIRS,
          actual: pairs.length,
        })
      )
    }

    const upperOk = checkRowLength(upper, upperIndex, weekColumns)
    if (!upperOk.ok) return upperOk
    const lowerOk = checkRowLength(lower, upperIndex + 1, weekColumns)
    if (!lowerOk.ok) return lowerOk

    for (let c = 0; c < weekColumns; c++) {
      const slot = weeks[c][day]
      slot.upper_classes[lesson] = parseClass(upper[descriptionColumn(c)], upper[roomColumn(c)])
      slot.lower_classes[lesson] = parseClass(lower[descriptionColumn(c)], lower[roomColumn(c)])
    }
  }

  return ok(weeks)
}
