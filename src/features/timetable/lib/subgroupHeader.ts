import { initialState, reducer, type Action } from '@/features/timetable/state/subgroupHeaderReducer'
import { fail, issue, ok, type Result } from '@/lib/errors'
import { CELLS_PER_COLUMN, LEAD_IN_COLUMNS, describeCell, isEmptyCell } from '@/lib/schedule'
import type { Cell, SubgroupCluster } from '@/types/schedule'

export const MAX_SUBGROUP_NUMBER = 255

// Column indexes (in sheet coordinates) of the cells carrying subgroup numbers
export function headerColumns(rowLength: number): number[] {
  const columns: number[] = []
  for (let c = LEAD_IN_COLUMNS; c < rowLength; c += CELLS_PER_COLUMN) columns.push(c)
  return columns
}

export function parseSubgroupNumber(cell: Cell, column: number, row = 1): Result<number> {
  if (typeof cell !== 'string') {
    return fail(issue('CELL_TYPE_MISMATCH', `Subgroup number must be text, got ${describeCell(cell)}`, { row, column }))
  }
  const text = cell.trim()
  const value = /^\d+$/.test(text) ? parseInt(text, 10) : NaN
  if (!Number.isInteger(value) || value < 1 || value > MAX_SUBGROUP_NUMBER) {
    return fail(issue('UNPARSABLE_SUBGROUP_NUMBER', `"${cell}" is not a subgroup number`, { row, column }))
  }
  return ok(value)
}

export function cellToAction(cell: Cell | undefined, column: number, row = 1): Result<Action> {
  if (cell === undefined || isEmptyCell(cell)) return ok({ type: 'EMPTY_CELL' })
  const parsed = parseSubgroupNumber(cell, column, row)
  if (!parsed.ok) return parsed
  return ok({ type: 'SUBGROUP_NUMBER', value: parsed.data })
}

/**
 * Splits the subgroup-number header row into per-group clusters.
 * Only every second cell after the lead-in is read, the cells in
 * between belong to the merged room columns.
 */
export function parseSubgroupHeader(row: Cell[], rowIndex = 1): Result<SubgroupCluster[]> {
  let state = initialState
  for (const column of headerColumns(row.length)) {
    const action = cellToAction(row[column], column, rowIndex)
    if (!action.ok) return action
    state = reducer(state, action.data)
  }
  state = reducer(state, { type: 'END' })
  return ok(state.clusters)
}
