import { scanBody } from '@/features/timetable/lib/gridScanner'
import { parseSubgroupHeader } from '@/features/timetable/lib/subgroupHeader'
import { fail, issue, ok, withSheet, type Result } from '@/lib/errors'
import { HEADER_ROWS, LEAD_IN_COLUMNS, countWeekColumns, isStringCell } from '@/lib/schedule'
import type { Cell, Course, GroupInfo, Sheet, SubgroupCluster, Week } from '@/types/schedule'

// Merged name cells leave empty cells behind, so only text cells name a group
export function groupNames(headerRow: Cell[]): string[] {
  return headerRow.slice(LEAD_IN_COLUMNS).filter(isStringCell)
}

export function assembleGroups(names: string[], clusters: SubgroupCluster[], weeks: Week[]): Result<GroupInfo[]> {
  if (names.length !== clusters.length) {
    return fail(
      issue(
        'GROUP_SUBGROUP_COUNT_MISMATCH',
        `Found ${names.length} group names but ${clusters.length} subgroup clusters`,
        { row: 0, expected: clusters.length, actual: names.length }
      )
    )
  }
  const expectedWeeks = countWeekColumns(clusters)
  if (weeks.length !== expectedWeeks) {
    return fail(
      issue('ROW_COLUMN_COUNT_MISMATCH', `Got ${weeks.length} week columns for ${expectedWeeks} subgroups`, {
        expected: expectedWeeks,
        actual: weeks.length,
      })
    )
  }

  let cursor = 0
  const groups = names.map((name, i): GroupInfo => {
    const cluster = clusters[i]
    if (cluster === null) {
      return { name, subgroups: { kind: 'without_subgroup', week: weeks[cursor++] } }
    }
    const subgroups = cluster.map((number) => ({ number, days: weeks[cursor++] }))
    return { name, subgroups: { kind: 'with_subgroups', subgroups } }
  })
  return ok(groups)
}

function parseSheetRows(rows: Cell[][]): Result<GroupInfo[]> {
  if (rows.length < HEADER_ROWS) {
    return fail(
      issue('MISSING_HEADER_ROWS', `Sheet has ${rows.length} rows, the group and subgroup headers need ${HEADER_ROWS}`, {
        expected: HEADER_ROWS,
        actual: rows.length,
      })
    )
  }
  const [nameRow, subgroupRow, ...body] = rows

  const clusters = parseSubgroupHeader(subgroupRow)
  if (!clusters.ok) return clusters

  const weeks = scanBody(body, countWeekColumns(clusters.data))
  if (!weeks.ok) return weeks

  return assembleGroups(groupNames(nameRow), clusters.data, weeks.data)
}

export function parseSheet(sheet: Sheet): Result<Course> {
  const groups = parseSheetRows(sheet.rows)
  if (!groups.ok) return fail(withSheet(groups.error, sheet.name))
  return ok({ name: sheet.name, groups: groups.data })
}
