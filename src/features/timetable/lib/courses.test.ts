import { describe, expect, it } from 'vitest'
import { buildCourses, parseSheets } from '@/features/timetable/lib/courses'
import { getSubgroup, findGroup } from '@/lib/schedule'
import { buildSheet } from '@/test/sheetFixture'
import type { Class, Sheet } from '@/types/schedule'

const math: Class = {
  name: 'Math',
  class_type: { kind: 'practice' },
  teacher: 'Teacher',
  room: 'Class',
}
const cs: Class = {
  name: 'CS',
  class_type: { kind: 'lab' },
  teacher: 'Teacher2',
  room: 'Class2',
}

function workbook(): Sheet[] {
  return [
    buildSheet('First', [{ name: 'Alpha', subgroups: null }]),
    buildSheet(
      'Course',
      [{ name: 'Group', subgroups: [1, 2] }],
      [
        { column: 0, day: 0, lesson: 0, half: 'upper', description: 'Math (Практические)\nTeacher', room: 'Class' },
        { column: 1, day: 6, lesson: 6, half: 'lower', description: 'CS (Лабораторные)\nTeacher2', room: 'Class2' },
      ]
    ),
    buildSheet('Third', [{ name: 'Gamma', subgroups: [1] }, { name: 'Delta', subgroups: null }]),
    buildSheet('Fourth', [{ name: 'Omega', subgroups: null }, { name: 'Psi', subgroups: null }]),
  ]
}

describe('buildCourses', () => {
  it('parses four sheets in order', () => {
    const result = buildCourses(workbook())
    if (!result.ok) throw new Error(result.error.map((e) => e.message).join('\n'))
    expect(result.data.map((c) => c.name)).toEqual(['First', 'Course', 'Third', 'Fourth'])
    expect(result.data[3].groups.map((g) => g.name)).toEqual(['Omega', 'Psi'])
  })

  it('puts the two filled cells in their subgroup slots and nothing else', () => {
    const result = buildCourses(workbook())
    if (!result.ok) throw new Error(result.error.map((e) => e.message).join('\n'))

    const group = findGroup(result.data[1], 'Group')
    expect(group).not.toBeNull()
    if (!group) return
    const first = getSubgroup(group, 1)
    const second = getSubgroup(group, 2)
    expect(first?.days[0].upper_classes[0]).toEqual(math)
    expect(second?.days[6].lower_classes[6]).toEqual(cs)

    let filled = 0
    for (const subgroup of [first, second]) {
      for (const day of subgroup?.days ?? []) {
        for (const slot of [...day.upper_classes, ...day.lower_classes]) {
          if (slot !== null) filled++
        }
      }
    }
    expect(filled).toBe(2)
  })

  it.each([3, 5])('rejects %i sheets before parsing any', (count) => {
    const broken: Sheet = { name: 'Broken', rows: [] }
    const result = buildCourses(Array.from({ length: count }, () => broken))
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toHaveLength(1)
    expect(result.error[0]).toMatchObject({ code: 'WRONG_SHEET_COUNT', expected: 4, actual: count, sheet: null })
  })

  it('collects every failing sheet', () => {
    const sheets = workbook()
    sheets[0].rows[1][3] = 'one'
    sheets[2].rows[4] = sheets[2].rows[4].slice(0, 4)
    const result = buildCourses(sheets)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.map((e) => [e.sheet, e.code])).toEqual([
      ['First', 'UNPARSABLE_SUBGROUP_NUMBER'],
      ['Third', 'ROW_COLUMN_COUNT_MISMATCH'],
    ])
  })
})

describe('parseSheets', () => {
  it('keeps healthy sheets when one is malformed', () => {
    const sheets = workbook()
    sheets[3].rows[10].push(null)
    const result = parseSheets(sheets)
    if (!result.ok) throw new Error(result.error.message)
    expect(result.data.map((r) => [r.sheet, r.result.ok])).toEqual([
      ['First', true],
      ['Course', true],
      ['Third', true],
      ['Fourth', false],
    ])
    const failed = result.data[3].result
    if (failed.ok) return
    expect(failed.error).toMatchObject({ code: 'ROW_COLUMN_COUNT_MISMATCH', sheet: 'Fourth', row: 10, expected: 7, actual: 8 })
  })
})
