import { describe, expect, it } from 'vitest'
import * as XLSX from 'xlsx'
import { readWorkbook, sheetFromWorksheet } from '@/lib/workbook'
import type { Cell } from '@/types/schedule'

function workbookBuffer(sheets: { name: string; rows: Cell[][] }[]): Buffer {
  const workbook = XLSX.utils.book_new()
  for (const sheet of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(sheet.rows), sheet.name)
  }
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
}

describe('sheetFromWorksheet', () => {
  it('keeps positions and cell kinds', () => {
    const worksheet = XLSX.utils.aoa_to_sheet([
      [null, null, null, 'Group'],
      ['Пн', 1, true, 'Math (Практические)\nTeacher'],
    ])
    expect(sheetFromWorksheet('S', worksheet)).toEqual({
      name: 'S',
      rows: [
        [null, null, null, 'Group'],
        ['Пн', 1, 1, 'Math (Практические)\nTeacher'],
      ],
    })
  })

  it('anchors the grid at A1 even when the used range starts later', () => {
    const worksheet: XLSX.WorkSheet = {
      '!ref': 'B2:C2',
      B2: { t: 's', v: 'x' },
      C2: { t: 'n', v: 3 },
    }
    expect(sheetFromWorksheet('S', worksheet).rows).toEqual([
      [null, null, null],
      [null, 'x', 3],
    ])
  })

  it('turns error cells into empty ones', () => {
    const worksheet: XLSX.WorkSheet = {
      '!ref': 'A1:B1',
      A1: { t: 'e', v: 7 },
      B1: { t: 's', v: 'ok' },
    }
    expect(sheetFromWorksheet('S', worksheet).rows).toEqual([[null, 'ok']])
  })

  it('returns no rows for a blank sheet', () => {
    expect(sheetFromWorksheet('Empty', {})).toEqual({ name: 'Empty', rows: [] })
  })
})

describe('readWorkbook', () => {
  it('reads sheets in workbook order', () => {
    const data = workbookBuffer([
      { name: 'Первый курс', rows: [['a', null, 'c']] },
      { name: 'Second', rows: [['x'], ['b']] },
    ])
    const sheets = readWorkbook(data)
    expect(sheets.map((s) => s.name)).toEqual(['Первый курс', 'Second'])
    expect(sheets[0].rows).toEqual([['a', null, 'c']])
    expect(sheets[1].rows).toEqual([['x'], ['b']])
  })
})
