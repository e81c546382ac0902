import { readFile } from 'node:fs/promises'
import * as XLSX from 'xlsx'
import type { Cell, Sheet } from '@/types/schedule'

function toCell(cell: XLSX.CellObject | undefined): Cell {
  if (!cell || cell.t === 'e' || cell.t === 'z') return null
  const { v } = cell
  if (typeof v === 'string') return v
  if (typeof v === 'number') return v
  if (typeof v === 'boolean') return v ? 1 : 0
  if (v instanceof Date) return v.getTime()
  return null
}

/**
 * Converts one worksheet into a rectangular grid. The grid always starts
 * at A1 so row and column indexes match the spreadsheet's own.
 */
export function sheetFromWorksheet(name: string, worksheet: XLSX.WorkSheet): Sheet {
  const ref = worksheet['!ref']
  if (!ref) return { name, rows: [] }

  const range = XLSX.utils.decode_range(ref)
  const rows: Cell[][] = []
  for (let r = 0; r <= range.e.r; r++) {
    const row: Cell[] = []
    for (let c = 0; c <= range.e.c; c++) {
      const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r, c })]
      row.push(toCell(cell))
    }
    rows.push(row)
  }
  return { name, rows }
}

// Sheets come back in workbook order; both .xlsx and legacy .xls are accepted
export function readWorkbook(data: Buffer): Sheet[] {
  const workbook = XLSX.read(data, { type: 'buffer' })
  return workbook.SheetNames.map((name) => sheetFromWorksheet(name, workbook.Sheets[name]))
}

export async function readWorkbookFile(path: string): Promise<Sheet[]> {
  const data = await readFile(path)
  return readWorkbook(data)
}
