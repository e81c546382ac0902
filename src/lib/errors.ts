export type ScheduleErrorCode =
  | 'WRONG_SHEET_COUNT'
  | 'MISSING_HEADER_ROWS'
  | 'CELL_TYPE_MISMATCH'
  | 'UNPARSABLE_SUBGROUP_NUMBER'
  | 'ROW_COLUMN_COUNT_MISMATCH'
  | 'TOO_MANY_ROWS'
  | 'GROUP_SUBGROUP_COUNT_MISMATCH'
  | 'INVALID_JSON'
  | 'INVALID_SCHEMA'
  | 'INVALID_CONFIG'

// Row and column are 0-based positions in the sheet grid
export type ScheduleIssue = {
  code: ScheduleErrorCode
  message: string
  sheet: string | null
  row: number | null
  column: number | null
  expected?: number
  actual?: number
}

export type Result<T, E = ScheduleIssue> =
  | { ok: true; data: T }
  | { ok: false; error: E }

export function ok<T>(data: T): { ok: true; data: T } {
  return { ok: true, data }
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export function issue(
  code: ScheduleErrorCode,
  message: string,
  at: Partial<Omit<ScheduleIssue, 'code' | 'message'>> = {}
): ScheduleIssue {
  return {
    code,
    message,
    sheet: at.sheet ?? null,
    row: at.row ?? null,
    column: at.column ?? null,
    ...(at.expected !== undefined ? { expected: at.expected } : {}),
    ...(at.actual !== undefined ? { actual: at.actual } : {}),
  }
}

export function withSheet(problem: ScheduleIssue, sheet: string): ScheduleIssue {
  return problem.sheet === null ? { ...problem, sheet } : problem
}

export function formatIssue(problem: ScheduleIssue): string {
  const where: string[] = []
  if (problem.sheet !== null) where.push(`sheet "${problem.sheet}"`)
  if (problem.row !== null) where.push(`row ${problem.row}`)
  if (problem.column !== null) where.push(`column ${problem.column}`)
  const prefix = where.length ? ` ${where.join(', ')}:` : ''
  return `[${problem.code}]${prefix} ${problem.message}`
}

export class ScheduleError extends Error {
  readonly issues: ScheduleIssue[]

  constructor(issues: ScheduleIssue | ScheduleIssue[]) {
    const list = Array.isArray(issues) ? issues : [issues]
    super(list.map(formatIssue).join('\n') || 'Schedule conversion failed')
    this.name = 'ScheduleError'
    this.issues = list
  }

  get code(): ScheduleErrorCode | null {
    return this.issues[0]?.code ?? null
  }
}

export function unwrap<T>(result: Result<T, ScheduleIssue | ScheduleIssue[]>): T {
  if (result.ok) return result.data
  throw new ScheduleError(result.error)
}
