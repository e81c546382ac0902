import { isStringCell } from '@/lib/schedule'
import type { Cell, Class, ClassType } from '@/types/schedule'

export const CLASS_TYPE_LABELS: Record<string, ClassType['kind']> = {
  'Лекционные': 'lecture',
  'Практические': 'practice',
  'Лабораторные': 'lab',
}

export function classTypeFromLabel(label: string): ClassType {
  const kind = CLASS_TYPE_LABELS[label]
  switch (kind) {
    case 'lecture':
      return { kind: 'lecture' }
    case 'practice':
      return { kind: 'practice' }
    case 'lab':
      return { kind: 'lab' }
    default:
      return { kind: 'unknown', label }
  }
}

function splitOnce(value: string, separator: string): [string, string] | null {
  const at = value.indexOf(separator)
  if (at < 0) return null
  return [value.slice(0, at), value.slice(at + separator.length)]
}

/**
 * Reads one lesson slot. The description cell looks like
 * `Name (Type)` with an optional teacher on a second line,
 * the room sits in the cell to its right.
 *
 * Returns null for an empty slot, which includes non-string cells
 * and descriptions that do not follow the pattern.
 */
export function parseClass(description: Cell | undefined, room: Cell | undefined): Class | null {
  if (!isStringCell(description)) return null

  const nameAndRest = splitOnce(description, ' (')
  if (!nameAndRest) return null
  const [name, rest] = nameAndRest

  const labelAndTeacher = splitOnce(rest, '\n')
  const labelWithParen = labelAndTeacher ? labelAndTeacher[0] : rest
  let teacher = labelAndTeacher ? labelAndTeacher[1] : null
  if (teacher !== null && !teacher.trim()) teacher = null

  if (!labelWithParen.endsWith(')')) return null
  const label = labelWithParen.slice(0, -1)

  if (!isStringCell(room)) return null

  return {
    name,
    class_type: classTypeFromLabel(label),
    teacher,
    room,
  }
}
