export * from '@/types/schedule'
export * from '@/lib/errors'
export * from '@/lib/schedule'
export * from '@/lib/api'
export * from '@/lib/config'
export * from '@/lib/log'
export * from '@/lib/workbook'
export * from '@/lib/convert'
export { parseClass, classTypeFromLabel, CLASS_TYPE_LABELS } from '@/features/timetable/lib/classCell'
export { parseSubgroupHeader, parseSubgroupNumber, headerColumns } from '@/features/timetable/lib/subgroupHeader'
export { scanBody, pairRows } from '@/features/timetable/lib/gridScanner'
export { assembleGroups, groupNames, parseSheet } from '@/features/timetable/lib/sheetAssembler'
export { buildCourses, parseSheets, SHEETS_PER_WORKBOOK, type SheetResult } from '@/features/timetable/lib/courses'
