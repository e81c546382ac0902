import { z } from 'zod'
import { fail, issue, ok, type Result } from '@/lib/errors'
import { DAYS_PER_WEEK, LESSONS_PER_DAY } from '@/lib/schedule'
import type {
  Class as ScheduleClass,
  ClassType as ScheduleClassType,
  Course as ScheduleCourse,
  Courses as ScheduleCourses,
  Day as ScheduleDay,
  GroupInfo as ScheduleGroupInfo,
  Subgroup as ScheduleSubgroup,
  Week as ScheduleWeek,
  WeekInfo as ScheduleWeekInfo,
} from '@/types/schedule'

export const ClassTypeSchema: z.ZodType<ScheduleClassType> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lecture') }),
  z.object({ kind: z.literal('practice') }),
  z.object({ kind: z.literal('lab') }),
  z.object({ kind: z.literal('unknown'), label: z.string() }),
])
export const ClassSchema: z.ZodType<ScheduleClass> = z.object({
  name: z.string(),
  class_type: ClassTypeSchema,
  teacher: z.string().nullable(),
  room: z.string(),
})
const LessonSlots = z.array(ClassSchema.nullable()).length(LESSONS_PER_DAY)
export const DaySchema: z.ZodType<ScheduleDay> = z.object({
  upper_classes: LessonSlots,
  lower_classes: LessonSlots,
})
export const WeekSchema: z.ZodType<ScheduleWeek> = z.array(DaySchema).length(DAYS_PER_WEEK)
export const SubgroupSchema: z.ZodType<ScheduleSubgroup> = z.object({
  number: z.number().int().min(1).max(255),
  days: WeekSchema,
})
export const WeekInfoSchema: z.ZodType<ScheduleWeekInfo> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('with_subgroups'), subgroups: z.array(SubgroupSchema).min(1) }),
  z.object({ kind: z.literal('without_subgroup'), week: WeekSchema }),
])
export const GroupInfoSchema: z.ZodType<ScheduleGroupInfo> = z.object({
  name: z.string(),
  subgroups: WeekInfoSchema,
})
export const CourseSchema: z.ZodType<ScheduleCourse> = z.object({
  name: z.string(),
  groups: z.array(GroupInfoSchema),
})
export const CoursesSchema: z.ZodType<ScheduleCourses> = z.tuple([CourseSchema, CourseSchema, CourseSchema, CourseSchema])

export function serializeCourses(courses: ScheduleCourses, indent = 2): string {
  return JSON.stringify(courses, null, indent)
}

export function parseJsonValidated<T>(text: string, schema: z.ZodType<T>): Result<T> {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return fail(issue('INVALID_JSON', 'Invalid JSON: ' + reason))
  }
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    return fail(issue('INVALID_SCHEMA', 'Invalid schema: ' + parsed.error.message))
  }
  return ok(parsed.data)
}

export function parseCoursesJson(text: string): Result<ScheduleCourses> {
  return parseJsonValidated(text, CoursesSchema)
}
