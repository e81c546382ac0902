// Shared schedule utilities – grid geometry, empty buffers and lookups

import type { Cell, Course, Day, GroupInfo, Subgroup, SubgroupCluster, Week } from '@/types/schedule';

export const DAYS_PER_WEEK = 7;
export const LESSONS_PER_DAY = 7;
export const MAX_LESSON_PAIRS = DAYS_PER_WEEK * LESSONS_PER_DAY;

// Leading cells of every row (day, lesson number, time) carry no group data
export const LEAD_IN_COLUMNS = 3;
// Each week-column spans two cells: class description, then room
export const CELLS_PER_COLUMN = 2;
// Group names and subgroup numbers, the body starts after them
export const HEADER_ROWS = 2;

export type LessonSlot = { day: number; lesson: number };

// Maps the k-th (upper, lower) row pair of the body onto its day and lesson
export function lessonSlotAt(pairIndex: number): LessonSlot {
  return {
    day: Math.floor(pairIndex / LESSONS_PER_DAY),
    lesson: pairIndex % LESSONS_PER_DAY,
  };
}

export function descriptionColumn(weekColumn: number) {
  return LEAD_IN_COLUMNS + weekColumn * CELLS_PER_COLUMN;
}

export function roomColumn(weekColumn: number) {
  return descriptionColumn(weekColumn) + 1;
}

export function expectedRowLength(weekColumns: number) {
  return LEAD_IN_COLUMNS + weekColumns * CELLS_PER_COLUMN;
}

export function isStringCell(cell: Cell | undefined): cell is string {
  return typeof cell === 'string';
}

export function isEmptyCell(cell: Cell | undefined) {
  return cell === null || cell === undefined;
}

export function describeCell(cell: Cell | undefined): string {
  if (isEmptyCell(cell)) return 'empty';
  return typeof cell;
}

export function emptyDay(): Day {
  return {
    upper_classes: Array.from({ length: LESSONS_PER_DAY }, () => null),
    lower_classes: Array.from({ length: LESSONS_PER_DAY }, () => null),
  };
}

export function emptyWeek(): Week {
  return Array.from({ length: DAYS_PER_WEEK }, emptyDay);
}

export function countWeekColumns(clusters: SubgroupCluster[]) {
  return clusters.reduce((sum, cluster) => sum + (cluster ? cluster.length : 1), 0);
}

export function findGroup(course: Course, groupName: string): GroupInfo | null {
  return course.groups.find((group) => group.name === groupName) ?? null;
}

export function getSubgroup(group: GroupInfo, subgroupNumber: number): Subgroup | null {
  if (group.subgroups.kind !== 'with_subgroups') return null;
  return group.subgroups.subgroups.find((s) => s.number === subgroupNumber) ?? null;
}

// Flattens a group into its weeks, number is null for a group without subgroups
export function groupWeeks(group: GroupInfo): { number: number | null; week: Week }[] {
  if (group.subgroups.kind === 'without_subgroup') {
    return [{ number: null, week: group.subgroups.week }];
  }
  return group.subgroups.subgroups.map((s) => ({ number: s.number, week: s.days }));
}
