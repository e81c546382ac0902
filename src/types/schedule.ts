// Shared schedule-related TypeScript types

// Decoded spreadsheet cell; null stands for an empty (or merged-away) cell
export type Cell = string | number | null;

export type Sheet = {
  name: string;
  rows: Cell[][];
};

export type ClassType =
  | { kind: 'lecture' }
  | { kind: 'practice' }
  | { kind: 'lab' }
  | { kind: 'unknown'; label: string };

export type Class = {
  name: string;
  class_type: ClassType;
  teacher: string | null;
  room: string;
};

// Index = lesson number 0..6
export type LessonSlots = (Class | null)[];

export type Day = {
  upper_classes: LessonSlots;
  lower_classes: LessonSlots;
};

// Monday = 0 … Sunday = 6
export type Week = Day[];

export type Subgroup = {
  number: number;
  days: Week;
};

export type WeekInfo =
  | { kind: 'with_subgroups'; subgroups: Subgroup[] }
  | { kind: 'without_subgroup'; week: Week };

export type GroupInfo = {
  name: string;
  subgroups: WeekInfo;
};

export type Course = {
  name: string;
  groups: GroupInfo[];
};

export type Courses = [Course, Course, Course, Course];

// A null entry is a group occupying a single column without subgroups
export type SubgroupCluster = number[] | null;
