import { AgeBand, Gender, GradeRow } from "../models/StudentRecord";

/** Descriptive statistics over a set of grades; every field but `count` is null when there are no grades. */
export interface Summary {
  count: number;
  mean: number | null;
  median: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
  q1: number | null;
  q3: number | null;
  passRate: number | null;
}

export interface SubjectAggregate extends Summary {
  courseCode: string;
  courseName: string;
}

export type GroupKey = "department" | "program" | "level" | "courseCode" | "teacher" | "gender" | "ageBand";

export interface GroupAggregate {
  group: Partial<Record<GroupKey, string>>;
  summary: Summary;
}

export interface CohortFilter {
  department?: string;
  program?: string;
  level?: string;
  subject?: string;
  teacher?: string;
  gender?: Gender;
  ageBand?: AgeBand;
}

export interface CohortSummary {
  filter: CohortFilter;
  empty: boolean;
  gradeCount: number;
  studentCount: number;
  overall: Summary;
  subjects: SubjectAggregate[];
}

export interface DistributionBin {
  from: number;
  to: number;
  count: number;
}

/** Mean grade per (row, column) pair; a null cell has no grade. */
export interface MeanMatrix {
  rows: string[];
  columns: string[];
  cells: Array<Array<number | null>>;
}

export interface RankingEntry {
  position: number;
  rank: number;
  studentId: string;
  lastName: string;
  firstName: string;
  department: string;
  program: string;
  level: string;
  score: number;
  gradedSubjects: number;
}

export interface RankingGroup {
  group: string;
  entries: RankingEntry[];
}

/** Composite-score weights by course code; courses without a weight count `defaultWeight`. */
export interface ScoringScheme {
  weights: Record<string, number>;
  defaultWeight: number;
}

export interface ComparisonMetric {
  metric: string;
  current: number | null;
  other: number | null;
  difference: number | null;
}

/** Expected column name → column name in the source file. */
export type ColumnMapping = Partial<Record<keyof GradeRow, string>>;

export const DASHBOARD_TABS = [
  "overview",
  "analysis",
  "demographics",
  "rankings",
  "exports",
  "data",
  "compare",
] as const;
export type DashboardTab = (typeof DASHBOARD_TABS)[number];
