import { AnalyzedRow } from "../models/StudentRecord";
import { Curriculum, courseCredits } from "../models/Curriculum";
import { RankingEntry, RankingGroup, ScoringScheme } from "../types/types";
import { round2 } from "../utils/format";

type Rows = ReadonlyArray<AnalyzedRow>;

export const EQUAL_WEIGHTS: ScoringScheme = { weights: {}, defaultWeight: 1 };

/** Composite scores weighted by course credits; courses outside the curriculum weigh 1. */
export const creditWeightedScheme = (curriculum: Curriculum): ScoringScheme => ({
  weights: courseCredits(curriculum),
  defaultWeight: 1,
});

const weightOf = (scheme: ScoringScheme, courseCode: string): number =>
  scheme.weights[courseCode] ?? scheme.defaultWeight;

/** Weighted mean of the non-missing grades; null when the student has none. */
export const compositeScore = (
  grades: Readonly<Record<string, number | null>>,
  scheme: ScoringScheme = EQUAL_WEIGHTS
): number | null => {
  let weighted = 0;
  let totalWeight = 0;
  for (const [courseCode, grade] of Object.entries(grades)) {
    if (grade === null) continue;
    const weight = weightOf(scheme, courseCode);
    weighted += grade * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? weighted / totalWeight : null;
};

interface Candidate {
  studentId: string;
  lastName: string;
  firstName: string;
  department: string;
  program: string;
  level: string;
  score: number;
  gradedSubjects: number;
}

const byScoreThenId = (a: Candidate, b: Candidate): number => {
  if (a.score !== b.score) return b.score - a.score;
  return a.studentId < b.studentId ? -1 : a.studentId > b.studentId ? 1 : 0;
};

/**
 * Orders candidates by score descending, then identifier ascending. Position is
 * the ordinal place; rank is dense, so equal scores share a rank and the next
 * distinct score takes the following rank.
 */
const order = (candidates: Candidate[]): RankingEntry[] => {
  const sorted = [...candidates].sort(byScoreThenId);
  let rank = 0;
  let previous: number | null = null;
  return sorted.map((candidate, index) => {
    if (candidate.score !== previous) {
      rank++;
      previous = candidate.score;
    }
    return { position: index + 1, rank, ...candidate };
  });
};

const candidatesFrom = (
  rows: Rows,
  score: (grades: Record<string, number | null>) => number | null
): Candidate[] => {
  const students = new Map<string, { row: AnalyzedRow; grades: Record<string, number | null> }>();
  for (const row of rows) {
    const entry = students.get(row.studentId) ?? { row, grades: {} };
    entry.grades[row.courseCode] = row.grade;
    students.set(row.studentId, entry);
  }

  const candidates: Candidate[] = [];
  for (const { row, grades } of students.values()) {
    const value = score(grades);
    if (value === null) continue;
    candidates.push({
      studentId: row.studentId,
      lastName: row.lastName,
      firstName: row.firstName,
      department: row.department,
      program: row.program,
      level: row.level,
      score: round2(value),
      gradedSubjects: Object.values(grades).filter((grade) => grade !== null).length,
    });
  }
  return candidates;
};

export const rankStudents = (rows: Rows, scheme: ScoringScheme = EQUAL_WEIGHTS): RankingEntry[] =>
  order(candidatesFrom(rows, (grades) => compositeScore(grades, scheme)));

/** Ranking on one subject's grade alone; students without that grade are left out. */
export const rankBySubject = (rows: Rows, courseCode: string): RankingEntry[] =>
  order(
    candidatesFrom(
      rows.filter((row) => row.courseCode === courseCode),
      (grades) => grades[courseCode] ?? null
    )
  );

export type RankingGrouping = "department" | "programLevel" | "subject";

const GROUP_LABELS: Record<RankingGrouping, (row: AnalyzedRow) => string> = {
  department: (row) => row.department,
  programLevel: (row) => `${row.program} / ${row.level}`,
  subject: (row) => row.courseCode,
};

export const rankWithinGroups = (
  rows: Rows,
  grouping: RankingGrouping,
  scheme: ScoringScheme = EQUAL_WEIGHTS
): RankingGroup[] => {
  const label = GROUP_LABELS[grouping];
  const partitions = new Map<string, AnalyzedRow[]>();
  for (const row of rows) {
    const key = label(row);
    const partition = partitions.get(key);
    if (partition) partition.push(row);
    else partitions.set(key, [row]);
  }

  return Array.from(partitions.keys())
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((group) => {
      const partition = partitions.get(group) ?? [];
      const entries =
        grouping === "subject" ? rankBySubject(partition, group) : rankStudents(partition, scheme);
      return { group, entries };
    });
};
