import { AnalyzedRow } from "../models/StudentRecord";
import { GroupAggregate, GroupKey, MeanMatrix, RankingEntry, RankingGroup, Summary } from "../types/types";
import { round2OrNull, roundSummary } from "../utils/format";
import { Table } from "./datasetStore";
import {
  ageGenderMatrix,
  globalStats,
  statsByAgeBand,
  statsByDepartment,
  statsByGender,
  statsByProgramLevel,
  statsBySubjectTeacher,
  subjectAggregates,
} from "./statistics";

const SUMMARY_COLUMNS = ["count", "mean", "median", "std", "min", "max", "q1", "q3", "passRate"] as const;

const summaryCells = (summary: Summary): Array<number | null> => {
  const rounded = roundSummary(summary);
  return SUMMARY_COLUMNS.map((column) => rounded[column]);
};

export const groupTable = (keys: ReadonlyArray<GroupKey>, aggregates: ReadonlyArray<GroupAggregate>): Table => ({
  columns: [...keys, ...SUMMARY_COLUMNS],
  rows: aggregates.map(({ group, summary }) => [...keys.map((key) => group[key] ?? ""), ...summaryCells(summary)]),
});

export const matrixTable = (corner: string, matrix: MeanMatrix): Table => ({
  columns: [corner, ...matrix.columns],
  rows: matrix.rows.map((label, i) => [label, ...matrix.cells[i].map(round2OrNull)]),
});

const RANKING_COLUMNS = [
  "position",
  "rank",
  "studentId",
  "lastName",
  "firstName",
  "department",
  "program",
  "level",
  "score",
  "gradedSubjects",
] as const;

export const rankingTable = (entries: ReadonlyArray<RankingEntry>): Table => ({
  columns: [...RANKING_COLUMNS],
  rows: entries.map((entry) => RANKING_COLUMNS.map((column) => entry[column])),
});

export const groupedRankingTable = (groupColumn: string, groups: ReadonlyArray<RankingGroup>): Table => ({
  columns: [groupColumn, ...RANKING_COLUMNS],
  rows: groups.flatMap(({ group, entries }) =>
    entries.map((entry) => [group, ...RANKING_COLUMNS.map((column) => entry[column])])
  ),
});

/** Every aggregate table of the analysis step, keyed by export file name. */
export const statisticsTables = (rows: ReadonlyArray<AnalyzedRow>, passMark: number): Record<string, Table> => ({
  "global-stats.csv": groupTable([], [{ group: {}, summary: globalStats(rows, passMark) }]),
  "subject-stats.csv": {
    columns: ["courseCode", "courseName", ...SUMMARY_COLUMNS],
    rows: subjectAggregates(rows, passMark).map((aggregate) => [
      aggregate.courseCode,
      aggregate.courseName,
      ...summaryCells(aggregate),
    ]),
  },
  "department-stats.csv": groupTable(["department"], statsByDepartment(rows, passMark)),
  "program-level-stats.csv": groupTable(["department", "program", "level"], statsByProgramLevel(rows, passMark)),
  "subject-teacher-stats.csv": groupTable(["courseCode", "teacher"], statsBySubjectTeacher(rows, passMark)),
  "gender-stats.csv": groupTable(["gender"], statsByGender(rows, passMark)),
  "age-band-stats.csv": groupTable(["ageBand"], statsByAgeBand(rows, passMark)),
  "age-gender-means.csv": matrixTable("gender", ageGenderMatrix(rows)),
});
