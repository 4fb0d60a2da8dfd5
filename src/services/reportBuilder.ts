import crypto from "crypto";
import { AGE_BANDS, AnalyzedRow } from "../models/StudentRecord";
import { CohortFilter, ScoringScheme, Summary } from "../types/types";
import { formatNumber, formatPercent } from "../utils/format";
import { EQUAL_WEIGHTS, rankStudents, rankWithinGroups } from "./ranking";
import {
  DEFAULT_PASS_MARK,
  ageGenderMatrix,
  distinctValues,
  globalStats,
  subjectAggregates,
} from "./statistics";

export type ReportBlock =
  | { kind: "title"; text: string }
  | { kind: "heading"; level: 1 | 2 | 3; text: string }
  | { kind: "paragraph"; text: string }
  | { kind: "table"; columns: string[]; rows: string[][]; columnWidths?: number[] }
  | { kind: "chart"; chart: string; caption: string; width: number; height: number }
  | { kind: "pageBreak" };

export interface Report {
  title: string;
  createdAt: Date;
  fileId: string;
  blocks: ReportBlock[];
}

export interface ReportOptions {
  title?: string;
  academicYear: string;
  createdAt: Date;
  passMark?: number;
  scheme?: ScoringScheme;
  filter?: CohortFilter;
  generalTop?: number;
  departmentTop?: number;
}

const describeFilter = (filter: CohortFilter | undefined): string | null => {
  if (!filter) return null;
  const parts = Object.entries(filter)
    .filter(([, value]) => value !== undefined && value !== "")
    .map(([key, value]) => `${key} = ${value}`);
  return parts.length > 0 ? parts.join(", ") : null;
};

const globalTable = (summary: Summary): ReportBlock => ({
  kind: "table",
  columns: ["Indicator", "Value"],
  rows: [
    ["Mean", formatNumber(summary.mean)],
    ["Median", formatNumber(summary.median)],
    ["Standard deviation", formatNumber(summary.std)],
    ["Minimum", formatNumber(summary.min)],
    ["Maximum", formatNumber(summary.max)],
    ["Pass rate (%)", formatNumber(summary.passRate)],
  ],
  columnWidths: [250, 100],
});

const describeTable = (summary: Summary): ReportBlock => ({
  kind: "table",
  columns: ["Statistic", "Value"],
  rows: [
    ["count", String(summary.count)],
    ["mean", formatNumber(summary.mean)],
    ["std", formatNumber(summary.std)],
    ["min", formatNumber(summary.min)],
    ["25%", formatNumber(summary.q1)],
    ["50%", formatNumber(summary.median)],
    ["75%", formatNumber(summary.q3)],
    ["max", formatNumber(summary.max)],
  ],
  columnWidths: [200, 100],
});

const chart = (name: string, caption: string, width = 500, height = 300): ReportBlock => ({
  kind: "chart",
  chart: name,
  caption,
  width,
  height,
});

/**
 * Assembles the report as an ordered list of blocks. The sequence of sections
 * is fixed; only the figures depend on the rows, so identical rows and options
 * give an identical report.
 */
export const buildReport = (rows: ReadonlyArray<AnalyzedRow>, options: ReportOptions): Report => {
  const passMark = options.passMark ?? DEFAULT_PASS_MARK;
  const scheme = options.scheme ?? EQUAL_WEIGHTS;
  const title = options.title ?? "Student Grade Analysis";
  const filterText = describeFilter(options.filter);
  const overall = globalStats(rows, passMark);
  const studentCount = new Set(rows.map((row) => row.studentId)).size;

  const blocks: ReportBlock[] = [
    { kind: "title", text: title },
    { kind: "paragraph", text: "Automatically generated report" },
    { kind: "paragraph", text: `Academic year: ${options.academicYear}` },
  ];
  if (filterText) {
    blocks.push({ kind: "paragraph", text: `Cohort: ${filterText}` });
  }
  blocks.push(
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "1. Project overview" },
    {
      kind: "paragraph",
      text:
        "This project analyses student grades. The data were simulated and analysed to produce " +
        "descriptive statistics, visualisations and academic rankings.",
    },
    { kind: "heading", level: 1, text: "2. Dataset description" },
    {
      kind: "paragraph",
      text:
        `The dataset contains ${rows.length} grades from ${studentCount} students across ` +
        `${distinctValues(rows, "department").length} departments, ${distinctValues(rows, "program").length} programs ` +
        `and ${distinctValues(rows, "level").length} levels. The pass mark is ${passMark}.`,
    },
    { kind: "heading", level: 1, text: "3. Global statistics" },
    globalTable(overall),
    { kind: "heading", level: 2, text: "3.1. Detailed descriptive statistics" },
    describeTable(overall),
    { kind: "heading", level: 2, text: "3.2. Statistics by subject" },
    {
      kind: "table",
      columns: ["Subject", "Name", "Count", "Mean", "Median", "Std", "Pass rate"],
      rows: subjectAggregates(rows, passMark).map((aggregate) => [
        aggregate.courseCode,
        aggregate.courseName,
        String(aggregate.count),
        formatNumber(aggregate.mean),
        formatNumber(aggregate.median),
        formatNumber(aggregate.std),
        formatPercent(aggregate.passRate),
      ]),
    },
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "4. Global view" },
    { kind: "heading", level: 2, text: "4.1. Grade distribution" },
    chart("grade-distribution", "Grade distribution"),
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "5. Detailed analyses" },
    { kind: "heading", level: 2, text: "5.1. Grades by department" },
    chart("boxplot-department", "Grades by department"),
    { kind: "heading", level: 2, text: "5.2. Mean grade by subject" },
    chart("mean-by-subject", "Mean grade by subject"),
    { kind: "pageBreak" },
    { kind: "heading", level: 2, text: "5.3. Mean grade by subject and level" },
    chart("heatmap-subject-level", "Mean grade by subject and level"),
    { kind: "heading", level: 2, text: "5.4. Mean grade by program" },
    chart("mean-by-program", "Mean grade by program"),
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "6. Demographics" },
    { kind: "heading", level: 2, text: "6.1. Grades by gender" },
    chart("boxplot-gender", "Grades by gender", 400, 300),
    { kind: "heading", level: 2, text: "6.2. Mean grade by age band" },
    chart("mean-by-age-band", "Mean grade by age band"),
    { kind: "heading", level: 2, text: "6.3. Mean grade by age band and gender" }
  );

  const matrix = ageGenderMatrix(rows);
  blocks.push(
    {
      kind: "table",
      columns: ["Gender", ...AGE_BANDS],
      rows: matrix.rows.map((gender, i) => [
        gender,
        ...AGE_BANDS.map((band) => {
          const j = matrix.columns.indexOf(band);
          return formatNumber(j === -1 ? null : matrix.cells[i][j]);
        }),
      ]),
      columnWidths: [100, 80, 80, 80, 80],
    },
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "7. Rankings" },
    { kind: "heading", level: 2, text: `7.1. General ranking (top ${options.generalTop ?? 20})` },
    {
      kind: "table",
      columns: ["Rank", "Student", "Last name", "First name", "Department", "Program", "Score"],
      rows: rankStudents(rows, scheme)
        .slice(0, options.generalTop ?? 20)
        .map((entry) => [
          String(entry.rank),
          entry.studentId,
          entry.lastName,
          entry.firstName,
          entry.department,
          entry.program,
          entry.score.toFixed(2),
        ]),
      columnWidths: [40, 60, 80, 80, 90, 90, 55],
    },
    { kind: "pageBreak" },
    { kind: "heading", level: 2, text: `7.2. Ranking by department (top ${options.departmentTop ?? 10})` }
  );

  for (const { group, entries } of rankWithinGroups(rows, "department", scheme)) {
    blocks.push(
      { kind: "heading", level: 3, text: group },
      {
        kind: "table",
        columns: ["Rank", "Student", "Last name", "First name", "Score"],
        rows: entries
          .slice(0, options.departmentTop ?? 10)
          .map((entry) => [String(entry.rank), entry.studentId, entry.lastName, entry.firstName, entry.score.toFixed(2)]),
        columnWidths: [40, 60, 100, 100, 60],
      }
    );
  }

  blocks.push(
    { kind: "pageBreak" },
    { kind: "heading", level: 1, text: "8. Conclusion" },
    {
      kind: "paragraph",
      text:
        "The statistics, visualisations and rankings give a clearer picture of academic " +
        "performance and support decisions by teaching staff.",
    }
  );

  const fileId = crypto
    .createHash("md5")
    .update(JSON.stringify({ title, createdAt: options.createdAt.toISOString(), blocks }))
    .digest("hex")
    .toUpperCase();

  return { title, createdAt: options.createdAt, fileId, blocks };
};

/** Names of the charts a report embeds, in order of appearance. */
export const chartsUsed = (report: Report): string[] =>
  report.blocks.flatMap((block) => (block.kind === "chart" ? [block.chart] : []));
