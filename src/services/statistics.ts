import { AGE_BANDS, AnalyzedRow, MAX_GRADE, MIN_GRADE } from "../models/StudentRecord";
import {
  CohortFilter,
  CohortSummary,
  ComparisonMetric,
  DistributionBin,
  GroupAggregate,
  GroupKey,
  MeanMatrix,
  SubjectAggregate,
  Summary,
} from "../types/types";

export const DEFAULT_PASS_MARK = 10;

type Rows = ReadonlyArray<AnalyzedRow>;

export const gradesOf = (rows: Rows): number[] =>
  rows.flatMap((row) => (row.grade === null ? [] : [row.grade]));

// Linear interpolation between closest ranks, on sorted input.
const quantile = (sorted: number[], q: number): number => {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

export const summarize = (values: ReadonlyArray<number>, passMark = DEFAULT_PASS_MARK): Summary => {
  const count = values.length;
  if (count === 0) {
    return { count, mean: null, median: null, std: null, min: null, max: null, q1: null, q3: null, passRate: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, value) => sum + value, 0) / count;
  const std =
    count > 1
      ? Math.sqrt(sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1))
      : null;
  const passed = sorted.filter((value) => value >= passMark).length;

  return {
    count,
    mean,
    median: quantile(sorted, 0.5),
    std,
    min: sorted[0],
    max: sorted[count - 1],
    q1: quantile(sorted, 0.25),
    q3: quantile(sorted, 0.75),
    passRate: (passed / count) * 100,
  };
};

export const globalStats = (rows: Rows, passMark = DEFAULT_PASS_MARK): Summary =>
  summarize(gradesOf(rows), passMark);

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const keyValue = (row: AnalyzedRow, key: GroupKey): string | null => {
  const value = row[key];
  return value === null ? null : String(value);
};

/**
 * Single grouping pass over the rows. Groups appear in key order; rows whose
 * key is absent (no age band) are left out. Missing grades still register the
 * group so that a subject with no recorded grade reports count 0.
 */
export const groupStats = (
  rows: Rows,
  keys: ReadonlyArray<GroupKey>,
  passMark = DEFAULT_PASS_MARK
): GroupAggregate[] => {
  const groups = new Map<string, { group: Partial<Record<GroupKey, string>>; values: number[] }>();

  for (const row of rows) {
    const group: Partial<Record<GroupKey, string>> = {};
    let complete = true;
    for (const key of keys) {
      const value = keyValue(row, key);
      if (value === null) {
        complete = false;
        break;
      }
      group[key] = value;
    }
    if (!complete) continue;

    const id = JSON.stringify(keys.map((key) => group[key]));
    let entry = groups.get(id);
    if (!entry) {
      entry = { group, values: [] };
      groups.set(id, entry);
    }
    if (row.grade !== null) entry.values.push(row.grade);
  }

  return Array.from(groups.values())
    .sort((a, b) => {
      for (const key of keys) {
        const order = compareKeys(a.group[key] ?? "", b.group[key] ?? "");
        if (order !== 0) return order;
      }
      return 0;
    })
    .map(({ group, values }) => ({ group, summary: summarize(values, passMark) }));
};

export const subjectAggregates = (rows: Rows, passMark = DEFAULT_PASS_MARK): SubjectAggregate[] => {
  const names = new Map<string, string>();
  for (const row of rows) {
    if (!names.has(row.courseCode)) names.set(row.courseCode, row.courseName);
  }
  return groupStats(rows, ["courseCode"], passMark).map(({ group, summary }) => {
    const courseCode = group.courseCode ?? "";
    return { courseCode, courseName: names.get(courseCode) ?? courseCode, ...summary };
  });
};

export const statsByDepartment = (rows: Rows, passMark = DEFAULT_PASS_MARK) =>
  groupStats(rows, ["department"], passMark);

export const statsByProgramLevel = (rows: Rows, passMark = DEFAULT_PASS_MARK) =>
  groupStats(rows, ["department", "program", "level"], passMark);

export const statsBySubjectTeacher = (rows: Rows, passMark = DEFAULT_PASS_MARK) =>
  groupStats(rows, ["courseCode", "teacher"], passMark);

export const statsByGender = (rows: Rows, passMark = DEFAULT_PASS_MARK) =>
  groupStats(rows, ["gender"], passMark);

/** Age bands in their natural order rather than key order. */
export const statsByAgeBand = (rows: Rows, passMark = DEFAULT_PASS_MARK): GroupAggregate[] => {
  const byBand = new Map(
    groupStats(rows, ["ageBand"], passMark).map((aggregate) => [aggregate.group.ageBand, aggregate])
  );
  return AGE_BANDS.flatMap((band) => {
    const aggregate = byBand.get(band);
    return aggregate ? [aggregate] : [];
  });
};

const meanMatrix = (
  rows: Rows,
  rowKey: GroupKey,
  columnKey: GroupKey,
  columnOrder?: ReadonlyArray<string>
): MeanMatrix => {
  const aggregates = groupStats(rows, [rowKey, columnKey]);
  const rowLabels = Array.from(new Set(aggregates.map((a) => a.group[rowKey] ?? ""))).sort(compareKeys);
  const present = new Set(aggregates.map((a) => a.group[columnKey] ?? ""));
  const columnLabels = columnOrder
    ? columnOrder.filter((label) => present.has(label))
    : Array.from(present).sort(compareKeys);

  const lookup = new Map(
    aggregates.map((a) => [`${a.group[rowKey]}\u0000${a.group[columnKey]}`, a.summary.mean])
  );
  return {
    rows: rowLabels,
    columns: columnLabels,
    cells: rowLabels.map((r) => columnLabels.map((c) => lookup.get(`${r}\u0000${c}`) ?? null)),
  };
};

export const ageGenderMatrix = (rows: Rows): MeanMatrix => meanMatrix(rows, "gender", "ageBand", AGE_BANDS);

export const subjectLevelMatrix = (rows: Rows): MeanMatrix => meanMatrix(rows, "courseCode", "level");

export interface DistributionOptions {
  bins?: number;
  min?: number;
  max?: number;
}

/** Equal-width histogram; the last bin is closed on the right, values outside the range are ignored. */
export const gradeDistribution = (
  values: ReadonlyArray<number>,
  { bins = 20, min = MIN_GRADE, max = MAX_GRADE }: DistributionOptions = {}
): DistributionBin[] => {
  if (!Number.isInteger(bins) || bins < 1) {
    throw new RangeError(`bins must be a positive integer, got ${bins}`);
  }
  if (!(max > min)) {
    throw new RangeError(`max (${max}) must be greater than min (${min})`);
  }
  const width = (max - min) / bins;
  const result: DistributionBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const value of values) {
    if (value < min || value > max) continue;
    const index = Math.min(Math.floor((value - min) / width), bins - 1);
    result[index].count++;
  }
  return result;
};

export const rowDistribution = (rows: Rows, options?: DistributionOptions): DistributionBin[] =>
  gradeDistribution(gradesOf(rows), options);

const FILTER_FIELDS: ReadonlyArray<[keyof CohortFilter, keyof AnalyzedRow]> = [
  ["department", "department"],
  ["program", "program"],
  ["level", "level"],
  ["subject", "courseCode"],
  ["teacher", "teacher"],
  ["gender", "gender"],
  ["ageBand", "ageBand"],
];

export const filterRows = (rows: Rows, filter: CohortFilter): AnalyzedRow[] => {
  const active = FILTER_FIELDS.filter(([field]) => filter[field] !== undefined);
  return rows.filter((row) => active.every(([field, column]) => row[column] === filter[field]));
};

export const cohortSummary = (
  rows: Rows,
  filter: CohortFilter,
  passMark = DEFAULT_PASS_MARK
): CohortSummary => {
  const subset = filterRows(rows, filter);
  return {
    filter,
    empty: subset.length === 0,
    gradeCount: gradesOf(subset).length,
    studentCount: new Set(subset.map((row) => row.studentId)).size,
    overall: globalStats(subset, passMark),
    subjects: subjectAggregates(subset, passMark),
  };
};

/** Sorted distinct values of a column, for the filter controls and reference endpoints. */
export const distinctValues = (rows: Rows, column: GroupKey): string[] =>
  Array.from(
    new Set(rows.flatMap((row) => {
      const value = keyValue(row, column);
      return value === null ? [] : [value];
    }))
  ).sort(compareKeys);

/**
 * Mean, median, pass rate and grade count of the filtered cohort against every
 * grade of another dataset. The filter only narrows the current rows.
 */
export const compareCohorts = (
  current: Rows,
  filter: CohortFilter,
  otherGrades: ReadonlyArray<number>,
  passMark = DEFAULT_PASS_MARK
): ComparisonMetric[] => {
  const a = cohortSummary(current, filter, passMark).overall;
  const b = summarize(otherGrades, passMark);
  const metric = (name: string, x: number | null, y: number | null): ComparisonMetric => ({
    metric: name,
    current: x,
    other: y,
    difference: x === null || y === null ? null : y - x,
  });
  return [
    metric("Mean", a.mean, b.mean),
    metric("Median", a.median, b.median),
    metric("Pass rate (%)", a.passRate, b.passRate),
    metric("Grade count", a.count, b.count),
  ];
};
