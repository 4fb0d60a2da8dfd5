import { Summary } from "../types/types";

export const round2 = (value: number): number => Math.round(value * 100) / 100;

export const round2OrNull = (value: number | null): number | null =>
  value === null ? null : round2(value);

/** Same summary with every statistic rounded to two decimals. */
export const roundSummary = <T extends Summary>(summary: T): T => ({
  ...summary,
  mean: round2OrNull(summary.mean),
  median: round2OrNull(summary.median),
  std: round2OrNull(summary.std),
  min: round2OrNull(summary.min),
  max: round2OrNull(summary.max),
  q1: round2OrNull(summary.q1),
  q3: round2OrNull(summary.q3),
  passRate: round2OrNull(summary.passRate),
});

/** Display form used by the dashboard, the report and the CLIs; absent values show as "n/a". */
export const formatNumber = (value: number | null, digits = 2): string =>
  value === null ? "n/a" : value.toFixed(digits);

export const formatPercent = (value: number | null): string =>
  value === null ? "n/a" : `${value.toFixed(2)}%`;
