/**
 * SVG chart builders. Every builder is a pure function of the aggregates it is
 * given and returns a standalone SVG document, so the same input always gives
 * the same markup; the dashboard inlines it and the renderer rasterises it.
 */

import { AnalyzedRow, MAX_GRADE, MIN_GRADE } from "../models/StudentRecord";
import { DistributionBin, GroupAggregate, MeanMatrix, RankingEntry, Summary } from "../types/types";
import {
  groupStats,
  rowDistribution,
  statsByAgeBand,
  statsByDepartment,
  statsByGender,
  subjectLevelMatrix,
} from "./statistics";

export interface ChartConfig {
  fontFamily: string;
  fontSizes: {
    title: number;
    axis: number;
    label: number;
  };
  palette: string[];
}

export const CHART_CONFIG: ChartConfig = {
  fontFamily: "Helvetica, Arial, sans-serif",
  fontSizes: { title: 16, axis: 12, label: 10 },
  palette: ["#4dd0e1", "#66c2a5", "#fc8d62", "#8da0cb", "#e78ac3", "#a6d854", "#ffd92f", "#e5c494"],
};

export interface Chart {
  name: string;
  title: string;
  svg: string;
}

export interface CategoryValue {
  label: string;
  value: number | null;
}

export interface BoxSeries {
  label: string;
  summary: Summary;
}

interface Frame {
  width: number;
  height: number;
  left: number;
  right: number;
  top: number;
  bottom: number;
}

const DEFAULT_FRAME: Frame = { width: 800, height: 450, left: 60, right: 20, top: 50, bottom: 70 };

export const escapeXml = (text: string): string =>
  text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

const fmt = (value: number): string => String(Math.round(value * 100) / 100);

const text = (x: number, y: number, content: string, size: number, attrs = ""): string =>
  `<text x="${fmt(x)}" y="${fmt(y)}" font-size="${size}" ${attrs}>${escapeXml(content)}</text>`;

const open = (frame: Frame, title: string): string =>
  `<svg xmlns="http://www.w3.org/2000/svg" width="${frame.width}" height="${frame.height}" ` +
  `viewBox="0 0 ${frame.width} ${frame.height}" font-family="${escapeXml(CHART_CONFIG.fontFamily)}">` +
  `<rect width="100%" height="100%" fill="#ffffff"/>` +
  text(frame.width / 2, 28, title, CHART_CONFIG.fontSizes.title, 'text-anchor="middle" font-weight="bold"');

const plotWidth = (frame: Frame): number => frame.width - frame.left - frame.right;
const plotHeight = (frame: Frame): number => frame.height - frame.top - frame.bottom;

const niceMax = (value: number): number => {
  if (value <= 0) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(value));
  const steps = [1, 2, 2.5, 5, 10];
  const step = steps.find((s) => s * magnitude >= value) ?? 10;
  return step * magnitude;
};

// Y axis with five gridlines from `min` to `max`.
const yAxis = (frame: Frame, min: number, max: number, label: string): string => {
  const parts: string[] = [];
  for (let i = 0; i <= 5; i++) {
    const value = min + ((max - min) * i) / 5;
    const y = frame.top + plotHeight(frame) * (1 - i / 5);
    parts.push(
      `<line x1="${frame.left}" y1="${fmt(y)}" x2="${frame.width - frame.right}" y2="${fmt(y)}" stroke="#e0e0e0"/>`,
      text(frame.left - 6, y + 4, fmt(value), CHART_CONFIG.fontSizes.label, 'text-anchor="end"')
    );
  }
  parts.push(
    text(16, frame.top + plotHeight(frame) / 2, label, CHART_CONFIG.fontSizes.axis,
      `text-anchor="middle" transform="rotate(-90 16 ${fmt(frame.top + plotHeight(frame) / 2)})"`),
    `<line x1="${frame.left}" y1="${frame.top}" x2="${frame.left}" y2="${frame.top + plotHeight(frame)}" stroke="#333"/>`,
    `<line x1="${frame.left}" y1="${frame.top + plotHeight(frame)}" x2="${frame.width - frame.right}" ` +
      `y2="${frame.top + plotHeight(frame)}" stroke="#333"/>`
  );
  return parts.join("");
};

const xLabel = (frame: Frame, label: string): string =>
  text(frame.left + plotWidth(frame) / 2, frame.height - 10, label, CHART_CONFIG.fontSizes.axis, 'text-anchor="middle"');

const emptyNotice = (frame: Frame): string =>
  text(frame.width / 2, frame.height / 2, "No data", CHART_CONFIG.fontSizes.axis, 'text-anchor="middle" fill="#888"');

export const histogramChart = (title: string, bins: ReadonlyArray<DistributionBin>, xTitle = "Grade"): string => {
  const frame = DEFAULT_FRAME;
  const maxCount = niceMax(Math.max(0, ...bins.map((bin) => bin.count)));
  const barWidth = bins.length > 0 ? plotWidth(frame) / bins.length : 0;
  const parts = [open(frame, title), yAxis(frame, 0, maxCount, "Count"), xLabel(frame, xTitle)];

  if (bins.every((bin) => bin.count === 0)) {
    parts.push(emptyNotice(frame));
  }
  bins.forEach((bin, i) => {
    const height = (bin.count / maxCount) * plotHeight(frame);
    const x = frame.left + i * barWidth;
    parts.push(
      `<rect x="${fmt(x + 1)}" y="${fmt(frame.top + plotHeight(frame) - height)}" width="${fmt(Math.max(barWidth - 2, 0))}" ` +
        `height="${fmt(height)}" fill="${CHART_CONFIG.palette[0]}"><title>${fmt(bin.from)}-${fmt(bin.to)}: ${bin.count}</title></rect>`
    );
    if (i % 2 === 0) {
      parts.push(text(x, frame.top + plotHeight(frame) + 16, fmt(bin.from), CHART_CONFIG.fontSizes.label, 'text-anchor="middle"'));
    }
  });
  const last = bins[bins.length - 1];
  if (last) {
    parts.push(text(frame.left + plotWidth(frame), frame.top + plotHeight(frame) + 16, fmt(last.to), CHART_CONFIG.fontSizes.label, 'text-anchor="middle"'));
  }
  parts.push("</svg>");
  return parts.join("");
};

export const barChart = (
  title: string,
  values: ReadonlyArray<CategoryValue>,
  { xTitle = "", yTitle = "Mean grade", yMax = MAX_GRADE }: { xTitle?: string; yTitle?: string; yMax?: number } = {}
): string => {
  const frame = DEFAULT_FRAME;
  const slot = values.length > 0 ? plotWidth(frame) / values.length : 0;
  const parts = [open(frame, title), yAxis(frame, 0, yMax, yTitle), xLabel(frame, xTitle)];

  if (values.every((entry) => entry.value === null)) {
    parts.push(emptyNotice(frame));
  }
  values.forEach((entry, i) => {
    const x = frame.left + i * slot;
    const labelY = frame.top + plotHeight(frame) + 16;
    parts.push(text(x + slot / 2, labelY, entry.label, CHART_CONFIG.fontSizes.label, 'text-anchor="middle"'));
    if (entry.value === null) return;
    const height = (Math.min(entry.value, yMax) / yMax) * plotHeight(frame);
    const y = frame.top + plotHeight(frame) - height;
    parts.push(
      `<rect x="${fmt(x + slot * 0.15)}" y="${fmt(y)}" width="${fmt(slot * 0.7)}" height="${fmt(height)}" ` +
        `fill="${CHART_CONFIG.palette[i % CHART_CONFIG.palette.length]}"/>`,
      text(x + slot / 2, y - 4, fmt(entry.value), CHART_CONFIG.fontSizes.label, 'text-anchor="middle"')
    );
  });
  parts.push("</svg>");
  return parts.join("");
};

/** Box plots (whiskers at min/max, box from Q1 to Q3, line at the median) on the grade scale. */
export const boxPlotChart = (title: string, series: ReadonlyArray<BoxSeries>, xTitle = ""): string => {
  const frame = DEFAULT_FRAME;
  const slot = series.length > 0 ? plotWidth(frame) / series.length : 0;
  const scale = (value: number): number =>
    frame.top + plotHeight(frame) * (1 - (value - MIN_GRADE) / (MAX_GRADE - MIN_GRADE));
  const parts = [open(frame, title), yAxis(frame, MIN_GRADE, MAX_GRADE, "Grade"), xLabel(frame, xTitle)];

  if (series.every(({ summary }) => summary.count === 0)) {
    parts.push(emptyNotice(frame));
  }
  series.forEach(({ label, summary }, i) => {
    const center = frame.left + i * slot + slot / 2;
    parts.push(text(center, frame.top + plotHeight(frame) + 16, label, CHART_CONFIG.fontSizes.label, 'text-anchor="middle"'));
    const { min, q1, median, q3, max } = summary;
    if (min === null || q1 === null || median === null || q3 === null || max === null) return;
    const half = Math.min(slot * 0.3, 60);
    const color = CHART_CONFIG.palette[i % CHART_CONFIG.palette.length];
    parts.push(
      `<line x1="${fmt(center)}" y1="${fmt(scale(max))}" x2="${fmt(center)}" y2="${fmt(scale(q3))}" stroke="#333"/>`,
      `<line x1="${fmt(center)}" y1="${fmt(scale(q1))}" x2="${fmt(center)}" y2="${fmt(scale(min))}" stroke="#333"/>`,
      `<line x1="${fmt(center - half / 2)}" y1="${fmt(scale(max))}" x2="${fmt(center + half / 2)}" y2="${fmt(scale(max))}" stroke="#333"/>`,
      `<line x1="${fmt(center - half / 2)}" y1="${fmt(scale(min))}" x2="${fmt(center + half / 2)}" y2="${fmt(scale(min))}" stroke="#333"/>`,
      `<rect x="${fmt(center - half)}" y="${fmt(scale(q3))}" width="${fmt(half * 2)}" ` +
        `height="${fmt(scale(q1) - scale(q3))}" fill="${color}" stroke="#333"/>`,
      `<line x1="${fmt(center - half)}" y1="${fmt(scale(median))}" x2="${fmt(center + half)}" y2="${fmt(scale(median))}" ` +
        `stroke="#333" stroke-width="2"/>`
    );
  });
  parts.push("</svg>");
  return parts.join("");
};

// Diverging blue-white-red scale centred on the middle of the grade range.
const heatColor = (value: number): string => {
  const t = Math.max(0, Math.min(1, (value - MIN_GRADE) / (MAX_GRADE - MIN_GRADE)));
  const mix = (a: number, b: number, f: number): number => Math.round(a + (b - a) * f);
  const [r, g, b] =
    t < 0.5
      ? [mix(59, 247, t * 2), mix(76, 247, t * 2), mix(192, 247, t * 2)]
      : [mix(247, 180, (t - 0.5) * 2), mix(247, 4, (t - 0.5) * 2), mix(247, 38, (t - 0.5) * 2)];
  return `rgb(${r},${g},${b})`;
};

export const heatmapChart = (title: string, matrix: MeanMatrix, xTitle = "", yTitle = ""): string => {
  const frame: Frame = { ...DEFAULT_FRAME, left: 90 };
  const cellWidth = matrix.columns.length > 0 ? plotWidth(frame) / matrix.columns.length : 0;
  const cellHeight = matrix.rows.length > 0 ? plotHeight(frame) / matrix.rows.length : 0;
  const parts = [open(frame, title), xLabel(frame, xTitle)];
  parts.push(text(16, frame.top + plotHeight(frame) / 2, yTitle, CHART_CONFIG.fontSizes.axis,
    `text-anchor="middle" transform="rotate(-90 16 ${fmt(frame.top + plotHeight(frame) / 2)})"`));

  if (matrix.rows.length === 0 || matrix.columns.length === 0) {
    parts.push(emptyNotice(frame));
  }
  matrix.columns.forEach((column, j) => {
    parts.push(text(frame.left + (j + 0.5) * cellWidth, frame.top + plotHeight(frame) + 16, column,
      CHART_CONFIG.fontSizes.label, 'text-anchor="middle"'));
  });
  matrix.rows.forEach((row, i) => {
    const y = frame.top + i * cellHeight;
    parts.push(text(frame.left - 6, y + cellHeight / 2 + 4, row, CHART_CONFIG.fontSizes.label, 'text-anchor="end"'));
    matrix.cells[i].forEach((value, j) => {
      const x = frame.left + j * cellWidth;
      parts.push(
        `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(cellWidth)}" height="${fmt(cellHeight)}" ` +
          `fill="${value === null ? "#f0f0f0" : heatColor(value)}" stroke="#ffffff"/>`
      );
      if (value !== null) {
        parts.push(text(x + cellWidth / 2, y + cellHeight / 2 + 4, value.toFixed(2), CHART_CONFIG.fontSizes.label,
          'text-anchor="middle"'));
      }
    });
  });
  parts.push("</svg>");
  return parts.join("");
};

/** Horizontal bars for the top of a ranking, best student first. */
export const rankingChart = (title: string, entries: ReadonlyArray<RankingEntry>): string => {
  const frame: Frame = { ...DEFAULT_FRAME, left: 170, bottom: 40 };
  const slot = entries.length > 0 ? plotHeight(frame) / entries.length : 0;
  const parts = [open(frame, title)];

  if (entries.length === 0) {
    parts.push(emptyNotice(frame));
  }
  entries.forEach((entry, i) => {
    const y = frame.top + i * slot;
    const width = (entry.score / MAX_GRADE) * plotWidth(frame);
    parts.push(
      text(frame.left - 6, y + slot / 2 + 4, `${entry.rank}. ${entry.lastName} ${entry.firstName}`,
        CHART_CONFIG.fontSizes.label, 'text-anchor="end"'),
      `<rect x="${frame.left}" y="${fmt(y + slot * 0.15)}" width="${fmt(width)}" height="${fmt(slot * 0.7)}" ` +
        `fill="${CHART_CONFIG.palette[2]}"/>`,
      text(frame.left + width + 4, y + slot / 2 + 4, entry.score.toFixed(2), CHART_CONFIG.fontSizes.label)
    );
  });
  parts.push("</svg>");
  return parts.join("");
};

const toBoxSeries = (aggregates: GroupAggregate[], key: "department" | "gender"): BoxSeries[] =>
  aggregates.map(({ group, summary }) => ({ label: group[key] ?? "", summary }));

const meanValues = (aggregates: GroupAggregate[], label: (a: GroupAggregate) => string): CategoryValue[] =>
  aggregates.map((aggregate) => ({ label: label(aggregate), value: aggregate.summary.mean }));

/** The fixed chart set shared by the chart CLI, the report and the dashboard. */
export const buildChartSet = (rows: ReadonlyArray<AnalyzedRow>): Chart[] => [
  {
    name: "grade-distribution",
    title: "Grade distribution",
    svg: histogramChart("Grade distribution", rowDistribution(rows)),
  },
  {
    name: "boxplot-department",
    title: "Grades by department",
    svg: boxPlotChart("Grades by department", toBoxSeries(statsByDepartment(rows), "department"), "Department"),
  },
  {
    name: "mean-by-program",
    title: "Mean grade by program",
    svg: barChart("Mean grade by program", meanValues(groupStats(rows, ["program"]), (a) => a.group.program ?? ""), {
      xTitle: "Program",
    }),
  },
  {
    name: "mean-by-subject",
    title: "Mean grade by subject",
    svg: barChart("Mean grade by subject", meanValues(groupStats(rows, ["courseCode"]), (a) => a.group.courseCode ?? ""), {
      xTitle: "Subject",
    }),
  },
  {
    name: "heatmap-subject-level",
    title: "Mean grade by subject and level",
    svg: heatmapChart("Mean grade by subject and level", subjectLevelMatrix(rows), "Level", "Subject"),
  },
  {
    name: "boxplot-gender",
    title: "Grades by gender",
    svg: boxPlotChart("Grades by gender", toBoxSeries(statsByGender(rows), "gender"), "Gender"),
  },
  {
    name: "mean-by-age-band",
    title: "Mean grade by age band",
    svg: barChart("Mean grade by age band", meanValues(statsByAgeBand(rows), (a) => a.group.ageBand ?? ""), {
      xTitle: "Age band",
    }),
  },
];
