import { AGE_BANDS, AnalyzedRow, GRADE_COLUMNS } from "../models/StudentRecord";
import { buildChartSet, rankingChart } from "../services/charts";
import { profileRows } from "../services/datasetStore";
import { rankStudents, rankWithinGroups } from "../services/ranking";
import {
  ageGenderMatrix,
  cohortSummary,
  statsBySubjectTeacher,
} from "../services/statistics";
import {
  CohortFilter,
  ComparisonMetric,
  DASHBOARD_TABS,
  DashboardTab,
  RankingEntry,
  ScoringScheme,
} from "../types/types";
import { formatNumber, formatPercent, round2OrNull } from "../utils/format";
import { Cell, escapeHtml, htmlTable, kpiCard, notice, page, section } from "./layout";


const TAB_LABELS: Record<DashboardTab, string> = {
  overview: "Overview",
  analysis: "Analysis",
  demographics: "Demographics",
  rankings: "Rankings",
  exports: "Exports",
  data: "Data",
  compare: "Compare",
};

export const FILTER_FIELDS = ["department", "program", "level", "subject", "teacher", "gender"] as const;
export type FilterField = (typeof FILTER_FIELDS)[number];
export type FilterOptions = Record<FilterField, string[]>;

export interface DashboardMessage {
  kind: "info" | "error";
  message: string;
}

export interface DashboardModel {
  tab: DashboardTab;
  filter: CohortFilter;
  options: FilterOptions;
  passMark: number;
  scheme: ScoringScheme;
  top: number;
  messages: DashboardMessage[];
  comparison?: ComparisonMetric[];
}

const PREVIEW_ROWS = 100;

export const filterQuery = (filter: CohortFilter, extra: Record<string, string> = {}): string => {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(filter)) {
    if (typeof value === "string" && value !== "") params.set(key, value);
  }
  for (const [key, value] of Object.entries(extra)) params.set(key, value);
  const query = params.toString();
  return query ? `?${query}` : "";
};

const navigation = (model: DashboardModel): string =>
  `<nav>${DASHBOARD_TABS.map(
    (tab) =>
      `<a href="/${escapeHtml(filterQuery(model.filter, { tab }))}"${tab === model.tab ? ' class="active"' : ""}>` +
      `${TAB_LABELS[tab]}</a>`
  ).join("")}</nav>`;

const select = (name: FilterField, values: ReadonlyArray<string>, selected: string | undefined): string =>
  `<label>${escapeHtml(name)}<select name="${name}"><option value="">All</option>` +
  values
    .map(
      (value) =>
        `<option value="${escapeHtml(value)}"${value === selected ? " selected" : ""}>${escapeHtml(value)}</option>`
    )
    .join("") +
  `</select></label>`;

const filterForm = (model: DashboardModel): string =>
  `<form class="filters" method="get" action="/">` +
  `<input type="hidden" name="tab" value="${model.tab}">` +
  FILTER_FIELDS.map((field) => select(field, model.options[field], model.filter[field])).join("") +
  `<button type="submit">Apply</button> <a href="/${filterQuery({}, { tab: model.tab })}">Reset</a></form>`;

const hiddenFilter = (filter: CohortFilter): string =>
  Object.entries(filter)
    .filter(([, value]) => typeof value === "string" && value !== "")
    .map(([key, value]) => `<input type="hidden" name="${escapeHtml(key)}" value="${escapeHtml(String(value))}">`)
    .join("");

const chart = (svg: string): string => `<div class="chart">${svg}</div>`;

const NO_DATA = notice("info", "No data for the selected filters.");

const overviewTab = (model: DashboardModel, rows: ReadonlyArray<AnalyzedRow>, charts: Map<string, string>): string => {
  const summary = cohortSummary(rows, {}, model.passMark);
  const { overall } = summary;
  const kpis =
    `<div class="kpis">` +
    kpiCard("Mean", formatNumber(overall.mean)) +
    kpiCard("Median", formatNumber(overall.median)) +
    kpiCard("Std deviation", formatNumber(overall.std)) +
    kpiCard("Pass rate", formatPercent(overall.passRate)) +
    kpiCard("Grades", String(summary.gradeCount)) +
    kpiCard("Students", String(summary.studentCount)) +
    `</div>`;

  const describe = htmlTable(
    ["count", "mean", "std", "min", "25%", "50%", "75%", "max"],
    [[overall.count, ...[overall.mean, overall.std, overall.min, overall.q1, overall.median, overall.q3, overall.max].map(round2OrNull)]]
  );
  const subjects = htmlTable(
    ["Subject", "Name", "Count", "Mean", "Median", "Std", "Min", "Max", "Pass rate (%)"],
    summary.subjects.map((s): Cell[] => [
      s.courseCode,
      s.courseName,
      s.count,
      round2OrNull(s.mean),
      round2OrNull(s.median),
      round2OrNull(s.std),
      round2OrNull(s.min),
      round2OrNull(s.max),
      round2OrNull(s.passRate),
    ])
  );

  return (
    kpis +
    section("Grade distribution", chart(charts.get("grade-distribution") ?? "")) +
    section("Descriptive statistics", describe) +
    section("Statistics by subject", subjects)
  );
};

const analysisTab = (model: DashboardModel, rows: ReadonlyArray<AnalyzedRow>, charts: Map<string, string>): string =>
  section("Grades by department", chart(charts.get("boxplot-department") ?? "")) +
  section("Mean grade by subject", chart(charts.get("mean-by-subject") ?? "")) +
  section("Mean grade by subject and level", chart(charts.get("heatmap-subject-level") ?? "")) +
  section(
    "Statistics by subject and teacher",
    htmlTable(
      ["Subject", "Teacher", "Count", "Mean", "Median", "Std", "Pass rate (%)"],
      statsBySubjectTeacher(rows, model.passMark).map(({ group, summary }): Cell[] => [
        group.courseCode ?? "",
        group.teacher ?? "",
        summary.count,
        round2OrNull(summary.mean),
        round2OrNull(summary.median),
        round2OrNull(summary.std),
        round2OrNull(summary.passRate),
      ])
    )
  );

const demographicsTab = (rows: ReadonlyArray<AnalyzedRow>, charts: Map<string, string>): string => {
  const matrix = ageGenderMatrix(rows);
  return (
    section("Grades by gender", chart(charts.get("boxplot-gender") ?? "")) +
    section("Mean grade by age band", chart(charts.get("mean-by-age-band") ?? "")) +
    section(
      "Mean grade by age band and gender",
      htmlTable(
        ["Gender", ...AGE_BANDS],
        matrix.rows.map((gender, i): Cell[] => [
          gender,
          ...AGE_BANDS.map((band) => {
            const j = matrix.columns.indexOf(band);
            return j === -1 ? null : round2OrNull(matrix.cells[i][j]);
          }),
        ])
      )
    )
  );
};

const rankingTable = (entries: ReadonlyArray<RankingEntry>): string =>
  htmlTable(
    ["Rank", "Student", "Last name", "First name", "Department", "Program", "Level", "Score", "Subjects"],
    entries.map((e): Cell[] => [
      e.rank,
      e.studentId,
      e.lastName,
      e.firstName,
      e.department,
      e.program,
      e.level,
      e.score.toFixed(2),
      e.gradedSubjects,
    ])
  );

const rankingsTab = (model: DashboardModel, rows: ReadonlyArray<AnalyzedRow>): string => {
  const general = rankStudents(rows, model.scheme).slice(0, model.top);
  const topForm =
    `<form class="filters" method="get" action="/">${hiddenFilter(model.filter)}` +
    `<input type="hidden" name="tab" value="rankings">` +
    `<label>Top N<input type="number" name="top" min="5" max="100" value="${model.top}"></label>` +
    `<button type="submit">Show</button></form>`;

  const perDepartment = rankWithinGroups(rows, "department", model.scheme)
    .map(({ group, entries }) => `<h3>${escapeHtml(group)}</h3>${rankingTable(entries.slice(0, model.top))}`)
    .join("");

  return (
    topForm +
    section(`General ranking (top ${model.top})`, chart(rankingChart(`Top ${model.top} students`, general)) + rankingTable(general)) +
    section("Ranking by department", perDepartment)
  );
};

const exportsTab = (model: DashboardModel): string =>
  section(
    "Exports",
    `<ul>` +
      `<li><a href="/export/csv${escapeHtml(filterQuery(model.filter))}">Download filtered grades (CSV)</a></li>` +
      `<li><a href="/export/report${escapeHtml(filterQuery(model.filter))}">Download report for this cohort (PDF)</a></li>` +
      `</ul>`
  );

const mappingInputs = (): string =>
  GRADE_COLUMNS.map(
    (column) => `<label>${column}<input type="text" name="map_${column}" placeholder="${column}"></label>`
  ).join("");

const dataTab = (rows: ReadonlyArray<AnalyzedRow>): string => {
  const profile = profileRows(rows);
  const columns = [...GRADE_COLUMNS, "age", "ageBand"] as const;
  const preview = htmlTable(
    columns,
    rows.slice(0, PREVIEW_ROWS).map((row) => columns.map((column): Cell => row[column]))
  );

  const importForm =
    `<form method="post" action="/import" enctype="multipart/form-data">` +
    `<p><input type="file" name="file" accept=".csv,.xlsx" required> <button type="submit">Import</button></p>` +
    `<details><summary>Column mapping (optional)</summary><div class="filters">${mappingInputs()}</div></details>` +
    `</form>`;

  return (
    `<div class="kpis">` +
    kpiCard("Rows", String(profile.rowCount)) +
    kpiCard("Columns", String(profile.columnCount)) +
    kpiCard("Missing values", String(profile.missingCells)) +
    `</div>` +
    section(
      "Column types",
      htmlTable(["Column", "Type", "Missing"], profile.columns.map((c): Cell[] => [c.name, c.type, c.missing]))
    ) +
    section(`First ${PREVIEW_ROWS} rows`, preview) +
    section("Analyse another dataset", importForm)
  );
};

const compareTab = (model: DashboardModel): string => {
  const form =
    `<form method="post" action="/compare" enctype="multipart/form-data">${hiddenFilter(model.filter)}` +
    `<p><input type="file" name="file" accept=".csv,.xlsx" required> <button type="submit">Compare</button></p>` +
    `<div class="filters"><label>Grade column<input type="text" name="map_grade" placeholder="grade"></label></div>` +
    `</form>`;

  const comparison = model.comparison
    ? section(
        "Current cohort against the uploaded dataset",
        htmlTable(
          ["Metric", "Current", "Uploaded", "Difference"],
          model.comparison.map((m): Cell[] => [
            m.metric,
            round2OrNull(m.current),
            round2OrNull(m.other),
            round2OrNull(m.difference),
          ])
        )
      )
    : "";

  return section("Compare with another dataset", form) + comparison;
};

const tabContent = (model: DashboardModel, rows: ReadonlyArray<AnalyzedRow>): string => {
  const charts = () => new Map(buildChartSet(rows).map((c) => [c.name, c.svg]));
  switch (model.tab) {
    case "overview":
      return rows.length > 0 ? overviewTab(model, rows, charts()) : NO_DATA;
    case "analysis":
      return rows.length > 0 ? analysisTab(model, rows, charts()) : NO_DATA;
    case "demographics":
      return rows.length > 0 ? demographicsTab(rows, charts()) : NO_DATA;
    case "rankings":
      return rows.length > 0 ? rankingsTab(model, rows) : NO_DATA;
    case "exports":
      return exportsTab(model);
    case "data":
      return dataTab(rows);
    case "compare":
      return compareTab(model);
  }
};

/** Full page for one tab; `filtered` is the snapshot already narrowed to `model.filter`. */
export const renderDashboard = (model: DashboardModel, filtered: ReadonlyArray<AnalyzedRow>): string =>
  page(
    "Student Grade Analysis",
    navigation(model),
    filterForm(model) +
      model.messages.map((m) => notice(m.kind, m.message)).join("") +
      tabContent(model, filtered)
  );
