export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

export type Cell = string | number | null;

const cellText = (value: Cell): string => (value === null ? "n/a" : escapeHtml(String(value)));

export const htmlTable = (columns: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<Cell>>): string =>
  `<table><thead><tr>${columns.map((c) => `<th>${escapeHtml(c)}</th>`).join("")}</tr></thead>` +
  `<tbody>${rows.map((row) => `<tr>${row.map((v) => `<td>${cellText(v)}</td>`).join("")}</tr>`).join("")}</tbody></table>`;

export const kpiCard = (label: string, value: string): string =>
  `<div class="kpi"><div class="kpi-value">${escapeHtml(value)}</div><div class="kpi-label">${escapeHtml(label)}</div></div>`;

export const notice = (kind: "info" | "error", message: string): string =>
  `<p class="notice notice-${kind}">${escapeHtml(message)}</p>`;

export const section = (title: string, body: string): string =>
  `<section><h2>${escapeHtml(title)}</h2>${body}</section>`;

const STYLES = `
body { font-family: Helvetica, Arial, sans-serif; margin: 0; color: #222; }
header { background: #37474f; color: #fff; padding: 12px 24px; }
nav a { color: #cfd8dc; margin-right: 16px; text-decoration: none; }
nav a.active { color: #fff; font-weight: bold; }
main { padding: 16px 24px; }
form.filters { display: flex; flex-wrap: wrap; gap: 8px; align-items: end; margin-bottom: 16px; }
form.filters label { display: flex; flex-direction: column; font-size: 12px; }
.kpis { display: flex; flex-wrap: wrap; gap: 12px; }
.kpi { border: 1px solid #cfd8dc; border-radius: 4px; padding: 12px 16px; min-width: 120px; }
.kpi-value { font-size: 22px; font-weight: bold; }
.kpi-label { font-size: 12px; color: #607d8b; }
table { border-collapse: collapse; margin: 8px 0 16px; font-size: 13px; }
th, td { border: 1px solid #cfd8dc; padding: 4px 8px; text-align: left; }
th { background: #eceff1; }
.notice { padding: 8px 12px; border-radius: 4px; }
.notice-info { background: #e3f2fd; }
.notice-error { background: #ffebee; color: #b71c1c; }
.chart svg { max-width: 100%; height: auto; }
`;

export const page = (title: string, nav: string, body: string): string => `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
<header><h1>${escapeHtml(title)}</h1>${nav}</header>
<main>${body}</main>
</body>
</html>`;
