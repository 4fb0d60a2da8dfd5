import { sampleDataset } from "../testing/fixtures";
import { barChart, buildChartSet, escapeXml, heatmapChart, histogramChart, rankingChart } from "./charts";
import { renderPng } from "./chartRenderer";
import { rankStudents } from "./ranking";
import { gradeDistribution } from "./statistics";

describe("charts", () => {
  const { rows } = sampleDataset();

  it("should escape markup in labels", () => {
    expect(escapeXml(`<a & "b">`)).toBe("&lt;a &amp; &quot;b&quot;&gt;");
    expect(barChart("Mean <x>", [])).toContain(">Mean &lt;x&gt;</text>");
  });

  it("should scale bars on the grade range", () => {
    const svg = barChart("Means", [{ label: "A", value: 10 }]);
    expect(svg).toContain('<rect x="168" y="215" width="504" height="165" fill="#4dd0e1"/>');
    expect(svg).toContain('<text x="420" y="211" font-size="10" text-anchor="middle">10</text>');
  });

  it("should print a notice for an empty histogram", () => {
    expect(histogramChart("Empty", gradeDistribution([]))).toContain(">No data</text>");
    expect(histogramChart("Full", gradeDistribution([12]))).not.toContain(">No data</text>");
  });

  it("should label heatmap cells with their mean", () => {
    const svg = heatmapChart("Heat", { rows: ["A"], columns: ["L1", "L2"], cells: [[13.5, null]] });
    expect(svg).toContain(">13.50</text>");
    expect(svg).toContain('fill="#f0f0f0"');
  });

  it("should list students in ranking order", () => {
    const svg = rankingChart("Top", rankStudents(rows));
    expect(svg.indexOf("1. Doe Ana")).toBeLessThan(svg.indexOf("1. Roe Ben"));
    expect(svg.indexOf("1. Roe Ben")).toBeLessThan(svg.indexOf("2. Poe Cal"));
  });

  it("should build the fixed chart set", () => {
    const charts = buildChartSet(rows);
    expect(charts.map((c) => c.name)).toEqual([
      "grade-distribution",
      "boxplot-department",
      "mean-by-program",
      "mean-by-subject",
      "heatmap-subject-level",
      "boxplot-gender",
      "mean-by-age-band",
    ]);
    expect(buildChartSet(rows)).toEqual(charts);
    for (const chart of charts) {
      expect(chart.svg.startsWith("<svg")).toBe(true);
      expect(chart.svg.endsWith("</svg>")).toBe(true);
    }
  });

  it("should rasterise an SVG to PNG", async () => {
    const png = await renderPng(barChart("Means", [{ label: "A", value: 10 }]), 72);
    expect(png.subarray(1, 4).toString("ascii")).toBe("PNG");
  });
});
