import { sampleDataset } from "../testing/fixtures";
import { buildReport, chartsUsed, ReportOptions } from "./reportBuilder";
import { renderReportPdf } from "./reportRenderer";
import { createReportPdf } from "./reportService";

describe("report", () => {
  const { rows } = sampleDataset();
  const options: ReportOptions = {
    academicYear: "2025-2026",
    createdAt: new Date("2025-09-01T00:00:00Z"),
  };

  describe("buildReport", () => {
    it("should lay out the sections in a fixed order", () => {
      const headings = buildReport(rows, options).blocks.flatMap((block) =>
        block.kind === "heading" && block.level === 1 ? [block.text] : []
      );
      expect(headings).toEqual([
        "1. Project overview",
        "2. Dataset description",
        "3. Global statistics",
        "4. Global view",
        "5. Detailed analyses",
        "6. Demographics",
        "7. Rankings",
        "8. Conclusion",
      ]);
    });

    it("should describe the dataset", () => {
      const report = buildReport(rows, options);
      expect(report.blocks).toContainEqual({
        kind: "paragraph",
        text:
          "The dataset contains 6 grades from 3 students across 2 departments, 2 programs " +
          "and 2 levels. The pass mark is 10.",
      });
    });

    it("should give the global statistics table", () => {
      const table = buildReport(rows, options).blocks.find((block) => block.kind === "table");
      expect(table).toEqual({
        kind: "table",
        columns: ["Indicator", "Value"],
        rows: [
          ["Mean", "13.17"],
          ["Median", "13.00"],
          ["Standard deviation", "3.19"],
          ["Minimum", "9.00"],
          ["Maximum", "18.00"],
          ["Pass rate (%)", "83.33"],
        ],
        columnWidths: [250, 100],
      });
    });

    it("should add one ranking table per department", () => {
      const titles = buildReport(rows, options).blocks.flatMap((block) =>
        block.kind === "heading" && block.level === 3 ? [block.text] : []
      );
      expect(titles).toEqual(["Civil Engineering", "Computer Science"]);
    });

    it("should name the cohort of a filtered report", () => {
      const report = buildReport(rows, { ...options, filter: { department: "Computer Science" } });
      expect(report.blocks[3]).toEqual({ kind: "paragraph", text: "Cohort: department = Computer Science" });
    });

    it("should be identical for identical input", () => {
      const first = buildReport(rows, options);
      expect(buildReport(rows, options)).toEqual(first);
      expect(first.fileId).toMatch(/^[0-9A-F]{32}$/);
      expect(chartsUsed(first)).toHaveLength(7);
    });
  });

  describe("renderReportPdf", () => {
    it("should produce the same PDF bytes for the same report", () => {
      const report = buildReport(rows, options);
      const pdf = renderReportPdf(report, new Map());
      expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
      expect(renderReportPdf(report, new Map()).equals(pdf)).toBe(true);
    });

    it("should print a notice in place of a missing chart", () => {
      const pdf = renderReportPdf(buildReport(rows, options), new Map()).toString("latin1");
      expect(pdf).toContain('Chart "Grade distribution" is not available.');
    });

    it("should embed rendered charts", async () => {
      const pdf = (await createReportPdf(rows, options)).toString("latin1");
      expect(pdf).toContain("/Subtype /Image");
      expect(pdf).not.toContain("is not available.");
    }, 30000);
  });
});
