import { buildDataset } from "../models/StudentRecord";
import { gradeRow, REFERENCE_DATE, sampleDataset, sampleRows, testCurriculum } from "../testing/fixtures";
import { generateDataset } from "./datasetGenerator";
import {
  ageGenderMatrix,
  cohortSummary,
  compareCohorts,
  filterRows,
  globalStats,
  gradeDistribution,
  statsByAgeBand,
  statsByDepartment,
  statsBySubjectTeacher,
  subjectAggregates,
  subjectLevelMatrix,
  summarize,
} from "./statistics";

describe("statistics", () => {
  const { rows } = sampleDataset();

  describe("summarize", () => {
    it("should compute descriptive statistics with sample deviation and linear quartiles", () => {
      const summary = summarize([12, 9, 14]);
      expect(summary.count).toBe(3);
      expect(summary.mean).toBeCloseTo(11.6667, 4);
      expect(summary.median).toBe(12);
      expect(summary.std).toBeCloseTo(2.5166, 4);
      expect(summary.min).toBe(9);
      expect(summary.max).toBe(14);
      expect(summary.q1).toBe(10.5);
      expect(summary.q3).toBe(13);
      expect(summary.passRate).toBeCloseTo(66.6667, 4);
    });

    it("should report absent statistics for no values", () => {
      expect(summarize([])).toEqual({
        count: 0,
        mean: null,
        median: null,
        std: null,
        min: null,
        max: null,
        q1: null,
        q3: null,
        passRate: null,
      });
    });

    it("should leave the deviation absent for a single value", () => {
      const summary = summarize([7]);
      expect(summary.std).toBeNull();
      expect(summary.mean).toBe(7);
      expect(summary.passRate).toBe(0);
    });

    it("should use the given pass mark", () => {
      expect(summarize([12, 9, 14], 13).passRate).toBeCloseTo(33.3333, 4);
    });
  });

  describe("subjectAggregates", () => {
    it("should aggregate each subject sorted by code", () => {
      const aggregates = subjectAggregates(rows);
      expect(aggregates.map((a) => a.courseCode)).toEqual(["A", "B"]);
      expect(aggregates[0].mean).toBeCloseTo(11.67, 2);
      expect(aggregates[1].mean).toBeCloseTo(14.67, 2);
      expect(aggregates[1].passRate).toBe(100);
      expect(aggregates[1].courseName).toBe("Course B");
    });

    it("should keep a subject whose grades are all missing with count 0", () => {
      const dataset = buildDataset(
        [...sampleRows(), gradeRow({ courseCode: "C", courseName: "Course C", grade: null })],
        REFERENCE_DATE
      );
      const [, , c] = subjectAggregates(dataset.rows);
      expect(c.courseCode).toBe("C");
      expect(c.count).toBe(0);
      expect(c.mean).toBeNull();
    });
  });

  describe("groupings", () => {
    it("should sort groups by key", () => {
      const departments = statsByDepartment(rows);
      expect(departments.map((d) => d.group.department)).toEqual(["Civil Engineering", "Computer Science"]);
      expect(departments[1].summary.count).toBe(4);
      expect(departments[1].summary.mean).toBe(13.5);
    });

    it("should group by subject and teacher", () => {
      expect(statsBySubjectTeacher(rows).map((g) => g.group)).toEqual([
        { courseCode: "A", teacher: "Mr Smith" },
        { courseCode: "B", teacher: "Mrs Lee" },
      ]);
    });

    it("should list age bands in their natural order", () => {
      expect(statsByAgeBand(rows).map((g) => g.group.ageBand)).toEqual(["18-20", "21-23", "24-26"]);
    });

    it("should build the age by gender mean matrix", () => {
      expect(ageGenderMatrix(rows)).toEqual({
        rows: ["F", "M"],
        columns: ["18-20", "21-23", "24-26"],
        cells: [
          [null, 13.5, null],
          [13.5, null, 12.5],
        ],
      });
    });

    it("should build the subject by level mean matrix", () => {
      expect(subjectLevelMatrix(rows)).toEqual({
        rows: ["A", "B"],
        columns: ["L2", "L3"],
        cells: [
          [14, 10.5],
          [11, 16.5],
        ],
      });
    });
  });

  describe("gradeDistribution", () => {
    it("should close the last bin and ignore values outside the range", () => {
      const bins = gradeDistribution([0, 9.99, 10, 20, 21], { bins: 2 });
      expect(bins).toEqual([
        { from: 0, to: 10, count: 2 },
        { from: 10, to: 20, count: 2 },
      ]);
    });

    it("should default to 20 bins over [0, 20]", () => {
      const bins = gradeDistribution([12, 12.5]);
      expect(bins).toHaveLength(20);
      expect(bins[12]).toEqual({ from: 12, to: 13, count: 2 });
    });

    it("should reject a non-positive bin count", () => {
      expect(() => gradeDistribution([1], { bins: 0 })).toThrow(RangeError);
    });
  });

  describe("cohorts", () => {
    it("should give the same result filtering then aggregating as aggregating the subset", () => {
      const filter = { department: "Computer Science", subject: "B" };
      const subset = filterRows(rows, filter);
      expect(subset.map((r) => r.grade)).toEqual([15, 18]);
      expect(cohortSummary(rows, filter).overall).toEqual(globalStats(subset));
    });

    it("should report an empty cohort without failing", () => {
      const summary = cohortSummary(rows, { teacher: "Nobody" });
      expect(summary.empty).toBe(true);
      expect(summary.studentCount).toBe(0);
      expect(summary.overall.mean).toBeNull();
      expect(summary.subjects).toEqual([]);
    });

    it("should filter on gender and age band", () => {
      expect(filterRows(rows, { gender: "M", ageBand: "24-26" }).map((r) => r.studentId)).toEqual(["S3", "S3"]);
    });

    it("should compare the cohort with the grades of another dataset", () => {
      const [mean, median, passRate, count] = compareCohorts(rows, { subject: "A" }, [13, 10, 15]);
      expect(mean.metric).toBe("Mean");
      expect(mean.difference).toBeCloseTo(1, 10);
      expect(median).toEqual({ metric: "Median", current: 12, other: 13, difference: 1 });
      expect(passRate.current).toBeCloseTo(66.6667, 4);
      expect(passRate.other).toBe(100);
      expect(count).toEqual({ metric: "Grade count", current: 3, other: 3, difference: 0 });
    });

    it("should not apply the cohort filter to the other dataset", () => {
      const [mean, , , count] = compareCohorts(rows, { department: "Computer Science" }, [5]);
      expect(mean).toEqual({ metric: "Mean", current: 13.5, other: 5, difference: -8.5 });
      expect(count).toEqual({ metric: "Grade count", current: 4, other: 1, difference: -3 });
    });
  });

  describe("generated datasets", () => {
    it.each([
      [1, 0],
      [2, 0.1],
      [3, 0.3],
      [4, 0.6],
    ])("should count every non-missing grade of a subject (seed %i, missing rate %p)", (seed, missingRate) => {
      const generated = buildDataset(
        generateDataset({ studentCount: 80, seed, missingRate }, testCurriculum()),
        REFERENCE_DATE
      );
      const expected = new Map<string, number>();
      for (const row of generated.rows) {
        if (!expected.has(row.courseCode)) expected.set(row.courseCode, 0);
        if (row.grade !== null) expected.set(row.courseCode, (expected.get(row.courseCode) ?? 0) + 1);
      }

      const aggregates = subjectAggregates(generated.rows);
      expect(aggregates.map((a) => a.courseCode)).toEqual(Array.from(expected.keys()).sort());
      for (const aggregate of aggregates) {
        expect(aggregate.count).toBe(expected.get(aggregate.courseCode));
      }
      expect(aggregates.reduce((sum, a) => sum + a.count, 0)).toBe(globalStats(generated.rows).count);
    });
  });
});
