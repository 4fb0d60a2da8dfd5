import { testCurriculum } from "../testing/fixtures";
import { ConfigurationError } from "../utils/errors";
import { generateDataset, validateGeneratorConfig } from "./datasetGenerator";

describe("datasetGenerator", () => {
  const curriculum = testCurriculum();

  it("should produce the same rows for the same seed", () => {
    expect(generateDataset({ studentCount: 25, seed: 7 }, curriculum)).toEqual(
      generateDataset({ studentCount: 25, seed: 7 }, curriculum)
    );
  });

  it("should produce different rows for another seed", () => {
    expect(generateDataset({ studentCount: 25, seed: 7 }, curriculum)).not.toEqual(
      generateDataset({ studentCount: 25, seed: 8 }, curriculum)
    );
  });

  it("should give every student one grade per course of their level", () => {
    const rows = generateDataset({ studentCount: 40, seed: 3 }, curriculum);
    const byStudent = new Map<string, string[]>();
    for (const row of rows) {
      byStudent.set(row.studentId, [...(byStudent.get(row.studentId) ?? []), row.courseCode]);
    }
    expect(byStudent.size).toBe(40);

    for (const row of rows) {
      const department = curriculum.departments.find((d) => d.name === row.department);
      const expected = (department?.levels[row.level] ?? []).map((c) => c.code);
      expect(byStudent.get(row.studentId)).toEqual(expected);
      expect(department?.programs).toContain(row.program);
    }
  });

  it("should number students with the curriculum prefix", () => {
    const rows = generateDataset({ studentCount: 2, seed: 1 }, curriculum);
    expect(Array.from(new Set(rows.map((r) => r.studentId)))).toEqual(["T0001", "T0002"]);
  });

  it("should keep grades within bounds with two decimals", () => {
    const rows = generateDataset({ studentCount: 200, seed: 11, mean: 18, standardDeviation: 6 }, curriculum);
    for (const { grade } of rows) {
      expect(grade).not.toBeNull();
      if (grade === null) continue;
      expect(grade).toBeGreaterThanOrEqual(0);
      expect(grade).toBeLessThanOrEqual(20);
      expect(Math.round(grade * 100) / 100).toBe(grade);
    }
    expect(rows.some((r) => r.grade === 20)).toBe(true);
  });

  it("should leave grades missing at the requested rate", () => {
    const rows = generateDataset({ studentCount: 300, seed: 5, missingRate: 0.5 }, curriculum);
    const missing = rows.filter((r) => r.grade === null).length / rows.length;
    expect(missing).toBeGreaterThan(0.35);
    expect(missing).toBeLessThan(0.65);
  });

  it("should produce no rows for zero students", () => {
    expect(generateDataset({ studentCount: 0 }, curriculum)).toEqual([]);
  });

  it("should draw birth dates inside the configured years", () => {
    const rows = generateDataset({ studentCount: 50, seed: 9, birthYearFrom: 2001, birthYearTo: 2002 }, curriculum);
    for (const row of rows) {
      expect(["2001", "2002"]).toContain(row.birthDate.slice(6));
    }
  });

  describe("validateGeneratorConfig", () => {
    it("should fill defaults", () => {
      expect(validateGeneratorConfig({}).studentCount).toBe(1200);
    });

    it.each([
      [{ studentCount: -1 }, "studentCount"],
      [{ studentCount: 2.5 }, "studentCount"],
      [{ standardDeviation: 0 }, "standardDeviation"],
      [{ mean: 25 }, "mean"],
      [{ minGrade: 10, maxGrade: 10 }, "maxGrade"],
      [{ missingRate: 1 }, "missingRate"],
      [{ birthYearFrom: 2005, birthYearTo: 2000 }, "birthYearTo"],
    ])("should reject %o naming %s", (config, field) => {
      expect(() => validateGeneratorConfig(config)).toThrow(ConfigurationError);
      expect(() => validateGeneratorConfig(config)).toThrow(field);
    });
  });
});
