import { sampleDataset } from "../testing/fixtures";
import { groupedRankingTable, rankingTable, statisticsTables } from "./exportTables";
import { rankStudents, rankWithinGroups } from "./ranking";

describe("exportTables", () => {
  const { rows } = sampleDataset();

  describe("statisticsTables", () => {
    const tables = statisticsTables(rows, 10);

    it("should produce one table per export file", () => {
      expect(Object.keys(tables)).toEqual([
        "global-stats.csv",
        "subject-stats.csv",
        "department-stats.csv",
        "program-level-stats.csv",
        "subject-teacher-stats.csv",
        "gender-stats.csv",
        "age-band-stats.csv",
        "age-gender-means.csv",
      ]);
    });

    it("should put the group keys before the rounded summary", () => {
      expect(tables["department-stats.csv"]).toEqual({
        columns: ["department", "count", "mean", "median", "std", "min", "max", "q1", "q3", "passRate"],
        rows: [
          ["Civil Engineering", 2, 12.5, 12.5, 2.12, 11, 14, 11.75, 13.25, 100],
          ["Computer Science", 4, 13.5, 13.5, 3.87, 9, 18, 11.25, 15.75, 75],
        ],
      });
    });

    it("should leave empty cells of the age and gender matrix empty", () => {
      expect(tables["age-gender-means.csv"]).toEqual({
        columns: ["gender", "18-20", "21-23", "24-26"],
        rows: [
          ["F", null, 13.5, null],
          ["M", 13.5, null, 12.5],
        ],
      });
    });
  });

  it("should list ranking entries with their position", () => {
    expect(rankingTable(rankStudents(rows)).rows).toEqual([
      [1, 1, "S1", "Doe", "Ana", "Computer Science", "Software Engineering", "L3", 13.5, 2],
      [2, 1, "S2", "Roe", "Ben", "Computer Science", "Software Engineering", "L3", 13.5, 2],
      [3, 2, "S3", "Poe", "Cal", "Civil Engineering", "Building Construction", "L2", 12.5, 2],
    ]);
  });

  it("should prefix grouped rankings with the group", () => {
    const table = groupedRankingTable("department", rankWithinGroups(rows, "department"));
    expect(table.columns[0]).toBe("department");
    expect(table.rows.map((row) => [row[0], row[3]])).toEqual([
      ["Civil Engineering", "S3"],
      ["Computer Science", "S1"],
      ["Computer Science", "S2"],
    ]);
  });
});
