import fs from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import { buildDataset, GRADE_COLUMNS } from "../models/StudentRecord";
import { gradeRow, REFERENCE_DATE, sampleDataset, sampleRows } from "../testing/fixtures";
import { DatasetError } from "../utils/errors";
import {
  loadDataset,
  parseCsvBuffer,
  parseGradeRows,
  parseGradeValues,
  parseUpload,
  profileRows,
  RawRecord,
  rowsToCsv,
  tableToCsv,
  writeCsv,
  writeTable,
} from "./datasetStore";

const rawRecord = (overrides: RawRecord = {}): RawRecord => ({
  studentId: "S1",
  lastName: "Doe",
  firstName: "Ana",
  gender: "F",
  birthDate: "15/03/2004",
  department: "Computer Science",
  program: "Software Engineering",
  level: "L3",
  academicYear: "2025-2026",
  courseCode: "A",
  courseName: "Course A",
  teacher: "Mr Smith",
  grade: "12",
  ...overrides,
});

describe("datasetStore", () => {
  describe("parseGradeRows", () => {
    it("should convert raw records into grade rows", () => {
      expect(parseGradeRows([rawRecord()])).toEqual([gradeRow()]);
    });

    it("should treat an empty grade as missing and accept a decimal comma", () => {
      const rows = parseGradeRows([rawRecord({ grade: "" }), rawRecord({ courseCode: "B", grade: "13,5" })]);
      expect(rows.map((r) => r.grade)).toEqual([null, 13.5]);
    });

    it("should normalise the gender to upper case", () => {
      expect(parseGradeRows([rawRecord({ gender: "m" })])[0].gender).toBe("M");
    });

    it("should list every missing column", () => {
      const { teacher: _teacher, grade: _grade, ...partial } = rawRecord();
      expect(() => parseGradeRows([partial])).toThrow(new DatasetError("Missing columns: teacher, grade"));
    });

    it("should apply a column mapping", () => {
      const { grade, studentId, ...rest } = rawRecord();
      const rows = parseGradeRows([{ ...rest, Note: grade, Matricule: studentId }], {
        grade: "Note",
        studentId: "Matricule",
      });
      expect(rows).toEqual([gradeRow()]);
    });

    it("should name the row holding a non-numeric grade", () => {
      expect(() => parseGradeRows([rawRecord(), rawRecord({ grade: "abc" })])).toThrow(
        'Row 2: grade "abc" is not a number'
      );
    });

    it("should reject a grade outside [0, 20]", () => {
      expect(() => parseGradeRows([rawRecord({ grade: "21" })])).toThrow("Row 1: grade 21 is outside [0, 20]");
    });

    it("should reject an unknown gender and a malformed birth date", () => {
      expect(() => parseGradeRows([rawRecord({ gender: "X" })])).toThrow(DatasetError);
      expect(() => parseGradeRows([rawRecord({ birthDate: "2004-03-15" })])).toThrow(
        'Row 1: invalid birthDate "2004-03-15" (expected dd/mm/yyyy)'
      );
    });

    it("should reject an empty file", () => {
      expect(() => parseGradeRows([])).toThrow("The file contains no data rows");
    });
  });

  describe("parseGradeValues", () => {
    it("should read only the grade column and skip missing grades", () => {
      expect(parseGradeValues([{ grade: "12" }, { grade: "" }, { grade: "9,5" }])).toEqual([12, 9.5]);
    });

    it("should follow a mapped grade column", () => {
      expect(parseGradeValues([{ Note: "15", other: "x" }], { grade: "Note" })).toEqual([15]);
    });

    it("should require the grade column", () => {
      expect(() => parseGradeValues([{ note: "15" }])).toThrow(new DatasetError("Missing columns: grade"));
    });

    it("should reject a grade outside [0, 20]", () => {
      expect(() => parseGradeValues([{ grade: "12" }, { grade: "25" }])).toThrow("Row 2: grade 25 is outside [0, 20]");
    });
  });

  describe("CSV and XLSX input", () => {
    it("should read back the CSV it writes", async () => {
      const rows = [...sampleRows(), gradeRow({ courseCode: "C", courseName: "Course, C", grade: null })];
      const records = await parseCsvBuffer(Buffer.from(rowsToCsv(rows)));
      expect(parseGradeRows(records)).toEqual(rows);
    });

    it("should trim header names", async () => {
      const records = await parseCsvBuffer(Buffer.from(" studentId ,grade\nS1,12\n"));
      expect(records).toEqual([{ studentId: "S1", grade: "12" }]);
    });

    it("should read the first sheet of a workbook", async () => {
      const sheet = XLSX.utils.aoa_to_sheet([
        [...GRADE_COLUMNS],
        GRADE_COLUMNS.map((column) => rawRecord()[column]),
      ]);
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, sheet, "grades");
      const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

      const records = await parseUpload(buffer, "Grades.XLSX");
      expect(parseGradeRows(records)).toEqual([gradeRow()]);
    });

    it("should refuse other file types", async () => {
      await expect(parseUpload(Buffer.from("{}"), "grades.json")).rejects.toThrow(
        'Unsupported file type ".json" (expected .csv or .xlsx)'
      );
    });
  });

  describe("files", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), "grade-store-"));
    });

    afterEach(async () => {
      await fs.promises.rm(directory, { recursive: true, force: true });
    });

    it("should load a dataset written as CSV", async () => {
      const target = path.join(directory, "raw", "grades.csv");
      await writeCsv(target, sampleRows());
      const dataset = await loadDataset(target, REFERENCE_DATE);
      expect(dataset).toEqual(sampleDataset());
    });

    it("should write aggregate tables as CSV", async () => {
      const target = path.join(directory, "exports", "table.csv");
      await writeTable(target, { columns: ["department", "mean"], rows: [["Computer Science", 13.5], ["Civil", null]] });
      expect(await fs.promises.readFile(target, "utf-8")).toBe("department,mean\nComputer Science,13.5\nCivil,\n");
    });
  });

  it("should format a table with quoting", () => {
    expect(tableToCsv({ columns: ["name"], rows: [["Doe, Ana"]] })).toBe('name\n"Doe, Ana"');
  });

  describe("profileRows", () => {
    it("should count rows, columns and missing values", () => {
      const dataset = buildDataset(
        [...sampleRows(), gradeRow({ courseCode: "C", grade: null })],
        REFERENCE_DATE
      );
      const profile = profileRows(dataset.rows);
      expect(profile.rowCount).toBe(7);
      expect(profile.columnCount).toBe(15);
      expect(profile.missingCells).toBe(1);
      expect(profile.columns.find((c) => c.name === "grade")).toEqual({ name: "grade", type: "number", missing: 1 });
      expect(profile.columns.find((c) => c.name === "studentId")).toEqual({ name: "studentId", type: "text", missing: 0 });
    });
  });
});
