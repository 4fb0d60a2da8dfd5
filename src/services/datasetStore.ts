import fs from "fs";
import path from "path";
import { Readable } from "stream";
import csvParser from "csv-parser";
import * as XLSX from "xlsx";
import {
  AnalyzedRow,
  Dataset,
  GENDERS,
  GRADE_COLUMNS,
  Gender,
  GradeRow,
  MAX_GRADE,
  MIN_GRADE,
  buildDataset,
  parseBirthDate,
} from "../models/StudentRecord";
import { ColumnMapping } from "../types/types";
import { DatasetError } from "../utils/errors";
import logger from "../utils/logger";

export type RawRecord = Record<string, string>;

/** A table of plain cells, as written to the CSV exports. */
export interface Table {
  columns: string[];
  rows: Array<Array<string | number | null>>;
}

// Helper to parse a CSV stream into raw records keyed by header
export async function parseCsvStream(stream: Readable): Promise<RawRecord[]> {
  return new Promise<RawRecord[]>((resolve, reject) => {
    const records: RawRecord[] = [];
    stream
      .on("error", reject)
      .pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }))
      .on("data", (data: RawRecord) => {
        records.push(data);
      })
      .on("end", () => resolve(records))
      .on("error", (err: Error) => reject(err));
  });
}

export const parseCsvBuffer = (buffer: Buffer): Promise<RawRecord[]> =>
  parseCsvStream(Readable.from(buffer));

export const parseXlsxBuffer = (buffer: Buffer): RawRecord[] => {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    throw new DatasetError("The workbook has no sheet");
  }
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: "",
    raw: false,
  });
  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([key, value]) => [key.trim(), String(value ?? "")]))
  );
};

/** Reads raw records from an uploaded file, choosing the parser from its name. */
export const parseUpload = async (buffer: Buffer, filename: string): Promise<RawRecord[]> => {
  const extension = path.extname(filename).toLowerCase();
  if (extension === ".csv") return parseCsvBuffer(buffer);
  if (extension === ".xlsx") return parseXlsxBuffer(buffer);
  throw new DatasetError(`Unsupported file type "${extension || filename}" (expected .csv or .xlsx)`);
};

export const readDatasetFile = async (filePath: string): Promise<RawRecord[]> => {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === ".csv") return parseCsvStream(fs.createReadStream(filePath));
  if (extension === ".xlsx") return parseXlsxBuffer(await fs.promises.readFile(filePath));
  throw new DatasetError(`Unsupported file type "${extension || filePath}" (expected .csv or .xlsx)`);
};

const isGender = (value: string): value is Gender => GENDERS.some((gender) => gender === value);

// Empty → missing; a decimal comma is accepted.
const parseGradeCell = (text: string, line: number): number | null => {
  const normalized = text.replace(",", ".");
  if (normalized === "") return null;
  const grade = Number(normalized);
  if (Number.isNaN(grade)) {
    throw new DatasetError(`Row ${line}: grade "${text}" is not a number`);
  }
  if (grade < MIN_GRADE || grade > MAX_GRADE) {
    throw new DatasetError(`Row ${line}: grade ${grade} is outside [${MIN_GRADE}, ${MAX_GRADE}]`);
  }
  return grade;
};

/**
 * Turns raw records into grade rows. Aborts on the first malformed record:
 * missing columns, an empty identifier, an unknown gender, a non-numeric or
 * out-of-range grade. An empty grade cell is a missing grade.
 */
export const parseGradeRows = (records: ReadonlyArray<RawRecord>, mapping: ColumnMapping = {}): GradeRow[] => {
  if (records.length === 0) {
    throw new DatasetError("The file contains no data rows");
  }

  const source = (column: keyof GradeRow): string => mapping[column] || column;
  const available = new Set(Object.keys(records[0]));
  const missing = GRADE_COLUMNS.filter((column) => !available.has(source(column)));
  if (missing.length > 0) {
    throw new DatasetError(`Missing columns: ${missing.join(", ")}`);
  }

  return records.map((raw, index) => {
    const line = index + 1;
    const cell = (column: keyof GradeRow): string => (raw[source(column)] ?? "").toString().trim();

    const studentId = cell("studentId");
    const courseCode = cell("courseCode");
    if (!studentId || !courseCode) {
      throw new DatasetError(`Row ${line}: studentId and courseCode are required`);
    }

    const gender = cell("gender").toUpperCase();
    if (!isGender(gender)) {
      throw new DatasetError(`Row ${line}: gender must be one of ${GENDERS.join(", ")}, got "${cell("gender")}"`);
    }

    const birthDate = cell("birthDate");
    if (!parseBirthDate(birthDate)) {
      throw new DatasetError(`Row ${line}: invalid birthDate "${birthDate}" (expected dd/mm/yyyy)`);
    }

    const grade = parseGradeCell(cell("grade"), line);

    return {
      studentId,
      lastName: cell("lastName"),
      firstName: cell("firstName"),
      gender,
      birthDate,
      department: cell("department"),
      program: cell("program"),
      level: cell("level"),
      academicYear: cell("academicYear"),
      courseCode,
      courseName: cell("courseName"),
      teacher: cell("teacher"),
      grade,
    };
  });
};

/**
 * Reads only the grade column of a file, for comparing its grade distribution
 * with a cohort. Missing grades are dropped.
 */
export const parseGradeValues = (records: ReadonlyArray<RawRecord>, mapping: ColumnMapping = {}): number[] => {
  if (records.length === 0) {
    throw new DatasetError("The file contains no data rows");
  }
  const column = mapping.grade || "grade";
  if (!Object.keys(records[0]).includes(column)) {
    throw new DatasetError(`Missing columns: ${column}`);
  }
  return records.flatMap((raw, index) => {
    const grade = parseGradeCell((raw[column] ?? "").toString().trim(), index + 1);
    return grade === null ? [] : [grade];
  });
};

export const loadDataset = async (filePath: string, referenceDate: Date): Promise<Dataset> => {
  logger.info(`Loading dataset from ${filePath}`);
  const records = await readDatasetFile(filePath);
  const dataset = buildDataset(parseGradeRows(records), referenceDate);
  logger.info(`Dataset ready: ${dataset.rows.length} rows, ${dataset.students.length} students`);
  return dataset;
};

const gradeRowsToSheet = (rows: ReadonlyArray<GradeRow>): XLSX.WorkSheet =>
  XLSX.utils.json_to_sheet(
    rows.map((row) => Object.fromEntries(GRADE_COLUMNS.map((column) => [column, row[column] ?? ""]))),
    { header: [...GRADE_COLUMNS] }
  );

export const rowsToCsv = (rows: ReadonlyArray<GradeRow>): string =>
  XLSX.utils.sheet_to_csv(gradeRowsToSheet(rows));

export const tableToCsv = (table: Table): string =>
  XLSX.utils.sheet_to_csv(
    XLSX.utils.aoa_to_sheet([table.columns, ...table.rows.map((row) => row.map((value) => value ?? ""))])
  );

const ensureDirectory = async (filePath: string): Promise<void> => {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
};

export const writeCsv = async (filePath: string, rows: ReadonlyArray<GradeRow>): Promise<void> => {
  await ensureDirectory(filePath);
  await fs.promises.writeFile(filePath, `${rowsToCsv(rows)}\n`, "utf-8");
};

export const writeXlsx = async (filePath: string, rows: ReadonlyArray<GradeRow>): Promise<void> => {
  await ensureDirectory(filePath);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, gradeRowsToSheet(rows), "grades");
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await fs.promises.writeFile(filePath, buffer);
};

export const writeTable = async (filePath: string, table: Table): Promise<void> => {
  await ensureDirectory(filePath);
  await fs.promises.writeFile(filePath, `${tableToCsv(table)}\n`, "utf-8");
};

export interface ColumnProfile {
  name: string;
  type: "number" | "text";
  missing: number;
}

export interface DataProfile {
  rowCount: number;
  columnCount: number;
  missingCells: number;
  columns: ColumnProfile[];
}

const PROFILED_COLUMNS: ReadonlyArray<keyof AnalyzedRow> = [...GRADE_COLUMNS, "age", "ageBand"];

/** Row, column and missing-value counts with an inferred type per column. */
export const profileRows = (rows: ReadonlyArray<AnalyzedRow>): DataProfile => {
  const columns = PROFILED_COLUMNS.map((name): ColumnProfile => {
    const present = rows.map((row) => row[name]).filter((value) => value !== null && value !== "");
    return {
      name,
      type: present.length > 0 && present.every((value) => typeof value === "number") ? "number" : "text",
      missing: rows.length - present.length,
    };
  });
  return {
    rowCount: rows.length,
    columnCount: columns.length,
    missingCells: columns.reduce((sum, column) => sum + column.missing, 0),
    columns,
  };
};
