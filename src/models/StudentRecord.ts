import { DatasetError } from "../utils/errors";

export const GENDERS = ["M", "F"] as const;
export type Gender = (typeof GENDERS)[number];

export const AGE_BANDS = ["18-20", "21-23", "24-26", "27+"] as const;
export type AgeBand = (typeof AGE_BANDS)[number];

// Upper bound (inclusive) of each band; the lower bound of the first band is exclusive.
const AGE_BAND_EDGES: ReadonlyArray<[AgeBand, number]> = [
  ["18-20", 20],
  ["21-23", 23],
  ["24-26", 26],
  ["27+", 30],
];
const AGE_BAND_FLOOR = 17;

/** One line of the dataset file: a single student's grade in a single course. */
export interface GradeRow {
  studentId: string;
  lastName: string;
  firstName: string;
  gender: Gender;
  birthDate: string;
  department: string;
  program: string;
  level: string;
  academicYear: string;
  courseCode: string;
  courseName: string;
  teacher: string;
  grade: number | null;
}

/** A grade row enriched with the values derived at load time. */
export interface AnalyzedRow extends GradeRow {
  age: number;
  ageBand: AgeBand | null;
}

export interface StudentRecord {
  readonly studentId: string;
  readonly lastName: string;
  readonly firstName: string;
  readonly gender: Gender;
  readonly birthDate: string;
  readonly age: number;
  readonly department: string;
  readonly program: string;
  readonly level: string;
  readonly academicYear: string;
  readonly grades: Readonly<Record<string, number | null>>;
}

export interface Dataset {
  readonly rows: ReadonlyArray<AnalyzedRow>;
  readonly students: ReadonlyArray<StudentRecord>;
  readonly referenceDate: Date;
}

export const GRADE_COLUMNS: ReadonlyArray<keyof GradeRow> = [
  "studentId",
  "lastName",
  "firstName",
  "gender",
  "birthDate",
  "department",
  "program",
  "level",
  "academicYear",
  "courseCode",
  "courseName",
  "teacher",
  "grade",
];

export const MIN_GRADE = 0;
export const MAX_GRADE = 20;

/** Parses a `dd/mm/yyyy` date; returns null when the text is not a real calendar date. */
export const parseBirthDate = (text: string): Date | null => {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!match) return null;
  const [, day, month, year] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
};

export const formatBirthDate = (date: Date): string => {
  const day = String(date.getUTCDate()).padStart(2, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${day}/${month}/${date.getUTCFullYear()}`;
};

export const ageAt = (birthDate: Date, referenceDate: Date): number => {
  const beforeBirthday =
    referenceDate.getUTCMonth() < birthDate.getUTCMonth() ||
    (referenceDate.getUTCMonth() === birthDate.getUTCMonth() &&
      referenceDate.getUTCDate() < birthDate.getUTCDate());
  return referenceDate.getUTCFullYear() - birthDate.getUTCFullYear() - (beforeBirthday ? 1 : 0);
};

export const ageBandOf = (age: number): AgeBand | null => {
  if (age <= AGE_BAND_FLOOR) return null;
  const edge = AGE_BAND_EDGES.find(([, upper]) => age <= upper);
  return edge ? edge[0] : null;
};

const sameProfile = (a: GradeRow, b: StudentRecord): boolean =>
  a.lastName === b.lastName &&
  a.firstName === b.firstName &&
  a.gender === b.gender &&
  a.birthDate === b.birthDate &&
  a.department === b.department &&
  a.program === b.program &&
  a.level === b.level &&
  a.academicYear === b.academicYear;

type StudentDraft = Omit<StudentRecord, "grades"> & { grades: Record<string, number | null> };

/**
 * Builds the immutable dataset snapshot: rows gain age and age band, and rows
 * are grouped into one record per student in first-appearance order.
 */
export const buildDataset = (rows: ReadonlyArray<GradeRow>, referenceDate: Date): Dataset => {
  const analyzed: AnalyzedRow[] = [];
  const students = new Map<string, StudentDraft>();

  rows.forEach((row, index) => {
    const birth = parseBirthDate(row.birthDate);
    if (!birth) {
      throw new DatasetError(`Row ${index + 1}: invalid birthDate "${row.birthDate}" (expected dd/mm/yyyy)`);
    }
    const age = ageAt(birth, referenceDate);
    analyzed.push(Object.freeze({ ...row, age, ageBand: ageBandOf(age) }));

    const existing = students.get(row.studentId);
    if (!existing) {
      students.set(row.studentId, {
        studentId: row.studentId,
        lastName: row.lastName,
        firstName: row.firstName,
        gender: row.gender,
        birthDate: row.birthDate,
        age,
        department: row.department,
        program: row.program,
        level: row.level,
        academicYear: row.academicYear,
        grades: { [row.courseCode]: row.grade },
      });
      return;
    }
    if (!sameProfile(row, existing)) {
      throw new DatasetError(`Row ${index + 1}: student ${row.studentId} has conflicting attributes`);
    }
    if (row.courseCode in existing.grades) {
      throw new DatasetError(`Row ${index + 1}: duplicate grade for ${row.studentId} in ${row.courseCode}`);
    }
    existing.grades[row.courseCode] = row.grade;
  });

  const records = Array.from(students.values()).map(
    (student): StudentRecord => Object.freeze({ ...student, grades: Object.freeze({ ...student.grades }) })
  );

  return Object.freeze({
    rows: Object.freeze(analyzed),
    students: Object.freeze(records),
    referenceDate,
  });
};
