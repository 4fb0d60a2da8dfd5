import { Curriculum } from "../models/Curriculum";
import { Dataset, GradeRow, buildDataset } from "../models/StudentRecord";

export const REFERENCE_DATE = new Date("2025-09-01T00:00:00Z");

export const gradeRow = (overrides: Partial<GradeRow> = {}): GradeRow => ({
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
  grade: 12,
  ...overrides,
});

const S1: Partial<GradeRow> = { studentId: "S1" };
const S2: Partial<GradeRow> = {
  studentId: "S2",
  lastName: "Roe",
  firstName: "Ben",
  gender: "M",
  birthDate: "01/10/2006",
};
const S3: Partial<GradeRow> = {
  studentId: "S3",
  lastName: "Poe",
  firstName: "Cal",
  gender: "M",
  birthDate: "20/01/2000",
  department: "Civil Engineering",
  program: "Building Construction",
  level: "L2",
};

/**
 * Three students, two subjects:
 *   A: S1 12, S2 9,  S3 14 (taught by Mr Smith)
 *   B: S1 15, S2 18, S3 11 (taught by Mrs Lee)
 * Ages at the reference date: S1 21, S2 18, S3 25.
 */
export const sampleRows = (): GradeRow[] => [
  gradeRow({ ...S1, courseCode: "A", grade: 12 }),
  gradeRow({ ...S1, courseCode: "B", courseName: "Course B", teacher: "Mrs Lee", grade: 15 }),
  gradeRow({ ...S2, courseCode: "A", grade: 9 }),
  gradeRow({ ...S2, courseCode: "B", courseName: "Course B", teacher: "Mrs Lee", grade: 18 }),
  gradeRow({ ...S3, courseCode: "A", grade: 14 }),
  gradeRow({ ...S3, courseCode: "B", courseName: "Course B", teacher: "Mrs Lee", grade: 11 }),
];

export const sampleDataset = (): Dataset => buildDataset(sampleRows(), REFERENCE_DATE);

export const testCurriculum = (): Curriculum => ({
  studentIdPrefix: "T",
  lastNames: ["Doe", "Roe"],
  firstNames: ["Ana", "Ben"],
  teachers: ["Mr Smith", "Mrs Lee"],
  departments: [
    {
      name: "Computer Science",
      programs: ["Software Engineering"],
      levels: {
        L3: [
          { code: "A", name: "Course A", credits: 2 },
          { code: "B", name: "Course B", credits: 1 },
        ],
      },
    },
    {
      name: "Civil Engineering",
      programs: ["Building Construction", "Public Works"],
      levels: {
        L2: [{ code: "C", name: "Course C", credits: 3 }],
        M1: [
          { code: "D", name: "Course D", credits: 4 },
          { code: "E", name: "Course E", credits: 5 },
        ],
      },
    },
  ],
});
