import path from "path";
import Joi from "joi";
import { Curriculum } from "../models/Curriculum";
import { GENDERS, GradeRow, MAX_GRADE, MIN_GRADE, formatBirthDate } from "../models/StudentRecord";
import { ConfigurationError } from "../utils/errors";
import { SeededRandom } from "../utils/random";
import { round2 } from "../utils/format";
import logger from "../utils/logger";
import { writeCsv, writeXlsx } from "./datasetStore";

export interface GeneratorConfig {
  studentCount: number;
  seed: number;
  academicYear: string;
  mean: number;
  standardDeviation: number;
  minGrade: number;
  maxGrade: number;
  missingRate: number;
  birthYearFrom: number;
  birthYearTo: number;
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  studentCount: 1200,
  seed: 42,
  academicYear: "2025-2026",
  mean: 12,
  standardDeviation: 3,
  minGrade: MIN_GRADE,
  maxGrade: MAX_GRADE,
  missingRate: 0,
  birthYearFrom: 1995,
  birthYearTo: 2007,
};

const generatorSchema = Joi.object<GeneratorConfig>({
  studentCount: Joi.number().integer().min(0).required(),
  seed: Joi.number().integer().required(),
  academicYear: Joi.string().pattern(/^\d{4}-\d{4}$/).required(),
  minGrade: Joi.number().min(MIN_GRADE).required(),
  maxGrade: Joi.number().max(MAX_GRADE).greater(Joi.ref("minGrade")).required(),
  mean: Joi.number().min(Joi.ref("minGrade")).max(Joi.ref("maxGrade")).required(),
  standardDeviation: Joi.number().positive().required(),
  missingRate: Joi.number().min(0).less(1).required(),
  birthYearFrom: Joi.number().integer().min(1900).required(),
  birthYearTo: Joi.number().integer().min(Joi.ref("birthYearFrom")).required(),
});

export const validateGeneratorConfig = (config: Partial<GeneratorConfig>): GeneratorConfig => {
  const { error, value } = generatorSchema.validate({ ...DEFAULT_GENERATOR_CONFIG, ...config });
  if (error) {
    throw new ConfigurationError(`Invalid generator configuration: ${error.details[0].message}`);
  }
  return value;
};

const randomBirthDate = (random: SeededRandom, fromYear: number, toYear: number): string => {
  const start = Date.UTC(fromYear, 0, 1);
  const end = Date.UTC(toYear, 11, 31);
  const days = Math.round((end - start) / 86_400_000);
  return formatBirthDate(new Date(start + random.int(0, days) * 86_400_000));
};

/**
 * Simulates one grade row per (student, course of the student's level). The
 * same configuration and curriculum always produce the same rows.
 */
export const generateDataset = (
  config: Partial<GeneratorConfig>,
  curriculum: Curriculum
): GradeRow[] => {
  const settings = validateGeneratorConfig(config);
  const random = new SeededRandom(settings.seed);
  const rows: GradeRow[] = [];

  for (let i = 0; i < settings.studentCount; i++) {
    const studentId = `${curriculum.studentIdPrefix}${String(i + 1).padStart(4, "0")}`;
    const lastName = random.pick(curriculum.lastNames);
    const firstName = random.pick(curriculum.firstNames);
    const gender = random.pick(GENDERS);
    const birthDate = randomBirthDate(random, settings.birthYearFrom, settings.birthYearTo);

    const department = random.pick(curriculum.departments);
    const program = random.pick(department.programs);
    const level = random.pick(Object.keys(department.levels).sort());
    const courses = department.levels[level];

    for (const course of courses) {
      const teacher = random.pick(curriculum.teachers);
      const raw = random.normal(settings.mean, settings.standardDeviation);
      const missing = settings.missingRate > 0 && random.next() < settings.missingRate;
      rows.push({
        studentId,
        lastName,
        firstName,
        gender,
        birthDate,
        department: department.name,
        program,
        level,
        academicYear: settings.academicYear,
        courseCode: course.code,
        courseName: course.name,
        teacher,
        grade: missing ? null : round2(Math.min(settings.maxGrade, Math.max(settings.minGrade, raw))),
      });
    }
  }

  return rows;
};

/** Writes the rows next to each other as `<name>.csv` and `<name>.xlsx`. */
export const writeDataset = async (
  csvPath: string,
  rows: ReadonlyArray<GradeRow>
): Promise<{ csv: string; xlsx: string }> => {
  const parsed = path.parse(csvPath);
  const xlsxPath = path.join(parsed.dir, `${parsed.name}.xlsx`);
  await writeCsv(csvPath, rows);
  await writeXlsx(xlsxPath, rows);
  logger.info(`Dataset written: ${rows.length} rows to ${csvPath} and ${xlsxPath}`);
  return { csv: csvPath, xlsx: xlsxPath };
};
