import dotenv from "dotenv";
dotenv.config();

import Joi from "joi";
import { ConfigurationError } from "./errors";

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  logLevel: string;
  apiPort: number;
  dashboardPort: number;
  datasetPath: string;
  exportDir: string;
  passMark: number;
  referenceDate: Date;
  academicYear: string;
  studentCount: number;
  randomSeed: number;
  gradeMean: number;
  gradeStd: number;
  missingRate: number;
  allowedOrigins: string[];
  rateLimitMax: number;
}

interface RawEnv {
  NODE_ENV: AppConfig["nodeEnv"];
  LOG_LEVEL: string;
  API_PORT: number;
  DASHBOARD_PORT: number;
  DATASET_PATH: string;
  EXPORT_DIR: string;
  PASS_MARK: number;
  REFERENCE_DATE: Date;
  ACADEMIC_YEAR: string;
  STUDENT_COUNT: number;
  RANDOM_SEED: number;
  GRADE_MEAN: number;
  GRADE_STD: number;
  MISSING_RATE: number;
  ALLOWED_ORIGINS: string;
  RATE_LIMIT_MAX: number;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string()
    .valid("development", "production", "test")
    .default("development"),
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
    .default("info"),
  API_PORT: Joi.number().port().default(3000),
  DASHBOARD_PORT: Joi.number().port().default(3003),
  DATASET_PATH: Joi.string().default("data/raw/grades.csv"),
  EXPORT_DIR: Joi.string().default("exports"),
  PASS_MARK: Joi.number().min(0).max(20).default(10),
  REFERENCE_DATE: Joi.date().iso().default(() => new Date("2025-09-01T00:00:00Z")),
  ACADEMIC_YEAR: Joi.string()
    .pattern(/^\d{4}-\d{4}$/)
    .default("2025-2026"),
  STUDENT_COUNT: Joi.number().integer().min(0).default(1200),
  RANDOM_SEED: Joi.number().integer().default(42),
  GRADE_MEAN: Joi.number().min(0).max(20).default(12),
  GRADE_STD: Joi.number().positive().default(3),
  MISSING_RATE: Joi.number().min(0).less(1).default(0),
  ALLOWED_ORIGINS: Joi.string().default("http://localhost:3000,http://localhost:3003"),
  RATE_LIMIT_MAX: Joi.number().integer().positive().default(100),
}).unknown(true);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { error, value } = envSchema.validate(env, { convert: true });
  if (error) {
    throw new ConfigurationError(`Invalid environment: ${error.details[0].message}`);
  }

  return {
    nodeEnv: value.NODE_ENV,
    logLevel: value.LOG_LEVEL,
    apiPort: value.API_PORT,
    dashboardPort: value.DASHBOARD_PORT,
    datasetPath: value.DATASET_PATH,
    exportDir: value.EXPORT_DIR,
    passMark: value.PASS_MARK,
    referenceDate: value.REFERENCE_DATE,
    academicYear: value.ACADEMIC_YEAR,
    studentCount: value.STUDENT_COUNT,
    randomSeed: value.RANDOM_SEED,
    gradeMean: value.GRADE_MEAN,
    gradeStd: value.GRADE_STD,
    missingRate: value.MISSING_RATE,
    allowedOrigins: value.ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    rateLimitMax: value.RATE_LIMIT_MAX,
  };
};
