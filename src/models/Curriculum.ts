import fs from "fs";
import path from "path";
import Joi from "joi";
import { ConfigurationError, errorMessage } from "../utils/errors";

export interface Course {
  code: string;
  name: string;
  credits: number;
}

export interface Department {
  name: string;
  programs: string[];
  levels: Record<string, Course[]>;
}

export interface Curriculum {
  studentIdPrefix: string;
  lastNames: string[];
  firstNames: string[];
  teachers: string[];
  departments: Department[];
}

export const DEFAULT_CURRICULUM_PATH = path.resolve(__dirname, "..", "..", "config", "curriculum.json");

const courseSchema = Joi.object<Course>({
  code: Joi.string().trim().required(),
  name: Joi.string().trim().required(),
  credits: Joi.number().positive().required(),
});

const curriculumSchema = Joi.object<Curriculum>({
  studentIdPrefix: Joi.string().alphanum().required(),
  lastNames: Joi.array().items(Joi.string()).min(1).required(),
  firstNames: Joi.array().items(Joi.string()).min(1).required(),
  teachers: Joi.array().items(Joi.string()).min(1).required(),
  departments: Joi.array()
    .items(
      Joi.object<Department>({
        name: Joi.string().required(),
        programs: Joi.array().items(Joi.string()).min(1).required(),
        levels: Joi.object()
          .pattern(/^[LM][1-5]$/, Joi.array().items(courseSchema).min(1))
          .min(1)
          .required(),
      })
    )
    .min(1)
    .unique("name")
    .required(),
});

export const validateCurriculum = (input: unknown): Curriculum => {
  const { error, value } = curriculumSchema.validate(input);
  if (error) {
    throw new ConfigurationError(`Invalid curriculum: ${error.details[0].message}`);
  }
  return value;
};

export const loadCurriculum = (filePath: string = DEFAULT_CURRICULUM_PATH): Curriculum => {
  const raw = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Curriculum file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return validateCurriculum(parsed);
};

/** Credits per course code, used as composite-score weights. */
export const courseCredits = (curriculum: Curriculum): Record<string, number> => {
  const credits: Record<string, number> = {};
  for (const department of curriculum.departments) {
    for (const courses of Object.values(department.levels)) {
      for (const course of courses) {
        credits[course.code] = course.credits;
      }
    }
  }
  return credits;
};
