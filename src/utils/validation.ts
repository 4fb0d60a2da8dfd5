import { Response } from "express";
import Joi from "joi";
import { AGE_BANDS, GENDERS, GRADE_COLUMNS } from "../models/StudentRecord";
import { CohortFilter, ColumnMapping, DASHBOARD_TABS, DashboardTab } from "../types/types";
import logger from "./logger";

const optionalText = Joi.string().trim().max(100).empty("");

const cohortFields = {
  department: optionalText,
  program: optionalText,
  level: optionalText,
  subject: optionalText,
  teacher: optionalText,
  gender: Joi.string()
    .uppercase()
    .valid(...GENDERS)
    .empty(""),
  ageBand: Joi.string()
    .valid(...AGE_BANDS)
    .empty(""),
};

export interface RankingQuery extends CohortFilter {
  limit: number;
}

export interface TeacherQuery {
  teacher: string;
}

export interface DepartmentQuery {
  department?: string;
}

export interface LevelQuery {
  level?: string;
}

export interface DistributionQuery extends CohortFilter {
  bins: number;
}

export const validateCohortFilter = (query: unknown) => {
  const schema = Joi.object<CohortFilter>(cohortFields);
  return schema.validate(query, { stripUnknown: true });
};

export const validateRankingQuery = (query: unknown, defaultLimit = 10) => {
  const schema = Joi.object<RankingQuery>({
    ...cohortFields,
    limit: Joi.number().integer().min(1).max(1000).default(defaultLimit),
  });
  return schema.validate(query, { stripUnknown: true });
};

export const validateTeacherQuery = (query: unknown) => {
  const schema = Joi.object<TeacherQuery>({
    teacher: Joi.string().trim().min(1).required(),
  });
  return schema.validate(query, { stripUnknown: true });
};

export const validateDepartmentQuery = (query: unknown) => {
  const schema = Joi.object<DepartmentQuery>({ department: optionalText });
  return schema.validate(query, { stripUnknown: true });
};

export const validateLevelQuery = (query: unknown) => {
  const schema = Joi.object<LevelQuery>({ level: optionalText });
  return schema.validate(query, { stripUnknown: true });
};

export const validateDistributionQuery = (query: unknown) => {
  const schema = Joi.object<DistributionQuery>({
    ...cohortFields,
    bins: Joi.number().integer().min(1).max(100).default(20),
  });
  return schema.validate(query, { stripUnknown: true });
};

export interface DashboardQuery extends CohortFilter {
  tab: DashboardTab;
  top: number;
}

/** Dashboard page: cohort filter, active tab and the top-N of the rankings tab. */
export const validateDashboardQuery = (query: unknown) => {
  const schema = Joi.object<DashboardQuery>({
    ...cohortFields,
    tab: Joi.string()
      .valid(...DASHBOARD_TABS)
      .empty("")
      .default("overview"),
    top: Joi.number().integer().min(5).max(100).empty("").default(10),
  });
  return schema.validate(query, { stripUnknown: true });
};

/**
 * Column mapping sent with an import: one optional form field per expected
 * column (`map_<column>`), naming the column of the uploaded file.
 */
export const parseColumnMapping = (body: unknown): ColumnMapping => {
  const mapping: ColumnMapping = {};
  if (typeof body !== "object" || body === null) return mapping;
  const fields = new Map(Object.entries(body));
  for (const column of GRADE_COLUMNS) {
    const value = fields.get(`map_${column}`);
    if (typeof value === "string" && value.trim() !== "") {
      mapping[column] = value.trim();
    }
  }
  return mapping;
};

export const sendValidationError = (res: Response, error: Joi.ValidationError) => {
  logger.warn("Query validation error", error.details);
  return res.status(400).json({ success: false, message: error.details[0].message });
};
