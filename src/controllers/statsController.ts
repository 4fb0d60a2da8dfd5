import { Request, Response } from "express";
import { GradeRepository } from "../services/gradeRepository";
import {
  cohortSummary,
  distinctValues,
  filterRows,
  globalStats,
  rowDistribution,
  statsByAgeBand,
  statsByDepartment,
  statsByGender,
  statsByProgramLevel,
  statsBySubjectTeacher,
  subjectAggregates,
} from "../services/statistics";
import { GroupAggregate } from "../types/types";
import { errorMessage } from "../utils/errors";
import { roundSummary } from "../utils/format";
import logger from "../utils/logger";
import {
  sendValidationError,
  validateCohortFilter,
  validateDistributionQuery,
  validateTeacherQuery,
} from "../utils/validation";

const flatten = (aggregates: GroupAggregate[]) =>
  aggregates.map(({ group, summary }) => ({ ...group, ...roundSummary(summary) }));

const serverError = (res: Response, context: string, err: unknown) => {
  logger.error(`Error computing ${context}`, err);
  return res.status(500).json({ success: false, message: errorMessage(err) });
};

export const statsController = (repository: GradeRepository) => {
  const { passMark } = repository;

  const global = (req: Request, res: Response) => {
    const { error, value } = validateCohortFilter(req.query);
    if (error) return sendValidationError(res, error);

    try {
      const summary = cohortSummary(repository.rows, value, passMark);
      return res.status(200).json({
        success: true,
        data: {
          filter: summary.filter,
          empty: summary.empty,
          gradeCount: summary.gradeCount,
          studentCount: summary.studentCount,
          summary: roundSummary(summary.overall),
        },
      });
    } catch (err) {
      return serverError(res, "global statistics", err);
    }
  };

  const subjects = (req: Request, res: Response) => {
    const { error, value } = validateCohortFilter(req.query);
    if (error) return sendValidationError(res, error);

    try {
      const data = subjectAggregates(filterRows(repository.rows, value), passMark).map(roundSummary);
      return res.status(200).json({ success: true, data });
    } catch (err) {
      return serverError(res, "subject statistics", err);
    }
  };

  const subject = (req: Request, res: Response) => {
    const { courseCode } = req.params;
    const rows = repository.rows.filter((row) => row.courseCode === courseCode);
    if (rows.length === 0) {
      logger.warn(`Unknown subject requested: ${courseCode}`);
      return res.status(404).json({ success: false, message: `Subject ${courseCode} not found` });
    }

    try {
      const [aggregate] = subjectAggregates(rows, passMark);
      return res.status(200).json({
        success: true,
        data: {
          ...roundSummary(aggregate),
          byTeacher: flatten(statsBySubjectTeacher(rows, passMark)),
          byLevel: flatten(statsByProgramLevel(rows, passMark)),
        },
      });
    } catch (err) {
      return serverError(res, `statistics for ${courseCode}`, err);
    }
  };

  const departments = (req: Request, res: Response) => {
    try {
      return res.status(200).json({ success: true, data: flatten(statsByDepartment(repository.rows, passMark)) });
    } catch (err) {
      return serverError(res, "department statistics", err);
    }
  };

  const programLevel = (req: Request, res: Response) => {
    try {
      return res.status(200).json({ success: true, data: flatten(statsByProgramLevel(repository.rows, passMark)) });
    } catch (err) {
      return serverError(res, "program/level statistics", err);
    }
  };

  const teacher = (req: Request, res: Response) => {
    const { error, value } = validateTeacherQuery(req.query);
    if (error) return sendValidationError(res, error);

    if (!distinctValues(repository.rows, "teacher").includes(value.teacher)) {
      logger.warn(`Unknown teacher requested: ${value.teacher}`);
      return res.status(404).json({ success: false, message: `Teacher ${value.teacher} not found` });
    }

    try {
      const rows = repository.rows.filter((row) => row.teacher === value.teacher);
      return res.status(200).json({
        success: true,
        data: {
          teacher: value.teacher,
          overall: roundSummary(globalStats(rows, passMark)),
          subjects: flatten(statsBySubjectTeacher(rows, passMark)),
        },
      });
    } catch (err) {
      return serverError(res, `statistics for teacher ${value.teacher}`, err);
    }
  };

  const gender = (req: Request, res: Response) => {
    try {
      return res.status(200).json({ success: true, data: flatten(statsByGender(repository.rows, passMark)) });
    } catch (err) {
      return serverError(res, "gender statistics", err);
    }
  };

  const ageBands = (req: Request, res: Response) => {
    try {
      return res.status(200).json({ success: true, data: flatten(statsByAgeBand(repository.rows, passMark)) });
    } catch (err) {
      return serverError(res, "age band statistics", err);
    }
  };

  const distribution = (req: Request, res: Response) => {
    const { error, value } = validateDistributionQuery(req.query);
    if (error) return sendValidationError(res, error);

    try {
      const { bins, ...filter } = value;
      return res.status(200).json({
        success: true,
        data: rowDistribution(filterRows(repository.rows, filter), { bins }),
      });
    } catch (err) {
      return serverError(res, "grade distribution", err);
    }
  };

  return { global, subjects, subject, departments, programLevel, teacher, gender, ageBands, distribution };
};
