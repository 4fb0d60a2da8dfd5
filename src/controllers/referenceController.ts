import { Request, Response } from "express";
import { GradeRepository } from "../services/gradeRepository";
import { distinctValues } from "../services/statistics";
import logger from "../utils/logger";
import {
  sendValidationError,
  validateDepartmentQuery,
  validateLevelQuery,
} from "../utils/validation";

export const referenceController = (repository: GradeRepository) => {
  const health = (req: Request, res: Response) => {
    res.status(200).json({
      success: true,
      data: {
        status: "ok",
        rows: repository.rows.length,
        students: repository.students.length,
      },
    });
  };

  const departments = (req: Request, res: Response) => {
    logger.info("Departments endpoint hit");
    res.status(200).json({ success: true, data: distinctValues(repository.rows, "department") });
  };

  const programs = (req: Request, res: Response) => {
    const { error, value } = validateDepartmentQuery(req.query);
    if (error) return sendValidationError(res, error);

    const rows = value.department
      ? repository.rows.filter((row) => row.department === value.department)
      : repository.rows;
    return res.status(200).json({ success: true, data: distinctValues(rows, "program") });
  };

  const teachers = (req: Request, res: Response) => {
    const { error, value } = validateDepartmentQuery(req.query);
    if (error) return sendValidationError(res, error);

    const rows = value.department
      ? repository.rows.filter((row) => row.department === value.department)
      : repository.rows;
    return res.status(200).json({ success: true, data: distinctValues(rows, "teacher") });
  };

  const subjects = (req: Request, res: Response) => {
    const { error, value } = validateLevelQuery(req.query);
    if (error) return sendValidationError(res, error);

    const names = new Map<string, string>();
    for (const row of repository.rows) {
      if (value.level && row.level !== value.level) continue;
      if (!names.has(row.courseCode)) names.set(row.courseCode, row.courseName);
    }
    const data = Array.from(names.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([courseCode, courseName]) => ({ courseCode, courseName }));
    return res.status(200).json({ success: true, data });
  };

  return { health, departments, programs, teachers, subjects };
};
