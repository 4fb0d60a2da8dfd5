import { Request, Response } from "express";
import { GradeRepository } from "../services/gradeRepository";
import { rankBySubject, rankStudents, rankWithinGroups, RankingGrouping } from "../services/ranking";
import { filterRows } from "../services/statistics";
import { errorMessage } from "../utils/errors";
import logger from "../utils/logger";
import { sendValidationError, validateRankingQuery } from "../utils/validation";

export const rankingController = (repository: GradeRepository) => {
  const general = (req: Request, res: Response) => {
    logger.info("General ranking endpoint hit");
    const { error, value } = validateRankingQuery(req.query);
    if (error) return sendValidationError(res, error);

    try {
      const { limit, ...filter } = value;
      const ranking = rankStudents(filterRows(repository.rows, filter), repository.scheme);
      return res.status(200).json({
        success: true,
        total: ranking.length,
        data: ranking.slice(0, limit),
      });
    } catch (err) {
      logger.error("Error computing general ranking", err);
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  const subject = (req: Request, res: Response) => {
    const { courseCode } = req.params;
    const { error, value } = validateRankingQuery(req.query);
    if (error) return sendValidationError(res, error);

    if (!repository.rows.some((row) => row.courseCode === courseCode)) {
      logger.warn(`Unknown subject requested: ${courseCode}`);
      return res.status(404).json({ success: false, message: `Subject ${courseCode} not found` });
    }

    try {
      const ranking = rankBySubject(repository.rows, courseCode);
      return res.status(200).json({
        success: true,
        total: ranking.length,
        data: ranking.slice(0, value.limit),
      });
    } catch (err) {
      logger.error(`Error ranking subject ${courseCode}`, err);
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  const grouped = (grouping: RankingGrouping) => (req: Request, res: Response) => {
    const { error, value } = validateRankingQuery(req.query);
    if (error) return sendValidationError(res, error);

    try {
      const data = rankWithinGroups(repository.rows, grouping, repository.scheme).map(({ group, entries }) => ({
        group,
        total: entries.length,
        entries: entries.slice(0, value.limit),
      }));
      return res.status(200).json({ success: true, data });
    } catch (err) {
      logger.error(`Error computing ${grouping} rankings`, err);
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  return {
    general,
    subject,
    department: grouped("department"),
    programLevel: grouped("programLevel"),
  };
};
