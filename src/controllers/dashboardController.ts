import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AnalyzedRow, GENDERS, buildDataset } from "../models/StudentRecord";
import { parseGradeRows, parseGradeValues, parseUpload, rowsToCsv } from "../services/datasetStore";
import { GradeRepository } from "../services/gradeRepository";
import { createReportPdf } from "../services/reportService";
import { compareCohorts, distinctValues, filterRows } from "../services/statistics";
import { CohortFilter, ComparisonMetric, DashboardTab } from "../types/types";
import { AppError, errorMessage } from "../utils/errors";
import logger from "../utils/logger";
import {
  parseColumnMapping,
  validateCohortFilter,
  validateDashboardQuery,
} from "../utils/validation";
import { DashboardMessage, FilterOptions, renderDashboard } from "../views/dashboardView";

export interface DashboardSettings {
  academicYear: string;
}

interface PageState {
  tab: DashboardTab;
  filter: CohortFilter;
  top?: number;
  messages?: DashboardMessage[];
  comparison?: ComparisonMetric[];
  // Rows of an uploaded file, shown for this response only; defaults to the served snapshot.
  rows?: ReadonlyArray<AnalyzedRow>;
}

const FILE_REQUIRED = "A CSV or XLSX file is required under field 'file'";

export const dashboardController = (repository: GradeRepository, settings: DashboardSettings) => {
  const filterOptions = (rows: ReadonlyArray<AnalyzedRow>): FilterOptions => {
    return {
      department: distinctValues(rows, "department"),
      program: distinctValues(rows, "program"),
      level: distinctValues(rows, "level"),
      subject: distinctValues(rows, "courseCode"),
      teacher: distinctValues(rows, "teacher"),
      gender: [...GENDERS],
    };
  };

  const sendPage = (res: Response, status: number, state: PageState) => {
    const rows = state.rows ?? repository.rows;
    const html = renderDashboard(
      {
        tab: state.tab,
        filter: state.filter,
        options: filterOptions(rows),
        passMark: repository.passMark,
        scheme: repository.scheme,
        top: state.top ?? 10,
        messages: state.messages ?? [],
        comparison: state.comparison,
      },
      filterRows(rows, state.filter)
    );
    return res.status(status).type("html").send(html);
  };

  const sendUploadError = (res: Response, state: PageState, context: string, err: unknown) => {
    if (err instanceof AppError) {
      logger.warn(`${context} rejected: ${err.message}`);
      return sendPage(res, err.status, { ...state, messages: [{ kind: "error", message: err.message }] });
    }
    logger.error(`${context} failed`, err);
    return sendPage(res, 500, { ...state, messages: [{ kind: "error", message: errorMessage(err) }] });
  };

  const index = (req: Request, res: Response) => {
    const { error, value } = validateDashboardQuery(req.query);
    if (error) {
      logger.warn("Dashboard query validation error", error.details);
      return sendPage(res, 400, {
        tab: "overview",
        filter: {},
        messages: [{ kind: "error", message: error.details[0].message }],
      });
    }

    const { tab, top, ...filter } = value;
    return sendPage(res, 200, { tab, top, filter });
  };

  const exportCsv = (req: Request, res: Response) => {
    const { error, value } = validateCohortFilter(req.query);
    if (error) {
      return res.status(400).type("text").send(error.details[0].message);
    }
    const rows = filterRows(repository.rows, value);
    logger.info(`Exporting ${rows.length} filtered rows as CSV`);
    res.attachment("grades-filtered.csv");
    return res.type("text/csv").send(`${rowsToCsv(rows)}\n`);
  };

  const exportReport = async (req: Request, res: Response) => {
    const { error, value } = validateCohortFilter(req.query);
    if (error) {
      return res.status(400).type("text").send(error.details[0].message);
    }

    try {
      const pdf = await createReportPdf(filterRows(repository.rows, value), {
        academicYear: settings.academicYear,
        createdAt: new Date(),
        passMark: repository.passMark,
        scheme: repository.scheme,
        filter: value,
      });
      res.attachment("grade-analysis-report.pdf");
      return res.type("application/pdf").send(pdf);
    } catch (err) {
      logger.error("Error generating cohort report", err);
      return sendPage(res, 500, {
        tab: "exports",
        filter: value,
        messages: [{ kind: "error", message: `Report generation failed: ${errorMessage(err)}` }],
      });
    }
  };

  // Analyses the uploaded file for this response only; the served snapshot is never replaced.
  const importDataset = async (req: Request, res: Response) => {
    logger.info("Dataset import endpoint hit");
    const state: PageState = { tab: "data", filter: {} };
    if (!req.file) {
      return sendPage(res, 400, { ...state, messages: [{ kind: "error", message: FILE_REQUIRED }] });
    }

    try {
      const records = await parseUpload(req.file.buffer, req.file.originalname);
      const rows = parseGradeRows(records, parseColumnMapping(req.body));
      const dataset = buildDataset(rows, repository.dataset.referenceDate);
      logger.info(`Analysed ${dataset.rows.length} uploaded rows from ${req.file.originalname}`);
      return sendPage(res, 200, {
        ...state,
        rows: dataset.rows,
        messages: [
          {
            kind: "info",
            message:
              `Imported ${dataset.rows.length} rows for ${dataset.students.length} students from ${req.file.originalname}. ` +
              "This page shows the uploaded file; the other tabs keep the served dataset.",
          },
        ],
      });
    } catch (err) {
      return sendUploadError(res, state, "Dataset import", err);
    }
  };

  const compareDataset = async (req: Request, res: Response) => {
    logger.info("Dataset comparison endpoint hit");
    const { error, value } = validateCohortFilter(req.body);
    const filter: CohortFilter = error ? {} : value;
    const state: PageState = { tab: "compare", filter };
    if (error) {
      return sendPage(res, 400, { ...state, messages: [{ kind: "error", message: error.details[0].message }] });
    }
    if (!req.file) {
      return sendPage(res, 400, { ...state, messages: [{ kind: "error", message: FILE_REQUIRED }] });
    }

    try {
      const records = await parseUpload(req.file.buffer, req.file.originalname);
      const otherGrades = parseGradeValues(records, parseColumnMapping(req.body));
      return sendPage(res, 200, {
        ...state,
        comparison: compareCohorts(repository.rows, filter, otherGrades, repository.passMark),
        messages: [{ kind: "info", message: `Compared with ${req.file.originalname}` }],
      });
    } catch (err) {
      return sendUploadError(res, state, "Dataset comparison", err);
    }
  };

  // Errors raised before a handler runs (multer limits, unexpected fields) still answer with a page.
  const handleError = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    const state: PageState = { tab: req.path === "/compare" ? "compare" : "data", filter: {} };
    if (err instanceof multer.MulterError) {
      logger.warn(`Upload rejected on ${req.originalUrl}: ${err.message}`);
      return sendPage(res, 400, { ...state, messages: [{ kind: "error", message: `Upload rejected: ${err.message}` }] });
    }
    return sendUploadError(res, state, `${req.method} ${req.originalUrl}`, err);
  };

  return { index, exportCsv, exportReport, importDataset, compareDataset, handleError };
};
