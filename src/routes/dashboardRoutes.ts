import express from "express";
import multer from "multer";
import { DashboardSettings, dashboardController } from "../controllers/dashboardController";
import { GradeRepository } from "../services/gradeRepository";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 },
});

export const createDashboardRouter = (repository: GradeRepository, settings: DashboardSettings) => {
  const router = express.Router();
  const dashboard = dashboardController(repository, settings);

  router.get("/", dashboard.index);
  router.get("/export/csv", dashboard.exportCsv);
  router.get("/export/report", dashboard.exportReport);

  // Uploads: multipart/form-data with file field 'file'
  router.post("/import", upload.single("file"), dashboard.importDataset);
  router.post("/compare", upload.single("file"), dashboard.compareDataset);
  router.use(dashboard.handleError);

  return router;
};
