import { createDashboardApp } from "./dashboardApp";
import { loadCurriculum } from "./models/Curriculum";
import { loadDataset } from "./services/datasetStore";
import { GradeRepository } from "./services/gradeRepository";
import { loadConfig } from "./utils/config";
import logger from "./utils/logger";

async function startDashboard() {
  try {
    const config = loadConfig();
    const dataset = await loadDataset(config.datasetPath, config.referenceDate);
    const repository = new GradeRepository(dataset, loadCurriculum(), config.passMark);
    const app = createDashboardApp(repository, {
      academicYear: config.academicYear,
      rateLimitMax: config.rateLimitMax,
    });

    app.listen(config.dashboardPort, () => {
      logger.info(`Dashboard is running on http://localhost:${config.dashboardPort}`);
    });
  } catch (e) {
    logger.error("Failed to start dashboard:", e);
    process.exit(1);
  }
}

process.on("unhandledRejection", (reason, promise) => {
  logger.error("Unhandled rejection", { promise, reason });
});

void startDashboard();
