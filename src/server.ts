import { createApiApp } from "./app";
import { loadCurriculum } from "./models/Curriculum";
import { loadDataset } from "./services/datasetStore";
import { GradeRepository } from "./services/gradeRepository";
import { loadConfig } from "./utils/config";
import logger from "./utils/logger";

async function startServer() {
  try {
    const config = loadConfig();
    const dataset = await loadDataset(config.datasetPath, config.referenceDate);
    const repository = new GradeRepository(dataset, loadCurriculum(), config.passMark);
    const app = createApiApp(repository, config);

    app.listen(config.apiPort, () => {
      logger.info(`API is running on port ${config.apiPort}`);
      logger.info(`API docs: http://localhost:${config.apiPort}/api-docs`);
    });
  } catch (e) {
    logger.error("Failed to start server:", e);
    process.exit(1);
  }
}

process.on("unhandledRejection", (reason, promise) => {
  logger.error("Unhandled rejection", { promise, reason });
});

void startServer();
