import express from "express";
import helmet from "helmet";
import { DashboardSettings } from "./controllers/dashboardController";
import errorHandler from "./middleware/errorHandler";
import { notFound, requestLogger } from "./middleware/requestLogger";
import { globalRateLimiter } from "./middleware/security";
import { createDashboardRouter } from "./routes/dashboardRoutes";
import { GradeRepository } from "./services/gradeRepository";

/** Server-rendered dashboard; charts are inline SVG, so no script or asset is served. */
export const createDashboardApp = (
  repository: GradeRepository,
  settings: DashboardSettings & { rateLimitMax: number }
) => {
  const app = express();

  app.set("trust proxy", 1);
  app.use(helmet());
  app.use(globalRateLimiter(settings.rateLimitMax));
  app.use(requestLogger);

  app.use(createDashboardRouter(repository, settings));

  app.use(notFound);
  app.use(errorHandler);
  return app;
};
