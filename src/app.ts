import fs from "fs";
import path from "path";
import express from "express";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import errorHandler from "./middleware/errorHandler";
import { notFound, requestLogger } from "./middleware/requestLogger";
import { corsPolicy, globalRateLimiter } from "./middleware/security";
import { createApiRouter } from "./routes/apiRoutes";
import { GradeRepository } from "./services/gradeRepository";
import { AppConfig } from "./utils/config";
import { errorMessage } from "./utils/errors";
import logger from "./utils/logger";

export const OPENAPI_PATH = path.resolve(__dirname, "..", "docs", "openapi.json");

const mountApiDocs = (app: express.Express) => {
  try {
    const apiDocument: Record<string, unknown> = JSON.parse(fs.readFileSync(OPENAPI_PATH, "utf8"));
    app.use(
      "/api-docs",
      swaggerUi.serve,
      swaggerUi.setup(apiDocument, {
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: "Grade Analytics API",
        swaggerOptions: { docExpansion: "list", filter: true, displayRequestDuration: true },
      })
    );
  } catch (err) {
    logger.warn(`API docs unavailable (${OPENAPI_PATH}): ${errorMessage(err)}`);
  }
};

/** Read-only JSON API over the repository's current snapshot. */
export const createApiApp = (
  repository: GradeRepository,
  config: Pick<AppConfig, "allowedOrigins" | "rateLimitMax">
) => {
  const app = express();

  app.set("trust proxy", 1);
  app.use(helmet());
  app.use(corsPolicy(config.allowedOrigins));
  app.use(globalRateLimiter(config.rateLimitMax));
  app.use(requestLogger);

  mountApiDocs(app);
  app.use(createApiRouter(repository));

  app.use(notFound);
  app.use(errorHandler);
  return app;
};
