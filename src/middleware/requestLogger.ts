import { NextFunction, Request, Response } from "express";
import logger from "../utils/logger";

export const getClientIp = (req: Request): string => req.ip || "unknown";

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  logger.info(`Received ${req.method} request to ${req.url} from IP: ${getClientIp(req)}`);
  if (req.is("multipart/form-data")) {
    logger.info("Request body: N/A (file upload)");
  }
  next();
};

export const notFound = (req: Request, res: Response) => {
  logger.warn(`No route for ${req.method} ${req.url}`);
  res.status(404).json({ success: false, message: `Route ${req.method} ${req.path} not found` });
};
