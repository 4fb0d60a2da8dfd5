import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError } from "../utils/errors";
import logger from "../utils/logger";

const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof AppError) {
    logger.warn(`${err.name} on ${req.method} ${req.originalUrl}: ${err.message}`);
    return res.status(err.status).json({ success: false, message: err.message });
  }

  if (err instanceof multer.MulterError) {
    logger.warn(`Upload rejected on ${req.originalUrl}: ${err.message}`);
    return res.status(400).json({ success: false, message: err.message });
  }

  logger.error("Unhandled error", err);
  return res.status(500).json({ success: false, message: "Internal server error" });
};

export default errorHandler;
