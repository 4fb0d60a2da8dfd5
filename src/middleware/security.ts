import cors, { CorsOptions } from "cors";
import { RequestHandler } from "express";
import { rateLimit } from "express-rate-limit";
import logger from "../utils/logger";
import { getClientIp } from "./requestLogger";

export const corsPolicy = (allowedOrigins: ReadonlyArray<string>): RequestHandler => {
  const options: CorsOptions = {
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error(`CORS blocked: ${origin}`));
      }
    },
    allowedHeaders: ["Content-Type"],
    methods: ["GET", "POST"],
  };
  return cors(options);
};

export const globalRateLimiter = (max: number): RequestHandler =>
  rateLimit({
    windowMs: 15 * 60 * 1000, // 15 Mins
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn(`Rate limit exceeded for IP: ${getClientIp(req)}`);
      res.status(429).json({
        success: false,
        message: "Too many requests",
      });
    },
  });
