import type { RequestHandler } from "express";
import type { ApiLogger } from "./ApiLogger.js";

/**
 * Express middleware logging one line per finished request:
 * `<METHOD> <url> <status> <ms>ms`.
 */
export const requestLogger =
  (logger: ApiLogger): RequestHandler =>
  (req, res, next) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const elapsedMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs}ms`;
      if (res.statusCode >= 500) {
        logger.error(line);
      } else if (res.statusCode >= 400) {
        logger.warn(line);
      } else {
        logger.info(line);
      }
    });
    next();
  };
