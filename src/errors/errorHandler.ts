import type { ErrorRequestHandler, RequestHandler } from "express";
import type { ApiLogger } from "../logging/ApiLogger.js";
import { ApiError } from "./ApiError.js";

/**
 * body-parser marks malformed JSON with `type: "entity.parse.failed"`.
 */
const isJsonParseError = (err: unknown): boolean =>
  err instanceof SyntaxError &&
  "type" in err &&
  err.type === "entity.parse.failed";

/**
 * Client errors raised by body-parser (oversized body, unsupported charset,
 * bad encoding) carry their own 4xx status and `expose: true`.
 */
const clientErrorStatus = (err: unknown): number | undefined => {
  if (!(err instanceof Error) || !("expose" in err) || err.expose !== true) {
    return undefined;
  }
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" &&
    Number.isInteger(status) &&
    status >= 400 &&
    status <= 499
    ? status
    : undefined;
};

/**
 * Fallback for unmatched routes.
 */
export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ detail: "Not Found" });
};

/**
 * Final error handler. ApiError and exposed client errors keep their status;
 * anything unexpected is logged and answered with a 500.
 */
export const errorHandler =
  (logger: ApiLogger): ErrorRequestHandler =>
  (err: unknown, _req, res, _next) => {
    if (err instanceof ApiError) {
      res.status(err.status).json({ detail: err.message });
      return;
    }

    if (isJsonParseError(err)) {
      res.status(400).json({ detail: "Invalid JSON body" });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined && err instanceof Error) {
      res.status(clientStatus).json({ detail: err.message });
      return;
    }

    const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
    logger.error(message);
    res.status(500).json({ detail: "Internal Server Error" });
  };
