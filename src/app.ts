import type Database from "better-sqlite3";
import express, { type Express } from "express";
import { createSqliteReader } from "./db/sqlite/createSqliteReader.js";
import { createSqliteWriter } from "./db/sqlite/createSqliteWriter.js";
import { HTTP_API_VERSION } from "./db/versions.js";
import { errorHandler, notFoundHandler } from "./errors/errorHandler.js";
import type { ApiLogger } from "./logging/ApiLogger.js";
import { consoleLogger } from "./logging/ConsoleApiLogger.js";
import { requestLogger } from "./logging/requestLogger.js";
import { createShopsRouter } from "./routes/shops.js";
import { createTreasuresRouter } from "./routes/treasures.js";

export interface AppOptions {
  /** Database connection, schema already initialized */
  db: Database.Database;
  /** Logger for request and error output (default: consoleLogger) */
  logger?: ApiLogger;
}

/**
 * Build the Express application. Does not listen.
 */
export const createApp = ({
  db,
  logger = consoleLogger,
}: AppOptions): Express => {
  const reader = createSqliteReader(db);
  const writer = createSqliteWriter(db);

  const app = express();
  app.use(requestLogger(logger));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", api_version: HTTP_API_VERSION });
  });

  app.use("/api/treasures", createTreasuresRouter({ reader, writer, logger }));
  app.use("/api/shops", createShopsRouter(reader));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
};
