import type { Server } from "node:http";
import { isAbsolute, resolve } from "node:path";
import type Database from "better-sqlite3";
import { createApp } from "./app.js";
import type { ProjectConfig } from "./config/Config.schemas.js";
import { loadConfigOrDefault } from "./config/configLoader.utils.js";
import { loadSeedData, seedDatabase } from "./db/seed.js";
import {
  closeDatabase,
  openDatabase,
} from "./db/sqlite/sqliteConnection.utils.js";
import type { ApiLogger } from "./logging/ApiLogger.js";
import { consoleLogger } from "./logging/ConsoleApiLogger.js";

/**
 * Handle returned by startHttpServer for testing and graceful shutdown.
 */
export interface ServerHandle {
  /** Close the server and release resources */
  close(): Promise<void>;
  /** The port the server is listening on */
  port: number;
}

/**
 * Options for startHttpServer and seedFromConfig.
 */
export interface ServerOptions {
  /** Logger for server output (default: consoleLogger) */
  logger?: ApiLogger;
  /** Directory holding treasures.config.json (default: process.cwd()) */
  projectRoot?: string;
  /** Environment for config overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

const resolvePath = (projectRoot: string, path: string): string =>
  path === ":memory:" || isAbsolute(path) ? path : resolve(projectRoot, path);

/**
 * Load config and open the configured database, seeding it when asked.
 */
const openConfiguredDatabase = (
  options: ServerOptions,
  seed: boolean,
): { db: Database.Database; config: ProjectConfig } => {
  const logger = options.logger ?? consoleLogger;
  const projectRoot = options.projectRoot ?? process.cwd();

  const { config, source, configPath } = loadConfigOrDefault(
    projectRoot,
    options.env,
  );
  if (source === "explicit") {
    logger.info(`Using config: ${configPath}`);
  } else {
    logger.info("No config file found. Using defaults.");
  }

  const dbPath = resolvePath(projectRoot, config.storage.path);
  logger.info(`Database: ${dbPath}`);
  const db = openDatabase({ path: dbPath });

  if (seed) {
    try {
      const dataDir = resolvePath(projectRoot, config.seed.dataDir);
      const data = loadSeedData(dataDir);
      seedDatabase(db, data);
      logger.success(
        `Seeded ${data.shops.length} shops and ${data.treasures.length} treasures from ${dataDir}`,
      );
    } catch (error) {
      closeDatabase(db);
      throw error;
    }
  }

  return { db, config };
};

/**
 * Reset the configured database to the seed data, then close it.
 */
export const seedFromConfig = (options: ServerOptions = {}): void => {
  const { db } = openConfiguredDatabase(options, true);
  closeDatabase(db);
};

/**
 * Starts the HTTP server.
 *
 * @example
 * ```bash
 * treasures-api          # Start server
 * treasures-api --seed   # Reset data, then start server
 * ```
 */
export const startHttpServer = async (
  args: string[],
  options: ServerOptions = {},
): Promise<ServerHandle> => {
  const logger = options.logger ?? consoleLogger;
  const { db, config } = openConfiguredDatabase(
    options,
    args.includes("--seed"),
  );

  const app = createApp({ db, logger });
  const { host, port } = config.server;

  const server = await new Promise<Server>((resolvePromise, reject) => {
    const listening = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolvePromise(listening);
    });
  }).catch((error: unknown) => {
    closeDatabase(db);
    throw error;
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((done) => server.close(() => done()));
    closeDatabase(db);
    throw new Error("Failed to get server address");
  }
  const actualPort = address.port;

  logger.success(`Server running at http://${host}:${actualPort}`);

  const close = (): Promise<void> =>
    new Promise((done, fail) => {
      server.close((error) => {
        closeDatabase(db);
        if (error) {
          fail(error);
          return;
        }
        done();
      });
    });

  return { close, port: actualPort };
};
