#!/usr/bin/env node

/**
 * treasures-api entry point
 *
 * Usage:
 *   treasures-api              # Start HTTP server
 *   treasures-api --seed       # Reset data from the seed files, then serve
 *   treasures-api --seed-only  # Reset data and exit
 */

import { consoleLogger } from "./src/logging/ConsoleApiLogger.js";
import { seedFromConfig, startHttpServer } from "./src/server.js";

const args = process.argv.slice(2);

const fail = (err: unknown): never => {
  const message = err instanceof Error ? err.message : String(err);
  consoleLogger.error(`treasures-api failed: ${message}`);
  process.exit(1);
};

if (args.includes("--seed-only")) {
  try {
    seedFromConfig({ logger: consoleLogger });
  } catch (err) {
    fail(err);
  }
} else {
  startHttpServer(args, { logger: consoleLogger })
    .then((handle) => {
      consoleLogger.info("Press CTRL+C to stop");

      const shutdown = (): void => {
        consoleLogger.info("Shutting down...");
        handle.close().then(
          () => process.exit(0),
          (err: unknown) => fail(err),
        );
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    })
    .catch(fail);
}
