import chalk from "chalk";
import type { ApiLogger } from "./ApiLogger.js";

const PREFIX = chalk.dim("[treasures]");

/**
 * Terminal logger with colored status markers.
 *
 * @param write - Line sink (default: console.error)
 */
export const createConsoleApiLogger = (
  write: (line: string) => void = (line) => console.error(line),
): ApiLogger => ({
  success(message: string): void {
    write(`${PREFIX} ${chalk.green("✓")} ${message}`);
  },

  info(message: string): void {
    write(`${PREFIX} ${message}`);
  },

  warn(message: string): void {
    write(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
  },

  error(message: string): void {
    write(`${PREFIX} ${chalk.red("✗")} ${message}`);
  },
});

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleApiLogger();
