import type { ApiLogger } from "./ApiLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: ApiLogger = {
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
