/**
 * Logging interface for the treasures API.
 *
 * All output goes to stderr so stdout stays free for piping.
 *
 * @example
 * ```typescript
 * logger.success("Server running at http://localhost:9090");
 * logger.info("GET /api/treasures 200 3ms");
 * logger.warn("POST /api/treasures 422 1ms");
 * ```
 */
export interface ApiLogger {
  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
