import Database from "better-sqlite3";
import { unprocessable } from "./ApiError.js";

/**
 * Request data used to word storage errors.
 */
export interface DbErrorContext {
  shopId: number;
}

const FOREIGN_KEY_VIOLATION = "SQLITE_CONSTRAINT_FOREIGNKEY";

export const isForeignKeyViolation = (error: unknown): boolean =>
  error instanceof Database.SqliteError &&
  error.code === FOREIGN_KEY_VIOLATION;

/**
 * Map a storage error to a client error where one applies.
 * Errors with no mapping are returned as-is.
 */
export const translateDbError = (
  error: unknown,
  context: DbErrorContext,
): unknown => {
  if (isForeignKeyViolation(error)) {
    return unprocessable(`shop id ${context.shopId} is out of range`);
  }
  return error;
};
