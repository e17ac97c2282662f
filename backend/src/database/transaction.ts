import type Database from "better-sqlite3";
import { ConcurrentUpdateConflictError } from "../errors.js";
import { logger } from "../logger.js";

function isBusyError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "SQLITE_BUSY" || error.code === "SQLITE_LOCKED")
  );
}

/**
 * Runs `work` inside one `BEGIN IMMEDIATE` transaction. The write lock is
 * taken before anything is read, so concurrent writers on other connections
 * serialize. Any throw rolls the whole unit back; a lock that cannot be
 * acquired within the busy timeout becomes a ConcurrentUpdateConflictError.
 */
export function withTransaction<T>(
  db: Database.Database,
  operation: string,
  work: () => T,
): T {
  try {
    return db.transaction(work).immediate();
  } catch (error) {
    if (isBusyError(error)) {
      logger.warn({ operation }, "Write lock unavailable, transaction aborted");
      throw new ConcurrentUpdateConflictError(operation);
    }
    throw error;
  }
}
