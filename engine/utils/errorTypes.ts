/**
 * Custom error types for Tabsets with context.
 * Each failure kind the store, reconstructor and config loader can raise has
 * its own class so the service can map it to a user-facing outcome.
 */

/**
 * Base error class for all Tabsets errors.
 * Includes context for better debugging and user messages.
 */
export class TabsetError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Tabset name contains characters outside the allowed set
 */
export class ValidationError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Requested tabset record does not exist
 */
export class NotFoundError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Tabset file exists but is not valid JSON or does not match the file format
 */
export class TabsetParseError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * File system operation failed (permission denied, disk full, move failed)
 */
export class FileSystemError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Rename target already holds a record
 */
export class AlreadyExistsError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Tabsets directory could not be read
 */
export class DirectoryUnavailableError extends FileSystemError {
  constructor(directory: string, cause?: Error) {
    super("Could not read tabsets directory", { directory }, cause);
  }
}

/**
 * Snapshot has no tabs, or a tab without panes
 */
export class InvalidSnapshotError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Configuration loading or validation failed
 */
export class ConfigError extends TabsetError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Check if error is a specific Tabsets error type
 */
export function isTabsetError(error: unknown): error is TabsetError {
  return error instanceof TabsetError;
}

function getErrnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * Check if error is a permission/access error (EACCES, EPERM)
 */
export function isPermissionError(error: unknown): boolean {
  const code = getErrnoCode(error);
  return code === "EACCES" || code === "EPERM";
}

/**
 * Check if error is a "not found" error (ENOENT)
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrnoCode(error) === "ENOENT";
}

/**
 * Normalize an unknown thrown value into an Error for use as a cause
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract user-friendly message from any error
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Extract technical details for logging
 * Handles circular references safely to prevent infinite recursion
 */
export function getErrorDetails(error: unknown, seen = new WeakSet<Error>()): Record<string, unknown> {
  const details: Record<string, unknown> = {
    message: getUserMessage(error),
  };

  if (error instanceof Error) {
    details.name = error.name;
    details.stack = error.stack;
  }

  if (isTabsetError(error)) {
    details.context = error.context;
    if (error.cause && !seen.has(error.cause)) {
      seen.add(error.cause);
      details.cause = getErrorDetails(error.cause, seen);
    }
  }

  if (error && typeof error === "object") {
    for (const key of ["code", "errno", "syscall", "path"] as const) {
      const value: unknown = Reflect.get(error, key);
      if (value) details[key] = value;
    }
  }

  return details;
}
