/**
 * Error types for context store operations
 *
 * Every error has a stable `code` and may wrap a `cause`. File errors carry the
 * path they concern. None of these cross the store's public boundary:
 * ContextStore turns them into structured failure results.
 */

export abstract class ContextStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A failure tied to one file or directory of the context store
 */
export abstract class ContextFileError extends ContextStoreError {
  constructor(
    public readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class DocumentReadError extends ContextFileError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(filePath, `Failed to read document: ${filePath}`, options);
  }
}

/**
 * The file is not JSON, or its top-level value is not an object
 */
export class DocumentParseError extends ContextFileError {
  readonly code = "PARSE_ERROR";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(filePath, `Failed to parse document ${filePath}: ${reason}`, options);
  }
}

export class DocumentWriteError extends ContextFileError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(filePath, `Failed to write document: ${filePath}`, options);
  }
}

export class DirectoryError extends ContextFileError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(dirPath, `Cannot create context directory: ${dirPath}`, options);
  }
}

export class ListFilesError extends ContextFileError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(dirPath, `Failed to list context directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a memory-service call does not settle in time
 */
export class MemoryServiceTimeoutError extends ContextStoreError {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Memory service ${operation} timed out after ${timeoutMs}ms`);
  }
}

/**
 * Extract a Node.js errno code from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Render an unknown thrown value as a single message, following the cause chain once
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if (err.cause instanceof Error) {
      return `${err.message}: ${err.cause.message}`;
    }
    return err.message;
  }
  return String(err);
}
