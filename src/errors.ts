export class DocbumpError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "DocbumpError";
  }
}

/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  IO_ERROR: "IO_ERROR",
  PARSE_ERROR: "PARSE_ERROR",
  ARITHMETIC_ERROR: "ARITHMETIC_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_JSON: "INVALID_JSON",
  SCHEMA_VALIDATION: "SCHEMA_VALIDATION",
  PROJECT_NOT_FOUND: "PROJECT_NOT_FOUND",
  CONFIG_EXISTS: "CONFIG_EXISTS",
  INTERRUPTED: "INTERRUPTED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * The errno code (`ENOENT`, `EACCES`, ...) carried by a Node.js system error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const errno = errnoCode(cause);
    return errno && !cause.message.startsWith(errno)
      ? `${errno}: ${cause.message}`
      : cause.message;
  }
  return String(cause);
}

// ============================================================================
// I/O errors
// ============================================================================

/**
 * A store file (HashStore or VersionStore) could not be created, read or
 * written.
 */
export class StoreIoError extends DocbumpError {
  constructor(
    public readonly storePath: string,
    public readonly operation: "create" | "read" | "write",
    public readonly cause: unknown,
  ) {
    super(
      `Cannot ${operation} store ${storePath}: ${describeCause(cause)}`,
      ErrorCodes.IO_ERROR,
    );
    this.name = "StoreIoError";
  }
}

/**
 * One of the observed files could not be read, so no fingerprint exists.
 */
export class ObservedFileError extends DocbumpError {
  constructor(
    public readonly filePath: string,
    public readonly cause: unknown,
  ) {
    super(
      `Cannot read observed file ${filePath}: ${describeCause(cause)}`,
      ErrorCodes.IO_ERROR,
    );
    this.name = "ObservedFileError";
  }
}

// ============================================================================
// Version errors
// ============================================================================

export class VersionParseError extends DocbumpError {
  constructor(
    public readonly storePath: string,
    public readonly reason: string,
  ) {
    super(
      `Unable to extract current version from ${storePath}: ${reason}`,
      ErrorCodes.PARSE_ERROR,
    );
    this.name = "VersionParseError";
  }
}

export class VersionArithmeticError extends DocbumpError {
  constructor(public readonly current: number) {
    super(
      `Cannot increment version ${current}: result is not a safe integer`,
      ErrorCodes.ARITHMETIC_ERROR,
    );
    this.name = "VersionArithmeticError";
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

export class ConfigError extends DocbumpError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

export class InvalidJsonError extends DocbumpError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_JSON);
    this.name = "InvalidJsonError";
  }
}

export class SchemaValidationError extends DocbumpError {
  constructor(message: string) {
    super(message, ErrorCodes.SCHEMA_VALIDATION);
    this.name = "SchemaValidationError";
  }
}

export class ProjectNotFoundError extends DocbumpError {
  constructor(message: string) {
    super(message, ErrorCodes.PROJECT_NOT_FOUND);
    this.name = "ProjectNotFoundError";
  }
}

export class ConfigExistsError extends DocbumpError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_EXISTS);
    this.name = "ConfigExistsError";
  }
}

export class InterruptedError extends DocbumpError {
  constructor() {
    super("Operation interrupted", ErrorCodes.INTERRUPTED);
    this.name = "InterruptedError";
  }
}

export function isDocbumpError(error: unknown): error is DocbumpError {
  return error instanceof DocbumpError;
}

export function toExitCode(error: unknown): number {
  if (error === null || error === undefined) {
    return 0;
  }

  if (error instanceof InterruptedError) {
    return 130;
  }

  return 1;
}
