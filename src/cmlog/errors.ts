export type CmLogErrorCode = "NOT_FOUND" | "READ_FAILURE" | "CONFIG";

/**
 * Base class for structural failures surfaced to the caller.
 * Malformed lines and unparseable timestamps are never reported through these.
 */
export class CmLogError extends Error {
  readonly code: CmLogErrorCode;

  constructor(code: CmLogErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CmLogError";
    this.code = code;
  }
}

/**
 * The log path did not exist when the source was opened.
 */
export class NotFoundError extends CmLogError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super("NOT_FOUND", `Log file not found: ${path}`, options);
    this.name = "NotFoundError";
    this.path = path;
  }
}

/**
 * I/O failed mid-stream, or the file shrank while being followed.
 */
export class ReadFailureError extends CmLogError {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super("READ_FAILURE", `Failed to read ${path}: ${reason}`, options);
    this.name = "ReadFailureError";
    this.path = path;
  }
}

export class ConfigError extends CmLogError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export function isCmLogError(err: unknown): err is CmLogError {
  return err instanceof CmLogError;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
