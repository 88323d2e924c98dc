/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Environment errors
  | "ENV_VARIABLE_ACCESS"
  // File errors
  | "FILE_NOT_FOUND"
  | "FILE_NOT_READABLE"
  | "FILE_IS_DIRECTORY"
  // Launch errors
  | "LAUNCH_FAILED"
  // Validation errors
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/** Codes that make up the FileAccessError kind. */
export const FILE_ACCESS_CODES: readonly ErrorCode[] = [
  "FILE_NOT_FOUND",
  "FILE_NOT_READABLE",
  "FILE_IS_DIRECTORY",
];

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

export function isVariableAccessError(error: unknown): error is CLIError {
  return isCLIError(error) && error.code === "ENV_VARIABLE_ACCESS";
}

export function isFileAccessError(error: unknown): error is CLIError {
  return isCLIError(error) && FILE_ACCESS_CODES.includes(error.code);
}
