import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Environment Errors
// ============================================================================

export type VariableOperation = "read" | "set" | "restore";

export function variableAccessFailed(
  name: string,
  operation: VariableOperation,
  reason: string,
  cause?: Error
): CLIError {
  return new CLIError(
    "ENV_VARIABLE_ACCESS",
    `Can't ${operation} environment variable "${name}"`,
    { details: reason, cause }
  );
}

// ============================================================================
// File Errors
// ============================================================================

export function fileNotFound(path: string, cause?: Error): CLIError {
  return new CLIError("FILE_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the file path exists and try again",
    cause,
  });
}

export function fileNotReadable(path: string, reason?: string, cause?: Error): CLIError {
  return new CLIError("FILE_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check file permissions",
    details: reason,
    cause,
  });
}

export function fileIsDirectory(path: string, cause?: Error): CLIError {
  return new CLIError("FILE_IS_DIRECTORY", `"${path}" is a directory, not a file`, {
    suggestion: "Provide a path to a specific file",
    cause,
  });
}

// ============================================================================
// Launch Errors
// ============================================================================

export function launchFailed(url: string, command: string, reason?: string, cause?: Error): CLIError {
  return new CLIError("LAUNCH_FAILED", `Couldn't open ${url}`, {
    suggestion: `Check that "${command}" is installed, or set launcher.command in your config`,
    details: reason,
    cause,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

/**
 * Message of a Node.js system error, or of anything thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
