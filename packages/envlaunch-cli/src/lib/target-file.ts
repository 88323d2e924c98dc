import { readFile } from "fs/promises";
import { fileIsDirectory, fileNotFound, fileNotReadable } from "./errors/catalog.js";
import type { CLIError } from "./errors/types.js";

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a failed read of `path` to the matching file error.
 */
export function toFileAccessError(path: string, error: unknown): CLIError {
  const cause = error instanceof Error ? error : undefined;

  switch (errnoCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return fileNotFound(path, cause);
    case "EISDIR":
      return fileIsDirectory(path, cause);
    default:
      return fileNotReadable(path, cause?.message ?? String(error), cause);
  }
}

/**
 * Read the target file as UTF-8 text.
 */
export async function readTargetFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw toFileAccessError(path, error);
  }
}
