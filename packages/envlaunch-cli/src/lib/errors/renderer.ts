import { Chalk, type ChalkInstance } from "chalk";
import { type CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import type { OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

export type LineWriter = (line: string) => void;

const stderrWriter: LineWriter = (line) => console.error(line);

/**
 * Wrap text to fit within a given width.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines;
}

function renderTextError(error: CLIError, chalk: ChalkInstance, write: LineWriter): void {
  const width = Math.min(process.stderr.columns || 80, 80) - 4;
  const output: string[] = [];

  const [first = "", ...rest] = wrapText(error.message, width);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      output.push(`  ${chalk.dim(detail)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  for (const line of output) {
    write(line);
  }
}

function renderJSONError(error: CLIError, write: LineWriter): void {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  };

  // Remove undefined values
  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  write(JSON.stringify(cleaned));
}

/**
 * Render an error based on the output mode.
 */
export function renderError(
  error: CLIError,
  mode: OutputMode,
  write: LineWriter = stderrWriter
): void {
  switch (mode) {
    case "json":
      renderJSONError(error, write);
      break;
    case "color":
      renderTextError(error, new Chalk(), write);
      break;
    case "plain":
      renderTextError(error, new Chalk({ level: 0 }), write);
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(
  error: unknown,
  mode: OutputMode,
  write: LineWriter = stderrWriter
): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode, write);
}
