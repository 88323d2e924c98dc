/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "color" | "plain" | "json";

export interface OutputTarget {
  isTTY?: boolean;
}

/**
 * Pick the output mode for diagnostics written to stderr.
 *
 * - `json`: structured output, selected by `logging.json` in the config
 * - `color`: interactive terminal
 * - `plain`: pipes and CI logs
 */
export function getOutputMode(
  json: boolean,
  target: OutputTarget = process.stderr
): OutputMode {
  if (json) {
    return "json";
  }

  if (!target.isTTY) {
    return "plain";
  }

  return "color";
}
