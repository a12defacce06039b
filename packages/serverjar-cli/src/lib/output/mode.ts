/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode } from "../cli-context.js";

export type OutputMode = "static" | "json";

/**
 * Detect the output mode from the CLI context.
 *
 * - `static`: human-readable text, coloured when stdout is a terminal
 * - `json`: structured JSON output for scripting
 */
export function getOutputMode(): OutputMode {
  return isJsonMode() ? "json" : "static";
}
