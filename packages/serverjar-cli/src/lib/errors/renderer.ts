import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import { outputError } from "../json-output.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Wrap text to fit within a given width.
 */
function wrapText(text: string, maxWidth: number): string[] {
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

/**
 * Build the human-readable lines for an error.
 */
export function formatStaticError(error: CLIError, width: number = Math.min(getTerminalWidth(), 80)): string[] {
  const output: string[] = [""];

  const errorLines = wrapText(error.message, width - 4);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  if (error.details) {
    output.push("");
    for (const detailLine of error.details.split("\n")) {
      for (const line of wrapText(detailLine, width - 4)) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];

  if (error.suggestion || examples.length > 0) {
    output.push("");

    if (error.suggestion) {
      const suggestionLines = wrapText(error.suggestion, width - 4);
      output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
      for (let i = 1; i < suggestionLines.length; i++) {
        output.push(`    ${suggestionLines[i]}`);
      }
    }

    if (error.suggestion && examples.length > 0) {
      output.push("");
    }

    if (examples.length === 1) {
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
    } else if (examples.length > 1) {
      output.push(`  ${chalk.dim("Examples:")}`);
      for (const ex of examples.slice(0, 3)) {
        output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
      }
    }
  }

  output.push("");
  return output;
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    outputError(error);
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}

/**
 * Render the error and mark the process as failed.
 */
export function failCommand(error: unknown, mode?: OutputMode): void {
  renderUnknownError(error, mode);
  process.exitCode = 1;
}

export { CLIError, isCLIError };
