/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: Record<string, string | undefined> = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.SERVERJAR_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.SERVERJAR_QUIET)) {
    currentContext.quiet = true;
  }

  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
