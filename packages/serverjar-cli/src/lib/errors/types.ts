/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure with predefined messaging.
 */
export type ErrorCode =
  // Manifest errors
  | "MANIFEST_FETCH_ERROR"
  | "MANIFEST_PARSE_ERROR"
  | "MANIFEST_ENTRY_ERROR"
  // Detail document errors
  | "DETAIL_FETCH_ERROR"
  | "DETAIL_PARSE_ERROR"
  // Download errors
  | "DOWNLOAD_TRANSPORT_ERROR"
  | "DOWNLOAD_WRITE_ERROR"
  // Lookup errors
  | "VERSION_NOT_FOUND"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  details?: string;
  cause?: unknown;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Type guard narrowing to a CLIError carrying one specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is CLIError {
  return isCLIError(error) && error.code === code;
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
