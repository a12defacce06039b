/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import { CLIError } from "./errors/types.js";
import type { DownloadOutcome, VersionInfo, VersionType } from "./manifest/index.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
}

export type JsonResult<T> = JsonSuccess<T> | JsonError;

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export type VersionInfoJson = VersionInfo;

export interface DownloadResultJson {
  version: string;
  status: DownloadOutcome["status"];
  path: string;
  bytes: number;
}

export interface VersionListJson {
  latest: {
    release: string | null;
    snapshot: string | null;
  };
  versions: Array<{
    id: string;
    type: VersionType;
    metadataUrl: string;
  }>;
  skipped: number;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: CLIError | Error): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof CLIError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof CLIError && error.details && { details: error.details }),
    },
  };
  console.error(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (isJsonMode()) {
    outputSuccess(data);
    return true;
  }
  return false;
}
