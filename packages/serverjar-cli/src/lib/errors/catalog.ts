import { CLIError, describeError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Manifest Errors
// ============================================================================

export function manifestFetchFailed(url: string, cause: unknown): CLIError {
  return new CLIError("MANIFEST_FETCH_ERROR", "Couldn't download the version manifest", {
    suggestion: "Check your internet connection or the --manifest-url value",
    details: `${url}: ${describeError(cause)}`,
    cause,
  });
}

export function manifestParseFailed(url: string, reason: string, cause?: unknown): CLIError {
  return new CLIError("MANIFEST_PARSE_ERROR", "The version manifest couldn't be read", {
    suggestion: "Make sure the manifest URL points at a version_manifest.json document",
    details: `${url}: ${reason}`,
    cause,
  });
}

export function manifestEntryInvalid(index: number, reason: string, id?: string): CLIError {
  const label = id ? `"${id}"` : `#${index}`;
  return new CLIError("MANIFEST_ENTRY_ERROR", `Manifest entry ${label} is malformed`, {
    details: reason,
  });
}

// ============================================================================
// Detail Document Errors
// ============================================================================

export function detailFetchFailed(versionId: string, url: string, cause: unknown): CLIError {
  return new CLIError("DETAIL_FETCH_ERROR", `Couldn't download the metadata for ${versionId}`, {
    suggestion: "This is usually temporary. Try again in a moment",
    details: `${url}: ${describeError(cause)}`,
    cause,
  });
}

export function detailParseFailed(versionId: string, url: string, reason: string, cause?: unknown): CLIError {
  return new CLIError("DETAIL_PARSE_ERROR", `The metadata for ${versionId} couldn't be read`, {
    details: `${url}: ${reason}`,
    cause,
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function downloadTransportFailed(url: string, cause: unknown): CLIError {
  return new CLIError("DOWNLOAD_TRANSPORT_ERROR", "The server jar download failed", {
    suggestion: "Check your internet connection and run the command again",
    details: url ? `${url}: ${describeError(cause)}` : describeError(cause),
    cause,
  });
}

export function downloadUrlMissing(versionId: string): CLIError {
  return new CLIError("DOWNLOAD_TRANSPORT_ERROR", `No server jar is published for ${versionId}`, {
    suggestion: "Very old versions ship without a dedicated server. Pick a newer one",
    example: "serverjar download latest_release",
  });
}

export function downloadWriteFailed(path: string, cause: unknown): CLIError {
  return new CLIError("DOWNLOAD_WRITE_ERROR", `Can't write "${path}"`, {
    suggestion: "Check folder permissions and free disk space",
    details: describeError(cause),
    cause,
  });
}

// ============================================================================
// Lookup Errors
// ============================================================================

export function versionNotFound(versionId: string): CLIError {
  return new CLIError("VERSION_NOT_FOUND", `${versionId} is not a valid version`, {
    suggestion: "Try 'latest_release' for the newest stable version",
    examples: ["serverjar download latest_release", "serverjar list --type release"],
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", describeError(error), { cause: error });
}
