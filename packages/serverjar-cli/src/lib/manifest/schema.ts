import { z } from "zod";

// ---------------------------------------------------------------------------
// Root manifest
// ---------------------------------------------------------------------------

export const VERSION_TYPES = ["release", "snapshot", "old_beta", "old_alpha"] as const;

export const VersionTypeSchema = z.enum(VERSION_TYPES);

export type VersionType = z.infer<typeof VersionTypeSchema>;

/** One `versions[]` item of version_manifest.json */
export const ManifestEntrySchema = z.object({
  id: z.string().min(1),
  type: VersionTypeSchema,
  url: z.string().min(1),
  time: z.string().optional(),
  releaseTime: z.string().optional(),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/**
 * Top level of version_manifest.json. Entries stay `unknown` here so one
 * malformed item can be skipped without rejecting the whole document.
 */
export const ManifestDocumentSchema = z.object({
  latest: z
    .object({
      release: z.string().nullish(),
      snapshot: z.string().nullish(),
    })
    .nullish(),
  versions: z.array(z.unknown()).nullish(),
});

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

// ---------------------------------------------------------------------------
// Per-version detail document
// ---------------------------------------------------------------------------

/** Value used for integer fields the detail document leaves out */
export const MISSING_VERSION_NUMBER = -1;

export interface DetailDocument {
  /** Server jar URL, "" when the version publishes none */
  downloadUrl: string;
  /** Server jar size in bytes, null when absent */
  fileSizeBytes: number | null;
  clientFileSizeBytes: number | null;
  serverSha1: string | null;
  /** Java major version, -1 when absent */
  requiredRuntimeMajorVersion: number;
  /** minimumLauncherVersion, -1 when absent */
  minLauncherVersion: number;
  releaseTime: string | null;
}

const DownloadInfoSchema = z.object({
  url: z.string().optional(),
  size: z.number().nonnegative().optional(),
  sha1: z.string().optional(),
});

export const DetailDocumentSchema = z
  .object({
    downloads: z
      .object({
        server: DownloadInfoSchema.optional(),
        client: DownloadInfoSchema.optional(),
      })
      .optional(),
    javaVersion: z
      .object({
        component: z.string().optional(),
        majorVersion: z.number().int().optional(),
      })
      .optional(),
    minimumLauncherVersion: z.number().int().optional(),
    releaseTime: z.string().optional(),
  })
  .transform(
    (raw): DetailDocument => ({
      downloadUrl: raw.downloads?.server?.url ?? "",
      fileSizeBytes: raw.downloads?.server?.size ?? null,
      clientFileSizeBytes: raw.downloads?.client?.size ?? null,
      serverSha1: raw.downloads?.server?.sha1 ?? null,
      requiredRuntimeMajorVersion: raw.javaVersion?.majorVersion ?? MISSING_VERSION_NUMBER,
      minLauncherVersion: raw.minimumLauncherVersion ?? MISSING_VERSION_NUMBER,
      releaseTime: raw.releaseTime ?? null,
    })
  );

/**
 * Flatten zod issues into one line per problem.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
