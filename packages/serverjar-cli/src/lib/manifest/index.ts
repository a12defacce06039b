export {
  ManifestResolver,
  lookupVersion,
  listVersions,
  DEFAULT_MANIFEST_URL,
  DEFAULT_SERVER_FOLDER,
  LATEST_RELEASE_ALIAS,
  LATEST_SNAPSHOT_ALIAS,
} from "./resolver.js";
export type { VersionTable, ManifestResolution, ManifestResolverOptions } from "./resolver.js";
export { VersionArtifact, fetchDetailDocument, serverJarFileName } from "./version-artifact.js";
export type {
  DetailState,
  DownloadOptions,
  DownloadOutcome,
  VersionArtifactOptions,
  VersionInfo,
} from "./version-artifact.js";
export { VERSION_TYPES, MISSING_VERSION_NUMBER } from "./schema.js";
export type { DetailDocument, ManifestEntry, VersionType } from "./schema.js";
export * from "../ports/index.js";
export * from "../adapters/index.js";
export { CLIError, isCLIError, hasErrorCode } from "../errors/types.js";
export type { ErrorCode } from "../errors/types.js";
