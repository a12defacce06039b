import type { DownloadService } from "../ports/download.js";
import type { HttpTransport } from "../ports/http.js";
import { createNodeFetchTransport } from "../adapters/node-fetch-transport.js";
import { createFetchDownloadService } from "../adapters/fetch-download.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { manifestEntryInvalid, manifestFetchFailed, manifestParseFailed } from "../errors/catalog.js";
import type { CLIError } from "../errors/types.js";
import { fetchJsonDocument } from "./fetch-document.js";
import { ManifestDocumentSchema, ManifestEntrySchema, describeIssues, type ManifestEntry } from "./schema.js";
import { VersionArtifact } from "./version-artifact.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MANIFEST_URL = "https://launchermeta.mojang.com/mc/game/version_manifest.json";

export const DEFAULT_SERVER_FOLDER = "server_versions";

export const LATEST_RELEASE_ALIAS = "latest_release";
export const LATEST_SNAPSHOT_ALIAS = "latest_snapshot";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Version id (or alias) to artifact. Aliases whose target is not listed map
 * to null.
 */
export type VersionTable = Map<string, VersionArtifact | null>;

export interface ManifestResolution {
  table: VersionTable;
  /** Entries left out because they were malformed */
  skipped: CLIError[];
}

export interface ManifestResolverOptions {
  manifestUrl?: string;
  transport?: HttpTransport;
  downloader?: DownloadService;
  logger?: Logger;
  verifySize?: boolean;
}

// ---------------------------------------------------------------------------
// Table helpers
// ---------------------------------------------------------------------------

/**
 * Look a version up by id or alias. Unknown ids give null.
 */
export function lookupVersion(table: VersionTable, versionId: string): VersionArtifact | null {
  return table.get(versionId) ?? null;
}

/**
 * Artifacts in manifest order, without alias keys.
 */
export function listVersions(table: VersionTable): VersionArtifact[] {
  const artifacts: VersionArtifact[] = [];
  for (const [key, artifact] of table) {
    if (artifact && artifact.id === key) {
      artifacts.push(artifact);
    }
  }
  return artifacts;
}

function entryId(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// ManifestResolver
// ---------------------------------------------------------------------------

/**
 * Builds the version table from the launcher manifest. Every call fetches
 * the manifest again.
 */
export class ManifestResolver {
  readonly manifestUrl: string;

  private readonly transport: HttpTransport;
  private readonly downloader: DownloadService;
  private readonly logger: Logger;
  private readonly verifySize: boolean;

  constructor(options: ManifestResolverOptions = {}) {
    this.manifestUrl = options.manifestUrl ?? DEFAULT_MANIFEST_URL;
    this.transport = options.transport ?? createNodeFetchTransport();
    this.logger = options.logger ?? createNoopLogger();
    this.downloader = options.downloader ?? createFetchDownloadService(this.transport, this.logger);
    this.verifySize = options.verifySize ?? false;
  }

  async resolve(
    manifestUrl: string = this.manifestUrl,
    destinationFolder: string = DEFAULT_SERVER_FOLDER
  ): Promise<VersionTable> {
    const { table } = await this.resolveWithReport(manifestUrl, destinationFolder);
    return table;
  }

  /**
   * Like `resolve`, and also reports the entries that were skipped.
   */
  async resolveWithReport(
    manifestUrl: string = this.manifestUrl,
    destinationFolder: string = DEFAULT_SERVER_FOLDER
  ): Promise<ManifestResolution> {
    this.logger.debug("Fetching version manifest", { url: manifestUrl });

    const raw = await fetchJsonDocument(this.transport, manifestUrl, {
      fetchFailed: (cause) => manifestFetchFailed(manifestUrl, cause),
      parseFailed: (reason, cause) => manifestParseFailed(manifestUrl, reason, cause),
    });

    const parsed = ManifestDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw manifestParseFailed(manifestUrl, describeIssues(parsed.error).join("; "), parsed.error);
    }

    const table: VersionTable = new Map();
    const skipped: CLIError[] = [];

    (parsed.data.versions ?? []).forEach((rawEntry, index) => {
      const entry = ManifestEntrySchema.safeParse(rawEntry);
      if (!entry.success) {
        const error = manifestEntryInvalid(index, describeIssues(entry.error).join("; "), entryId(rawEntry));
        this.logger.warn("Skipping malformed manifest entry", { index, reason: error.details });
        skipped.push(error);
        return;
      }
      table.set(entry.data.id, this.createArtifact(entry.data, destinationFolder));
    });

    const latest = parsed.data.latest;
    table.set(LATEST_RELEASE_ALIAS, latest?.release ? lookupVersion(table, latest.release) : null);
    table.set(LATEST_SNAPSHOT_ALIAS, latest?.snapshot ? lookupVersion(table, latest.snapshot) : null);

    this.logger.debug("Version manifest resolved", {
      versions: table.size - 2,
      skipped: skipped.length,
    });

    return { table, skipped };
  }

  private createArtifact(entry: ManifestEntry, destinationFolder: string): VersionArtifact {
    return new VersionArtifact({
      entry,
      destinationFolder,
      transport: this.transport,
      downloader: this.downloader,
      logger: this.logger,
      verifySize: this.verifySize,
    });
  }
}
