import { mkdir, stat } from "fs/promises";
import type { Stats } from "fs";
import { join } from "path";
import type { DownloadService, ProgressCallback } from "../ports/download.js";
import type { HttpTransport } from "../ports/http.js";
import { createNoopLogger, type Logger } from "../logger.js";
import {
  detailFetchFailed,
  detailParseFailed,
  downloadUrlMissing,
  downloadWriteFailed,
} from "../errors/catalog.js";
import { fetchJsonDocument } from "./fetch-document.js";
import {
  DetailDocumentSchema,
  describeIssues,
  type DetailDocument,
  type ManifestEntry,
  type VersionType,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Lifecycle of the lazily fetched detail document. `resolved` is terminal;
 * a failed fetch goes back to `unresolved`.
 */
export type DetailState =
  | { status: "unresolved" }
  | { status: "pending"; promise: Promise<DetailDocument> }
  | { status: "resolved"; detail: DetailDocument };

export interface VersionArtifactOptions {
  entry: ManifestEntry;
  destinationFolder: string;
  transport: HttpTransport;
  downloader: DownloadService;
  logger?: Logger;
  /** Re-download an existing jar whose size differs from the detail document */
  verifySize?: boolean;
}

export interface DownloadOptions {
  onProgress?: ProgressCallback;
  verifySize?: boolean;
}

export type DownloadOutcome =
  | { status: "skipped"; path: string; bytes: number }
  | { status: "downloaded"; path: string; bytes: number };

export interface VersionInfo {
  id: string;
  type: VersionType;
  metadataUrl: string;
  destinationPath: string;
  downloadUrl: string;
  fileSizeBytes: number | null;
  serverSha1: string | null;
  clientFileSizeBytes: number | null;
  requiredRuntimeMajorVersion: number;
  minLauncherVersion: number;
  releaseTime: string | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function serverJarFileName(versionId: string): string {
  return `minecraft_server.${versionId}.jar`;
}

/**
 * Fetch and parse one detail document.
 */
export async function fetchDetailDocument(
  transport: HttpTransport,
  versionId: string,
  url: string
): Promise<DetailDocument> {
  const raw = await fetchJsonDocument(transport, url, {
    fetchFailed: (cause) => detailFetchFailed(versionId, url, cause),
    parseFailed: (reason, cause) => detailParseFailed(versionId, url, reason, cause),
  });

  const result = DetailDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw detailParseFailed(versionId, url, describeIssues(result.error).join("; "), result.error);
  }
  return result.data;
}

async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw downloadWriteFailed(path, error);
  }
}

// ---------------------------------------------------------------------------
// VersionArtifact
// ---------------------------------------------------------------------------

/**
 * One version listed in the manifest, bound to a destination folder.
 */
export class VersionArtifact {
  readonly id: string;
  readonly type: VersionType;
  readonly metadataUrl: string;
  readonly destinationFolder: string;

  private state: DetailState = { status: "unresolved" };
  private readonly transport: HttpTransport;
  private readonly downloader: DownloadService;
  private readonly logger: Logger;
  private readonly verifySize: boolean;

  constructor(options: VersionArtifactOptions) {
    this.id = options.entry.id;
    this.type = options.entry.type;
    this.metadataUrl = options.entry.url;
    this.destinationFolder = options.destinationFolder;
    this.transport = options.transport;
    this.downloader = options.downloader;
    this.logger = (options.logger ?? createNoopLogger()).child({ version: options.entry.id });
    this.verifySize = options.verifySize ?? false;
  }

  get detailStatus(): DetailState["status"] {
    return this.state.status;
  }

  /**
   * The detail document, fetched on first use and cached for the lifetime
   * of this instance. Concurrent first calls share one request.
   */
  async detail(): Promise<DetailDocument> {
    switch (this.state.status) {
      case "resolved":
        return this.state.detail;
      case "pending":
        return this.state.promise;
      case "unresolved": {
        this.logger.debug("Fetching version metadata", { url: this.metadataUrl });
        const promise = fetchDetailDocument(this.transport, this.id, this.metadataUrl);
        this.state = { status: "pending", promise };
        try {
          const detail = await promise;
          this.state = { status: "resolved", detail };
          return detail;
        } catch (error) {
          this.state = { status: "unresolved" };
          throw error;
        }
      }
    }
  }

  async downloadUrl(): Promise<string> {
    return (await this.detail()).downloadUrl;
  }

  async fileSizeBytes(): Promise<number | null> {
    return (await this.detail()).fileSizeBytes;
  }

  async serverSha1(): Promise<string | null> {
    return (await this.detail()).serverSha1;
  }

  async clientFileSizeBytes(): Promise<number | null> {
    return (await this.detail()).clientFileSizeBytes;
  }

  async requiredRuntimeMajorVersion(): Promise<number> {
    return (await this.detail()).requiredRuntimeMajorVersion;
  }

  async minLauncherVersion(): Promise<number> {
    return (await this.detail()).minLauncherVersion;
  }

  destinationPath(): string {
    return join(this.destinationFolder, serverJarFileName(this.id));
  }

  async isDownloaded(): Promise<boolean> {
    return (await statIfExists(this.destinationPath())) !== null;
  }

  /**
   * Download the server jar unless it is already present.
   *
   * The destination folder (and its parents) is created first. An existing
   * file counts as downloaded; with `verifySize` a file whose size differs
   * from the detail document is replaced instead.
   */
  async download(options: DownloadOptions = {}): Promise<DownloadOutcome> {
    const target = this.destinationPath();

    try {
      await mkdir(this.destinationFolder, { recursive: true });
    } catch (error) {
      throw downloadWriteFailed(this.destinationFolder, error);
    }

    const existing = await statIfExists(target);
    if (existing) {
      const verify = options.verifySize ?? this.verifySize;
      const expected = verify ? await this.fileSizeBytes() : null;

      if (expected === null || expected === existing.size) {
        this.logger.debug("Server jar already present", { path: target });
        return { status: "skipped", path: target, bytes: existing.size };
      }

      this.logger.warn("Existing server jar has unexpected size, downloading again", {
        path: target,
        expected,
        actual: existing.size,
      });
    }

    const detail = await this.detail();
    if (!detail.downloadUrl) {
      throw downloadUrlMissing(this.id);
    }

    this.logger.info("Downloading server jar", { url: detail.downloadUrl, path: target });
    const result = await this.downloader.download({
      url: detail.downloadUrl,
      outputPath: target,
      expectedSize: detail.fileSizeBytes,
      onProgress: options.onProgress,
    });

    return { status: "downloaded", path: target, bytes: result.bytesWritten };
  }

  async toInfo(): Promise<VersionInfo> {
    const detail = await this.detail();
    return {
      id: this.id,
      type: this.type,
      metadataUrl: this.metadataUrl,
      destinationPath: this.destinationPath(),
      downloadUrl: detail.downloadUrl,
      fileSizeBytes: detail.fileSizeBytes,
      serverSha1: detail.serverSha1,
      clientFileSizeBytes: detail.clientFileSizeBytes,
      requiredRuntimeMajorVersion: detail.requiredRuntimeMajorVersion,
      minLauncherVersion: detail.minLauncherVersion,
      releaseTime: detail.releaseTime,
    };
  }

  toString(): string {
    return `VersionArtifact(${this.id}, ${this.type})`;
  }
}
