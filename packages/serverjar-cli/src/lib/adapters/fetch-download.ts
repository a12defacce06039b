import { createWriteStream } from "fs";
import { once } from "events";
import { rename, rm } from "fs/promises";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { DownloadRequest, DownloadResult, DownloadService, ProgressCallback } from "../ports/download.js";
import type { HttpResponse, HttpTransport } from "../ports/http.js";
import { downloadTransportFailed, downloadWriteFailed } from "../errors/catalog.js";
import { describeError, hasErrorCode } from "../errors/types.js";
import { createNoopLogger, type Logger } from "../logger.js";

/** Suffix of the file a transfer writes before it is moved into place */
export const PART_SUFFIX = ".part";

/**
 * Create a download service that streams a transport response to disk.
 *
 * Bytes land in `<outputPath>.part` and are renamed over `outputPath` only
 * after the stream completes, so an interrupted transfer never leaves a
 * file at the final path. Failures are reported as DOWNLOAD_TRANSPORT_ERROR
 * (request or body stream) or DOWNLOAD_WRITE_ERROR (local filesystem).
 * On failure the response body is destroyed so its socket is released.
 */
export function createFetchDownloadService(
  transport: HttpTransport,
  logger: Logger = createNoopLogger()
): DownloadService {
  return {
    async download({ url, outputPath, expectedSize = null, onProgress }: DownloadRequest): Promise<DownloadResult> {
      let response: HttpResponse;
      try {
        response = await transport.get(url);
      } catch (error) {
        throw downloadTransportFailed(url, error);
      }

      if (!response.ok) {
        throw downloadTransportFailed(url, new Error(`HTTP ${response.status} ${response.statusText}`));
      }

      const body = response.body;
      if (!body) {
        throw downloadTransportFailed(url, new Error("No response body"));
      }

      const total = parseContentLength(response.headers.get("content-length")) ?? expectedSize;
      const partPath = `${outputPath}${PART_SUFFIX}`;
      const counter = { transferred: 0 };

      try {
        const file = createWriteStream(partPath);
        await once(file, "open");
        await pipeline(countChunks(body, url, total, counter, onProgress), file);
        await rename(partPath, outputPath);
      } catch (error) {
        discardBody(body);
        await rm(partPath, { force: true }).catch((cleanupError: unknown) => {
          logger.warn("Couldn't remove partial download", { path: partPath, error: describeError(cleanupError) });
        });
        if (hasErrorCode(error, "DOWNLOAD_TRANSPORT_ERROR")) {
          throw error;
        }
        throw downloadWriteFailed(outputPath, error);
      }

      return { bytesWritten: counter.transferred };
    },
  };
}

function discardBody(body: AsyncIterable<Uint8Array | string>): void {
  if (body instanceof Readable && !body.destroyed) {
    body.destroy();
  }
}

async function* countChunks(
  body: AsyncIterable<Uint8Array | string>,
  url: string,
  total: number | null,
  counter: { transferred: number },
  onProgress?: ProgressCallback
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of body) {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      counter.transferred += bytes.byteLength;
      onProgress?.(counter.transferred, total);
      yield bytes;
    }
  } catch (error) {
    throw downloadTransportFailed(url, error);
  }
}

function parseContentLength(header: string | null): number | null {
  if (!header) return null;
  const value = Number.parseInt(header, 10);
  return Number.isNaN(value) || value < 0 ? null : value;
}
