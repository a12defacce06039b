/**
 * Progress callback invoked once per received chunk.
 * `totalBytes` is null when neither the response nor the caller knows the size.
 */
export type ProgressCallback = (transferredBytes: number, totalBytes: number | null) => void;

export interface DownloadRequest {
  url: string;
  outputPath: string;
  /** Fallback total for progress when the response has no Content-Length */
  expectedSize?: number | null;
  onProgress?: ProgressCallback;
}

export interface DownloadResult {
  bytesWritten: number;
}

/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** Download a file from URL to local path */
  download(request: DownloadRequest): Promise<DownloadResult>;
}
