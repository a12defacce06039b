export type { DownloadService, DownloadRequest, DownloadResult, ProgressCallback } from "./download.js";
export type { HttpTransport, HttpResponse } from "./http.js";
