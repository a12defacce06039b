/**
 * Abstraction for HTTP GET requests.
 * Allows testing manifest and download logic without network access.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  /** Streaming body; null when the response carries none */
  body: AsyncIterable<Uint8Array | string> | null;
}

export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
}
