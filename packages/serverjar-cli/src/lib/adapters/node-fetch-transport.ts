import fetch from "node-fetch";
import type { HttpResponse, HttpTransport } from "../ports/http.js";

export const DEFAULT_USER_AGENT = "serverjar-cli";

export interface NodeFetchTransportOptions {
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Create an HTTP transport backed by node-fetch.
 */
export function createNodeFetchTransport({
  userAgent = DEFAULT_USER_AGENT,
  fetchImpl = fetch,
}: NodeFetchTransportOptions = {}): HttpTransport {
  return {
    async get(url: string): Promise<HttpResponse> {
      const response = await fetchImpl(url, {
        method: "GET",
        headers: { "User-Agent": userAgent },
      });

      return {
        ok: response.ok,
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        text: () => response.text(),
        body: response.body,
      };
    },
  };
}
