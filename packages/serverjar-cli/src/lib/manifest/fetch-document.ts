import type { HttpTransport } from "../ports/http.js";
import type { CLIError } from "../errors/types.js";
import { describeError } from "../errors/types.js";

export interface DocumentErrorFactory {
  fetchFailed(cause: unknown): CLIError;
  parseFailed(reason: string, cause?: unknown): CLIError;
}

/**
 * GET a JSON document. Transport failures and non-2xx statuses go through
 * `errors.fetchFailed`, unparseable bodies through `errors.parseFailed`.
 */
export async function fetchJsonDocument(
  transport: HttpTransport,
  url: string,
  errors: DocumentErrorFactory
): Promise<unknown> {
  let text: string;
  try {
    const response = await transport.get(url);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    text = await response.text();
  } catch (error) {
    throw errors.fetchFailed(error);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw errors.parseFailed(describeError(error), error);
  }
}
