import { NetworkError } from "./errors.js";

export type FetchFn = typeof fetch;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Issue one HTTP call with a fixed timeout.
 * Timeouts and connection failures surface as NetworkError and are never retried.
 */
export async function sendWithTimeout(
  fetchImpl: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  try {
    return await fetchImpl(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const err = error instanceof Error ? error : undefined;
    if (err?.name === "TimeoutError" || err?.name === "AbortError") {
      throw new NetworkError(`${init.method ?? "GET"} ${stripQuery(url)} timed out after ${timeoutMs}ms`, err);
    }
    throw new NetworkError(
      `${init.method ?? "GET"} ${stripQuery(url)} failed: ${err?.message ?? String(error)}`,
      err,
    );
  }
}

/**
 * Read a response body as JSON when it parses, otherwise as text.
 * Empty bodies (204, empty 200) read as undefined.
 */
export async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

// Query strings may carry portal codes or tokens
export function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
