import type { ScanResponse } from "../secrets/modules/types";

/**
 * Connection failure or timeout while fetching a URL to carve
 */
export class FetchError extends Error {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(`Error connecting to URL: [${url}]`, { cause });
    this.name = "FetchError";
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Extracts name/value pairs from Set-Cookie header values.
 * Attributes after the first ";" are ignored; later cookies win.
 */
export function parseSetCookies(setCookies: readonly string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const header of setCookies) {
    const pair = header.split(";", 1)[0];
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;

    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    if (name) {
      const quoted = value.length > 1 && value.startsWith('"') && value.endsWith('"');
      cookies[name] = quoted ? value.slice(1, -1) : value;
    }
  }
  return cookies;
}

/**
 * Converts a fetch Response into the surface the carver consumes
 */
export async function toScanResponse(response: Response): Promise<ScanResponse> {
  const headers: Record<string, string | string[]> = {};
  response.headers.forEach((value, name) => {
    if (name !== "set-cookie") {
      headers[name] = value;
    }
  });

  const setCookies = response.headers.getSetCookie();
  if (setCookies.length > 0) {
    headers["set-cookie"] = setCookies;
  }

  return {
    headers,
    cookies: parseSetCookies(setCookies),
    body: await response.text(),
  };
}

/**
 * Fetches a URL once; any network failure becomes a FetchError
 */
export async function fetchForCarving(url: string, options: FetchOptions): Promise<ScanResponse> {
  const fetchImpl = options.fetchImpl ?? fetch;

  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    return await toScanResponse(response);
  } catch (error) {
    throw new FetchError(url, error);
  }
}
