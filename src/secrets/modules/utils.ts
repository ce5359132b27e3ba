import { createHash, createHmac, pbkdf2Sync, timingSafeEqual } from "node:crypto";
import { inflateSync } from "node:zlib";
import type { CarvedToken, ScanResponse, SecretEntry, SecretMatch, TokenDetails } from "./types";

// Location ranks keep carve output in cookie → header → body order
const COOKIE_RANK = 0;
const HEADER_RANK = 10_000;
const BODY_RANK = 20_000;

const BASE64URL = /^[A-Za-z0-9_-]*$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export type HashAlgorithm = "sha1" | "sha256" | "sha384" | "sha512";

/**
 * Decodes unpadded base64url, returning null for anything outside the alphabet
 */
export function decodeBase64Url(value: string): Buffer | null {
  if (!BASE64URL.test(value) || value.length % 4 === 1) return null;
  return Buffer.from(value, "base64url");
}

/**
 * Decodes standard base64 (padding optional), returning null on bad input
 */
export function decodeBase64(value: string): Buffer | null {
  if (!BASE64.test(value) || value.replace(/=+$/, "").length % 4 === 1) return null;
  return Buffer.from(value, "base64");
}

export function hmac(algorithm: HashAlgorithm, key: string | Buffer, data: string | Buffer): Buffer {
  return createHmac(algorithm, key).update(data).digest();
}

export function digest(algorithm: HashAlgorithm, data: string | Buffer): Buffer {
  return createHash(algorithm).update(data).digest();
}

export function pbkdf2(
  secret: string,
  salt: string,
  iterations: number,
  keyLength: number,
  algorithm: HashAlgorithm,
): Buffer {
  return pbkdf2Sync(secret, salt, iterations, keyLength, algorithm);
}

/**
 * Constant-time comparison that tolerates length mismatch
 */
export function safeEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Parses JSON, returning undefined for invalid input
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Decodes an itsdangerous/Django style payload: base64url, zlib-compressed
 * when prefixed with ".", JSON inside.
 */
export function decodeSignedPayload(payload: string): unknown {
  const compressed = payload.startsWith(".");
  const raw = decodeBase64Url(compressed ? payload.slice(1) : payload);
  if (!raw) return undefined;

  let text: string;
  if (compressed) {
    try {
      text = inflateSync(raw).toString("utf-8");
    } catch {
      return undefined;
    }
  } else {
    text = raw.toString("utf-8");
  }
  return parseJson(text);
}

/**
 * Wraps a decoded payload so details are always an object
 */
export function toDetails(decoded: unknown): TokenDetails {
  if (decoded !== null && typeof decoded === "object" && !Array.isArray(decoded)) {
    return { ...decoded };
  }
  return { payload: decoded };
}

/**
 * Runs a verifier over every secret, returning the first one that verifies
 */
export function firstMatchingSecret(
  secrets: readonly SecretEntry[],
  verify: (secret: string) => TokenDetails | null,
): SecretMatch | null {
  for (const secret of secrets) {
    const details = verify(secret.value);
    if (details) {
      return { secret, details };
    }
  }
  return null;
}

function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Carves tokens from cookies; `extract` returns the positional values for a
 * cookie it recognises, or null to skip it
 */
export function carveCookies(
  response: ScanResponse,
  extract: (name: string, value: string, cookies: Record<string, string>) => string[] | null,
): CarvedToken[] {
  const tokens: CarvedToken[] = [];
  Object.entries(response.cookies).forEach(([name, rawValue], index) => {
    const values = extract(name, decodeCookieValue(rawValue), response.cookies);
    if (values) {
      tokens.push({
        location: `Cookie: ${name}`,
        values,
        rank: COOKIE_RANK + index,
        hints: { cookieName: name },
      });
    }
  });
  return tokens;
}

/**
 * Carves the first match of `pattern` from each header value.
 * Cookie headers are skipped: cookies arrive through ScanResponse.cookies.
 */
export function carveHeaders(response: ScanResponse, pattern: RegExp): CarvedToken[] {
  const tokens: CarvedToken[] = [];
  const single = new RegExp(pattern.source, pattern.flags.replace("g", ""));

  Object.entries(response.headers).forEach(([name, value], index) => {
    const lower = name.toLowerCase();
    if (lower === "cookie" || lower === "set-cookie") return;

    const values = Array.isArray(value) ? value : [value];
    for (const headerValue of values) {
      const match = single.exec(headerValue);
      if (match) {
        tokens.push({ location: `Header: ${name}`, values: [match[0]], rank: HEADER_RANK + index });
        return;
      }
    }
  });
  return tokens;
}

/**
 * Carves every match of a global `pattern` from the body
 */
export function carveBody(response: ScanResponse, pattern: RegExp): CarvedToken[] {
  const tokens: CarvedToken[] = [];
  for (const match of response.body.matchAll(pattern)) {
    if (match.index !== undefined) {
      tokens.push({
        location: `Body: offset ${match.index}`,
        values: [match[1] ?? match[0]],
        rank: BODY_RANK + match.index,
      });
    }
  }
  return tokens;
}
