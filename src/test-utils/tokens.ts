/**
 * Test utilities for producing signed framework tokens
 *
 * Each helper signs the way the framework itself does, independent of the
 * detection modules, so tests verify the modules against real formats.
 */

import { createCipheriv, createHash, createHmac, pbkdf2Sync } from "node:crypto";
import { deflateSync } from "node:zlib";

function b64url(data: string | Buffer): string {
  return Buffer.from(data).toString("base64url");
}

export function signJwt(
  payload: Record<string, unknown>,
  secret: string,
  alg: "HS256" | "HS384" | "HS512" = "HS256",
): string {
  const digest = { HS256: "sha256", HS384: "sha384", HS512: "sha512" }[alg];
  const signingInput = `${b64url(JSON.stringify({ alg, typ: "JWT" }))}.${b64url(JSON.stringify(payload))}`;
  return `${signingInput}.${createHmac(digest, secret).update(signingInput).digest("base64url")}`;
}

/**
 * An RS256-shaped token; the signature is filler since only the format matters
 */
export function unsignedRs256Jwt(payload: Record<string, unknown>): string {
  const header = b64url(JSON.stringify({ alg: "RS256", typ: "JWT" }));
  return `${header}.${b64url(JSON.stringify(payload))}.${b64url(Buffer.alloc(256, 1))}`;
}

/**
 * A well-formed token with an arbitrary header and a filler signature
 */
export function jwtWithHeader(header: Record<string, unknown>, payload: Record<string, unknown>): string {
  return `${b64url(JSON.stringify(header))}.${b64url(JSON.stringify(payload))}.${b64url(Buffer.alloc(32, 2))}`;
}

/**
 * itsdangerous URLSafeTimedSerializer as configured by Flask sessions
 */
export function signFlaskCookie(
  payload: Record<string, unknown>,
  secret: string,
  options: { timestamp?: string; compress?: boolean } = {},
): string {
  const json = JSON.stringify(payload);
  const encoded = options.compress ? `.${b64url(deflateSync(json))}` : b64url(json);
  const value = `${encoded}.${options.timestamp ?? "ZxYz1A"}`;
  const key = createHmac("sha1", secret).update("cookie-session").digest();
  return `${value}.${createHmac("sha1", key).update(value).digest("base64url")}`;
}

/**
 * django.core.signing with the signed_cookies session salt
 */
export function signDjangoCookie(
  payload: Record<string, unknown>,
  secret: string,
  algorithm: "sha1" | "sha256" = "sha256",
  timestamp = "1tXyZa",
): string {
  const value = `${b64url(JSON.stringify(payload))}:${timestamp}`;
  const key = createHash(algorithm)
    .update(`django.contrib.sessions.backends.signed_cookiessigner${secret}`)
    .digest();
  return `${value}:${createHmac(algorithm, key).update(value).digest("base64url")}`;
}

/**
 * cookie-signature as used by express-session
 */
export function signExpressSession(sessionId: string, secret: string): string {
  const signature = createHmac("sha256", secret).update(sessionId).digest("base64").replace(/=+$/, "");
  return `s:${sessionId}.${signature}`;
}

const KEYGRIP_REPLACEMENTS: Record<string, string> = { "/": "_", "+": "-", "=": "" };

/**
 * cookie-session value plus its keygrip signature cookie
 */
export function signCookieSession(
  payload: Record<string, unknown>,
  secret: string,
  cookieName = "session",
): { value: string; signature: string } {
  const value = Buffer.from(JSON.stringify(payload)).toString("base64");
  const signature = createHmac("sha1", secret)
    .update(`${cookieName}=${value}`)
    .digest("base64")
    .replace(/\/|\+|=/g, (c) => KEYGRIP_REPLACEMENTS[c] ?? c);
  return { value, signature };
}

/**
 * Illuminate\Encryption\Encrypter output for an APP_KEY
 */
export function encryptLaravelCookie(plaintext: string, appKey: string): string {
  const key = appKey.startsWith("base64:")
    ? Buffer.from(appKey.slice("base64:".length), "base64")
    : Buffer.from(appKey, "utf-8");
  const cipher = key.length === 32 ? "aes-256-cbc" : "aes-128-cbc";
  const ivBytes = Buffer.alloc(16, 7);

  const encryptor = createCipheriv(cipher, key, ivBytes);
  const ciphertext = Buffer.concat([encryptor.update(plaintext, "utf-8"), encryptor.final()]);

  const iv = ivBytes.toString("base64");
  const value = ciphertext.toString("base64");
  const mac = createHmac("sha256", key).update(iv + value).digest("hex");

  return Buffer.from(JSON.stringify({ iv, value, mac, tag: "" })).toString("base64");
}

/**
 * ActiveSupport::MessageVerifier signed cookie
 */
export function signRailsCookie(
  payload: unknown,
  secret: string,
  derivation: "secret_token" | "pbkdf2-sha1" | "pbkdf2-sha256" = "pbkdf2-sha1",
): string {
  const data = Buffer.from(JSON.stringify(payload)).toString("base64");
  if (derivation === "secret_token") {
    return `${data}--${createHmac("sha1", secret).update(data).digest("hex")}`;
  }
  const algorithm = derivation === "pbkdf2-sha1" ? "sha1" : "sha256";
  const key = pbkdf2Sync(secret, "signed cookie", 1000, 64, algorithm);
  return `${data}--${createHmac(algorithm, key).update(data).digest("hex")}`;
}
