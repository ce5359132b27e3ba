import { createDecipheriv } from "node:crypto";
import { z } from "zod";
import type { CryptoModule, TokenDetails } from "./types";
import { carveCookies, decodeBase64, firstMatchingSecret, hmac, parseJson, safeEqual } from "./utils";

const LaravelPayloadSchema = z.object({
  iv: z.string().min(1),
  value: z.string().min(1),
  mac: z.string().regex(/^[0-9a-f]{64}$/),
  tag: z.string().optional(),
});

type LaravelPayload = z.infer<typeof LaravelPayloadSchema>;

function parseLaravelCookie(value: string): LaravelPayload | null {
  // Encrypted payloads always start with base64 of '{"iv":'
  if (!value.startsWith("eyJpdiI6")) return null;
  const decoded = decodeBase64(value);
  if (!decoded) return null;

  const result = LaravelPayloadSchema.safeParse(parseJson(decoded.toString("utf-8")));
  return result.success ? result.data : null;
}

/**
 * APP_KEY values are either "base64:<key>" or the raw key string
 */
function appKeyBytes(secret: string): Buffer | null {
  if (secret.startsWith("base64:")) {
    return decodeBase64(secret.slice("base64:".length));
  }
  return Buffer.from(secret, "utf-8");
}

function decrypt(payload: LaravelPayload, key: Buffer): string | null {
  const cipher = key.length === 32 ? "aes-256-cbc" : key.length === 16 ? "aes-128-cbc" : null;
  const iv = decodeBase64(payload.iv);
  const ciphertext = decodeBase64(payload.value);
  if (!cipher || !iv || iv.length !== 16 || !ciphertext) return null;

  try {
    const decipher = createDecipheriv(cipher, key, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf-8");
  } catch {
    return null;
  }
}

/**
 * Laravel encrypted cookies (Illuminate\Encryption\Encrypter)
 *
 * The MAC is HMAC-SHA256 over iv + value keyed with APP_KEY. A verified key
 * is also used to decrypt the cookie for the report.
 */
export const laravelModule: CryptoModule = {
  name: "Laravel_SignedCookies",
  description: { product: "Laravel Signed Cookie", secret: "Laravel APP_KEY" },
  secretsResource: "laravel.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseLaravelCookie(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const payload = parseLaravelCookie(values[0]);
    if (!payload) return null;
    const mac = Buffer.from(payload.mac, "hex");

    return firstMatchingSecret(secrets, (secret) => {
      const key = appKeyBytes(secret);
      if (!key || key.length === 0) return null;
      if (!safeEqual(hmac("sha256", key, payload.iv + payload.value), mac)) return null;

      const details: TokenDetails = {};
      const plaintext = decrypt(payload, key);
      if (plaintext !== null) {
        details.decrypted = plaintext;
      }
      return details;
    });
  },

  carve(response) {
    return carveCookies(response, (_name, value) => (parseLaravelCookie(value) ? [value] : null));
  },
};
