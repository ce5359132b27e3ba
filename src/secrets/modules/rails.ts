import type { CryptoModule, TokenDetails } from "./types";
import {
  carveCookies,
  decodeBase64,
  firstMatchingSecret,
  type HashAlgorithm,
  hmac,
  parseJson,
  pbkdf2,
  safeEqual,
} from "./utils";

// MessageVerifier format: base64 data, "--", hex digest (SHA1 40, SHA256 64)
const RAILS_SIGNED = /^([A-Za-z0-9+/]+={0,2})--([0-9a-f]{40}|[0-9a-f]{64})$/;

const SIGNED_COOKIE_SALT = "signed cookie";
const KEY_ITERATIONS = 1000;
const KEY_LENGTH = 64;

interface SignedCookie {
  data: string;
  digest: Buffer;
  algorithm: HashAlgorithm;
}

function parseSignedCookie(value: string): SignedCookie | null {
  const match = RAILS_SIGNED.exec(value);
  if (!match || !decodeBase64(match[1])) return null;
  return {
    data: match[1],
    digest: Buffer.from(match[2], "hex"),
    algorithm: match[2].length === 40 ? "sha1" : "sha256",
  };
}

function describePayload(data: string): TokenDetails {
  const decoded = decodeBase64(data)?.toString("utf-8") ?? "";
  const json = parseJson(decoded);
  return json === undefined ? { payload: decoded } : { payload: json };
}

/**
 * Rails signed cookies (ActiveSupport::MessageVerifier)
 *
 * Rails 3 signs with secret_token directly; later versions derive the key
 * from secret_key_base with PBKDF2 and the "signed cookie" salt.
 */
export const railsModule: CryptoModule = {
  name: "Rails_SecretKeyBase",
  description: { product: "Rails Signed Cookie", secret: "Rails secret_key_base" },
  secretsResource: "rails.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseSignedCookie(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const cookie = parseSignedCookie(values[0]);
    if (!cookie) return null;

    return firstMatchingSecret(secrets, (secret) => {
      if (cookie.algorithm === "sha1" && safeEqual(hmac("sha1", secret, cookie.data), cookie.digest)) {
        return { ...describePayload(cookie.data), keyDerivation: "secret_token" };
      }

      const key = pbkdf2(secret, SIGNED_COOKIE_SALT, KEY_ITERATIONS, KEY_LENGTH, cookie.algorithm);
      if (safeEqual(hmac(cookie.algorithm, key, cookie.data), cookie.digest)) {
        return { ...describePayload(cookie.data), keyDerivation: `pbkdf2-${cookie.algorithm}` };
      }
      return null;
    });
  },

  carve(response) {
    return carveCookies(response, (_name, value) => (RAILS_SIGNED.test(value) ? [value] : null));
  },
};
