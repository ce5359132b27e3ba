import type { CryptoModule } from "./types";
import {
  carveCookies,
  decodeBase64Url,
  decodeSignedPayload,
  digest,
  firstMatchingSecret,
  type HashAlgorithm,
  hmac,
  safeEqual,
  toDetails,
} from "./utils";

// payload:timestamp:signature; SHA1 signatures are 27 chars, SHA256 43
const DJANGO_COOKIE = /^(\.?[A-Za-z0-9_-]+:[A-Za-z0-9]{4,8}):([A-Za-z0-9_-]{27}|[A-Za-z0-9_-]{43})$/;

const SIGNER_SALT = "django.contrib.sessions.backends.signed_cookiessigner";

interface DjangoCookie {
  signedValue: string;
  signature: Buffer;
  algorithm: HashAlgorithm;
  payload: unknown;
}

function parseDjangoCookie(value: string): DjangoCookie | null {
  const match = DJANGO_COOKIE.exec(value);
  if (!match) return null;

  const signature = decodeBase64Url(match[2]);
  const payload = decodeSignedPayload(match[1].slice(0, match[1].lastIndexOf(":")));
  if (!signature || payload === undefined) return null;

  return {
    signedValue: match[1],
    signature,
    algorithm: signature.length === 20 ? "sha1" : "sha256",
    payload,
  };
}

/**
 * Django signed_cookies session backend (django.core.signing)
 */
export const djangoModule: CryptoModule = {
  name: "Django_SignedCookies",
  description: { product: "Django Signed Cookie", secret: "Django SECRET_KEY" },
  secretsResource: "django.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseDjangoCookie(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const cookie = parseDjangoCookie(values[0]);
    if (!cookie) return null;

    return firstMatchingSecret(secrets, (secret) => {
      const key = digest(cookie.algorithm, SIGNER_SALT + secret);
      const expected = hmac(cookie.algorithm, key, cookie.signedValue);
      if (!safeEqual(expected, cookie.signature)) return null;
      return { ...toDetails(cookie.payload), signatureAlgorithm: cookie.algorithm };
    });
  },

  carve(response) {
    return carveCookies(response, (_name, value) => (DJANGO_COOKIE.test(value) ? [value] : null));
  },
};
