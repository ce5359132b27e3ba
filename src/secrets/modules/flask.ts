import type { CryptoModule } from "./types";
import {
  carveCookies,
  decodeBase64Url,
  decodeSignedPayload,
  firstMatchingSecret,
  hmac,
  safeEqual,
  toDetails,
} from "./utils";

// payload.timestamp.signature, payload prefixed with "." when zlib-compressed
const FLASK_COOKIE = /^(\.?[A-Za-z0-9_-]+\.[A-Za-z0-9_-]{4,8})\.([A-Za-z0-9_-]{27})$/;

const SESSION_SALT = "cookie-session";

interface FlaskCookie {
  signedValue: string;
  signature: Buffer;
  payload: unknown;
}

function parseFlaskCookie(value: string): FlaskCookie | null {
  const match = FLASK_COOKIE.exec(value);
  if (!match) return null;

  const signature = decodeBase64Url(match[2]);
  const payload = decodeSignedPayload(match[1].slice(0, match[1].lastIndexOf(".")));
  if (!signature || payload === undefined) return null;

  return { signedValue: match[1], signature, payload };
}

/**
 * Flask session cookies signed by itsdangerous
 *
 * The signing key is derived with HMAC-SHA1 over the "cookie-session" salt.
 */
export const flaskModule: CryptoModule = {
  name: "Flask_SignedCookies",
  description: { product: "Flask Signed Cookie", secret: "Flask Password" },
  secretsResource: "flask.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseFlaskCookie(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const cookie = parseFlaskCookie(values[0]);
    if (!cookie) return null;

    return firstMatchingSecret(secrets, (secret) => {
      const key = hmac("sha1", secret, SESSION_SALT);
      const expected = hmac("sha1", key, cookie.signedValue);
      return safeEqual(expected, cookie.signature) ? toDetails(cookie.payload) : null;
    });
  },

  carve(response) {
    return carveCookies(response, (_name, value) => (FLASK_COOKIE.test(value) ? [value] : null));
  },
};
