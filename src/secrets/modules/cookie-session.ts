import type { CryptoModule } from "./types";
import {
  carveCookies,
  decodeBase64,
  decodeBase64Url,
  firstMatchingSecret,
  hmac,
  parseJson,
  safeEqual,
  toDetails,
} from "./utils";

// keygrip signatures: base64 HMAC-SHA1 with "/+" mapped to "_-" and "=" dropped
const KEYGRIP_SIGNATURE = /^[A-Za-z0-9_-]{27}$/;

// cookie-session's own cookie names, tried when the name isn't known
const DEFAULT_COOKIE_NAMES = ["session", "express:sess"];

interface CookieSession {
  value: string;
  signature: Buffer;
  payload: unknown;
}

function parseCookieSession(values: readonly string[]): CookieSession | null {
  if (values.length !== 2) return null;
  const [value, signatureText] = values;
  if (!KEYGRIP_SIGNATURE.test(signatureText)) return null;

  const signature = decodeBase64Url(signatureText);
  const decoded = decodeBase64(value);
  if (!signature || !decoded) return null;

  const payload = parseJson(decoded.toString("utf-8"));
  if (payload === undefined) return null;

  return { value, signature, payload };
}

/**
 * cookie-session cookies, signed in a companion "<name>.sig" cookie
 *
 * Takes two values: the cookie value and its signature.
 */
export const cookieSessionModule: CryptoModule = {
  name: "Express_SignedCookies_CS",
  description: { product: "Express.js Signed Cookie (cookie-session)", secret: "Express.js SESSION_SECRET" },
  secretsResource: "express.txt",
  arity: 2,

  identify(values) {
    return parseCookieSession(values) !== null;
  },

  check(values, secrets, hints) {
    const session = parseCookieSession(values);
    if (!session) return null;

    const names = hints?.cookieName ? [hints.cookieName] : DEFAULT_COOKIE_NAMES;

    return firstMatchingSecret(secrets, (secret) => {
      for (const name of names) {
        if (safeEqual(hmac("sha1", secret, `${name}=${session.value}`), session.signature)) {
          return { ...toDetails(session.payload), cookieName: name };
        }
      }
      return null;
    });
  },

  carve(response) {
    return carveCookies(response, (name, value, cookies) => {
      const signature = cookies[`${name}.sig`];
      return signature !== undefined ? [value, signature] : null;
    });
  },

  hashcat: {
    // HMAC-SHA1 keyed with the password
    mode: 150,
    description: "Express.js Signed Cookie (cookie-session), HMAC-SHA1",
    format(values, hints) {
      const session = parseCookieSession(values);
      if (!session) return null;
      const name = hints?.cookieName ?? DEFAULT_COOKIE_NAMES[0];
      return `${session.signature.toString("hex")}:${name}=${session.value}`;
    },
  },
};
