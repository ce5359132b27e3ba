import type { CryptoModule } from "./types";
import { carveCookies, decodeBase64, firstMatchingSecret, hmac, safeEqual } from "./utils";

// cookie-signature format: "s:" + value + "." + unpadded base64 HMAC-SHA256
const EXPRESS_SESSION = /^s:(.+)\.([A-Za-z0-9+/]{43})$/;

interface SignedSession {
  value: string;
  signature: Buffer;
}

function parseSignedSession(cookie: string): SignedSession | null {
  const match = EXPRESS_SESSION.exec(cookie);
  if (!match) return null;
  const signature = decodeBase64(match[2]);
  return signature ? { value: match[1], signature } : null;
}

/**
 * express-session cookies signed by cookie-signature
 */
export const expressSessionModule: CryptoModule = {
  name: "Express_SignedCookies_ES",
  description: { product: "Express.js Signed Cookie (express-session)", secret: "Express.js SESSION_SECRET" },
  secretsResource: "express.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseSignedSession(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const session = parseSignedSession(values[0]);
    if (!session) return null;

    return firstMatchingSecret(secrets, (secret) =>
      safeEqual(hmac("sha256", secret, session.value), session.signature)
        ? { sessionId: session.value }
        : null,
    );
  },

  carve(response) {
    return carveCookies(response, (_name, value) => (EXPRESS_SESSION.test(value) ? [value] : null));
  },

  hashcat: {
    mode: 1450,
    description: "Express.js Signed Cookie (express-session), HMAC-SHA256",
    format(values) {
      if (values.length !== 1) return null;
      const session = parseSignedSession(values[0]);
      return session ? `${session.signature.toString("hex")}:${session.value}` : null;
    },
  },
};
