import { z } from "zod";
import type { CryptoModule, ScanResponse } from "./types";
import {
  carveBody,
  carveCookies,
  carveHeaders,
  decodeBase64Url,
  firstMatchingSecret,
  type HashAlgorithm,
  hmac,
  parseJson,
  safeEqual,
  toDetails,
} from "./utils";

const JWT_SHAPE = /^eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*$/;
const JWT_SEARCH = /eyJ[A-Za-z0-9_-]{8,}\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]{16,}/g;

const HMAC_ALGORITHMS = new Map<string, HashAlgorithm>([
  ["HS256", "sha256"],
  ["HS384", "sha384"],
  ["HS512", "sha512"],
]);

const JwtHeaderSchema = z
  .object({
    alg: z.string(),
    typ: z.string().optional(),
  })
  .passthrough();

type JwtHeader = z.infer<typeof JwtHeaderSchema>;

interface ParsedJwt {
  header: JwtHeader;
  payload: unknown;
  signingInput: string;
  signature: Buffer;
}

function parseJwt(token: string): ParsedJwt | null {
  if (!JWT_SHAPE.test(token)) return null;

  const [headerPart, payloadPart, signaturePart] = token.split(".");
  const headerBytes = decodeBase64Url(headerPart);
  const payloadBytes = decodeBase64Url(payloadPart);
  const signature = decodeBase64Url(signaturePart);
  if (!headerBytes || !payloadBytes || !signature) return null;

  const header = JwtHeaderSchema.safeParse(parseJson(headerBytes.toString("utf-8")));
  if (!header.success) return null;

  return {
    header: header.data,
    payload: parseJson(payloadBytes.toString("utf-8")),
    signingInput: `${headerPart}.${payloadPart}`,
    signature,
  };
}

/**
 * Generic JSON Web Token module
 *
 * Verifies HMAC-signed tokens (HS256/HS384/HS512). Asymmetric tokens are
 * still identified so the advisor can suggest an offline attack.
 */
export const jwtModule: CryptoModule = {
  name: "Generic_JWT",
  description: { product: "JSON Web Token (JWT)", secret: "HMAC/RSA Key" },
  secretsResource: "jwt.txt",
  arity: 1,

  identify(values) {
    return values.length === 1 && parseJwt(values[0]) !== null;
  },

  check(values, secrets) {
    if (values.length !== 1) return null;
    const jwt = parseJwt(values[0]);
    if (!jwt) return null;

    const algorithm = HMAC_ALGORITHMS.get(jwt.header.alg);
    if (!algorithm) return null;

    return firstMatchingSecret(secrets, (secret) => {
      const expected = hmac(algorithm, secret, jwt.signingInput);
      if (!safeEqual(expected, jwt.signature)) return null;
      return { ...toDetails(jwt.payload), jwtHeaders: jwt.header };
    });
  },

  carve(response: ScanResponse) {
    return [
      ...carveCookies(response, (_name, value) => (JWT_SHAPE.test(value) ? [value] : null)),
      ...carveHeaders(response, JWT_SEARCH),
      ...carveBody(response, JWT_SEARCH),
    ];
  },

  hashcat: {
    mode: 16500,
    description: "JSON Web Token (JWT)",
    format(values) {
      if (values.length !== 1) return null;
      const jwt = parseJwt(values[0]);
      if (!jwt || !HMAC_ALGORITHMS.has(jwt.header.alg)) return null;
      return values[0];
    },
  },
};
