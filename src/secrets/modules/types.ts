/**
 * Product categories reported alongside a detection
 */
export interface ProductDescriptor {
  /** What kind of token the module recognises, e.g. "JSON Web Token (JWT)" */
  product: string;
  /** What kind of secret signs it, e.g. "HMAC/RSA Key" */
  secret: string;
}

export type SecretOrigin = "default" | "custom";

export interface SecretEntry {
  value: string;
  origin: SecretOrigin;
}

/**
 * Minimal HTTP response surface the carver consumes.
 * Header names are matched case-insensitively; cookie names exactly.
 */
export interface ScanResponse {
  headers: Record<string, string | string[]>;
  cookies: Record<string, string>;
  body: string;
}

export type TokenDetails = Record<string, unknown>;

/**
 * Outcome of a successful verification inside a module
 */
export interface SecretMatch {
  secret: SecretEntry;
  details: TokenDetails;
}

/**
 * A candidate token pulled out of a response by a module
 */
export interface CarvedToken {
  /** Provenance shown to the user, e.g. "Cookie: session" */
  location: string;
  /** Positional values handed to check/identify */
  values: string[];
  /** Sort key: cookies first, then headers, then body offset */
  rank: number;
  hints?: CheckHints;
}

/**
 * Extra context the carver knows about a token
 */
export interface CheckHints {
  cookieName?: string;
}

export interface HashcatTemplate {
  /** hashcat -m mode */
  mode: number;
  description: string;
  /** Builds the hash argument from recognised values, null when the values don't fit */
  format(values: readonly string[], hints?: CheckHints): string | null;
}

export interface HashcatCandidate {
  detectingModule: string;
  hashcatDescription: string;
  hashcatCommand: string;
}

export interface SecretFound {
  type: "SecretFound";
  detectingModule: string;
  description: ProductDescriptor;
  /** The observed token value(s) */
  product: string;
  location: string;
  secret: string;
  secretOrigin: SecretOrigin;
  details: TokenDetails;
}

export interface ProductIdentified {
  type: "ProductIdentified";
  detectingModule: string;
  description: ProductDescriptor;
  product: string;
  location: string;
  hashcat?: HashcatCandidate[];
}

export type DetectionResult = SecretFound | ProductIdentified;

/**
 * Capability contract every detection module implements
 *
 * A module recognises one token format, verifies tokens of that format
 * against candidate secrets and carves such tokens out of HTTP responses.
 * Malformed input is never an error: check returns null and identify false.
 */
export interface CryptoModule {
  name: string;
  description: ProductDescriptor;

  /** File under resources/secrets holding the module's default secrets */
  secretsResource: string;

  /** Number of positional values check and identify accept */
  arity: number;

  /** True when the values are structurally this module's token format */
  identify(values: readonly string[]): boolean;

  /** Tries each secret in order; first verifying secret wins */
  check(
    values: readonly string[],
    secrets: readonly SecretEntry[],
    hints?: CheckHints,
  ): SecretMatch | null;

  /** Extracts candidate tokens for this module from a response */
  carve(response: ScanResponse): CarvedToken[];

  hashcat?: HashcatTemplate;
}
