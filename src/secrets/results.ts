import type {
  CryptoModule,
  HashcatCandidate,
  ProductIdentified,
  SecretFound,
  SecretMatch,
} from "./modules/types";

export const MANUAL_INPUT_LOCATION = "Manual Input";

/**
 * Joins positional values into the reported product string
 */
export function productOf(values: readonly string[]): string {
  return values.join(" ");
}

export function toSecretFound(
  module: CryptoModule,
  values: readonly string[],
  location: string,
  match: SecretMatch,
): SecretFound {
  return {
    type: "SecretFound",
    detectingModule: module.name,
    description: module.description,
    product: productOf(values),
    location,
    secret: match.secret.value,
    secretOrigin: match.secret.origin,
    details: match.details,
  };
}

export function toProductIdentified(
  module: CryptoModule,
  values: readonly string[],
  location: string,
  hashcat?: HashcatCandidate[],
): ProductIdentified {
  const result: ProductIdentified = {
    type: "ProductIdentified",
    detectingModule: module.name,
    description: module.description,
    product: productOf(values),
    location,
  };
  if (hashcat && hashcat.length > 0) {
    result.hashcat = hashcat;
  }
  return result;
}
