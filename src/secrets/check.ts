import { EmptyCandidateError } from "./errors";
import type { SecretFound } from "./modules/types";
import type { ModuleRegistry } from "./registry";
import { MANUAL_INPUT_LOCATION, toSecretFound } from "./results";
import { resolveDictionary, type ScanOptions } from "./scan-options";

/**
 * Checks user-supplied values against every registered module
 *
 * Modules are tried in registration order and the first one that verifies a
 * secret wins. Modules expecting a different number of values are skipped.
 * Returns null when no module finds a known secret.
 */
export function checkAllModules(
  registry: ModuleRegistry,
  values: readonly string[],
  options: ScanOptions = {},
): SecretFound | null {
  if (values.length === 0) {
    throw new EmptyCandidateError();
  }

  const dictionary = resolveDictionary(options);

  for (const module of registry.allModules()) {
    if (module.arity !== values.length) continue;

    const match = module.check(values, dictionary.secretsFor(module));
    if (match) {
      return toSecretFound(module, values, MANUAL_INPUT_LOCATION, match);
    }
  }

  return null;
}
