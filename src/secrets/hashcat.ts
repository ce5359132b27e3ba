import type {
  CheckHints,
  CryptoModule,
  HashcatCandidate,
  HashcatTemplate,
} from "./modules/types";
import type { ModuleRegistry } from "./registry";

export const DEFAULT_DICTIONARY_PLACEHOLDER = "<dictionary_file>";
export const TOKEN_PLACEHOLDER = "<token>";

export interface HashcatOptions {
  dictionaryPlaceholder?: string;
}

function buildCommand(template: HashcatTemplate, hash: string, dictionary: string): string {
  return `hashcat -m ${template.mode} -a 0 ${hash} ${dictionary}`;
}

/**
 * Hashcat suggestion for one module, using the observed token when the
 * module recognises the values. Carved tokens pass their hints along so the
 * hash matches what was actually signed.
 */
export function hashcatForModule(
  module: CryptoModule,
  values: readonly string[],
  options: HashcatOptions = {},
  hints?: CheckHints,
): HashcatCandidate | null {
  if (!module.hashcat) return null;
  const hash = module.hashcat.format(values, hints);
  if (hash === null) return null;

  return {
    detectingModule: module.name,
    hashcatDescription: module.hashcat.description,
    hashcatCommand: buildCommand(
      module.hashcat,
      hash,
      options.dictionaryPlaceholder ?? DEFAULT_DICTIONARY_PLACEHOLDER,
    ),
  };
}

function namesModule(module: CryptoModule, identifier: string): boolean {
  const wanted = identifier.trim().toLowerCase();
  return (
    wanted === module.name.toLowerCase() || wanted === module.description.product.toLowerCase()
  );
}

/**
 * Looks up offline cracking commands for a token or product name
 *
 * A module contributes when it recognises the values as its token format
 * (the command embeds the token), or when a single value names the module
 * or its product category (the command carries a <token> placeholder).
 * Never throws; unknown identifiers give an empty list.
 */
export function hashcatAllModules(
  registry: ModuleRegistry,
  identifier: string | readonly string[],
  options: HashcatOptions = {},
): HashcatCandidate[] {
  const values = typeof identifier === "string" ? [identifier] : identifier;
  if (values.length === 0) return [];

  const dictionary = options.dictionaryPlaceholder ?? DEFAULT_DICTIONARY_PLACEHOLDER;
  const candidates: HashcatCandidate[] = [];

  for (const module of registry.allModules()) {
    if (!module.hashcat) continue;

    const observed = hashcatForModule(module, values, options);
    if (observed) {
      candidates.push(observed);
      continue;
    }

    if (values.length === 1 && namesModule(module, values[0])) {
      candidates.push({
        detectingModule: module.name,
        hashcatDescription: module.hashcat.description,
        hashcatCommand: buildCommand(module.hashcat, TOKEN_PLACEHOLDER, dictionary),
      });
    }
  }

  return candidates;
}
