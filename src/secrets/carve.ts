import type { CarvedToken, CryptoModule, DetectionResult, ScanResponse } from "./modules/types";
import { hashcatForModule, type HashcatOptions } from "./hashcat";
import type { ModuleRegistry } from "./registry";
import { toProductIdentified, toSecretFound } from "./results";
import { resolveDictionary, type ScanOptions } from "./scan-options";

export interface CarveOptions extends ScanOptions, HashcatOptions {
  /** Attach hashcat suggestions to ProductIdentified results */
  hashcat?: boolean;
  /** Body characters scanned; 0 means unlimited */
  maxBodyChars?: number;
}

interface LocationGroup {
  rank: number;
  candidates: Array<{ module: CryptoModule; token: CarvedToken }>;
}

/**
 * Fills in missing parts of a response
 */
export function toScanResponse(partial: Partial<ScanResponse>): ScanResponse {
  return {
    headers: partial.headers ?? {},
    cookies: partial.cookies ?? {},
    body: partial.body ?? "",
  };
}

/**
 * Carves tokens out of an HTTP response and checks each one
 *
 * Every module carves its own candidates. Candidates are grouped by location;
 * within a location the first module (registration order) that finds a secret
 * wins, otherwise the first that recognises the format reports the product.
 * One result per location, ordered cookies → headers → body.
 */
export function carveAllModules(
  registry: ModuleRegistry,
  response: ScanResponse,
  options: CarveOptions = {},
): DetectionResult[] {
  const dictionary = resolveDictionary(options);

  const maxBodyChars = options.maxBodyChars ?? 0;
  const scanned: ScanResponse =
    maxBodyChars > 0 && response.body.length > maxBodyChars
      ? { ...response, body: response.body.slice(0, maxBodyChars) }
      : response;

  const groups = new Map<string, LocationGroup>();
  for (const module of registry.allModules()) {
    for (const token of module.carve(scanned)) {
      const group = groups.get(token.location) ?? { rank: token.rank, candidates: [] };
      // first token per module and location
      if (group.candidates.some((c) => c.module === module)) continue;
      group.candidates.push({ module, token });
      groups.set(token.location, group);
    }
  }

  const ordered = [...groups.entries()].sort((a, b) => a[1].rank - b[1].rank);
  const results: DetectionResult[] = [];

  for (const [location, group] of ordered) {
    let result: DetectionResult | null = null;

    for (const { module, token } of group.candidates) {
      const match = module.check(token.values, dictionary.secretsFor(module), token.hints);
      if (match) {
        result = toSecretFound(module, token.values, location, match);
        break;
      }
      if (!result && module.identify(token.values)) {
        const hashcat = options.hashcat
          ? hashcatForModule(module, token.values, options, token.hints)
          : null;
        result = toProductIdentified(module, token.values, location, hashcat ? [hashcat] : undefined);
      }
    }

    if (result) {
      results.push(result);
    }
  }

  return results;
}
