/**
 * Scanner Service - wires configuration, the module registry and scan logging
 * around the detection engine for the CLI and HTTP routes
 */

import { getConfig } from "../config";
import { carveAllModules } from "../secrets/carve";
import { checkAllModules } from "../secrets/check";
import { SecretDictionary } from "../secrets/dictionary";
import { hashcatAllModules } from "../secrets/hashcat";
import type {
  DetectionResult,
  HashcatCandidate,
  ScanResponse,
  SecretEntry,
  SecretFound,
} from "../secrets/modules/types";
import { createRegistry, type ModuleRegistry } from "../secrets/registry";
import type { ScanOptions } from "../secrets/scan-options";
import { logScan, type ScanSource } from "./logger";

let registryInstance: ModuleRegistry | null = null;

export function getRegistry(): ModuleRegistry {
  if (!registryInstance) {
    registryInstance = createRegistry({ only: getConfig().scan.modules });
  }
  return registryInstance;
}

export interface CustomSecretsInput {
  /** Custom secrets file path (CLI) */
  path?: string;
  /** Already validated entries (HTTP API) */
  entries?: SecretEntry[];
}

function scanOptionsFor(custom: CustomSecretsInput | undefined): ScanOptions {
  if (custom?.entries) {
    return { dictionary: new SecretDictionary(custom.entries) };
  }
  return {
    customSecrets: custom?.path,
    maxCustomSecretsBytes: getConfig().scan.max_custom_secrets_bytes,
  };
}

export interface CheckOutcome {
  result: SecretFound | null;
  /** Suggestions when nothing was found and hashcat is enabled */
  hashcat: HashcatCandidate[];
}

/**
 * Checks values against all modules, falling back to hashcat suggestions
 */
export function runCheck(
  values: string[],
  source: ScanSource,
  options: { custom?: CustomSecretsInput; hashcat?: boolean } = {},
): CheckOutcome {
  const startTime = Date.now();
  const config = getConfig();
  const registry = getRegistry();

  const result = checkAllModules(registry, values, scanOptionsFor(options.custom));

  const hashcat =
    result === null && (options.hashcat ?? config.hashcat.enabled)
      ? hashcatAllModules(registry, values, {
          dictionaryPlaceholder: config.hashcat.dictionary_placeholder,
        })
      : [];

  logScan({
    source,
    operation: "check",
    results: result ? [result] : [],
    hashcatModules: hashcat.map((h) => h.detectingModule),
    startTime,
  });

  return { result, hashcat };
}

/**
 * Carves a response, attaching hashcat suggestions to identified products
 */
export function runCarve(
  response: ScanResponse,
  source: ScanSource,
  target?: string,
  options: { hashcat?: boolean } = {},
): DetectionResult[] {
  const startTime = Date.now();
  const config = getConfig();

  const results = carveAllModules(getRegistry(), response, {
    hashcat: options.hashcat ?? config.hashcat.enabled,
    dictionaryPlaceholder: config.hashcat.dictionary_placeholder,
    maxBodyChars: config.scan.max_body_chars,
  });

  logScan({ source, operation: "carve", target, results, startTime });

  return results;
}

export function runHashcat(values: string[], source: ScanSource): HashcatCandidate[] {
  const startTime = Date.now();
  const config = getConfig();

  const candidates = hashcatAllModules(getRegistry(), values, {
    dictionaryPlaceholder: config.hashcat.dictionary_placeholder,
  });

  logScan({
    source,
    operation: "hashcat",
    results: [],
    hashcatModules: candidates.map((c) => c.detectingModule),
    startTime,
  });

  return candidates;
}

/**
 * Logs a scan that failed before producing results
 */
export function logFailedScan(
  source: ScanSource,
  operation: "check" | "carve" | "hashcat",
  startTime: number,
  error: unknown,
  target?: string,
  statusCode?: number,
): void {
  logScan({
    source,
    operation,
    target,
    results: [],
    startTime,
    statusCode,
    errorMessage: error instanceof Error ? error.message : String(error),
  });
}
