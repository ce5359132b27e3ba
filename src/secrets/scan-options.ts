import { loadCustomSecrets, SecretDictionary } from "./dictionary";

export interface ScanOptions {
  /** Path to a custom secrets file merged with the defaults */
  customSecrets?: string;
  maxCustomSecretsBytes?: number;
  /** Prebuilt dictionary; takes precedence over customSecrets */
  dictionary?: SecretDictionary;
}

/**
 * Builds the dictionary for one scan. Custom secrets are loaded and
 * validated here, before any module runs.
 */
export function resolveDictionary(options: ScanOptions): SecretDictionary {
  if (options.dictionary) return options.dictionary;
  if (options.customSecrets) {
    return new SecretDictionary(
      loadCustomSecrets(options.customSecrets, options.maxCustomSecretsBytes),
    );
  }
  return new SecretDictionary();
}
