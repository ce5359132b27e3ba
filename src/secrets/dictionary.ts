import { readFileSync, statSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { SecretsFileError } from "./errors";
import type { CryptoModule, SecretEntry } from "./modules/types";

const RESOURCES_DIR = new URL("../../resources/secrets/", import.meta.url);

export const DEFAULT_MAX_CUSTOM_SECRETS_BYTES = 100 * 1024;
const MAX_SECRET_LENGTH = 1024;

const CustomSecretSchema = z
  .string()
  .max(MAX_SECRET_LENGTH, `exceeds ${MAX_SECRET_LENGTH} characters`)
  .refine((s) => !/[\x00-\x08\x0a-\x1f\x7f]/.test(s), "contains control characters");

function splitLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim() !== "");
}

// Default lists never change during a process, so they are read once
const defaultsCache = new Map<string, readonly SecretEntry[]>();

/**
 * Reads a module's default secret list from resources/secrets
 */
export function loadDefaultSecrets(resource: string): readonly SecretEntry[] {
  const cached = defaultsCache.get(resource);
  if (cached) return cached;

  const text = readFileSync(fileURLToPath(new URL(resource, RESOURCES_DIR)), "utf-8");
  const entries = Object.freeze(
    splitLines(text).map((value): SecretEntry => Object.freeze({ value, origin: "default" })),
  );
  defaultsCache.set(resource, entries);
  return entries;
}

/**
 * Validates custom secret values, one entry per line; blank lines are
 * skipped but still count towards the line numbers in errors.
 */
export function parseCustomSecrets(lines: readonly string[], source: string): SecretEntry[] {
  const issues: string[] = [];
  const entries: SecretEntry[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    const result = CustomSecretSchema.safeParse(line);
    if (!result.success) {
      issues.push(`line ${index + 1}: ${result.error.errors.map((e) => e.message).join(", ")}`);
      return;
    }
    entries.push({ value: result.data, origin: "custom" });
  });

  if (issues.length === 0 && entries.length === 0) {
    issues.push("no secrets found");
  }
  if (issues.length > 0) {
    throw new SecretsFileError(source, issues);
  }
  return entries;
}

/**
 * Loads and validates a custom secrets file
 */
export function loadCustomSecrets(
  path: string,
  maxBytes: number = DEFAULT_MAX_CUSTOM_SECRETS_BYTES,
): SecretEntry[] {
  let raw: Buffer;
  try {
    if (statSync(path).size > maxBytes) {
      throw new SecretsFileError(path, [`exceeds the maximum size of ${maxBytes} bytes`]);
    }
    raw = readFileSync(path);
  } catch (error) {
    if (error instanceof SecretsFileError) throw error;
    throw new SecretsFileError(path, [error instanceof Error ? error.message : String(error)]);
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(raw);
  } catch {
    throw new SecretsFileError(path, ["not valid UTF-8 text"]);
  }

  return parseCustomSecrets(text.split(/\r?\n/), path);
}

/**
 * Read-only view of the secrets each module should try
 *
 * Custom entries come first and shadow identical default values; the
 * default lists themselves are never modified.
 */
export class SecretDictionary {
  private readonly merged = new Map<string, readonly SecretEntry[]>();

  constructor(
    private readonly custom: readonly SecretEntry[] = [],
    private readonly loadDefaults: (resource: string) => readonly SecretEntry[] = loadDefaultSecrets,
  ) {}

  secretsFor(module: CryptoModule): readonly SecretEntry[] {
    const cached = this.merged.get(module.secretsResource);
    if (cached) return cached;

    const seen = new Set<string>();
    const entries: SecretEntry[] = [];
    for (const entry of [...this.custom, ...this.loadDefaults(module.secretsResource)]) {
      if (seen.has(entry.value)) continue;
      seen.add(entry.value);
      entries.push(entry);
    }

    const frozen = Object.freeze(entries);
    this.merged.set(module.secretsResource, frozen);
    return frozen;
  }
}
