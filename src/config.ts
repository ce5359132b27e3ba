import { existsSync, readFileSync, statSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

// Schema definitions

const ServerSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default("0.0.0.0"),
});

const ScanSchema = z.object({
  // Restrict scans to these module names; empty means every registered module
  modules: z.array(z.string()).default([]),
  max_custom_secrets_bytes: z.coerce.number().int().min(1).default(100 * 1024),
  fetch_timeout_ms: z.coerce.number().int().min(1).default(10_000),
  max_body_chars: z.coerce.number().int().min(0).default(2_000_000),
});

const HashcatSchema = z.object({
  enabled: z.boolean().default(true),
  dictionary_placeholder: z.string().min(1).default("<dictionary_file>"),
});

const LoggingSchema = z.object({
  enabled: z.boolean().default(true),
  database: z.string().default("./data/keysleuth.db"),
  retention_days: z.coerce.number().int().min(0).default(30),
});

const ConfigSchema = z.object({
  server: ServerSchema.default({}),
  scan: ScanSchema.default({}),
  hashcat: HashcatSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScanConfig = z.infer<typeof ScanSchema>;
export type HashcatConfig = z.infer<typeof HashcatSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

/**
 * Replaces ${VAR} and ${VAR:-default} patterns with environment variable values
 */
function substituteEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, expr: string) => {
    // Support ${VAR:-default} syntax
    const [varName, defaultValue] = expr.split(":-");
    const envValue = process.env[varName];
    if (envValue) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Warning: Environment variable ${varName} is not set`);
    return "";
  });
}

/**
 * Recursively substitutes environment variables in an object
 */
function substituteEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsInObject);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsInObject(value);
    }
    return result;
  }
  return obj;
}

/**
 * Validates raw (already parsed) configuration
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(substituteEnvVarsInObject(raw ?? {}));

  if (!result.success) {
    console.error("Config validation errors:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid configuration");
  }

  return result.data;
}

/**
 * Loads configuration from YAML file with environment variable substitution
 *
 * An explicit path must exist. Without one, KEYSLEUTH_CONFIG and the usual
 * file names are tried, and schema defaults apply when none is present.
 */
export function loadConfig(configPath?: string): Config {
  const explicit = configPath ?? process.env.KEYSLEUTH_CONFIG;
  const paths = explicit ? [explicit] : ["./config.yaml", "./config.yml", "./config.example.yaml"];

  let configFile: string | null = null;

  for (const path of paths) {
    if (existsSync(path)) {
      if (!statSync(path).isFile()) {
        throw new Error(`'${path}' is a directory, not a file`);
      }
      configFile = readFileSync(path, "utf-8");
      break;
    }
  }

  if (configFile === null) {
    if (explicit) {
      throw new Error(`Config file not found: ${explicit}`);
    }
    return parseConfig({});
  }

  return parseConfig(parseYaml(configFile));
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Replaces the singleton, e.g. after the CLI reads --config
 */
export function setConfig(config: Config): void {
  configInstance = config;
}
