import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, describe, expect, test, vi } from "vitest";
import { loadConfig, parseConfig } from "./config";

const tempDir = mkdtempSync(join(tmpdir(), "keysleuth-config-"));

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("parseConfig", () => {
  test("applies defaults to an empty config", () => {
    const config = parseConfig({});

    expect(config.server).toEqual({ port: 3000, host: "0.0.0.0" });
    expect(config.scan.modules).toEqual([]);
    expect(config.scan.max_custom_secrets_bytes).toBe(102400);
    expect(config.hashcat).toEqual({ enabled: true, dictionary_placeholder: "<dictionary_file>" });
    expect(config.logging.retention_days).toBe(30);
  });

  test("substitutes environment variables", () => {
    vi.stubEnv("KEYSLEUTH_TEST_PORT", "4100");

    const config = parseConfig({
      server: { port: "${KEYSLEUTH_TEST_PORT}", host: "${KEYSLEUTH_TEST_HOST:-127.0.0.1}" },
    });

    expect(config.server).toEqual({ port: 4100, host: "127.0.0.1" });
  });

  test("rejects invalid values", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    expect(() => parseConfig({ server: { port: 70000 } })).toThrow("Invalid configuration");
    expect(console.error).toHaveBeenCalledWith("Config validation errors:");
  });
});

describe("loadConfig", () => {
  test("reads a YAML file", () => {
    const path = join(tempDir, "config.yaml");
    writeFileSync(path, "scan:\n  modules: [Generic_JWT]\nhashcat:\n  enabled: false\n");

    const config = loadConfig(path);
    expect(config.scan.modules).toEqual(["Generic_JWT"]);
    expect(config.hashcat.enabled).toBe(false);
  });

  test("fails for a missing explicit file", () => {
    const path = join(tempDir, "missing.yaml");
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  test("rejects a directory", () => {
    expect(() => loadConfig(tempDir)).toThrow(`'${tempDir}' is a directory, not a file`);
  });
});
