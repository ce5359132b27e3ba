import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { DetectionResult } from "../secrets/modules/types";
import { ScanLogger, toScanLog } from "./logger";

const description = { product: "JSON Web Token (JWT)", secret: "HMAC/RSA Key" };

const results: DetectionResult[] = [
  {
    type: "SecretFound",
    detectingModule: "Generic_JWT",
    description,
    product: "token-a",
    location: "Cookie: auth",
    secret: "secret",
    secretOrigin: "default",
    details: {},
  },
  {
    type: "ProductIdentified",
    detectingModule: "Generic_JWT",
    description,
    product: "token-b",
    location: "Header: Authorization",
  },
  {
    type: "ProductIdentified",
    detectingModule: "Flask_SignedCookies",
    description: { product: "Flask Signed Cookie", secret: "Flask Password" },
    product: "cookie",
    location: "Cookie: session",
  },
];

describe("toScanLog", () => {
  test("counts results and lists modules once", () => {
    const row = toScanLog({
      source: "api",
      operation: "carve",
      results,
      hashcatModules: ["Generic_JWT", "Express_SignedCookies_ES"],
      startTime: Date.now(),
    });

    expect(row).toMatchObject({
      source: "api",
      operation: "carve",
      target: null,
      modules: "Generic_JWT,Flask_SignedCookies,Express_SignedCookies_ES",
      secrets_found: 1,
      products_identified: 2,
      status_code: null,
      error_message: null,
    });
  });

  test("never records secret values or tokens", () => {
    const row = toScanLog({ source: "cli", operation: "check", results, startTime: Date.now() });
    expect(Object.values(row)).not.toContain("secret");
    expect(Object.values(row)).not.toContain("token-a");
  });
});

describe("ScanLogger", () => {
  let logger: ScanLogger;

  beforeEach(() => {
    logger = new ScanLogger({ database: ":memory:", retentionDays: 30 });
  });

  afterEach(() => {
    logger.close();
  });

  test("stores and returns scans newest first", () => {
    logger.log(toScanLog({ source: "cli", operation: "check", results: [], startTime: Date.now() }));
    logger.log(
      toScanLog({
        source: "api",
        operation: "carve",
        target: "https://example.test/",
        results,
        startTime: Date.now(),
      }),
    );

    const logs = logger.getLogs();
    expect(logs).toHaveLength(2);
    expect(logs[0]).toMatchObject({ operation: "carve", target: "https://example.test/" });
    expect(logs[1]).toMatchObject({ operation: "check", target: null });
  });

  test("summarises stats", () => {
    logger.log(toScanLog({ source: "api", operation: "carve", results, startTime: Date.now() }));
    logger.log(toScanLog({ source: "api", operation: "check", results: [], startTime: Date.now() }));

    const stats = logger.getStats();
    expect(stats.total_scans).toBe(2);
    expect(stats.secrets_found).toBe(1);
    expect(stats.products_identified).toBe(2);
    expect(stats.scans_last_hour).toBe(2);
  });

  test("reports zeros for an empty log", () => {
    expect(logger.getStats()).toEqual({
      total_scans: 0,
      secrets_found: 0,
      products_identified: 0,
      avg_latency_ms: 0,
      scans_last_hour: 0,
    });
  });

  test("removes entries older than the retention period", () => {
    const old = toScanLog({ source: "cli", operation: "check", results: [], startTime: Date.now() });
    logger.log({ ...old, timestamp: "2000-01-01T00:00:00.000Z" });
    logger.log(old);

    expect(logger.cleanup()).toBe(1);
    expect(logger.getLogs()).toHaveLength(1);
  });

  test("keeps everything when retention is disabled", () => {
    const keepForever = new ScanLogger({ database: ":memory:", retentionDays: 0 });
    const row = toScanLog({ source: "cli", operation: "check", results: [], startTime: Date.now() });
    keepForever.log({ ...row, timestamp: "2000-01-01T00:00:00.000Z" });

    expect(keepForever.cleanup()).toBe(0);
    keepForever.close();
  });
});
