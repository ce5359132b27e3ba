import { createHmac } from "node:crypto";
import { describe, expect, test } from "vitest";
import { signExpressSession } from "../../test-utils/tokens";
import { expressSessionModule } from "./express-session";
import type { SecretEntry } from "./types";

const secrets: SecretEntry[] = [{ value: "keyboard cat", origin: "default" }];

describe("expressSessionModule", () => {
  test("finds the session secret", () => {
    const cookie = signExpressSession("Jq5hXbGk2vTn8wRz", "keyboard cat");
    const match = expressSessionModule.check([cookie], secrets);

    expect(match?.secret.value).toBe("keyboard cat");
    expect(match?.details).toEqual({ sessionId: "Jq5hXbGk2vTn8wRz" });
  });

  test("returns null for another secret", () => {
    const cookie = signExpressSession("Jq5hXbGk2vTn8wRz", "other");
    expect(expressSessionModule.check([cookie], secrets)).toBeNull();
    expect(expressSessionModule.identify([cookie])).toBe(true);
  });

  test("does not identify unsigned values", () => {
    expect(expressSessionModule.identify(["Jq5hXbGk2vTn8wRz"])).toBe(false);
    expect(expressSessionModule.identify(["s:abc.short"])).toBe(false);
  });

  test("carves URL-encoded cookies", () => {
    const cookie = signExpressSession("abc123", "keyboard cat");
    const tokens = expressSessionModule.carve({
      cookies: { "connect.sid": encodeURIComponent(cookie) },
      headers: {},
      body: "",
    });

    expect(tokens).toHaveLength(1);
    expect(tokens[0].location).toBe("Cookie: connect.sid");
    expect(tokens[0].values).toEqual([cookie]);
  });

  test("formats the hashcat hash as hex digest and message", () => {
    const cookie = signExpressSession("abc123", "keyboard cat");
    const hex = createHmac("sha256", "keyboard cat").update("abc123").digest("hex");

    expect(expressSessionModule.hashcat?.format([cookie])).toBe(`${hex}:abc123`);
  });
});
