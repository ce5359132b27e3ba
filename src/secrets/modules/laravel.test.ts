import { describe, expect, test } from "vitest";
import { encryptLaravelCookie } from "../../test-utils/tokens";
import { laravelModule } from "./laravel";
import type { SecretEntry } from "./types";

const BASE64_KEY = `base64:${Buffer.alloc(32, 3).toString("base64")}`;

const secrets: SecretEntry[] = [
  { value: "SomeRandomString", origin: "default" },
  { value: BASE64_KEY, origin: "default" },
];

describe("laravelModule", () => {
  test("finds a base64 APP_KEY and decrypts the cookie", () => {
    const cookie = encryptLaravelCookie("user-session-id", BASE64_KEY);
    const match = laravelModule.check([cookie], secrets);

    expect(match?.secret.value).toBe(BASE64_KEY);
    expect(match?.details).toEqual({ decrypted: "user-session-id" });
  });

  test("finds a raw 16-byte key", () => {
    const cookie = encryptLaravelCookie("remember-me", "SomeRandomString");
    const match = laravelModule.check([cookie], secrets);

    expect(match?.secret.value).toBe("SomeRandomString");
    expect(match?.details).toEqual({ decrypted: "remember-me" });
  });

  test("identifies cookies encrypted with an unknown key", () => {
    const cookie = encryptLaravelCookie("x", `base64:${Buffer.alloc(32, 9).toString("base64")}`);
    expect(laravelModule.identify([cookie])).toBe(true);
    expect(laravelModule.check([cookie], secrets)).toBeNull();
  });

  test("rejects values that are not encrypted payloads", () => {
    const notLaravel = Buffer.from(JSON.stringify({ iv: "a", value: "b" })).toString("base64");
    expect(laravelModule.identify([notLaravel])).toBe(false);
    expect(laravelModule.identify(["eyJpdiI6!!"])).toBe(false);
  });

  test("carves URL-encoded cookies", () => {
    const cookie = encryptLaravelCookie("x", BASE64_KEY);
    const tokens = laravelModule.carve({
      cookies: { laravel_session: encodeURIComponent(cookie) },
      headers: {},
      body: "",
    });

    expect(tokens.map((t) => t.location)).toEqual(["Cookie: laravel_session"]);
    expect(tokens[0].values).toEqual([cookie]);
  });
});
