import { deflateSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import type { ScanResponse } from "./types";
import {
  carveBody,
  carveCookies,
  carveHeaders,
  decodeBase64,
  decodeBase64Url,
  decodeSignedPayload,
  firstMatchingSecret,
  safeEqual,
  toDetails,
} from "./utils";

function response(partial: Partial<ScanResponse>): ScanResponse {
  return { headers: {}, cookies: {}, body: "", ...partial };
}

describe("base64 decoding", () => {
  test("decodes unpadded base64url", () => {
    expect(decodeBase64Url("aGk_")?.toString("hex")).toBe("68693f");
  });

  test("rejects characters outside the alphabet", () => {
    expect(decodeBase64Url("a+b/")).toBeNull();
    expect(decodeBase64("a_b-")).toBeNull();
  });

  test("rejects impossible lengths", () => {
    expect(decodeBase64Url("abcde")).toBeNull();
    expect(decodeBase64("abcde")).toBeNull();
  });

  test("accepts padded base64", () => {
    expect(decodeBase64("aGk=")?.toString("utf-8")).toBe("hi");
  });
});

describe("decodeSignedPayload", () => {
  test("decodes JSON payloads", () => {
    const payload = Buffer.from('{"a":1}').toString("base64url");
    expect(decodeSignedPayload(payload)).toEqual({ a: 1 });
  });

  test("inflates payloads prefixed with a dot", () => {
    const payload = `.${deflateSync('{"a":[1,2]}').toString("base64url")}`;
    expect(decodeSignedPayload(payload)).toEqual({ a: [1, 2] });
  });

  test("returns undefined for non-JSON content", () => {
    expect(decodeSignedPayload(Buffer.from("nope").toString("base64url"))).toBeUndefined();
    expect(decodeSignedPayload(".AAAA")).toBeUndefined();
  });
});

describe("helpers", () => {
  test("safeEqual handles different lengths", () => {
    expect(safeEqual(Buffer.from("ab"), Buffer.from("abc"))).toBe(false);
    expect(safeEqual(Buffer.from("abc"), Buffer.from("abc"))).toBe(true);
  });

  test("toDetails wraps non-object payloads", () => {
    expect(toDetails({ a: 1 })).toEqual({ a: 1 });
    expect(toDetails([1, 2])).toEqual({ payload: [1, 2] });
    expect(toDetails("x")).toEqual({ payload: "x" });
  });

  test("firstMatchingSecret stops at the first verifying secret", () => {
    const tried: string[] = [];
    const match = firstMatchingSecret(
      [
        { value: "one", origin: "default" },
        { value: "two", origin: "default" },
        { value: "three", origin: "default" },
      ],
      (secret) => {
        tried.push(secret);
        return secret === "two" ? { ok: true } : null;
      },
    );

    expect(match).toEqual({ secret: { value: "two", origin: "default" }, details: { ok: true } });
    expect(tried).toEqual(["one", "two"]);
  });
});

describe("carving", () => {
  test("carveCookies ranks by cookie position and decodes values", () => {
    const tokens = carveCookies(response({ cookies: { a: "x", b: "hello%20world" } }), (_n, v) =>
      v.includes(" ") ? [v] : null,
    );

    expect(tokens).toEqual([
      { location: "Cookie: b", values: ["hello world"], rank: 1, hints: { cookieName: "b" } },
    ]);
  });

  test("carveHeaders skips cookie headers and takes the first match", () => {
    const tokens = carveHeaders(
      response({
        headers: {
          "Set-Cookie": "tok_111",
          "X-Token": ["none", "tok_222 tok_333"],
        },
      }),
      /tok_\d+/g,
    );

    expect(tokens).toEqual([{ location: "Header: X-Token", values: ["tok_222"], rank: 10_001 }]);
  });

  test("carveBody reports every match with its offset", () => {
    const tokens = carveBody(response({ body: "ab tok_1 cd tok_22" }), /tok_\d+/g);

    expect(tokens).toEqual([
      { location: "Body: offset 3", values: ["tok_1"], rank: 20_003 },
      { location: "Body: offset 12", values: ["tok_22"], rank: 20_012 },
    ]);
  });
});
