import { Hono } from "hono";
import { describe, expect, test } from "vitest";
import { infoRoutes } from "./info";

const app = new Hono();
app.route("/", infoRoutes);

describe("GET /info", () => {
  test("returns 200 with app info", async () => {
    const res = await app.request("/info");

    expect(res.status).toBe(200);

    const body = (await res.json()) as Record<string, unknown>;
    expect(body.name).toBe("keysleuth");
    expect(body.version).toMatch(/^\d+\.\d+\.\d+$/);
    expect(body.hashcat).toEqual({ enabled: true });
  });

  test("lists modules with their hashcat modes", async () => {
    const res = await app.request("/info");
    const body = (await res.json()) as { modules: Array<{ name: string; hashcat: number | null }> };

    expect(body.modules).toHaveLength(7);
    expect(body.modules[0]).toEqual({
      name: "Generic_JWT",
      product: "JSON Web Token (JWT)",
      secret: "HMAC/RSA Key",
      hashcat: 16500,
    });
    expect(body.modules.find((m) => m.name === "Flask_SignedCookies")?.hashcat).toBeNull();
  });

  test("returns correct content-type", async () => {
    const res = await app.request("/info");

    expect(res.headers.get("content-type")).toContain("application/json");
  });
});
