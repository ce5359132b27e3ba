import { describe, expect, test, vi } from "vitest";
import { createApp } from "./app";

vi.mock("./services/logger", () => ({
  logScan: vi.fn(),
}));

const app = createApp();

describe("createApp", () => {
  test("serves the health check", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; modules: number };
    expect(body.status).toBe("healthy");
    expect(body.modules).toBe(7);
  });

  test("echoes the request id", async () => {
    const res = await app.request("/health", { headers: { "X-Request-ID": "req-1" } });
    expect(res.headers.get("X-Request-ID")).toBe("req-1");
  });

  test("returns a JSON 404 for unknown routes", async () => {
    const res = await app.request("/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { message: "Route not found: GET /nope", type: "not_found" },
    });
  });
});
