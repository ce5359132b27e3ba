import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { apiRoutes } from "./routes/api";
import { healthRoutes } from "./routes/health";
import { infoRoutes } from "./routes/info";
import { logsRoutes } from "./routes/logs";
import { errorResponse } from "./routes/utils";

type Variables = {
  requestId: string;
};

/**
 * Builds the HTTP application
 */
export function createApp(): Hono<{ Variables: Variables }> {
  const app = new Hono<{ Variables: Variables }>();

  // Request ID middleware
  const requestIdMiddleware = createMiddleware<{ Variables: Variables }>(async (c, next) => {
    const requestId = c.req.header("x-request-id") || randomUUID();
    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);
    await next();
  });

  app.use("*", requestIdMiddleware);
  app.use("*", cors());
  app.use("*", logger());

  app.route("/", healthRoutes);
  app.route("/", infoRoutes);
  app.route("/api", apiRoutes);
  app.route("/api", logsRoutes);

  app.notFound((c) => {
    return c.json(errorResponse(`Route not found: ${c.req.method} ${c.req.path}`, "not_found"), 404);
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(
        errorResponse(err.message, err.status >= 500 ? "internal_error" : "validation_error"),
        err.status,
      );
    }

    console.error("Unhandled error:", err);
    return c.json(errorResponse("Internal server error", "internal_error"), 500);
  });

  return app;
}
