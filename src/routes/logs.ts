import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { createMiddleware } from "hono/factory";
import { z } from "zod";
import { getConfig } from "../config";
import { getLogger } from "../services/logger";
import { errorResponse, validationDetails } from "./utils";

const LogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const logsRoutes = new Hono();

const requireLogging = createMiddleware(async (c, next) => {
  if (!getConfig().logging.enabled) {
    return c.json(errorResponse("Scan logging is disabled", "not_found"), 404);
  }
  await next();
});

/**
 * GET /api/logs - Recent scans, newest first
 */
logsRoutes.get(
  "/logs",
  requireLogging,
  zValidator("query", LogsQuerySchema, (result, c) => {
    if (!result.success) {
      return c.json(
        errorResponse("Invalid request", "validation_error", validationDetails(result.error)),
        400,
      );
    }
  }),
  (c) => {
    const { limit, offset } = c.req.valid("query");
    const logs = getLogger().getLogs(limit, offset);

    return c.json({
      logs,
      pagination: {
        limit,
        offset,
        count: logs.length,
      },
    });
  },
);

/**
 * GET /api/stats - Scan totals
 */
logsRoutes.get("/stats", requireLogging, (c) => {
  return c.json(getLogger().getStats());
});
