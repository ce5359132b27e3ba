/**
 * Scan API routes
 *
 * Exposes the checker, carver and hashcat advisor over HTTP. Responses are
 * supplied by the client; the service never fetches URLs itself.
 */

import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import { parseCustomSecrets } from "../secrets/dictionary";
import { SecretsFileError } from "../secrets/errors";
import { toScanResponse } from "../secrets/carve";
import type { SecretEntry } from "../secrets/modules/types";
import { logFailedScan, runCarve, runCheck, runHashcat } from "../services/scanner";
import { errorResponse, validationDetails } from "./utils";

export const apiRoutes = new Hono();

// Request schemas
const ValuesSchema = z
  .array(z.string().min(1, "values must not be empty"))
  .min(1, "values is required");

const CheckRequestSchema = z.object({
  values: ValuesSchema,
  customSecrets: z.array(z.string()).optional(),
});

const CarveRequestSchema = z.object({
  headers: z.record(z.string(), z.union([z.string(), z.array(z.string())])).optional(),
  cookies: z.record(z.string(), z.string()).optional(),
  body: z.string().optional(),
  hashcat: z.boolean().optional(),
});

const HashcatRequestSchema = z.object({
  values: ValuesSchema,
});

/**
 * POST /api/check
 *
 * Checks token values for known secrets. When nothing is found the response
 * carries hashcat suggestions for the values.
 */
apiRoutes.post(
  "/check",
  zValidator("json", CheckRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json(
        errorResponse("Invalid request", "validation_error", validationDetails(result.error)),
        400,
      );
    }
  }),
  (c) => {
    const startTime = Date.now();
    const request = c.req.valid("json");

    let entries: SecretEntry[] | undefined;
    try {
      entries = request.customSecrets
        ? parseCustomSecrets(request.customSecrets, "customSecrets")
        : undefined;
    } catch (error) {
      if (error instanceof SecretsFileError) {
        logFailedScan("api", "check", startTime, error, undefined, 400);
        return c.json(errorResponse(error.message, "secrets_file_error"), 400);
      }
      throw error;
    }

    const outcome = runCheck(request.values, "api", { custom: entries ? { entries } : undefined });
    return c.json(outcome);
  },
);

/**
 * POST /api/carve
 *
 * Carves tokens from a client-supplied HTTP response.
 */
apiRoutes.post(
  "/carve",
  zValidator("json", CarveRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json(
        errorResponse("Invalid request", "validation_error", validationDetails(result.error)),
        400,
      );
    }
  }),
  (c) => {
    const request = c.req.valid("json");
    const results = runCarve(toScanResponse(request), "api", undefined, {
      hashcat: request.hashcat,
    });
    return c.json({ results });
  },
);

/**
 * POST /api/hashcat
 */
apiRoutes.post(
  "/hashcat",
  zValidator("json", HashcatRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json(
        errorResponse("Invalid request", "validation_error", validationDetails(result.error)),
        400,
      );
    }
  }),
  (c) => {
    const request = c.req.valid("json");
    return c.json({ candidates: runHashcat(request.values, "api") });
  },
);
