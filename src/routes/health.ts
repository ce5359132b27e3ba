import { Hono } from "hono";
import { getRegistry } from "../services/scanner";

export const healthRoutes = new Hono();

healthRoutes.get("/health", (c) => {
  return c.json({
    status: "healthy",
    modules: getRegistry().size,
    timestamp: new Date().toISOString(),
  });
});
