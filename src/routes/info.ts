import { Hono } from "hono";
import pkg from "../../package.json";
import { getConfig } from "../config";
import { getRegistry } from "../services/scanner";

export const infoRoutes = new Hono();

infoRoutes.get("/info", (c) => {
  const config = getConfig();

  return c.json({
    name: "keysleuth",
    version: pkg.version,
    description: pkg.description,
    modules: getRegistry()
      .allModules()
      .map((m) => ({
        name: m.name,
        product: m.description.product,
        secret: m.description.secret,
        hashcat: m.hashcat ? m.hashcat.mode : null,
      })),
    hashcat: {
      enabled: config.hashcat.enabled,
    },
  });
});
