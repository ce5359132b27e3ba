import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { type Config, getConfig } from "./config";
import { closeLogger, getLogger } from "./services/logger";
import { getRegistry } from "./services/scanner";

const config = getConfig();
const app = createApp();

const port = config.server.port;
const host = config.server.host;

const server = serve({ fetch: app.fetch, port, hostname: host }, () => {
  printStartupBanner(config, host, port);
});

const stopCleanup = startCleanupScheduler(config);
setupGracefulShutdown(stopCleanup);

function printStartupBanner(config: Config, host: string, port: number) {
  const modules = getRegistry()
    .allModules()
    .map((m) => m.name)
    .join(", ");

  console.log(`
keysleuth - known secret detection service

Server:     http://${host}:${port}
Check:      http://${host}:${port}/api/check
Carve:      http://${host}:${port}/api/carve
Hashcat:    http://${host}:${port}/api/hashcat
Stats:      http://${host}:${port}/api/stats
Health:     http://${host}:${port}/health
Info:       http://${host}:${port}/info

Modules:    ${modules}
Hashcat:    ${config.hashcat.enabled ? "enabled" : "disabled"}
Scan log:   ${config.logging.enabled ? config.logging.database : "disabled"}
`);
}

function startCleanupScheduler(config: Config): () => void {
  let cleanupInterval: ReturnType<typeof setInterval> | null = null;

  if (config.logging.enabled && config.logging.retention_days > 0) {
    const logger = getLogger();

    const runCleanup = () => {
      try {
        const deleted = logger.cleanup();
        if (deleted > 0) {
          console.log(
            `Log cleanup: removed ${deleted} entries older than ${config.logging.retention_days} days`,
          );
        }
      } catch (error) {
        console.error("Log cleanup failed:", error);
      }
    };

    // Run cleanup on startup, then daily
    runCleanup();
    cleanupInterval = setInterval(runCleanup, 24 * 60 * 60 * 1000);
  }

  return () => {
    if (cleanupInterval) {
      clearInterval(cleanupInterval);
    }
  };
}

function setupGracefulShutdown(stopCleanup: () => void) {
  function shutdown() {
    console.log("\nShutting down...");
    stopCleanup();
    server.close();
    closeLogger();
    process.exit(0);
  }

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}
