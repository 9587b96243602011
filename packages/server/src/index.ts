import { loadConfig } from "@sheetshelf/core/config";
import { adminSocketPath, listenAdminSocket } from "@sheetshelf/runtime";
import { createServer } from "./bootstrap.js";
import { VERSION } from "./version.js";

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const config = await loadConfig();
  const context = await createServer(config);
  const { adminApp, logger, storageRoot } = context;

  // --- Protocol listener (a bind failure ends the process) ---
  const address = await context.start();
  logger.info(
    { host: address.address, port: address.port, version: VERSION },
    "Server started",
  );

  // --- Admin listener (Unix domain socket) ---
  let closeAdmin: (() => Promise<void>) | undefined;
  if (config.admin.enabled) {
    try {
      const admin = await listenAdminSocket({
        socketPath: adminSocketPath({
          storageRoot,
          socketPath: config.admin.socketPath,
        }),
        fetch: adminApp.fetch,
        logger,
      });
      closeAdmin = admin.close;
    } catch (err) {
      logger.warn({ err }, "Admin socket failed to start, continuing without");
    }
  }

  context.startBackgroundServices().catch((err: unknown) => {
    logger.error({ err }, "Background services failed");
  });

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, closing listener");

    // Force exit if in-flight requests do not settle
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    if (closeAdmin) {
      try {
        await closeAdmin();
      } catch (err) {
        logger.warn({ err }, "Failed to close admin socket");
      }
    }

    await context.cleanup();
    logger.info("Server stopped");
    process.exit(0);
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
