import { Hono } from "hono";
import type { HealthReport, ListenerStatus } from "@sheetshelf/core/schemas";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  /** Bound protocol port; null before the listener is up. */
  getPort: () => number | null;
  getConnectionCount: () => number;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();

    const body: HealthReport = {
      status: "healthy",
      version: deps.version,
      uptime: Math.max(0, Math.floor(uptimeMs / 1000)),
    };
    return c.json(body);
  });

  // Listener state for local tooling
  app.get("/status", (c) => {
    const port = deps.getPort();
    const body: ListenerStatus = {
      status: port === null ? "starting" : "running",
      port,
      connections: deps.getConnectionCount(),
    };
    return c.json(body);
  });

  return app;
}
