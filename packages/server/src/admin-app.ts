/**
 * Admin Hono app served on the admin Unix domain socket.
 *
 * No auth middleware: socket file permissions (chmod 0600) are the trust
 * boundary.
 */

import { Hono } from "hono";
import { RemoteStoreError, SheetShelfError } from "@sheetshelf/core/errors";
import type { Logger } from "pino";
import { catalogRoutes, type CatalogRouteDeps } from "./routes/catalog.js";
import { healthRoute, type HealthDeps } from "./routes/health.js";

export interface AdminAppDeps extends HealthDeps, CatalogRouteDeps {
  logger: Logger;
}

export function createAdminApp(deps: AdminAppDeps): Hono {
  const app = new Hono();

  app.route("/", healthRoute(deps));
  app.route("/", catalogRoutes(deps));

  app.onError((err, c) => {
    if (err instanceof SheetShelfError) {
      deps.logger.warn({ err }, err.message);
      // The store failed, not this process
      const status = err instanceof RemoteStoreError ? 502 : 500;
      return c.json(err.toJSON(), status);
    }

    deps.logger.error({ err }, "Unhandled error (admin)");
    return c.json(
      {
        error: {
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  app.notFound((c) => {
    return c.json(
      {
        error: {
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
