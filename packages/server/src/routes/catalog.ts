import { Hono } from "hono";
import {
  normalizeVirtualPath,
  type RemoteCatalog,
} from "@sheetshelf/core/catalog";
import {
  UploadQuerySchema,
  type RootFolder,
  type UploadListing,
} from "@sheetshelf/core/schemas";
import { toListItem } from "../handlers/list.js";

export interface CatalogRouteDeps {
  catalog: RemoteCatalog;
}

/**
 * Catalog views for local tooling: the same listing LIST_REQUEST returns,
 * and the root folder the catalog keeps everything under.
 */
export function catalogRoutes(deps: CatalogRouteDeps): Hono {
  const app = new Hono();

  app.get("/uploads", async (c) => {
    const query = UploadQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      const issue = query.error.issues[0];
      const where = issue?.path.map(String).join(".") || "query";
      return c.json(
        {
          error: {
            errorCode: "INVALID_QUERY",
            message: `Invalid ${where}: ${issue?.message ?? "unknown"}`,
          },
        },
        400,
      );
    }

    const { path, starred, trashed } = query.data;
    const uploads = await deps.catalog.listUploads(path, starred, trashed);
    const listing: UploadListing = {
      path: normalizeVirtualPath(path),
      items: uploads.map(toListItem),
    };
    return c.json(listing);
  });

  // Creates the root folder when the store has none yet
  app.get("/root", async (c) => {
    const root = await deps.catalog.getSheetStore();
    const body: RootFolder = { id: root.id, name: root.name };
    return c.json(body);
  });

  return app;
}
