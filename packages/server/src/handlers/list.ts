/**
 * LIST_REQUEST handler: lists upload folders under the requested virtual
 * path and summarizes each one for the client.
 */

import type { RemoteCatalog } from "@sheetshelf/core/catalog";
import {
  PROPERTY,
  type ItemKind,
  type RemoteItem,
} from "@sheetshelf/core/drive";
import { listResponse, type ListItem } from "@sheetshelf/core/payload";
import { ok } from "@sheetshelf/core/result";
import type { RequestHandler } from "@sheetshelf/runtime";

/** Wire codes for item kinds. */
export const KIND_CODES: Record<ItemKind, number> = {
  OTHER: 0,
  FOLDER: 1,
  DOCUMENT: 2,
};

function sizeOf(item: RemoteItem): number {
  const size = Math.trunc(Number(item.properties[PROPERTY.SIZE] ?? 0));
  return Number.isSafeInteger(size) && size > 0 ? size : 0;
}

function modifiedAtOf(item: RemoteItem): number {
  if (item.modifiedTime === undefined) return 0;
  return Date.parse(item.modifiedTime) || 0;
}

export function toListItem(item: RemoteItem): ListItem {
  return {
    name: item.name,
    size: sizeOf(item),
    kindCode: KIND_CODES[item.kind],
    modifiedAtMillis: modifiedAtOf(item),
    contentHash: item.id,
  };
}

export function createListHandler(
  catalog: RemoteCatalog,
): RequestHandler<"LIST_REQUEST"> {
  return async (request) => {
    const uploads = await catalog.listUploads(
      request.query,
      request.starred ?? false,
      request.trashed ?? false,
    );
    return ok(listResponse(request.state, uploads.map(toListItem)));
  };
}
