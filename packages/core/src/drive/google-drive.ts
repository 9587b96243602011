/**
 * Google Drive REST v3 adapter for the RemoteStore boundary.
 * Uses GET/POST/PATCH against {apiUrl}/files with a bearer token from the
 * supplied AccessTokenProvider.
 */

import { z } from "zod";
import { ItemNotFoundError, RemoteStoreError } from "../errors/catalog.js";
import type {
  AccessTokenProvider,
  ItemPage,
  ListItemsRequest,
  RemoteStore,
} from "./interface.js";
import { compileQuery } from "./query.js";
import {
  DEFAULT_FIELDS,
  MIME,
  kindFromMime,
  type ItemDraft,
  type PropertyPatch,
  type RemoteItem,
} from "./types.js";

export const DEFAULT_DRIVE_API_URL = "https://www.googleapis.com/drive/v3";

const DriveFileSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  mimeType: z.string().default(""),
  parents: z.array(z.string()).default([]),
  properties: z.record(z.string(), z.string()).default({}),
  trashed: z.boolean().default(false),
  modifiedTime: z.string().optional(),
});

const DriveFileListSchema = z.object({
  files: z.array(DriveFileSchema).default([]),
  nextPageToken: z.string().optional(),
});

type DriveFile = z.infer<typeof DriveFileSchema>;

function toRemoteItem(file: DriveFile): RemoteItem {
  return {
    id: file.id,
    name: file.name,
    kind: kindFromMime(file.mimeType),
    mimeType: file.mimeType,
    parents: file.parents,
    properties: file.properties,
    trashed: file.trashed,
    ...(file.modifiedTime !== undefined && { modifiedTime: file.modifiedTime }),
  };
}

export interface DriveStoreOptions {
  apiUrl?: string;
  tokens: AccessTokenProvider;
}

interface DriveRequest {
  method?: "GET" | "POST" | "PATCH";
  query?: Record<string, string | undefined>;
  body?: unknown;
}

export function createDriveStore(options: DriveStoreOptions): RemoteStore {
  const base = (options.apiUrl ?? DEFAULT_DRIVE_API_URL).replace(/\/+$/, "");

  async function send(path: string, req: DriveRequest = {}): Promise<Response> {
    const url = new URL(`${base}${path}`);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined && value !== "") {
        url.searchParams.set(key, value);
      }
    }

    const token = await options.tokens.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
    };
    if (req.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      return await fetch(url, {
        method: req.method ?? "GET",
        headers,
        ...(req.body !== undefined && { body: JSON.stringify(req.body) }),
      });
    } catch (e) {
      throw new RemoteStoreError(
        `Drive request failed: ${e instanceof Error ? e.message : String(e)}`,
        undefined,
        { cause: e },
      );
    }
  }

  async function parse<S extends z.ZodType>(
    res: Response,
    schema: S,
  ): Promise<z.output<S>> {
    if (!res.ok) {
      throw new RemoteStoreError(
        `Drive error: ${res.status} ${res.statusText}`,
        res.status,
      );
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new RemoteStoreError(
        "Drive response is not valid JSON",
        res.status,
        { cause: err },
      );
    }
    const body = schema.safeParse(json);
    if (!body.success) {
      throw new RemoteStoreError(
        `Unexpected Drive response: ${body.error.issues[0]?.message ?? "invalid body"}`,
        res.status,
      );
    }
    return body.data;
  }

  return {
    async getItem(id, fields = DEFAULT_FIELDS) {
      const res = await send(`/files/${encodeURIComponent(id)}`, {
        query: { fields },
      });
      if (res.status === 404) throw new ItemNotFoundError(id);
      return toRemoteItem(await parse(res, DriveFileSchema));
    },

    async listItems(request: ListItemsRequest): Promise<ItemPage> {
      const res = await send("/files", {
        query: {
          q: request.filter ? compileQuery(request.filter) : undefined,
          pageSize: String(request.pageSize),
          pageToken: request.pageToken,
          fields: `nextPageToken, files(${request.fields})`,
        },
      });
      const list = await parse(res, DriveFileListSchema);
      return {
        items: list.files.map(toRemoteItem),
        ...(list.nextPageToken !== undefined && {
          nextPageToken: list.nextPageToken,
        }),
      };
    },

    async createItem(draft: ItemDraft, fields = DEFAULT_FIELDS) {
      const res = await send("/files", {
        method: "POST",
        query: { fields },
        body: {
          name: draft.name,
          mimeType: MIME[draft.kind],
          ...(draft.parents && { parents: draft.parents }),
          ...(draft.properties && { properties: draft.properties }),
        },
      });
      return toRemoteItem(await parse(res, DriveFileSchema));
    },

    async updateProperties(id: string, patch: PropertyPatch) {
      const res = await send(`/files/${encodeURIComponent(id)}`, {
        method: "PATCH",
        query: { fields: DEFAULT_FIELDS },
        body: { properties: patch },
      });
      if (res.status === 404) throw new ItemNotFoundError(id);
      return toRemoteItem(await parse(res, DriveFileSchema));
    },
  };
}
