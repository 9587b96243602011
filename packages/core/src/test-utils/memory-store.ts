/**
 * In-memory RemoteStore for tests.
 * Evaluates ItemFilters directly, pages with numeric cursors, and records
 * every call so tests can assert how the catalog walks the store.
 */

import { ItemNotFoundError } from "../errors/catalog.js";
import type { ItemFilter } from "../drive/filter.js";
import type {
  ItemPage,
  ListItemsRequest,
  RemoteStore,
} from "../drive/interface.js";
import {
  MIME,
  kindFromMime,
  type ItemDraft,
  type ItemKind,
  type PropertyPatch,
  type RemoteItem,
} from "../drive/types.js";

export interface SeedItem {
  id: string;
  name: string;
  kind?: ItemKind;
  parents?: string[];
  properties?: Record<string, string>;
  trashed?: boolean;
  modifiedTime?: string;
}

export type StoreMethod = keyof RemoteStore;

export interface MemoryStore extends RemoteStore {
  /** Current items in insertion order (copies). */
  snapshot(): RemoteItem[];
  /** Calls made so far, by method. */
  calls: Record<StoreMethod, number>;
  /** Filters passed to listItems(), in order. */
  listRequests: ListItemsRequest[];
  /** Make the next call to `method` reject with `error`. */
  failNext(method: StoreMethod, error: Error): void;
  /** Add items after construction. */
  seed(...items: SeedItem[]): void;
}

const OTHER_MIME = "application/octet-stream";

function mimeOf(kind: ItemKind): string {
  return kind === "OTHER" ? OTHER_MIME : MIME[kind];
}

function toItem(seed: SeedItem): RemoteItem {
  const kind = seed.kind ?? "FOLDER";
  return {
    id: seed.id,
    name: seed.name,
    kind,
    mimeType: mimeOf(kind),
    parents: [...(seed.parents ?? [])],
    properties: { ...(seed.properties ?? {}) },
    trashed: seed.trashed ?? false,
    modifiedTime: seed.modifiedTime ?? "2024-05-01T12:00:00.000Z",
  };
}

function clone(item: RemoteItem): RemoteItem {
  return {
    ...item,
    parents: [...item.parents],
    properties: { ...item.properties },
  };
}

export function matchesFilter(item: RemoteItem, filter: ItemFilter): boolean {
  switch (filter.op) {
    case "kind":
      return item.kind === filter.kind;
    case "parentIn":
      return item.parents.includes(filter.parentId);
    case "nameContains":
      return item.name.includes(filter.value);
    case "nameEquals":
      return item.name === filter.value;
    case "trashed":
      return item.trashed === filter.value;
    case "property":
      return item.properties[filter.key] === filter.value;
    case "and":
      return filter.filters.every((f) => matchesFilter(item, f));
    case "or":
      return filter.filters.some((f) => matchesFilter(item, f));
  }
}

export function createMemoryStore(initial: SeedItem[] = []): MemoryStore {
  const items = new Map<string, RemoteItem>();
  const failures = new Map<StoreMethod, Error>();
  let nextId = 1;

  const calls: Record<StoreMethod, number> = {
    getItem: 0,
    listItems: 0,
    createItem: 0,
    updateProperties: 0,
  };
  const listRequests: ListItemsRequest[] = [];

  function enter(method: StoreMethod): void {
    calls[method] += 1;
    const failure = failures.get(method);
    if (failure) {
      failures.delete(method);
      throw failure;
    }
  }

  function seed(...seeds: SeedItem[]): void {
    for (const s of seeds) items.set(s.id, toItem(s));
  }

  seed(...initial);

  return {
    calls,
    listRequests,

    snapshot() {
      return [...items.values()].map(clone);
    },

    failNext(method, error) {
      failures.set(method, error);
    },

    seed,

    async getItem(id: string): Promise<RemoteItem> {
      enter("getItem");
      const item = items.get(id);
      if (!item) throw new ItemNotFoundError(id);
      return clone(item);
    },

    async listItems(request: ListItemsRequest): Promise<ItemPage> {
      enter("listItems");
      listRequests.push(request);
      const { filter } = request;
      const matching = [...items.values()].filter(
        (item) => filter === undefined || matchesFilter(item, filter),
      );
      const offset = request.pageToken ? Number(request.pageToken) : 0;
      const end = offset + request.pageSize;
      return {
        items: matching.slice(offset, end).map(clone),
        ...(end < matching.length && { nextPageToken: String(end) }),
      };
    },

    async createItem(draft: ItemDraft): Promise<RemoteItem> {
      enter("createItem");
      const id = `item-${nextId++}`;
      const mimeType = MIME[draft.kind];
      const item: RemoteItem = {
        id,
        name: draft.name,
        kind: kindFromMime(mimeType),
        mimeType,
        parents: [...(draft.parents ?? [])],
        properties: { ...(draft.properties ?? {}) },
        trashed: false,
        modifiedTime: new Date().toISOString(),
      };
      items.set(id, item);
      return clone(item);
    },

    async updateProperties(id: string, patch: PropertyPatch) {
      enter("updateProperties");
      const item = items.get(id);
      if (!item) throw new ItemNotFoundError(id);
      for (const [key, value] of Object.entries(patch)) {
        if (value === null) delete item.properties[key];
        else item.properties[key] = value;
      }
      return clone(item);
    },
  };
}
