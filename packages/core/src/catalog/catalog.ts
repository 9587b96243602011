/**
 * Remote catalog: domain operations over a RemoteStore.
 *
 * Uploads are folders tagged with `directParent = "true"` and a virtual
 * `path` property; all of them live under a single root folder that is
 * found or created on first use.
 */

import type { Logger } from "pino";
import { ItemNotFoundError } from "../errors/catalog.js";
import {
  allOf,
  anyOf,
  kindIs,
  nameContains,
  nameEquals,
  parentIn,
  propertyIs,
  trashedIs,
  type ItemFilter,
} from "../drive/filter.js";
import type { RemoteStore } from "../drive/interface.js";
import {
  DEFAULT_FIELDS,
  PROPERTY,
  type ItemKind,
  type ItemProperties,
  type PropertyPatch,
  type RemoteItem,
} from "../drive/types.js";
import { LazyCell } from "./lazy.js";
import { ROOT_PATH, normalizeVirtualPath } from "./paths.js";

export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_ROOT_FOLDER_NAME = "sheetStore";

/** Pass as the limit to getFiles() to walk every page. Use sparingly. */
export const UNLIMITED = -1;

export interface RemoteCatalogOptions {
  store: RemoteStore;
  logger: Logger;
  /** Items requested per page (default: 50) */
  pageSize?: number;
  /** Name of the root folder (default: "sheetStore") */
  rootFolderName?: string;
}

export interface FileQuery {
  /** Extra filter ANDed with the kind filter */
  query?: ItemFilter;
  /** Partial-response fields; must include mimeType when kinds are given */
  fields?: string;
  /** Kinds to match; any kind when empty */
  kinds?: ItemKind[];
}

type ItemRef = RemoteItem | string;

export class RemoteCatalog {
  private readonly store: RemoteStore;
  private readonly logger: Logger;
  private readonly pageSize: number;
  private readonly rootFolderName: string;
  private readonly root: LazyCell<RemoteItem>;

  constructor(options: RemoteCatalogOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.rootFolderName = options.rootFolderName ?? DEFAULT_ROOT_FOLDER_NAME;
    this.root = new LazyCell(() => this.findOrCreateRoot());
  }

  /**
   * Fetch an item by id.
   * Without `fields`, a missing item yields null; with `fields`, every
   * store error, not-found included, propagates.
   */
  async getFile(id: string): Promise<RemoteItem | null>;
  async getFile(id: string, fields: string): Promise<RemoteItem>;
  async getFile(id: string, fields?: string): Promise<RemoteItem | null> {
    if (fields !== undefined) {
      return this.store.getItem(id, fields);
    }
    try {
      return await this.store.getItem(id);
    } catch (err) {
      if (err instanceof ItemNotFoundError) return null;
      throw err;
    }
  }

  /**
   * Id of the first folder whose name contains `name`.
   * Lookup failures are reported as "not found".
   */
  async getIdOfName(name: string, inSheetStore = true): Promise<string | null> {
    try {
      const filters = [nameContains(name.replaceAll("'", ""))];
      if (inSheetStore) {
        const root = await this.getSheetStore();
        filters.unshift(parentIn(root.id));
      }
      const [first] = await this.getFiles(1, {
        query: allOf(...filters),
        kinds: ["FOLDER"],
      });
      return first?.id ?? null;
    } catch (err) {
      this.logger.debug({ err, name }, "Folder lookup failed");
      return null;
    }
  }

  /**
   * Upload folders under a virtual path. Starred listings ignore the path.
   * Store failures are logged and yield an empty list.
   */
  async listUploads(
    path: string = ROOT_PATH,
    starred = false,
    trashed = false,
  ): Promise<RemoteItem[]> {
    const filters: ItemFilter[] = [
      propertyIs(PROPERTY.DIRECT_PARENT, "true"),
    ];
    if (!starred) {
      filters.push(propertyIs(PROPERTY.PATH, normalizeVirtualPath(path)));
    }
    filters.push(trashedIs(trashed));
    if (starred) {
      filters.push(propertyIs(PROPERTY.STARRED, "true"));
    }

    try {
      return await this.getFiles(UNLIMITED, {
        query: allOf(...filters),
        kinds: ["FOLDER"],
      });
    } catch (err) {
      this.logger.error(
        { err, path, starred, trashed },
        "Failed to list uploads",
      );
      return [];
    }
  }

  /** Documents tagged as direct-parent entries, or those under `parentId`. */
  async getAllSheets(parentId?: string): Promise<RemoteItem[]> {
    const query =
      parentId === undefined
        ? propertyIs(PROPERTY.DIRECT_PARENT, "true")
        : parentIn(parentId);
    return this.getFiles(UNLIMITED, { query, kinds: ["DOCUMENT"] });
  }

  async createFolder(
    name: string,
    parent?: ItemRef,
    properties?: ItemProperties,
  ): Promise<RemoteItem> {
    return this.store.createItem({
      name,
      kind: "FOLDER",
      ...(parent !== undefined && { parents: [idOf(parent)] }),
      ...(properties !== undefined && { properties }),
    });
  }

  /**
   * Merge `properties` over the item's current ones. Keys not named in
   * `properties` keep their values.
   */
  async addProperties(
    target: ItemRef,
    properties: ItemProperties,
  ): Promise<RemoteItem> {
    const current = await this.withProperties(target);
    return this.setProperties(current, {
      ...current.properties,
      ...properties,
    });
  }

  /**
   * Replace the item's property map. Keys not named in `properties` are
   * removed.
   */
  async setProperties(
    target: ItemRef,
    properties: ItemProperties,
  ): Promise<RemoteItem> {
    const current = await this.withProperties(target);
    const patch: PropertyPatch = { ...properties };
    for (const key of Object.keys(current.properties)) {
      if (!(key in properties)) patch[key] = null;
    }
    return this.store.updateProperties(current.id, patch);
  }

  /**
   * Page through matching items until `limit` are collected (UNLIMITED for
   * all) or the store has no further pages. Pages are fetched one after
   * another on a single cursor.
   */
  async getFiles(
    limit: number,
    options: FileQuery = {},
  ): Promise<RemoteItem[]> {
    if (limit === 0) return [];

    const kinds = new Set(options.kinds ?? []);
    const filter = buildFilter(kinds, options.query);
    const fields = options.fields ?? DEFAULT_FIELDS;
    const found: RemoteItem[] = [];

    let pageToken: string | undefined;
    do {
      const page = await this.store.listItems({
        filter,
        pageSize: this.pageSize,
        pageToken,
        fields,
      });

      for (const item of page.items) {
        // The store's kind filter is advisory
        if (kinds.size > 0 && !kinds.has(item.kind)) continue;
        found.push(item);
        if (limit > 0 && found.length >= limit) return found;
      }

      pageToken = page.nextPageToken;
    } while (pageToken);

    return found;
  }

  /** The root folder, found or created once per process. */
  getSheetStore(): Promise<RemoteItem> {
    return this.root.get();
  }

  private async findOrCreateRoot(): Promise<RemoteItem> {
    const [existing] = await this.getFiles(1, {
      query: allOf(nameEquals(this.rootFolderName), trashedIs(false)),
      kinds: ["FOLDER"],
    });
    if (existing) {
      this.logger.debug({ id: existing.id }, "Found root folder");
      return existing;
    }

    const created = await this.createFolder(this.rootFolderName);
    this.logger.info(
      { id: created.id, name: this.rootFolderName },
      "Created root folder",
    );
    return created;
  }

  private async withProperties(target: ItemRef): Promise<RemoteItem> {
    if (typeof target !== "string") return target;
    return this.store.getItem(target, "id, properties");
  }
}

function idOf(ref: ItemRef): string {
  return typeof ref === "string" ? ref : ref.id;
}

function buildFilter(
  kinds: ReadonlySet<ItemKind>,
  query: ItemFilter | undefined,
): ItemFilter | undefined {
  const parts: ItemFilter[] = [];
  if (kinds.size > 0) {
    parts.push(anyOf(...[...kinds].map(kindIs)));
  }
  if (query) parts.push(query);
  return parts.length > 0 ? allOf(...parts) : undefined;
}
