/**
 * Remote store boundary.
 * The catalog depends on these four calls and nothing else. Implementations
 * signal a missing item on getItem() with ItemNotFoundError; every other
 * failure is a RemoteStoreError.
 */

import type { ItemFilter } from "./filter.js";
import type { ItemDraft, PropertyPatch, RemoteItem } from "./types.js";

export interface ListItemsRequest {
  filter?: ItemFilter;
  pageSize: number;
  /** Cursor from the previous page's nextPageToken */
  pageToken?: string;
  /** Partial-response fields for each item */
  fields: string;
}

export interface ItemPage {
  items: RemoteItem[];
  /** Absent on the last page */
  nextPageToken?: string;
}

export interface RemoteStore {
  /**
   * Fetch one item.
   * @param fields - partial-response projection; all default fields if omitted
   * @throws ItemNotFoundError if no item has this id
   */
  getItem(id: string, fields?: string): Promise<RemoteItem>;

  /** Fetch one page of items matching the filter. */
  listItems(request: ListItemsRequest): Promise<ItemPage>;

  /** Create an item; returns it as the store reports it, id included. */
  createItem(draft: ItemDraft, fields?: string): Promise<RemoteItem>;

  /** Apply a property patch (null removes a key) and return the result. */
  updateProperties(id: string, patch: PropertyPatch): Promise<RemoteItem>;
}

/**
 * Supplies bearer tokens for store requests.
 * Acquisition and refresh live outside this package.
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/** Provider for a token obtained elsewhere, e.g. from the environment. */
export function createStaticTokenProvider(token: string): AccessTokenProvider {
  return {
    async getAccessToken() {
      return token;
    },
  };
}
