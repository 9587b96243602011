/**
 * Structured item filters. The store adapter renders them into the store's
 * textual query grammar (see query.ts); test doubles evaluate them directly.
 */

import type { ItemKind } from "./types.js";

export type ItemFilter =
  | { op: "kind"; kind: ItemKind }
  | { op: "parentIn"; parentId: string }
  | { op: "nameContains"; value: string }
  | { op: "nameEquals"; value: string }
  | { op: "trashed"; value: boolean }
  | { op: "property"; key: string; value: string }
  | { op: "and"; filters: ItemFilter[] }
  | { op: "or"; filters: ItemFilter[] };

export const kindIs = (kind: ItemKind): ItemFilter => ({ op: "kind", kind });

export const parentIn = (parentId: string): ItemFilter => ({
  op: "parentIn",
  parentId,
});

export const nameContains = (value: string): ItemFilter => ({
  op: "nameContains",
  value,
});

export const nameEquals = (value: string): ItemFilter => ({
  op: "nameEquals",
  value,
});

export const trashedIs = (value: boolean): ItemFilter => ({
  op: "trashed",
  value,
});

export const propertyIs = (key: string, value: string): ItemFilter => ({
  op: "property",
  key,
  value,
});

/** AND of the given filters; a single filter is returned as is. */
export function allOf(...filters: ItemFilter[]): ItemFilter {
  return filters.length === 1 ? filters[0] : { op: "and", filters };
}

/** OR of the given filters; a single filter is returned as is. */
export function anyOf(...filters: ItemFilter[]): ItemFilter {
  return filters.length === 1 ? filters[0] : { op: "or", filters };
}
