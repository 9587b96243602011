/** MIME types the store uses for the item kinds this system cares about. */
export const MIME = {
  FOLDER: "application/vnd.google-apps.folder",
  DOCUMENT: "application/vnd.google-apps.spreadsheet",
} as const;

export type ItemKind = "FOLDER" | "DOCUMENT" | "OTHER";

export function kindFromMime(mimeType: string | undefined): ItemKind {
  switch (mimeType) {
    case MIME.FOLDER:
      return "FOLDER";
    case MIME.DOCUMENT:
      return "DOCUMENT";
    default:
      return "OTHER";
  }
}

export type ItemProperties = Record<string, string>;

/** One node of the remote store. */
export interface RemoteItem {
  id: string;
  name: string;
  kind: ItemKind;
  mimeType: string;
  parents: string[];
  properties: ItemProperties;
  trashed: boolean;
  /** ISO 8601, when the store reports one */
  modifiedTime?: string;
}

/** Metadata keys with a meaning to the catalog. */
export const PROPERTY = {
  PATH: "path",
  DIRECT_PARENT: "directParent",
  STARRED: "starred",
  SIZE: "size",
} as const;

/**
 * Partial-response field list used when the caller does not ask for one.
 * Must include mimeType, since kinds are derived from it.
 */
export const DEFAULT_FIELDS =
  "id, name, mimeType, parents, properties, trashed, modifiedTime";

export interface ItemDraft {
  name: string;
  kind: Exclude<ItemKind, "OTHER">;
  parents?: string[];
  properties?: ItemProperties;
}

/**
 * Property patch in the store's own terms: a string sets a key, null
 * removes it, keys left out are untouched.
 */
export type PropertyPatch = Record<string, string | null>;
