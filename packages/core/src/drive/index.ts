export type {
  RemoteStore,
  ListItemsRequest,
  ItemPage,
  AccessTokenProvider,
} from "./interface.js";
export { createStaticTokenProvider } from "./interface.js";
export {
  MIME,
  PROPERTY,
  DEFAULT_FIELDS,
  kindFromMime,
  type ItemKind,
  type ItemProperties,
  type RemoteItem,
  type ItemDraft,
  type PropertyPatch,
} from "./types.js";
export {
  kindIs,
  parentIn,
  nameContains,
  nameEquals,
  trashedIs,
  propertyIs,
  allOf,
  anyOf,
  type ItemFilter,
} from "./filter.js";
export { compileQuery, quote } from "./query.js";
export {
  createDriveStore,
  DEFAULT_DRIVE_API_URL,
  type DriveStoreOptions,
} from "./google-drive.js";
