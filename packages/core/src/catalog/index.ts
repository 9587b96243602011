export {
  RemoteCatalog,
  UNLIMITED,
  DEFAULT_PAGE_SIZE,
  DEFAULT_ROOT_FOLDER_NAME,
  type RemoteCatalogOptions,
  type FileQuery,
} from "./catalog.js";
export { LazyCell } from "./lazy.js";
export {
  VIRTUAL_PATH_PATTERN,
  ROOT_PATH,
  isVirtualPath,
  normalizeVirtualPath,
} from "./paths.js";
