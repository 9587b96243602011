export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
  DRIVE_TOKEN_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export {
  CONFIG_FILE_NAME,
  configPathIn,
  expandHomePath,
  resolveRootPath,
} from "./paths.js";
