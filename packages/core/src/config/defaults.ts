import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "sheetshelf");

/** Environment variable overriding the storage root. */
export const ROOT_PATH_ENV = "SHEETSHELF_ROOT_PATH";

/** Environment variable holding the Drive access token. */
export const DRIVE_TOKEN_ENV = "SHEETSHELF_DRIVE_TOKEN";
