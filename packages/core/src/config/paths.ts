import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH, ROOT_PATH_ENV } from "./defaults.js";

export const CONFIG_FILE_NAME = "config.json";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Absolute storage root. An explicit path wins, then a non-blank
 * SHEETSHELF_ROOT_PATH, then ~/sheetshelf.
 */
export function resolveRootPath(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromEnv = env[ROOT_PATH_ENV]?.trim();
  const chosen = input ?? (fromEnv ? fromEnv : DEFAULT_ROOT_PATH);
  return resolve(expandHomePath(chosen));
}

export function configPathIn(rootPath: string): string {
  return join(rootPath, CONFIG_FILE_NAME);
}
