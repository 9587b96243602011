/**
 * Virtual paths are metadata strings used to group uploads, not real
 * filesystem paths: a leading and trailing slash around at most two
 * word segments, e.g. "/", "/photos/", "/photos/2024/".
 */
export const VIRTUAL_PATH_PATTERN = /^\/(?:[\w-]+\/){0,2}$/;

export const ROOT_PATH = "/";

export function isVirtualPath(path: string): boolean {
  return VIRTUAL_PATH_PATTERN.test(path);
}

/** Blank or invalid paths collapse to the root path. */
export function normalizeVirtualPath(path: string | undefined): string {
  if (path === undefined || path.trim() === "" || !isVirtualPath(path)) {
    return ROOT_PATH;
  }
  return path;
}
