/**
 * Admin socket location.
 *
 * An explicit `admin.socketPath` wins; otherwise the socket is admin.sock
 * in the storage root. Windows has no socket files, so there it is a named
 * pipe keyed by the storage root, letting several roots run side by side.
 */

import { createHash } from "node:crypto";
import { join, resolve } from "node:path";
import { AdminSocketError } from "@sheetshelf/core/errors";

export const ADMIN_SOCKET_FILE = "admin.sock";

// sun_path is 104 bytes on macOS, terminator included
export const MAX_SOCKET_PATH_BYTES = 103;

export interface AdminSocketOptions {
  storageRoot: string;
  /** From config; overrides the default location. */
  socketPath?: string;
  platform?: NodeJS.Platform;
}

function pipeKey(storageRoot: string): string {
  return createHash("sha256")
    .update(resolve(storageRoot))
    .digest("hex")
    .slice(0, 12);
}

export function adminSocketPath(options: AdminSocketOptions): string {
  const platform = options.platform ?? process.platform;

  if (platform === "win32") {
    const pipe = `\\\\.\\pipe\\sheetshelf-${pipeKey(options.storageRoot)}`;
    return options.socketPath ?? pipe;
  }

  const socketPath = resolve(
    options.socketPath ?? join(options.storageRoot, ADMIN_SOCKET_FILE),
  );
  const bytes = Buffer.byteLength(socketPath, "utf8");
  if (bytes > MAX_SOCKET_PATH_BYTES) {
    throw new AdminSocketError(
      socketPath,
      `Admin socket path is ${bytes} bytes, over the ${MAX_SOCKET_PATH_BYTES}-byte limit; set admin.socketPath to a shorter path`,
    );
  }
  return socketPath;
}
