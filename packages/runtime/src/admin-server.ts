/**
 * Admin server: HTTP over a Unix domain socket (a named pipe on Windows),
 * serving a fetch handler such as a Hono app's.
 *
 * The socket file is restricted to its owner (0600). A leftover socket from
 * a crashed process is replaced; a socket something still answers on, or a
 * file that is not a socket, is left alone and startup fails.
 */

import { createServer, type Server } from "node:http";
import { connect } from "node:net";
import { chmod, lstat, rm } from "node:fs/promises";
import { getRequestListener } from "@hono/node-server";
import type { Logger } from "pino";
import { AdminSocketError } from "@sheetshelf/core/errors";

export interface AdminServerOptions {
  socketPath: string;
  /** The request handler function (Hono's fetch adapter). */
  fetch: (request: Request) => Response | Promise<Response>;
  logger: Logger;
}

export interface AdminServer {
  server: Server;
  socketPath: string;
  close: () => Promise<void>;
}

function hasCode(err: unknown, ...codes: string[]): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    codes.includes(err.code)
  );
}

/** Resolves true when a process accepts connections on the socket. */
function isAnswering(socketPath: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const socket = connect(socketPath);
    socket.once("connect", () => {
      socket.destroy();
      resolve(true);
    });
    socket.once("error", (err) => {
      if (hasCode(err, "ECONNREFUSED", "ENOENT")) resolve(false);
      else reject(err);
    });
  });
}

async function clearStaleSocket(
  socketPath: string,
  logger: Logger,
): Promise<void> {
  let isSocket: boolean;
  try {
    isSocket = (await lstat(socketPath)).isSocket();
  } catch (err) {
    if (hasCode(err, "ENOENT")) return;
    throw err;
  }

  if (!isSocket) {
    throw new AdminSocketError(
      socketPath,
      `Refusing to replace ${socketPath}: not a socket`,
    );
  }
  if (await isAnswering(socketPath)) {
    throw new AdminSocketError(
      socketPath,
      `Admin socket already in use: ${socketPath}`,
    );
  }

  logger.info({ socketPath }, "Removing stale admin socket");
  await rm(socketPath, { force: true });
}

export async function listenAdminSocket(
  options: AdminServerOptions,
): Promise<AdminServer> {
  const { socketPath, logger } = options;
  const usesFile = process.platform !== "win32";

  if (usesFile) {
    await clearStaleSocket(socketPath, logger);
  }

  const server = createServer(getRequestListener(options.fetch));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => {
      server.removeListener("error", reject);
      resolve();
    });
  });

  if (usesFile) {
    try {
      await chmod(socketPath, 0o600);
    } catch (err) {
      logger.warn({ err, socketPath }, "Could not restrict admin socket");
    }
  }

  logger.info({ socketPath }, "Admin socket listening");

  return {
    server,
    socketPath,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          if (!usesFile) {
            resolve();
            return;
          }
          rm(socketPath, { force: true }).then(resolve, reject);
        });
      }),
  };
}
