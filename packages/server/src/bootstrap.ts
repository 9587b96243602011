import { mkdir } from "node:fs/promises";
import type { AddressInfo } from "node:net";
import type { Hono } from "hono";
import { RemoteCatalog } from "@sheetshelf/core/catalog";
import { DRIVE_TOKEN_ENV, resolveRootPath } from "@sheetshelf/core/config";
import {
  createDriveStore,
  createStaticTokenProvider,
  type AccessTokenProvider,
  type RemoteStore,
} from "@sheetshelf/core/drive";
import { RemoteStoreError } from "@sheetshelf/core/errors";
import {
  componentLogger,
  createLogger,
  type Logger,
} from "@sheetshelf/core/logger";
import type { ServerConfig } from "@sheetshelf/core/schemas";
import { ProtocolServer } from "@sheetshelf/runtime";
import { createAdminApp } from "./admin-app.js";
import { createListHandler } from "./handlers/list.js";
import { VERSION } from "./version.js";

export interface ServerContext {
  protocol: ProtocolServer;
  catalog: RemoteCatalog;
  adminApp: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  storageRoot: string;
  /** Bind the protocol listener. Rejects if the port cannot be bound. */
  start: () => Promise<AddressInfo>;
  startBackgroundServices: () => Promise<void>;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Store to catalog. Default: the Drive REST adapter. */
  store?: RemoteStore;
  /** Token source for the Drive adapter. Default: SHEETSHELF_DRIVE_TOKEN. */
  tokens?: AccessTokenProvider;
  logger?: Logger;
}

function tokensFromEnv(logger: Logger): AccessTokenProvider {
  const token = process.env[DRIVE_TOKEN_ENV];
  if (token) {
    return createStaticTokenProvider(token);
  }

  logger.warn(`${DRIVE_TOKEN_ENV} not set, catalog requests will fail`);
  return {
    async getAccessToken() {
      throw new RemoteStoreError(`${DRIVE_TOKEN_ENV} is not set`);
    },
  };
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const storageRoot = resolveRootPath(options?.rootPath);
  await mkdir(storageRoot, { recursive: true });

  const store =
    options?.store ??
    createDriveStore({
      apiUrl: config.drive.apiUrl,
      tokens: options?.tokens ?? tokensFromEnv(logger),
    });

  const catalog = new RemoteCatalog({
    store,
    logger: componentLogger(logger, "catalog"),
    pageSize: config.drive.pageSize,
    rootFolderName: config.drive.rootFolderName,
  });

  const protocolLogger = componentLogger(logger, "protocol-server");
  const protocol = new ProtocolServer({
    host: config.server.host,
    port: config.server.port,
    logger: protocolLogger,
  });
  protocol.registerHandler("LIST_REQUEST", createListHandler(catalog));
  protocol.addReceiver((_connection, line) => {
    protocolLogger.trace({ line }, "Line received");
  });

  let boundPort: number | null = null;

  const adminApp = createAdminApp({
    logger,
    catalog,
    version: VERSION,
    startedAt,
    getPort: () => boundPort,
    getConnectionCount: () => protocol.connectionCount(),
  });

  return {
    protocol,
    catalog,
    adminApp,
    logger,
    config,
    startedAt,
    storageRoot,
    start: async () => {
      const address = await protocol.start();
      boundPort = address.port;
      return address;
    },
    startBackgroundServices: async () => {
      // Resolve the root folder up front so the first request does not pay
      // for it. Failure is not memoized; the next caller retries.
      try {
        const root = await catalog.getSheetStore();
        logger.info({ rootId: root.id }, "Root folder ready");
      } catch (err) {
        logger.warn({ err }, "Root folder not resolved, will retry on use");
      }
    },
    cleanup: async () => {
      protocol.close();
      boundPort = null;
      await protocol.drain();
    },
  };
}
