import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { ServerConfigSchema } from "@sheetshelf/core/schemas";
import {
  createMemoryStore,
  type MemoryStore,
  type SeedItem,
} from "@sheetshelf/core/test-utils";
import { adminSocketPath, listenAdminSocket } from "@sheetshelf/runtime";
import { createServer, type ServerContext } from "@sheetshelf/server";

export interface TestServer {
  port: number;
  storageRoot: string;
  socketPath: string;
  store: MemoryStore;
  context: ServerContext;
  cleanup: () => Promise<void>;
}

/**
 * Boot the full server on an ephemeral port, backed by an in-memory store,
 * with the admin socket in a temporary storage root.
 */
export async function startTestServer(options?: {
  seed?: SeedItem[];
}): Promise<TestServer> {
  const storageRoot = await mkdtemp(join(tmpdir(), "e2e-shelf-"));

  const config = ServerConfigSchema.parse({
    server: { port: 0 },
    logging: { level: "fatal" },
  });

  const store = createMemoryStore(options?.seed ?? []);
  const context = await createServer(config, {
    rootPath: storageRoot,
    store,
    logger: pino({ level: "silent" }),
  });

  const { port } = await context.start();
  const socketPath = adminSocketPath({ storageRoot });
  const admin = await listenAdminSocket({
    socketPath,
    fetch: context.adminApp.fetch,
    logger: context.logger,
  });

  return {
    port,
    storageRoot,
    socketPath,
    store,
    context,
    cleanup: async () => {
      await admin.close();
      await context.cleanup();
      await rm(storageRoot, { recursive: true, force: true });
    },
  };
}
