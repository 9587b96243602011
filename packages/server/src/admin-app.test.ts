import { describe, it, expect } from "vitest";
import pino from "pino";
import { RemoteCatalog } from "@sheetshelf/core/catalog";
import { ConfigError, RemoteStoreError } from "@sheetshelf/core/errors";
import { createMemoryStore } from "@sheetshelf/core/test-utils";
import { createAdminApp } from "./admin-app.js";

const logger = pino({ level: "silent" });

function createApp(getConnectionCount: () => number = () => 1) {
  const store = createMemoryStore();
  const catalog = new RemoteCatalog({ store, logger });
  const app = createAdminApp({
    logger,
    catalog,
    version: "0.0.1",
    startedAt: new Date(),
    getPort: () => 4567,
    getConnectionCount,
  });
  return { app, store };
}

describe("createAdminApp", () => {
  it("serves /health", async () => {
    const res = await createApp().app.request("/health");
    expect(res.status).toBe(200);
    expect((await res.json()).status).toBe("healthy");
  });

  it("serves /status", async () => {
    const res = await createApp().app.request("/status");
    expect(await res.json()).toEqual({
      status: "running",
      port: 4567,
      connections: 1,
    });
  });

  it("serves the catalog routes", async () => {
    const res = await createApp().app.request("/uploads");
    expect(await res.json()).toEqual({ path: "/", items: [] });
  });

  it("returns a JSON 404 for unknown routes", async () => {
    const res = await createApp().app.request("/v1/nothing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { errorCode: "NOT_FOUND", message: "Not found" },
    });
  });

  it("renders catalog errors with their code", async () => {
    const { app } = createApp(() => {
      throw new ConfigError("/tmp/config.json", "Invalid config");
    });

    const res = await app.request("/status");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        errorCode: "CONFIG_INVALID",
        message: "Invalid config",
        details: { configPath: "/tmp/config.json" },
      },
    });
  });

  it("answers a store failure with 502", async () => {
    const { app, store } = createApp();
    store.failNext("listItems", new RemoteStoreError("Drive error: 503", 503));

    const res = await app.request("/root");

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: {
        errorCode: "REMOTE_STORE",
        message: "Drive error: 503",
        details: { status: 503 },
      },
    });
  });

  it("hides other errors", async () => {
    const { app } = createApp(() => {
      throw new Error("secret detail");
    });

    const res = await app.request("/status");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { errorCode: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
