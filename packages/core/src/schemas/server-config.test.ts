import { describe, it, expect } from "vitest";
import { ServerConfigSchema } from "./server-config.js";

describe("ServerConfigSchema", () => {
  it("fills every section from defaults", () => {
    const config = ServerConfigSchema.parse({});

    expect(config).toEqual({
      server: { host: "127.0.0.1", port: 4567 },
      logging: { level: "info", pretty: false },
      drive: {
        apiUrl: "https://www.googleapis.com/drive/v3",
        pageSize: 50,
        rootFolderName: "sheetStore",
      },
      admin: { enabled: true },
    });
  });

  it("accepts port 0 for an ephemeral listener", () => {
    const config = ServerConfigSchema.parse({ server: { port: 0 } });
    expect(config.server.port).toBe(0);
  });

  it("rejects a page size above the store maximum", () => {
    const result = ServerConfigSchema.safeParse({ drive: { pageSize: 1001 } });
    expect(result.success).toBe(false);
  });

  it("rejects a non-URL drive apiUrl", () => {
    const result = ServerConfigSchema.safeParse({
      drive: { apiUrl: "not a url" },
    });
    expect(result.success).toBe(false);
  });

  it("rejects an empty root folder name", () => {
    const result = ServerConfigSchema.safeParse({
      drive: { rootFolderName: "" },
    });
    expect(result.success).toBe(false);
  });

  it("takes an explicit admin socket path", () => {
    const config = ServerConfigSchema.parse({
      admin: { socketPath: "/run/shelf.sock" },
    });
    expect(config.admin).toEqual({
      enabled: true,
      socketPath: "/run/shelf.sock",
    });
  });

  it("rejects an empty admin socket path", () => {
    const result = ServerConfigSchema.safeParse({ admin: { socketPath: "" } });
    expect(result.success).toBe(false);
  });

  it("rejects unknown log levels", () => {
    const result = ServerConfigSchema.safeParse({
      logging: { level: "verbose" },
    });
    expect(result.success).toBe(false);
  });
});
