import { describe, it, expect } from "vitest";
import { ListenerStatusSchema, UploadQuerySchema } from "./admin.js";

describe("UploadQuerySchema", () => {
  it("defaults to the root path with both flags off", () => {
    expect(UploadQuerySchema.parse({})).toEqual({
      path: "/",
      starred: false,
      trashed: false,
    });
  });

  it("reads flags from query string values", () => {
    expect(
      UploadQuerySchema.parse({ path: "/a/", starred: "true", trashed: "false" }),
    ).toEqual({ path: "/a/", starred: true, trashed: false });
  });

  it("rejects a flag that is not true or false", () => {
    expect(UploadQuerySchema.safeParse({ starred: "yes" }).success).toBe(false);
  });
});

describe("ListenerStatusSchema", () => {
  it("allows a null port before the listener is bound", () => {
    const status = { status: "starting", port: null, connections: 0 };
    expect(ListenerStatusSchema.parse(status)).toEqual(status);
  });

  it("rejects an unknown status", () => {
    const result = ListenerStatusSchema.safeParse({
      status: "stopped",
      port: 1,
      connections: 0,
    });
    expect(result.success).toBe(false);
  });
});
