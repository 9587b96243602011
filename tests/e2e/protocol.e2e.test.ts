import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Payload } from "@sheetshelf/core/payload";
import { AdminClient, LineClient } from "@sheetshelf/runtime";
import { startTestServer, type TestServer } from "./helpers/server.js";

function listRequest(
  state: string,
  query: string,
  flags: { starred?: boolean; trashed?: boolean } = {},
): Payload {
  return { code: 1, message: "", type: "LIST_REQUEST", state, query, ...flags };
}

function namesOf(payload: Payload): string[] {
  if (payload.type !== "LIST_RESPONSE") {
    throw new Error(`expected LIST_RESPONSE, got ${payload.type}`);
  }
  return payload.items.map((item) => item.name);
}

describe.skipIf(process.platform === "win32")("Protocol server (e2e)", () => {
  let server: TestServer;
  let client: LineClient;

  beforeAll(async () => {
    server = await startTestServer({
      seed: [
        { id: "root", name: "sheetStore" },
        {
          id: "inbox",
          name: "inbox",
          parents: ["root"],
          properties: { directParent: "true", path: "/" },
        },
        {
          id: "trip",
          name: "trip",
          parents: ["root"],
          properties: { directParent: "true", path: "/photos/", starred: "true" },
        },
        {
          id: "pets",
          name: "pets",
          parents: ["root"],
          properties: { directParent: "true", path: "/photos/" },
        },
        {
          id: "old",
          name: "old",
          parents: ["root"],
          trashed: true,
          properties: { directParent: "true", path: "/photos/" },
        },
      ],
    });
    client = await LineClient.connect({ port: server.port });
  });

  afterAll(async () => {
    client.close();
    await server.cleanup();
  });

  it("lists uploads by virtual path", async () => {
    expect(namesOf(await client.request(listRequest("p1", "/")))).toEqual([
      "inbox",
    ]);
    expect(
      namesOf(await client.request(listRequest("p2", "/photos/"))),
    ).toEqual(["trip", "pets"]);
  });

  it("lists starred and trashed uploads", async () => {
    const starred = await client.request(
      listRequest("s1", "/", { starred: true }),
    );
    const trashed = await client.request(
      listRequest("t1", "/photos/", { trashed: true }),
    );

    expect(namesOf(starred)).toEqual(["trip"]);
    expect(namesOf(trashed)).toEqual(["old"]);
  });

  it("answers an invalid path as the root path", async () => {
    const reply = await client.request(listRequest("bad", "../etc"));
    expect(namesOf(reply)).toEqual(["inbox"]);
  });

  it("keeps replies on their own connection", async () => {
    const other = await LineClient.connect({ port: server.port });
    try {
      const [mine, theirs] = await Promise.all([
        client.request(listRequest("mine", "/")),
        other.request(listRequest("theirs", "/photos/")),
      ]);

      expect(mine.state).toBe("mine");
      expect(theirs.state).toBe("theirs");
      expect(client.pending()).toEqual([]);
      expect(other.pending()).toEqual([]);
    } finally {
      other.close();
    }
  });

  it("rejects an unknown payload type with the state echoed", async () => {
    await client.sendRaw('{"code":1,"type":"UPLOAD_REQUEST","state":"u1"}');
    const reply = JSON.parse(await client.nextLine());

    expect(reply.type).toBe("ERROR");
    expect(reply.state).toBe("u1");
    expect(reply.message).toMatch(/^Invalid envelope: type: /);
  });

  it("reports listener state over the admin socket", async () => {
    const admin = new AdminClient({ socketPath: server.socketPath });

    const status = await admin.status();

    expect(status.status).toBe("running");
    expect(status.port).toBe(server.port);
    expect(status.connections).toBeGreaterThanOrEqual(1);
  });

  it("serves /health over the admin socket", async () => {
    const admin = new AdminClient({ socketPath: server.socketPath });
    expect((await admin.health()).status).toBe("healthy");
  });

  it("lists the same uploads over the admin socket", async () => {
    const admin = new AdminClient({ socketPath: server.socketPath });

    const listing = await admin.uploads({ path: "/photos/" });
    const reply = await client.request(listRequest("same", "/photos/"));

    expect(listing.path).toBe("/photos/");
    expect(reply.type === "LIST_RESPONSE" && reply.items).toEqual(
      listing.items,
    );
  });

  it("resolves the existing root folder over the admin socket", async () => {
    const admin = new AdminClient({ socketPath: server.socketPath });
    expect(await admin.root()).toEqual({ id: "root", name: "sheetStore" });
  });
});
