import { afterEach, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import { loadConfig } from "../src/config.js";
import { createGateway, type Gateway } from "../src/gateway.js";
import { silentLogger } from "../src/lib/log.js";
import { createApp } from "../src/server.js";
import { faultyBackend, type FaultyBackend } from "./helpers.js";

const HELLO_DIGEST = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

const BACKENDS = JSON.stringify([
  { id: "P", role: "PRIMARY", adapter: { type: "memory" } },
  { id: "S1", role: "SYNC_REPLICA", adapter: { type: "memory" } },
  { id: "A1", role: "ASYNC_REPLICA", adapter: { type: "memory" } }
]);

describe("object http api", () => {
  let gateway: Gateway;
  let stores: Record<string, FaultyBackend>;

  function boot(env: Record<string, string> = {}) {
    const config = loadConfig({ BACKENDS, CATALOG_PATH: "memory", JOURNAL_PATH: "memory", ...env });
    stores = { P: faultyBackend("P"), S1: faultyBackend("S1"), A1: faultyBackend("A1") };
    gateway = createGateway(config, { backendOverrides: stores, log: silentLogger });
    return createApp(gateway);
  }

  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    app = boot();
  });

  afterEach(async () => {
    await gateway.close();
  });

  it("stores an object and serves it back with its metadata", async () => {
    const put = await request(app).put("/objects/docs/hello.txt").set("content-type", "text/plain").send("hello");
    expect(put.status).toBe(201);
    expect(put.headers["x-content-digest"]).toBe(HELLO_DIGEST);
    expect(put.body).toEqual({
      key: "docs/hello.txt",
      digest: HELLO_DIGEST,
      size: 5,
      version: 1,
      syncFailures: [],
      asyncPending: ["A1"]
    });

    const got = await request(app).get("/objects/docs/hello.txt");
    expect(got.status).toBe(200);
    expect(got.text).toBe("hello");
    expect(got.headers["content-type"]).toMatch(/^text\/plain/);
    expect(got.headers["x-served-by"]).toBe("P");
    expect(got.headers["x-object-version"]).toBe("1");

    const head = await request(app).head("/objects/docs/hello.txt");
    expect(head.status).toBe(200);
    expect(head.headers["content-length"]).toBe("5");
    expect(head.headers["x-content-digest"]).toBe(HELLO_DIGEST);
  });

  it("reports sync replica failures without failing the write", async () => {
    stores.S1.faults.put = "unavailable";
    const put = await request(app).put("/objects/k1").set("content-type", "text/plain").send("hello");
    expect(put.status).toBe(201);
    expect(put.body.syncFailures).toEqual(["S1"]);

    const status = await request(app).get("/v1/status");
    expect(status.body.recent_events).toHaveLength(1);
    expect(status.body.recent_events[0]).toMatchObject({ key: "k1", backendId: "S1", status: "SYNC_FAILURE" });
  });

  it("maps a failed primary write to 502", async () => {
    stores.P.faults.put = "unavailable";
    const put = await request(app).put("/objects/k1").set("content-type", "text/plain").send("hello");
    expect(put.status).toBe(502);
    expect(put.body).toEqual({ error: "primary_write_failed", detail: "unavailable" });
    expect((await request(app).get("/objects/k1")).status).toBe(404);
  });

  it("exposes and repairs replication state per key", async () => {
    await request(app).put("/objects/k1").set("content-type", "text/plain").send("hello");

    const pending = await request(app).get("/v1/replication/k1");
    expect(pending.status).toBe(200);
    expect(pending.body.replicas.A1.state).toBe("PENDING");
    expect(pending.body.tasks).toHaveLength(1);

    await gateway.propagator.tick();
    const done = await request(app).get("/v1/replication/k1");
    expect(done.body.replicas.A1.state).toBe("DONE");
    expect(done.body.tasks).toEqual([]);

    const repaired = await request(app).post("/v1/replication/k1");
    expect(repaired.status).toBe(202);
    expect(repaired.body).toEqual({ requeued: [] });
  });

  it("deletes objects and reports replica delete failures in a header", async () => {
    await request(app).put("/objects/k1").set("content-type", "text/plain").send("hello");
    stores.S1.faults.delete = "unavailable";

    const del = await request(app).delete("/objects/k1");
    expect(del.status).toBe(204);
    expect(del.headers["x-replica-failures"]).toBe("S1");

    const got = await request(app).get("/objects/k1");
    expect(got.status).toBe(404);
    expect(got.body.error).toBe("object_not_found");
    expect((await request(app).delete("/objects/k1")).status).toBe(404);
  });

  it("rejects invalid keys and unknown routes", async () => {
    const bad = await request(app).put("/objects/a//b").set("content-type", "text/plain").send("x");
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: "invalid_key", detail: "key_has_empty_segment" });

    const missing = await request(app).get("/nope");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "not_found" });
  });

  it("rejects bodies over the configured limit", async () => {
    await gateway.close();
    app = boot({ MAX_OBJECT_BYTES: "16" });
    const put = await request(app).put("/objects/big").set("content-type", "application/octet-stream").send(Buffer.alloc(17));
    expect(put.status).toBe(413);
    expect(put.body).toEqual({ error: "object_too_large" });
    expect(stores.P.calls.put).toBe(0);
  });

  it("summarises the gateway on /v1/status", async () => {
    await request(app).put("/objects/k1").set("content-type", "text/plain").send("hello");
    const status = await request(app).get("/v1/status");
    expect(status.status).toBe(200);
    expect(status.body).toMatchObject({
      ok: true,
      service: "replistore",
      primary: "P",
      objects: 1,
      backends: [
        { id: "P", role: "PRIMARY", kind: "memory" },
        { id: "S1", role: "SYNC_REPLICA", kind: "memory" },
        { id: "A1", role: "ASYNC_REPLICA", kind: "memory" }
      ],
      journal: { PENDING: 1, IN_FLIGHT: 0, DONE: 0, FAILED: 0 }
    });
    expect((await request(app).get("/healthz")).body).toEqual({ ok: true });
  });
});
