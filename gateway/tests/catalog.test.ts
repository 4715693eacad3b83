import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createObjectCatalog, isReadableReplica, type ObjectRecord } from "../src/catalog.js";

const AT = "2024-01-01T00:00:00.000Z";

function record(key: string, version: number, replicas: ObjectRecord["replicas"] = {}): ObjectRecord {
  return {
    key,
    digest: "cd".repeat(32),
    size: 4,
    contentType: "text/plain",
    source: "P",
    version,
    createdAt: AT,
    updatedAt: AT,
    replicas: { P: { state: "SYNCED", version, updatedAt: AT }, ...replicas }
  };
}

describe("object catalog", () => {
  it("refuses versions that do not move forward, tombstones included", () => {
    const catalog = createObjectCatalog();
    catalog.commit(record("k1", 1));
    expect(() => catalog.commit(record("k1", 1))).toThrow("stale_record_version:k1:1");

    expect(catalog.remove("k1")?.version).toBe(1);
    expect(catalog.lastVersion("k1")).toBe(1);
    expect(() => catalog.commit(record("k1", 1))).toThrow("stale_record_version");
    catalog.commit(record("k1", 2));
    expect(catalog.tombstone("k1")).toBeNull();
  });

  it("ignores replica updates for superseded versions", () => {
    const catalog = createObjectCatalog();
    catalog.commit(record("k1", 1, { A1: { state: "PENDING", version: 1, updatedAt: AT } }));
    catalog.commit(record("k1", 2, { A1: { state: "PENDING", version: 2, updatedAt: AT } }));

    expect(catalog.setReplicaState("k1", "A1", 1, "DONE")).toBe(false);
    expect(catalog.get("k1")?.replicas.A1?.state).toBe("PENDING");
    expect(catalog.setReplicaState("k1", "A1", 2, "DONE")).toBe(true);
    expect(catalog.get("k1")?.replicas.A1?.state).toBe("DONE");
  });

  it("hands out copies", () => {
    const catalog = createObjectCatalog();
    catalog.commit(record("k1", 1));
    const copy = catalog.get("k1");
    if (copy) copy.replicas.P = { state: "FAILED", version: 1, updatedAt: AT };
    expect(catalog.get("k1")?.replicas.P?.state).toBe("SYNCED");
  });

  it("only reads from replicas that hold the committed version", () => {
    const r = record("k1", 2, {
      S1: { state: "SYNCED", version: 2, updatedAt: AT },
      A1: { state: "DONE", version: 1, updatedAt: AT },
      A2: { state: "PENDING", version: 2, updatedAt: AT }
    });
    expect(isReadableReplica(r, "S1")).toBe(true);
    expect(isReadableReplica(r, "A1")).toBe(false);
    expect(isReadableReplica(r, "A2")).toBe(false);
    expect(isReadableReplica(r, "missing")).toBe(false);
  });

  it("rebuilds records and tombstones from its log", () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "replistore-catalog-")), "catalog.jsonl");
    const before = createObjectCatalog({ path: file, now: () => Date.parse(AT) });
    before.open();
    before.commit(record("k1", 1, { A1: { state: "PENDING", version: 1, updatedAt: AT } }));
    before.setReplicaState("k1", "A1", 1, "FAILED", "async_replication_failed:digest_mismatch");
    before.commit(record("k2", 1));
    before.remove("k2");
    fs.appendFileSync(file, "not json\n");

    const after = createObjectCatalog({ path: file });
    expect(after.open()).toEqual({ records: 1, tombstones: 1 });
    expect(after.get("k1")?.replicas.A1).toEqual({
      state: "FAILED",
      version: 1,
      updatedAt: AT,
      error: "async_replication_failed:digest_mismatch"
    });
    expect(after.lastVersion("k2")).toBe(1);
    expect(after.list().map((r) => r.key)).toEqual(["k1"]);
  });

  it("rewrites its log once superseded lines pile up", () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "replistore-catalog-")), "catalog.jsonl");
    const catalog = createObjectCatalog({ path: file, now: () => Date.parse(AT), compactSlack: 10 });
    catalog.open();
    const fileLines = () => fs.readFileSync(file, "utf8").split("\n").filter(Boolean).length;

    for (let version = 1; version <= 60; version++) {
      catalog.commit(record("k1", version, { A1: { state: "PENDING", version, updatedAt: AT } }));
      catalog.setReplicaState("k1", "A1", version, "DONE");
      expect(fileLines()).toBeLessThanOrEqual(12);
    }
    catalog.remove("k1");
    catalog.commit(record("k2", 1));

    const reopened = createObjectCatalog({ path: file });
    expect(reopened.open()).toEqual({ records: 1, tombstones: 1 });
    expect(reopened.lastVersion("k1")).toBe(60);
    expect(reopened.get("k2")?.version).toBe(1);
  });
});
