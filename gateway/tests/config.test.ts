import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { defaultBackends, loadConfig, parseBackendList } from "../src/config.js";

describe("config", () => {
  it("falls back to a local primary with a local async backup", () => {
    const config = loadConfig({});
    const dataDir = path.resolve(".data");

    expect(config.port).toBe(8070);
    expect(config.host).toBe("0.0.0.0");
    expect(config.logLevel).toBe("quiet");
    expect(config.backends).toEqual(defaultBackends(dataDir));
    expect(config.backends.map((b) => `${b.id}:${b.role}`)).toEqual(["primary:PRIMARY", "backup:ASYNC_REPLICA"]);
    expect(config.journalPath).toBe(path.join(dataDir, "journal.jsonl"));
    expect(config.catalogPath).toBe(path.join(dataDir, "catalog.jsonl"));
    expect(config.eventsSpoolPath).toBeNull();
    expect(config.syncWriteAttempts).toBe(3);
    expect(config.retry).toEqual({ baseDelayMs: 1000, maxDelayMs: 300_000, maxAttempts: 5 });
    expect(config.maxObjectBytes).toBe(64 * 1024 * 1024);
    expect(Object.isFrozen(config.backends[0])).toBe(true);
  });

  it("reads numbers and in-memory state switches from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      LOG_LEVEL: "debug",
      JOURNAL_PATH: "memory",
      CATALOG_PATH: "memory",
      SYNC_WRITE_ATTEMPTS: "5",
      ASYNC_MAX_ATTEMPTS: "7",
      PROPAGATION_WORKERS: "2"
    });
    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe("verbose");
    expect(config.journalPath).toBeNull();
    expect(config.catalogPath).toBeNull();
    expect(config.syncWriteAttempts).toBe(5);
    expect(config.retry.maxAttempts).toBe(7);
    expect(config.propagationWorkers).toBe(2);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow("invalid_config:PORT must be a number >= 0");
    expect(() => loadConfig({ SYNC_WRITE_ATTEMPTS: "0" })).toThrow("SYNC_WRITE_ATTEMPTS must be a number >= 1");
  });

  it("validates backend lists", () => {
    expect(() => parseBackendList([{ id: "s", role: "SYNC_REPLICA", adapter: { type: "memory" } }])).toThrow(
      "invalid_config:backends: missing_primary"
    );
    expect(() =>
      parseBackendList([
        { id: "a", role: "PRIMARY", adapter: { type: "memory" } },
        { id: "a", role: "ASYNC_REPLICA", adapter: { type: "memory" } }
      ])
    ).toThrow("duplicate_backend_id:a");
    expect(() => parseBackendList([{ id: "a", role: "MIRROR", adapter: { type: "memory" } }])).toThrow("0.role");
    expect(() => parseBackendList([{ id: "a", role: "PRIMARY", adapter: { type: "http", baseUrl: "nope" } }])).toThrow(
      "0.adapter.baseUrl"
    );
    expect(() => loadConfig({ BACKENDS: "[oops" })).toThrow("BACKENDS is not valid JSON");
  });

  it("resolves local roots against the backend file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "replistore-config-"));
    const file = path.join(dir, "backends.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        backends: [
          { id: "disk", role: "PRIMARY", adapter: { type: "local", root: "store" } },
          { id: "edge", role: "SYNC_REPLICA", adapter: { type: "http", baseUrl: "http://edge.internal:8070", timeoutMs: 2000 } }
        ]
      })
    );

    const config = loadConfig({ BACKENDS_PATH: file });
    expect(config.backends).toEqual([
      { id: "disk", role: "PRIMARY", adapter: { type: "local", root: path.join(dir, "store") } },
      { id: "edge", role: "SYNC_REPLICA", adapter: { type: "http", baseUrl: "http://edge.internal:8070", timeoutMs: 2000 } }
    ]);
  });
});
