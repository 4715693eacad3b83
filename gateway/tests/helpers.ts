import { BackendRole } from "@replistore/replication-policy";
import { BackendError, createMemoryBackend, type BackendErrorCode, type MemoryBackend, type StorageBackend } from "../src/backends/index.js";
import { createObjectCatalog } from "../src/catalog.js";
import { createWriteCoordinator, type BackendBinding } from "../src/coordinator.js";
import { createReplicationEvents } from "../src/events.js";
import { createReplicationJournal } from "../src/journal.js";
import { createKeyedLock } from "../src/lib/keyed_lock.js";
import { createPropagator } from "../src/propagator.js";

type Op = "put" | "get" | "delete";

export type Fault = BackendErrorCode | "corrupt";

export type FaultyBackend = StorageBackend & {
  inner: MemoryBackend;
  faults: Partial<Record<Op, Fault>>;
  calls: Record<Op, number>;
  // Resolves the put currently parked on the gate, if any.
  gate: { enabled: boolean; entered: Promise<void>; release: () => void };
};

export function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Memory backend with switchable failures, call counters and an optional gate on `put`. */
export function faultyBackend(id: string): FaultyBackend {
  const inner = createMemoryBackend({ id });
  const faults: Partial<Record<Op, Fault>> = {};
  const calls: Record<Op, number> = { put: 0, get: 0, delete: 0 };
  let entered = deferred();
  let released = deferred();

  const gate = {
    enabled: false,
    get entered() {
      return entered.promise;
    },
    release() {
      released.resolve();
    }
  };

  function fail(op: Op) {
    const fault = faults[op];
    if (fault && fault !== "corrupt") throw new BackendError(fault, id, "injected");
  }

  return {
    id,
    kind: "memory",
    inner,
    faults,
    calls,
    gate,
    async put(key, data) {
      calls.put += 1;
      if (gate.enabled) {
        entered.resolve();
        await released.promise;
        entered = deferred();
        released = deferred();
      }
      fail("put");
      const digest = await inner.put(key, data);
      return faults.put === "corrupt" ? "0".repeat(64) : digest;
    },
    async get(key) {
      calls.get += 1;
      fail("get");
      const data = await inner.get(key);
      return faults.get === "corrupt" ? Buffer.from("tampered") : data;
    },
    async delete(key) {
      calls.delete += 1;
      fail("delete");
      await inner.delete(key);
    },
    stat: (key) => inner.stat(key)
  };
}

export const RETRY = { baseDelayMs: 1000, maxDelayMs: 300_000, maxAttempts: 5 };

/**
 * In-memory catalog, journal, coordinator and propagator over faulty memory
 * backends, sharing one manual clock.
 */
export function createHarness(layout: Array<[string, BackendRole]>) {
  const clock = { now: 1_700_000_000_000 };
  const now = () => clock.now;
  const backends = new Map(layout.map(([id]) => [id, faultyBackend(id)]));
  const bindings: BackendBinding[] = layout.map(([id, role]) => {
    const backend = backends.get(id);
    if (!backend) throw new Error(`missing ${id}`);
    return { id, role, backend };
  });
  const catalog = createObjectCatalog({ now });
  const journal = createReplicationJournal({ now });
  const events = createReplicationEvents();
  const replicaLock = createKeyedLock();
  const propagator = createPropagator({
    journal,
    catalog,
    events,
    backends: new Map(bindings.map((b) => [b.id, b.backend])),
    schedule: RETRY,
    workers: 2,
    replicaLock,
    now
  });
  const coordinator = createWriteCoordinator({ backends: bindings, catalog, journal, events, replicaLock, now });

  function backend(id: string): FaultyBackend {
    const found = backends.get(id);
    if (!found) throw new Error(`unknown backend ${id}`);
    return found;
  }

  return { clock, catalog, journal, events, propagator, coordinator, backend };
}

export const STANDARD: Array<[string, BackendRole]> = [
  ["P", BackendRole.PRIMARY],
  ["S1", BackendRole.SYNC_REPLICA],
  ["A1", BackendRole.ASYNC_REPLICA]
];
