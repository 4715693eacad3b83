import { createSizeTieredPolicy } from "@replistore/replication-policy";
import { createBackend, type StorageBackend } from "./backends/index.js";
import { createObjectCatalog } from "./catalog.js";
import type { GatewayConfig } from "./config.js";
import { createWriteCoordinator, type BackendBinding } from "./coordinator.js";
import { createReplicationEvents } from "./events.js";
import { createReplicationJournal } from "./journal.js";
import { createKeyedLock } from "./lib/keyed_lock.js";
import { createLogger, type Logger } from "./lib/log.js";
import { createPropagator } from "./propagator.js";

export type GatewayDeps = {
  // Replace the adapter built from a descriptor, e.g. with a fault-injecting wrapper.
  backendOverrides?: Record<string, StorageBackend>;
  fetchImpl?: typeof fetch;
  now?: () => number;
  log?: Logger;
};

export function createGateway(config: GatewayConfig, deps: GatewayDeps = {}) {
  const log = deps.log || createLogger("replistore", config.logLevel);
  const now = deps.now || Date.now;

  const bindings: BackendBinding[] = config.backends.map((d) => ({
    id: d.id,
    role: d.role,
    backend: deps.backendOverrides?.[d.id] ?? createBackend(d.id, d.adapter, { fetchImpl: deps.fetchImpl })
  }));
  const backends = new Map(bindings.map((b) => [b.id, b.backend]));

  const catalog = createObjectCatalog({ path: config.catalogPath, now });
  const journal = createReplicationJournal({ path: config.journalPath, now });
  const events = createReplicationEvents({ spoolPath: config.eventsSpoolPath, log: log.child("events") });
  const replicaLock = createKeyedLock();

  const propagator = createPropagator({
    journal,
    catalog,
    events,
    backends,
    schedule: config.retry,
    workers: config.propagationWorkers,
    pollIntervalMs: config.propagationPollMs,
    replicaLock,
    now,
    log: log.child("propagator")
  });

  const coordinator = createWriteCoordinator({
    backends: bindings,
    catalog,
    journal,
    events,
    policy: createSizeTieredPolicy(config.maxSyncBytes),
    syncAttempts: config.syncWriteAttempts,
    replicaLock,
    onEnqueued: () => propagator.wake(),
    now,
    log: log.child("coordinator")
  });

  const opened = catalog.open();
  const replayed = journal.open();
  const recovered = coordinator.recover();
  log.info("state recovered", {
    records: opened.records,
    tasks: replayed.tasks,
    resumed: replayed.resumed,
    requeued: recovered.requeued,
    discarded: recovered.discarded
  });

  return {
    config,
    log,
    backends,
    catalog,
    journal,
    events,
    propagator,
    coordinator,
    start() {
      propagator.start();
    },
    async close() {
      await propagator.stop();
      journal.compact();
      catalog.compact();
    }
  };
}

export type Gateway = ReturnType<typeof createGateway>;
