import {
  type BackendRole,
  classify,
  planReplication,
  validateTopology,
  type BackendRef,
  type ReplicationPolicy
} from "@replistore/replication-policy";
import { isBackendError, type StorageBackend } from "./backends/index.js";
import { isReadableReplica, type ObjectCatalog, type ObjectRecord, type ReplicaStatus } from "./catalog.js";
import { GatewayError, errorMessage } from "./errors.js";
import type { ReplicationEvents } from "./events.js";
import { taskId, type ReplicationJournal } from "./journal.js";
import { sha256Hex } from "./lib/digest.js";
import { createKeyedLock, type KeyedLock } from "./lib/keyed_lock.js";
import { validateObjectKey } from "./lib/keys.js";
import { silentLogger, type Logger } from "./lib/log.js";

export type BackendBinding = {
  id: string;
  role: BackendRole;
  backend: StorageBackend;
};

export type WriteResult = {
  key: string;
  digest: string;
  size: number;
  version: number;
  syncFailures: string[];
  asyncPending: string[];
};

export type ReadResult = {
  data: Buffer;
  record: ObjectRecord;
  servedBy: string;
};

export type DeleteResult = {
  key: string;
  version: number;
  replicaFailures: string[];
};

export type PutOptions = {
  contentType?: string;
  signal?: AbortSignal;
};

export type WriteCoordinatorConfig = {
  backends: readonly BackendBinding[];
  catalog: ObjectCatalog;
  journal: ReplicationJournal;
  events: ReplicationEvents;
  policy?: ReplicationPolicy;
  syncAttempts?: number;
  // Shared with the propagator so sync writes, async copies and replica deletes never overlap per (key, backend).
  replicaLock?: KeyedLock;
  onEnqueued?: () => void;
  now?: () => number;
  log?: Logger;
};

type SyncOutcome = { ok: true; attempts: number } | { ok: false; attempts: number; error: string };

export function createWriteCoordinator(cfg: WriteCoordinatorConfig) {
  const { catalog, journal, events } = cfg;
  const policy = cfg.policy || classify;
  const syncAttempts = Math.max(1, Math.floor(cfg.syncAttempts ?? 3));
  const now = cfg.now || Date.now;
  const log = cfg.log || silentLogger;
  const keyLock = createKeyedLock();
  const replicaLock = cfg.replicaLock || createKeyedLock();

  const refs: BackendRef[] = cfg.backends.map((b) => ({ id: b.id, role: b.role }));
  const byId = new Map(cfg.backends.map((b) => [b.id, b.backend]));
  const topology = validateTopology(refs);
  if (!topology.ok) throw new GatewayError("invalid_config", topology.error);
  const primaryId = topology.primary;
  const primary = mustBackend(primaryId);
  const replicaIds = cfg.backends.filter((b) => b.id !== primaryId).map((b) => b.id);

  function mustBackend(id: string): StorageBackend {
    const backend = byId.get(id);
    if (!backend) throw new Error(`unknown_backend:${id}`);
    return backend;
  }

  function requireKey(raw: string): string {
    const valid = validateObjectKey(raw);
    if (!valid.ok) throw new GatewayError("invalid_key", valid.error);
    return valid.key;
  }

  function stamp(): string {
    return new Date(now()).toISOString();
  }

  async function writeSync(id: string, key: string, data: Buffer, digest: string, signal?: AbortSignal): Promise<SyncOutcome> {
    const backend = mustBackend(id);
    return replicaLock.run(taskId(key, id), async () => {
      let lastError = "not_attempted";
      for (let attempt = 1; attempt <= syncAttempts; attempt++) {
        if (signal?.aborted) return { ok: false, attempts: attempt - 1, error: "cancelled" };
        try {
          const returned = await backend.put(key, data);
          if (returned === digest) return { ok: true, attempts: attempt };
          lastError = "digest_mismatch";
        } catch (err) {
          lastError = errorMessage(err);
        }
        log.debug(`sync write attempt ${attempt}/${syncAttempts} failed`, { key, backend: id, error: lastError });
      }
      return { ok: false, attempts: syncAttempts, error: lastError };
    });
  }

  async function putObject(rawKey: string, data: Buffer, opts: PutOptions = {}): Promise<WriteResult> {
    const key = requireKey(rawKey);
    return keyLock.run(key, async () => {
      const digest = sha256Hex(data);
      let primaryDigest: string;
      try {
        primaryDigest = await primary.put(key, data);
      } catch (err) {
        const code = isBackendError(err) ? err.code : "error";
        throw new GatewayError("primary_write_failed", code, { cause: err });
      }
      if (primaryDigest !== digest) throw new GatewayError("primary_write_failed", "digest_mismatch");

      // Primary is durable from here on; nothing below may roll it back.
      const version = catalog.lastVersion(key) + 1;
      const plan = planReplication({ key, size: data.length, digest }, refs, policy);
      const at = stamp();
      const replicas: Record<string, ReplicaStatus> = {
        [primaryId]: { state: "SYNCED", version, updatedAt: at }
      };

      const syncFailures: string[] = [];
      for (const id of plan.sync) {
        const outcome = await writeSync(id, key, data, digest, opts.signal);
        if (outcome.ok) {
          replicas[id] = { state: "SYNCED", version, updatedAt: stamp() };
          continue;
        }
        syncFailures.push(id);
        replicas[id] = { state: "FAILED", version, updatedAt: stamp(), error: `sync_replica_failed:${outcome.error}` };
        events.emit({
          key,
          backendId: id,
          status: "SYNC_FAILURE",
          attempt: outcome.attempts,
          timestamp: stamp(),
          error: outcome.error
        });
      }
      for (const id of plan.async) {
        replicas[id] = { state: "PENDING", version, updatedAt: at };
      }

      const previous = catalog.get(key);
      catalog.commit({
        key,
        digest,
        size: data.length,
        contentType: opts.contentType || "application/octet-stream",
        source: primaryId,
        version,
        createdAt: previous?.createdAt ?? at,
        updatedAt: stamp(),
        replicas
      });

      // The record is visible before any task references it.
      for (const id of plan.async) {
        journal.enqueue({ key, source: primaryId, target: id, digest, size: data.length, version });
      }
      // A backend that moved from async to sync under the policy keeps no stale task behind.
      for (const task of journal.list({ key })) {
        if (task.version !== version) journal.remove(key, task.target, task.version);
      }
      if (plan.async.length) cfg.onEnqueued?.();

      log.debug("put committed", { key, version, syncFailures });
      return { key, digest, size: data.length, version, syncFailures, asyncPending: [...plan.async] };
    });
  }

  async function getObject(rawKey: string): Promise<ReadResult> {
    const key = requireKey(rawKey);
    const record = catalog.get(key);
    if (!record) throw new GatewayError("object_not_found");

    try {
      const data = await primary.get(key);
      const digest = sha256Hex(data);
      if (digest === record.digest) return { data, record, servedBy: primaryId };
      // The primary runs ahead of the catalog during an overwrite's sync phase, or after a put that failed late.
      const latest = catalog.get(key);
      if (latest && latest.digest === digest) return { data, record: latest, servedBy: primaryId };
      log.warn("primary holds bytes of another version, trying replicas", { key, version: record.version });
    } catch (err) {
      // The primary is authoritative about absence: a concurrent delete removes it first.
      if (isBackendError(err, "not_found")) throw new GatewayError("object_not_found");
      log.warn("primary read failed, trying replicas", { key, error: errorMessage(err) });
    }

    for (const id of replicaIds) {
      if (!isReadableReplica(record, id)) continue;
      try {
        const data = await mustBackend(id).get(key);
        if (sha256Hex(data) === record.digest) return { data, record, servedBy: id };
        log.warn("replica returned bytes with a different digest", { key, backend: id });
      } catch (err) {
        log.debug("replica read failed", { key, backend: id, error: errorMessage(err) });
      }
    }
    throw new GatewayError("object_unavailable");
  }

  function statObject(rawKey: string): ObjectRecord {
    const key = requireKey(rawKey);
    const record = catalog.get(key);
    if (!record) throw new GatewayError("object_not_found");
    return record;
  }

  async function deleteObject(rawKey: string): Promise<DeleteResult> {
    const key = requireKey(rawKey);
    return keyLock.run(key, async () => {
      const record = catalog.get(key);
      if (!record) throw new GatewayError("object_not_found");

      try {
        await primary.delete(key);
      } catch (err) {
        if (!isBackendError(err, "not_found")) {
          const code = isBackendError(err) ? err.code : "error";
          throw new GatewayError("primary_delete_failed", code, { cause: err });
        }
      }

      // Tombstone first: from here no replica is readable and in-flight copies are discarded.
      catalog.remove(key);
      journal.drop(key);

      const replicaFailures: string[] = [];
      for (const id of replicaIds) {
        const backend = mustBackend(id);
        await replicaLock.run(taskId(key, id), async () => {
          try {
            await backend.delete(key);
          } catch (err) {
            if (isBackendError(err, "not_found")) return;
            replicaFailures.push(id);
            events.emit({
              key,
              backendId: id,
              status: "DELETE_FAILED",
              attempt: 1,
              timestamp: stamp(),
              error: errorMessage(err)
            });
          }
        });
      }
      log.debug("delete committed", { key, version: record.version, replicaFailures });
      return { key, version: record.version, replicaFailures };
    });
  }

  /**
   * Queues an async copy for every replica that is FAILED or missing at the
   * current version, sync replicas included. Returns the backends requeued.
   */
  async function repair(rawKey: string): Promise<string[]> {
    const key = requireKey(rawKey);
    return keyLock.run(key, async () => {
      const record = catalog.get(key);
      if (!record) throw new GatewayError("object_not_found");
      const requeued: string[] = [];
      for (const id of replicaIds) {
        const status = record.replicas[id];
        if (status && status.version === record.version && status.state !== "FAILED") continue;
        journal.enqueue({ key, source: record.source, target: id, digest: record.digest, size: record.size, version: record.version });
        catalog.setReplicaState(key, id, record.version, "PENDING");
        requeued.push(id);
      }
      if (requeued.length) cfg.onEnqueued?.();
      return requeued;
    });
  }

  /**
   * Startup reconciliation between catalog and journal: re-enqueues PENDING
   * replicas whose task never reached the log (crash between commit and
   * append) and removes tasks whose object version is gone.
   */
  function recover(): { requeued: number; discarded: number } {
    let requeued = 0;
    let discarded = 0;
    for (const task of journal.list()) {
      const record = catalog.get(task.key);
      if (!record || record.version !== task.version) {
        if (journal.remove(task.key, task.target, task.version)) discarded += 1;
      }
    }
    for (const record of catalog.list()) {
      for (const [id, status] of Object.entries(record.replicas)) {
        if (status.state !== "PENDING" || status.version !== record.version || !byId.has(id)) continue;
        if (journal.get(record.key, id)) continue;
        journal.enqueue({ key: record.key, source: record.source, target: id, digest: record.digest, size: record.size, version: record.version });
        requeued += 1;
      }
    }
    if (requeued) cfg.onEnqueued?.();
    return { requeued, discarded };
  }

  return {
    putObject,
    getObject,
    statObject,
    deleteObject,
    repair,
    recover,
    primaryId,
    replicaIds: [...replicaIds]
  };
}

export type WriteCoordinator = ReturnType<typeof createWriteCoordinator>;
