import { appendJsonl, isRecord, readJsonl, rewriteJsonl } from "./lib/jsonl.js";

export type ReplicaState = "SYNCED" | "PENDING" | "DONE" | "FAILED";

export type ReplicaStatus = {
  state: ReplicaState;
  version: number;
  updatedAt: string;
  error?: string;
};

export type ObjectRecord = {
  key: string;
  digest: string;       // sha256 hex of the bytes
  size: number;
  contentType: string;
  source: string;       // primary backend id at write time
  version: number;      // bumps on every committed put, survives deletes through the tombstone
  createdAt: string;
  updatedAt: string;
  replicas: Record<string, ReplicaStatus>;
};

export type Tombstone = {
  key: string;
  version: number;
  deletedAt: string;
};

type CatalogLine =
  | { op: "put"; record: ObjectRecord }
  | { op: "replica"; key: string; backendId: string; status: ReplicaStatus }
  | { op: "delete"; tombstone: Tombstone };

export type ObjectCatalogConfig = {
  path?: string | null;   // null/undefined keeps the catalog in memory only
  now?: () => number;
  // Dead lines tolerated beyond twice the live entry count before the file is rewritten.
  compactSlack?: number;
};

const READABLE: ReadonlySet<ReplicaState> = new Set<ReplicaState>(["SYNCED", "DONE"]);

export function isReadableReplica(record: ObjectRecord, backendId: string): boolean {
  const status = record.replicas[backendId];
  return !!status && READABLE.has(status.state) && status.version === record.version;
}

/**
 * The set of committed objects and delete tombstones. A record enters the
 * catalog only once the primary and every sync replica have been attempted, so
 * anything `get` returns is visible to readers.
 */
export function createObjectCatalog(cfg: ObjectCatalogConfig = {}) {
  const filePath = cfg.path || null;
  const now = cfg.now || Date.now;
  const records = new Map<string, ObjectRecord>();
  const tombstones = new Map<string, Tombstone>();
  const compactSlack = Math.max(0, cfg.compactSlack ?? 1000);
  let lines = 0;

  function append(line: CatalogLine) {
    if (filePath) {
      appendJsonl(filePath, line);
      lines += 1;
    }
    apply(line);
    if (filePath && lines > 2 * (records.size + tombstones.size) + compactSlack) compact();
  }

  function apply(line: CatalogLine) {
    if (line.op === "put") {
      records.set(line.record.key, line.record);
      tombstones.delete(line.record.key);
    } else if (line.op === "replica") {
      const record = records.get(line.key);
      if (record && record.version === line.status.version) {
        record.replicas[line.backendId] = line.status;
      }
    } else {
      records.delete(line.tombstone.key);
      tombstones.set(line.tombstone.key, line.tombstone);
    }
  }

  function open(): { records: number; tombstones: number } {
    records.clear();
    tombstones.clear();
    if (filePath) {
      for (const raw of readJsonl(filePath)) {
        const line = parseLine(raw);
        if (line) apply(line);
      }
      compact();
    }
    return { records: records.size, tombstones: tombstones.size };
  }

  function compact() {
    if (!filePath) return;
    const live: CatalogLine[] = [
      ...[...tombstones.values()].map((tombstone): CatalogLine => ({ op: "delete", tombstone })),
      ...[...records.values()].map((record): CatalogLine => ({ op: "put", record }))
    ];
    rewriteJsonl(filePath, live);
    lines = live.length;
  }

  function get(key: string): ObjectRecord | null {
    const record = records.get(key);
    return record ? structuredClone(record) : null;
  }

  function lastVersion(key: string): number {
    return records.get(key)?.version ?? tombstones.get(key)?.version ?? 0;
  }

  function commit(record: ObjectRecord): ObjectRecord {
    if (record.version <= lastVersion(record.key)) {
      throw new Error(`stale_record_version:${record.key}:${record.version}`);
    }
    const line: CatalogLine = { op: "put", record: structuredClone(record) };
    append(line);
    return structuredClone(record);
  }

  // Applies only while `version` is still the committed one; later versions own their replica states.
  function setReplicaState(key: string, backendId: string, version: number, state: ReplicaState, error?: string): boolean {
    const record = records.get(key);
    if (!record || record.version !== version) return false;
    const status: ReplicaStatus = { state, version, updatedAt: new Date(now()).toISOString() };
    if (error) status.error = error;
    const line: CatalogLine = { op: "replica", key, backendId, status };
    append(line);
    return true;
  }

  function remove(key: string): Tombstone | null {
    const record = records.get(key);
    if (!record) return null;
    const tombstone: Tombstone = { key, version: record.version, deletedAt: new Date(now()).toISOString() };
    const line: CatalogLine = { op: "delete", tombstone };
    append(line);
    return tombstone;
  }

  return {
    open,
    compact,
    get,
    lastVersion,
    commit,
    setReplicaState,
    remove,
    tombstone: (key: string): Tombstone | null => tombstones.get(key) ?? null,
    list: (): ObjectRecord[] => [...records.values()].map((r) => structuredClone(r)),
    size: () => records.size
  };
}

export type ObjectCatalog = ReturnType<typeof createObjectCatalog>;

const REPLICA_STATES: readonly ReplicaState[] = ["SYNCED", "PENDING", "DONE", "FAILED"];

function isReplicaState(value: unknown): value is ReplicaState {
  return REPLICA_STATES.some((s) => s === value);
}

function parseReplicaStatus(raw: unknown): ReplicaStatus | null {
  if (!isRecord(raw)) return null;
  const { state, version, updatedAt, error } = raw;
  if (!isReplicaState(state)) return null;
  if (typeof version !== "number" || typeof updatedAt !== "string") return null;
  const status: ReplicaStatus = { state, version, updatedAt };
  if (typeof error === "string") status.error = error;
  return status;
}

function parseRecord(raw: unknown): ObjectRecord | null {
  if (!isRecord(raw)) return null;
  const { key, digest, size, contentType, source, version, createdAt, updatedAt, replicas } = raw;
  if (typeof key !== "string" || typeof digest !== "string" || typeof size !== "number") return null;
  if (typeof source !== "string" || typeof version !== "number") return null;
  if (typeof createdAt !== "string" || typeof updatedAt !== "string" || !isRecord(replicas)) return null;
  const parsed: Record<string, ReplicaStatus> = {};
  for (const [id, value] of Object.entries(replicas)) {
    const status = parseReplicaStatus(value);
    if (status) parsed[id] = status;
  }
  return {
    key,
    digest,
    size,
    contentType: typeof contentType === "string" ? contentType : "application/octet-stream",
    source,
    version,
    createdAt,
    updatedAt,
    replicas: parsed
  };
}

function parseLine(raw: unknown): CatalogLine | null {
  if (!isRecord(raw)) return null;
  if (raw.op === "put") {
    const record = parseRecord(raw.record);
    return record ? { op: "put", record } : null;
  }
  if (raw.op === "replica") {
    const status = parseReplicaStatus(raw.status);
    if (!status || typeof raw.key !== "string" || typeof raw.backendId !== "string") return null;
    return { op: "replica", key: raw.key, backendId: raw.backendId, status };
  }
  if (raw.op === "delete" && isRecord(raw.tombstone)) {
    const { key, version, deletedAt } = raw.tombstone;
    if (typeof key !== "string" || typeof version !== "number" || typeof deletedAt !== "string") return null;
    return { op: "delete", tombstone: { key, version, deletedAt } };
  }
  return null;
}
