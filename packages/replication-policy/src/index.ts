export enum BackendRole {
  PRIMARY = "PRIMARY",
  SYNC_REPLICA = "SYNC_REPLICA",
  ASYNC_REPLICA = "ASYNC_REPLICA"
}

export enum ReplicationMode {
  SYNC = "SYNC",
  ASYNC = "ASYNC"
}

export type BackendRef = {
  id: string;
  role: BackendRole;
};

export type ObjectMeta = {
  key: string;
  size: number;
  digest: string;
};

export type Classification = Record<string, ReplicationMode>;

export type ReplicationPolicy = (meta: ObjectMeta, backends: readonly BackendRef[]) => Classification;

export type ReplicationPlan = {
  primary: string;
  sync: string[];   // replicas written inline, declaration order
  async: string[];  // replicas handed to the journal, declaration order
};

export type RetrySchedule = {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
};

export type TopologyCheck = { ok: true; primary: string } | { ok: false; error: string };

export function validateTopology(backends: readonly BackendRef[]): TopologyCheck {
  if (!backends.length) return { ok: false, error: "no_backends" };
  const seen = new Set<string>();
  for (const b of backends) {
    if (!b.id.trim()) return { ok: false, error: "empty_backend_id" };
    if (seen.has(b.id)) return { ok: false, error: `duplicate_backend_id:${b.id}` };
    seen.add(b.id);
  }
  const primaries = backends.filter((b) => b.role === BackendRole.PRIMARY);
  if (primaries.length === 0) return { ok: false, error: "missing_primary" };
  if (primaries.length > 1) return { ok: false, error: `multiple_primaries:${primaries.map((b) => b.id).join(",")}` };
  return { ok: true, primary: primaries[0].id };
}

export function modeForRole(role: BackendRole): ReplicationMode {
  switch (role) {
    case BackendRole.PRIMARY:
    case BackendRole.SYNC_REPLICA:
      return ReplicationMode.SYNC;
    case BackendRole.ASYNC_REPLICA:
      return ReplicationMode.ASYNC;
  }
}

export const classify: ReplicationPolicy = (_meta, backends) => {
  const out: Classification = {};
  for (const b of backends) out[b.id] = modeForRole(b.role);
  return out;
};

/**
 * Large objects skip inline replication: sync replicas are demoted to async once
 * the object exceeds `maxSyncBytes`. The primary stays synchronous regardless.
 */
export function createSizeTieredPolicy(maxSyncBytes: number): ReplicationPolicy {
  if (!(maxSyncBytes > 0)) return classify;
  return (meta, backends) => {
    const out = classify(meta, backends);
    if (meta.size <= maxSyncBytes) return out;
    for (const b of backends) {
      if (b.role === BackendRole.SYNC_REPLICA) out[b.id] = ReplicationMode.ASYNC;
    }
    return out;
  };
}

export function planReplication(
  meta: ObjectMeta,
  backends: readonly BackendRef[],
  policy: ReplicationPolicy = classify
): ReplicationPlan {
  const topology = validateTopology(backends);
  if (!topology.ok) throw new Error(`invalid_topology:${topology.error}`);

  const modes = policy(meta, backends);
  const plan: ReplicationPlan = { primary: topology.primary, sync: [], async: [] };
  for (const b of backends) {
    if (b.id === topology.primary) continue;
    const mode = modes[b.id];
    // A policy that skips a backend is a bug in the policy, not a reason to drop a replica.
    if (mode === undefined) throw new Error(`unclassified_backend:${b.id}`);
    if (mode === ReplicationMode.SYNC) plan.sync.push(b.id);
    else plan.async.push(b.id);
  }
  return plan;
}

export function defaultRetryScheduleFromEnv(env: Record<string, string | undefined> = process.env): RetrySchedule {
  return {
    baseDelayMs: num(env.ASYNC_BASE_DELAY_MS, 1000),
    maxDelayMs: num(env.ASYNC_MAX_DELAY_MS, 5 * 60 * 1000),
    maxAttempts: Math.max(1, Math.floor(num(env.ASYNC_MAX_ATTEMPTS, 5)))
  };
}

// Delay before the next try once `attempt` tries have failed (attempt >= 1).
export function backoffDelayMs(attempt: number, schedule: RetrySchedule): number {
  const n = Math.max(1, Math.floor(attempt));
  const raw = schedule.baseDelayMs * 2 ** (n - 1);
  return Math.min(raw, schedule.maxDelayMs);
}

export function isExhausted(attempt: number, schedule: RetrySchedule): boolean {
  return attempt >= schedule.maxAttempts;
}

function num(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}
