import { appendJsonl, isRecord, readJsonl, rewriteJsonl } from "./lib/jsonl.js";

export type TaskStatus = "PENDING" | "IN_FLIGHT" | "DONE" | "FAILED";

export type ReplicationTask = {
  key: string;
  source: string;
  target: string;
  digest: string;
  size: number;
  version: number;      // catalog version the task replicates
  attempts: number;
  nextRetryAt: number;  // epoch ms
  status: TaskStatus;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
};

export type EnqueueInput = Pick<ReplicationTask, "key" | "source" | "target" | "digest" | "size" | "version">;

type JournalLine =
  | { op: "task"; task: ReplicationTask }
  | { op: "remove"; key: string; target: string; version: number }
  | { op: "drop"; key: string };

export type ReplicationJournalConfig = {
  path?: string | null;   // null/undefined keeps the journal in memory only
  now?: () => number;
  // Dead lines tolerated beyond twice the live task count before the file is rewritten.
  compactSlack?: number;
};

export type TaskFilter = {
  key?: string;
  target?: string;
  status?: TaskStatus;
};

export function taskId(key: string, target: string): string {
  return `${key}\u0000${target}`;
}

/**
 * Append-only log of async replication work, one task per (key, target).
 *
 * Every mutation appends the task's new snapshot, so replaying the file and
 * keeping the last line per task rebuilds the state after a restart. DONE tasks
 * leave the live set at once; FAILED tasks stay as dead letters until an
 * operator retries them or the key is deleted.
 */
export function createReplicationJournal(cfg: ReplicationJournalConfig = {}) {
  const filePath = cfg.path || null;
  const now = cfg.now || Date.now;
  const tasks = new Map<string, ReplicationTask>();
  const compactSlack = Math.max(0, cfg.compactSlack ?? 1000);
  let lines = 0;

  function append(line: JournalLine) {
    if (filePath) {
      appendJsonl(filePath, line);
      lines += 1;
    }
    apply(line);
    if (filePath && lines > 2 * tasks.size + compactSlack) compact();
  }

  function apply(line: JournalLine) {
    if (line.op === "task") {
      const id = taskId(line.task.key, line.task.target);
      if (line.task.status === "DONE") tasks.delete(id);
      else tasks.set(id, line.task);
    } else if (line.op === "remove") {
      const id = taskId(line.key, line.target);
      if (tasks.get(id)?.version === line.version) tasks.delete(id);
    } else {
      for (const [id, task] of tasks) {
        if (task.key === line.key) tasks.delete(id);
      }
    }
  }

  function write(task: ReplicationTask): ReplicationTask {
    const line: JournalLine = { op: "task", task: { ...task } };
    append(line);
    return { ...task };
  }

  function stamp(): string {
    return new Date(now()).toISOString();
  }

  // IN_FLIGHT tasks found on replay were interrupted mid-copy; puts are idempotent, so they rerun.
  function open(): { tasks: number; resumed: number } {
    tasks.clear();
    let resumed = 0;
    if (filePath) {
      for (const raw of readJsonl(filePath)) {
        const line = parseLine(raw);
        if (line) apply(line);
      }
      for (const task of tasks.values()) {
        if (task.status === "IN_FLIGHT") {
          task.status = "PENDING";
          resumed += 1;
        }
      }
      compact();
    }
    return { tasks: tasks.size, resumed };
  }

  function compact() {
    if (!filePath) return;
    rewriteJsonl(
      filePath,
      [...tasks.values()].map((task): JournalLine => ({ op: "task", task }))
    );
    lines = tasks.size;
  }

  function enqueue(input: EnqueueInput): ReplicationTask {
    const at = now();
    return write({
      ...input,
      attempts: 0,
      nextRetryAt: at,
      status: "PENDING",
      createdAt: new Date(at).toISOString(),
      updatedAt: new Date(at).toISOString()
    });
  }

  function current(key: string, target: string, version: number): ReplicationTask | null {
    const task = tasks.get(taskId(key, target));
    return task && task.version === version ? task : null;
  }

  function claim(key: string, target: string, version: number): ReplicationTask | null {
    const task = current(key, target, version);
    if (!task || task.status !== "PENDING" || task.nextRetryAt > now()) return null;
    return write({ ...task, status: "IN_FLIGHT", updatedAt: stamp() });
  }

  function release(key: string, target: string, version: number): ReplicationTask | null {
    const task = current(key, target, version);
    if (!task || task.status !== "IN_FLIGHT") return null;
    return write({ ...task, status: "PENDING", updatedAt: stamp() });
  }

  function complete(key: string, target: string, version: number): ReplicationTask | null {
    const task = current(key, target, version);
    if (!task || task.status !== "IN_FLIGHT") return null;
    return write({ ...task, attempts: task.attempts + 1, status: "DONE", lastError: undefined, updatedAt: stamp() });
  }

  /** Counts a failed attempt. `retryAt` null makes the failure terminal. */
  function fail(key: string, target: string, version: number, error: string, retryAt: number | null): ReplicationTask | null {
    const task = current(key, target, version);
    if (!task || task.status !== "IN_FLIGHT") return null;
    return write({
      ...task,
      attempts: task.attempts + 1,
      status: retryAt === null ? "FAILED" : "PENDING",
      nextRetryAt: retryAt ?? task.nextRetryAt,
      lastError: error,
      updatedAt: stamp()
    });
  }

  function remove(key: string, target: string, version: number): boolean {
    if (!current(key, target, version)) return false;
    const line: JournalLine = { op: "remove", key, target, version };
    append(line);
    return true;
  }

  function drop(key: string): ReplicationTask[] {
    const dropped = list({ key });
    if (!dropped.length) return [];
    const line: JournalLine = { op: "drop", key };
    append(line);
    return dropped;
  }

  function retry(key: string, target?: string): ReplicationTask[] {
    const failed = list({ key, target, status: "FAILED" });
    const at = now();
    return failed.map((task) =>
      write({ ...task, status: "PENDING", attempts: 0, nextRetryAt: at, lastError: undefined, updatedAt: new Date(at).toISOString() })
    );
  }

  function list(filter: TaskFilter = {}): ReplicationTask[] {
    return [...tasks.values()]
      .filter((t) => filter.key === undefined || t.key === filter.key)
      .filter((t) => filter.target === undefined || t.target === filter.target)
      .filter((t) => filter.status === undefined || t.status === filter.status)
      .map((t) => ({ ...t }));
  }

  function eligible(at = now()): ReplicationTask[] {
    return list({ status: "PENDING" })
      .filter((t) => t.nextRetryAt <= at)
      .sort((a, b) => a.nextRetryAt - b.nextRetryAt || a.key.localeCompare(b.key) || a.target.localeCompare(b.target));
  }

  function counts(): Record<TaskStatus, number> {
    const out: Record<TaskStatus, number> = { PENDING: 0, IN_FLIGHT: 0, DONE: 0, FAILED: 0 };
    for (const task of tasks.values()) out[task.status] += 1;
    return out;
  }

  return {
    open,
    compact,
    enqueue,
    claim,
    release,
    complete,
    fail,
    remove,
    drop,
    retry,
    list,
    eligible,
    counts,
    get: (key: string, target: string): ReplicationTask | null => {
      const task = tasks.get(taskId(key, target));
      return task ? { ...task } : null;
    }
  };
}

export type ReplicationJournal = ReturnType<typeof createReplicationJournal>;

const STATUSES: readonly TaskStatus[] = ["PENDING", "IN_FLIGHT", "DONE", "FAILED"];

function isTaskStatus(value: unknown): value is TaskStatus {
  return STATUSES.some((s) => s === value);
}

function parseTask(raw: unknown): ReplicationTask | null {
  if (!isRecord(raw)) return null;
  const { key, source, target, digest, size, version, attempts, nextRetryAt, status, lastError, createdAt, updatedAt } = raw;
  if (typeof key !== "string" || typeof source !== "string" || typeof target !== "string") return null;
  if (typeof digest !== "string" || typeof size !== "number" || typeof version !== "number") return null;
  if (typeof attempts !== "number" || typeof nextRetryAt !== "number" || !isTaskStatus(status)) return null;
  if (typeof createdAt !== "string" || typeof updatedAt !== "string") return null;
  const task: ReplicationTask = { key, source, target, digest, size, version, attempts, nextRetryAt, status, createdAt, updatedAt };
  if (typeof lastError === "string") task.lastError = lastError;
  return task;
}

function parseLine(raw: unknown): JournalLine | null {
  if (!isRecord(raw)) return null;
  if (raw.op === "task") {
    const task = parseTask(raw.task);
    return task ? { op: "task", task } : null;
  }
  if (raw.op === "remove") {
    const { key, target, version } = raw;
    if (typeof key !== "string" || typeof target !== "string" || typeof version !== "number") return null;
    return { op: "remove", key, target, version };
  }
  if (raw.op === "drop" && typeof raw.key === "string") return { op: "drop", key: raw.key };
  return null;
}
