import { backoffDelayMs, isExhausted, type RetrySchedule } from "@replistore/replication-policy";
import { isBackendError, type StorageBackend } from "./backends/index.js";
import type { ObjectCatalog } from "./catalog.js";
import { errorMessage } from "./errors.js";
import type { ReplicationEvents } from "./events.js";
import { taskId, type ReplicationJournal, type ReplicationTask } from "./journal.js";
import { sha256Hex } from "./lib/digest.js";
import { createKeyedLock, type KeyedLock } from "./lib/keyed_lock.js";
import { silentLogger, type Logger } from "./lib/log.js";
import { createWorkQueue, type WorkQueue } from "./lib/work_queue.js";

export type PropagatorConfig = {
  journal: ReplicationJournal;
  catalog: ObjectCatalog;
  events: ReplicationEvents;
  backends: ReadonlyMap<string, StorageBackend>;
  schedule: RetrySchedule;
  workers?: number;
  pollIntervalMs?: number;
  replicaLock?: KeyedLock;
  now?: () => number;
  log?: Logger;
};

export type PropagatorStats = {
  running: boolean;
  workers: number;
  inFlight: number;
  queued: number;
  succeeded: number;
  retried: number;
  failed: number;
  discarded: number;
};

type Job = {
  task: ReplicationTask;
  done: () => void;
};

type Outcome = "succeeded" | "retried" | "failed" | "discarded";

/**
 * Drains the journal in the background. The scheduler claims due tasks and
 * feeds them through a work queue to a fixed pool of workers; a claimed
 * (key, target) pair is never dispatched twice, so copies of the same task
 * never run concurrently.
 */
export function createPropagator(cfg: PropagatorConfig) {
  const { journal, catalog, events, backends, schedule } = cfg;
  const workerCount = Math.max(1, Math.floor(cfg.workers ?? 4));
  const pollIntervalMs = Math.max(10, cfg.pollIntervalMs ?? 1000);
  const replicaLock = cfg.replicaLock || createKeyedLock();
  const now = cfg.now || Date.now;
  const log = cfg.log || silentLogger;

  const claimed = new Set<string>();
  const counters: Record<Outcome, number> = { succeeded: 0, retried: 0, failed: 0, discarded: 0 };
  let queue: WorkQueue<Job> | null = null;
  let loops: Promise<void>[] = [];
  let timer: NodeJS.Timeout | null = null;
  let running = false;

  function ensureWorkers(): WorkQueue<Job> {
    if (queue && !queue.closed) return queue;
    const q = createWorkQueue<Job>();
    queue = q;
    loops = Array.from({ length: workerCount }, (_, i) => workerLoop(q, i));
    return q;
  }

  async function workerLoop(q: WorkQueue<Job>, index: number) {
    for (;;) {
      const job = await q.next();
      if (!job) return;
      const { task } = job;
      try {
        const outcome = await processTask(task);
        counters[outcome] += 1;
      } catch (err) {
        // Journal or catalog I/O failed; hand the task back so it is not stuck IN_FLIGHT.
        log.error(`worker ${index} crashed on task`, { key: task.key, target: task.target, error: errorMessage(err) });
        try {
          journal.release(task.key, task.target, task.version);
        } catch (releaseErr) {
          log.error("could not release task; it resumes on restart", { key: task.key, error: errorMessage(releaseErr) });
        }
      } finally {
        claimed.delete(taskId(task.key, task.target));
        job.done();
        if (running) scheduleNext();
      }
    }
  }

  function discard(task: ReplicationTask): Outcome {
    journal.remove(task.key, task.target, task.version);
    log.debug("task superseded", { key: task.key, target: task.target, version: task.version });
    return "discarded";
  }

  function failTask(task: ReplicationTask, error: string, terminal = false): Outcome {
    const attempt = task.attempts + 1;
    if (!terminal && !isExhausted(attempt, schedule)) {
      const retryAt = now() + backoffDelayMs(attempt, schedule);
      journal.fail(task.key, task.target, task.version, error, retryAt);
      log.debug("replication attempt failed", { key: task.key, target: task.target, attempt, error });
      return "retried";
    }
    const failed = journal.fail(task.key, task.target, task.version, error, null);
    // Only the transition into FAILED reports; a superseded task has nothing to surface.
    if (!failed) return "discarded";
    catalog.setReplicaState(task.key, task.target, task.version, "FAILED", `async_replication_failed:${error}`);
    events.emit({
      key: task.key,
      backendId: task.target,
      status: "ASYNC_FAILED",
      attempt,
      timestamp: new Date(now()).toISOString(),
      error
    });
    return "failed";
  }

  function isCurrent(task: ReplicationTask): boolean {
    return catalog.get(task.key)?.version === task.version;
  }

  async function processTask(task: ReplicationTask): Promise<Outcome> {
    const source = backends.get(task.source);
    const target = backends.get(task.target);
    if (!source || !target) {
      // The topology no longer has this backend; retrying cannot help.
      return failTask(task, "unknown_backend", true);
    }

    return replicaLock.run(taskId(task.key, task.target), async () => {
      if (!isCurrent(task)) return discard(task);

      let data: Buffer;
      try {
        data = await source.get(task.key);
      } catch (err) {
        if (isBackendError(err, "not_found") && !isCurrent(task)) return discard(task);
        return failTask(task, `source_${isBackendError(err) ? err.code : "error"}`);
      }
      if (sha256Hex(data) !== task.digest) {
        if (!isCurrent(task)) return discard(task);
        return failTask(task, "digest_mismatch:source");
      }

      let digest: string;
      try {
        digest = await target.put(task.key, data);
      } catch (err) {
        return failTask(task, errorMessage(err));
      }
      if (digest !== task.digest) return failTask(task, "digest_mismatch");

      if (!isCurrent(task)) {
        // Deleted or overwritten while copying: the bytes just written must not outlive the tombstone.
        try {
          await target.delete(task.key);
        } catch (err) {
          if (!isBackendError(err, "not_found")) {
            log.warn("could not remove superseded replica copy", { key: task.key, target: task.target, error: errorMessage(err) });
          }
        }
        return discard(task);
      }

      journal.complete(task.key, task.target, task.version);
      catalog.setReplicaState(task.key, task.target, task.version, "DONE");
      return "succeeded";
    });
  }

  /** Claims due tasks up to the free worker slots and hands them to the workers. */
  function dispatch(): Promise<void>[] {
    const q = ensureWorkers();
    const waits: Promise<void>[] = [];
    for (const due of journal.eligible(now())) {
      if (claimed.size >= workerCount) break;
      if (claimed.has(taskId(due.key, due.target))) continue;
      const task = journal.claim(due.key, due.target, due.version);
      if (!task) continue;
      claimed.add(taskId(task.key, task.target));
      waits.push(new Promise<void>((resolve) => q.push({ task, done: resolve })));
    }
    return waits;
  }

  /** Runs due tasks, a pool-sized batch at a time, until none is left. Resolves with the number run. */
  async function tick(): Promise<number> {
    let total = 0;
    for (;;) {
      const waits = dispatch();
      if (!waits.length) return total;
      total += waits.length;
      await Promise.all(waits);
    }
  }

  function nextDelayMs(): number {
    // Every slot busy: a finishing worker reschedules.
    if (claimed.size >= workerCount) return pollIntervalMs;
    let earliest: number | null = null;
    for (const task of journal.list({ status: "PENDING" })) {
      if (claimed.has(taskId(task.key, task.target))) continue;
      if (earliest === null || task.nextRetryAt < earliest) earliest = task.nextRetryAt;
    }
    if (earliest === null) return pollIntervalMs;
    return Math.min(pollIntervalMs, Math.max(0, earliest - now()));
  }

  function scheduleNext(delayMs = nextDelayMs()) {
    if (timer) clearTimeout(timer);
    timer = setTimeout(loop, delayMs);
    timer.unref();
  }

  function loop() {
    timer = null;
    if (!running) return;
    try {
      dispatch();
    } catch (err) {
      log.error("dispatch failed", { error: errorMessage(err) });
    }
    scheduleNext();
  }

  function start() {
    if (running) return;
    running = true;
    ensureWorkers();
    scheduleNext(0);
    log.info(`started with ${workerCount} workers`);
  }

  async function stop() {
    running = false;
    if (timer) clearTimeout(timer);
    timer = null;
    queue?.close();
    await Promise.all(loops);
    loops = [];
  }

  function wake() {
    if (running) scheduleNext(0);
  }

  function stats(): PropagatorStats {
    return {
      running,
      workers: workerCount,
      inFlight: claimed.size,
      queued: queue?.length ?? 0,
      ...counters
    };
  }

  return { start, stop, wake, tick, stats };
}

export type Propagator = ReturnType<typeof createPropagator>;
