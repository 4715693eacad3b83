import { appendJsonl } from "./lib/jsonl.js";
import { silentLogger, type Logger } from "./lib/log.js";
import { errorMessage } from "./errors.js";

export type ReplicationEventStatus = "SYNC_FAILURE" | "ASYNC_FAILED" | "DELETE_FAILED";

export type ReplicationEvent = {
  key: string;
  backendId: string;
  status: ReplicationEventStatus;
  attempt: number;
  timestamp: string;
  error?: string;
};

export type ReplicationEventListener = (event: ReplicationEvent) => void;

export type ReplicationEventsConfig = {
  spoolPath?: string | null;
  recentMax?: number;
  log?: Logger;
};

/**
 * Failure channel for monitoring. Every event is logged, kept in a bounded
 * ring for the status endpoint, optionally spooled to JSONL, and fanned out
 * to in-process subscribers.
 */
export function createReplicationEvents(cfg: ReplicationEventsConfig = {}) {
  const log = cfg.log || silentLogger;
  const recentMax = Math.max(1, cfg.recentMax ?? 100);
  const listeners = new Set<ReplicationEventListener>();
  const recent: ReplicationEvent[] = [];

  function emit(event: ReplicationEvent) {
    log.warn(`${event.status.toLowerCase()} ${event.key} -> ${event.backendId}`, {
      attempt: event.attempt,
      error: event.error
    });
    recent.push(event);
    if (recent.length > recentMax) recent.splice(0, recent.length - recentMax);
    if (cfg.spoolPath) {
      try {
        appendJsonl(cfg.spoolPath, event);
      } catch (err) {
        log.error("event spool write failed", { path: cfg.spoolPath, error: errorMessage(err) });
      }
    }
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("event listener threw", { error: errorMessage(err) });
      }
    }
  }

  function subscribe(listener: ReplicationEventListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    emit,
    subscribe,
    recent: (): ReplicationEvent[] => recent.map((e) => ({ ...e }))
  };
}

export type ReplicationEvents = ReturnType<typeof createReplicationEvents>;
