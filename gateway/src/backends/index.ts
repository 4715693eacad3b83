import { createHttpBackend } from "./http.js";
import { createLocalBackend } from "./local.js";
import { createMemoryBackend } from "./memory.js";
import type { StorageBackend } from "./types.js";

export { BackendError, isBackendError } from "./types.js";
export type { BackendErrorCode, BackendKind, ObjectStat, StorageBackend } from "./types.js";
export { createMemoryBackend, type MemoryBackend } from "./memory.js";
export { createLocalBackend } from "./local.js";
export { createHttpBackend, DIGEST_HEADER } from "./http.js";

export type AdapterSpec =
  | { type: "memory"; maxBytes?: number }
  | { type: "local"; root: string }
  | { type: "http"; baseUrl: string; timeoutMs?: number };

export function createBackend(id: string, adapter: AdapterSpec, opts: { fetchImpl?: typeof fetch } = {}): StorageBackend {
  switch (adapter.type) {
    case "memory":
      return createMemoryBackend({ id, maxBytes: adapter.maxBytes });
    case "local":
      return createLocalBackend({ id, root: adapter.root });
    case "http":
      return createHttpBackend({ id, baseUrl: adapter.baseUrl, timeoutMs: adapter.timeoutMs, fetchImpl: opts.fetchImpl });
  }
}
