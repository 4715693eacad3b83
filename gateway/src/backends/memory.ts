import { sha256Hex } from "../lib/digest.js";
import { BackendError, type StorageBackend } from "./types.js";

export type MemoryBackendConfig = {
  id: string;
  maxBytes?: number;
};

export type MemoryBackend = StorageBackend & {
  keys(): string[];
  usedBytes(): number;
};

export function createMemoryBackend(cfg: MemoryBackendConfig): MemoryBackend {
  const objects = new Map<string, Buffer>();
  const maxBytes = cfg.maxBytes ?? Number.POSITIVE_INFINITY;

  function usedBytes(): number {
    let total = 0;
    for (const buf of objects.values()) total += buf.length;
    return total;
  }

  return {
    id: cfg.id,
    kind: "memory",
    async put(key, data) {
      const existing = objects.get(key)?.length ?? 0;
      if (usedBytes() - existing + data.length > maxBytes) {
        throw new BackendError("quota_exceeded", cfg.id);
      }
      // Copy so later mutation of the caller's buffer cannot change stored bytes.
      objects.set(key, Buffer.from(data));
      return sha256Hex(data);
    },
    async get(key) {
      const buf = objects.get(key);
      if (!buf) throw new BackendError("not_found", cfg.id, key);
      return Buffer.from(buf);
    },
    async delete(key) {
      if (!objects.delete(key)) throw new BackendError("not_found", cfg.id, key);
    },
    async stat(key) {
      const buf = objects.get(key);
      if (!buf) throw new BackendError("not_found", cfg.id, key);
      return { size: buf.length, digest: sha256Hex(buf) };
    },
    keys: () => [...objects.keys()].sort(),
    usedBytes
  };
}
