import fsp from "node:fs/promises";
import path from "node:path";
import { sha256Hex } from "../lib/digest.js";
import { validateObjectKey } from "../lib/keys.js";
import { BackendError, type StorageBackend } from "./types.js";

export type LocalBackendConfig = {
  id: string;
  root: string;
};

const PATH_CONFLICT = new Set(["ENOENT", "ENOTDIR", "EISDIR", "EEXIST"]);

function errnoCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err) return String(err.code);
  return "";
}

export function createLocalBackend(cfg: LocalBackendConfig): StorageBackend {
  const baseDir = path.resolve(cfg.root);

  function target(key: string): string {
    const valid = validateObjectKey(key);
    if (!valid.ok) throw new BackendError("invalid_key", cfg.id, valid.error);
    const file = path.resolve(baseDir, ...key.split("/"));
    if (!file.startsWith(baseDir + path.sep)) throw new BackendError("invalid_key", cfg.id, "key_escapes_root");
    return file;
  }

  function mapError(err: unknown, key: string): BackendError {
    if (err instanceof BackendError) return err;
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") return new BackendError("not_found", cfg.id, key, { cause: err });
    if (code === "ENOSPC" || code === "EDQUOT") return new BackendError("quota_exceeded", cfg.id, code, { cause: err });
    if (code === "ENAMETOOLONG") return new BackendError("invalid_key", cfg.id, code, { cause: err });
    return new BackendError("unavailable", cfg.id, code || "io_error", { cause: err });
  }

  return {
    id: cfg.id,
    kind: "local",
    async put(key, data) {
      const file = target(key);
      const tmp = `${file}.tmp.${process.pid}.${Math.random().toString(36).slice(2)}`;
      try {
        await fsp.mkdir(path.dirname(file), { recursive: true });
        await fsp.writeFile(tmp, data);
        await fsp.rename(tmp, file);
      } catch (err) {
        await fsp.rm(tmp, { force: true });
        // A key segment collides with an existing file, or the key names a directory.
        if (PATH_CONFLICT.has(errnoCode(err))) throw new BackendError("invalid_key", cfg.id, "key_path_conflict", { cause: err });
        throw mapError(err, key);
      }
      return sha256Hex(data);
    },
    async get(key) {
      try {
        return await fsp.readFile(target(key));
      } catch (err) {
        throw mapError(err, key);
      }
    },
    async delete(key) {
      try {
        await fsp.unlink(target(key));
      } catch (err) {
        throw mapError(err, key);
      }
    },
    async stat(key) {
      try {
        const data = await fsp.readFile(target(key));
        return { size: data.length, digest: sha256Hex(data) };
      } catch (err) {
        throw mapError(err, key);
      }
    }
  };
}
