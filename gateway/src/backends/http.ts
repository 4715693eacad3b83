import { normalizeDigest, sha256Hex } from "../lib/digest.js";
import { BackendError, type StorageBackend } from "./types.js";

export type HttpBackendConfig = {
  id: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export const DIGEST_HEADER = "x-content-digest";

/**
 * Talks to any server exposing `/objects/{key}` with PUT/GET/DELETE/HEAD,
 * including another replistore gateway.
 */
export function createHttpBackend(cfg: HttpBackendConfig): StorageBackend {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const fetchImpl = cfg.fetchImpl || fetch;
  const timeoutMs = Number(cfg.timeoutMs ?? 5000);

  function objectUrl(key: string): string {
    return `${base}/objects/${key.split("/").map(encodeURIComponent).join("/")}`;
  }

  async function request(method: string, key: string, body?: Buffer): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(objectUrl(key), {
        method,
        body: body ? new Uint8Array(body) : undefined,
        headers: body ? { "content-type": "application/octet-stream" } : undefined,
        signal: controller.signal
      });
    } catch (err) {
      const detail = err instanceof Error && err.name === "AbortError" ? "timeout" : "network_error";
      throw new BackendError("unavailable", cfg.id, detail, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  function statusError(status: number, key: string): BackendError {
    if (status === 404) return new BackendError("not_found", cfg.id, key);
    if (status === 400) return new BackendError("invalid_key", cfg.id, key);
    if (status === 413 || status === 507) return new BackendError("quota_exceeded", cfg.id, `status_${status}`);
    return new BackendError("unavailable", cfg.id, `status_${status}`);
  }

  async function get(key: string): Promise<Buffer> {
    const res = await request("GET", key);
    if (!res.ok) throw statusError(res.status, key);
    return Buffer.from(await res.arrayBuffer());
  }

  return {
    id: cfg.id,
    kind: "http",
    async put(key, data) {
      const res = await request("PUT", key, data);
      if (!res.ok) throw statusError(res.status, key);
      const fromHeader = normalizeDigest(res.headers.get(DIGEST_HEADER));
      if (fromHeader) return fromHeader;
      const payload: unknown = await res.json().catch(() => null);
      const fromBody =
        typeof payload === "object" && payload !== null && "digest" in payload && typeof payload.digest === "string"
          ? normalizeDigest(payload.digest)
          : null;
      return fromBody ?? sha256Hex(data);
    },
    get,
    async delete(key) {
      const res = await request("DELETE", key);
      if (!res.ok) throw statusError(res.status, key);
    },
    async stat(key) {
      const res = await request("HEAD", key);
      if (!res.ok) throw statusError(res.status, key);
      const digest = normalizeDigest(res.headers.get(DIGEST_HEADER));
      const size = Number(res.headers.get("content-length") || "0");
      if (digest) return { size, digest };
      // No digest header: hash the bytes ourselves.
      const data = await get(key);
      return { size: data.length, digest: sha256Hex(data) };
    }
  };
}
