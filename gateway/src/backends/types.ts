export type BackendErrorCode = "unavailable" | "quota_exceeded" | "invalid_key" | "not_found";

export class BackendError extends Error {
  readonly code: BackendErrorCode;
  readonly backendId: string;

  constructor(code: BackendErrorCode, backendId: string, detail?: string, options?: { cause?: unknown }) {
    super(detail ? `${code}:${backendId}:${detail}` : `${code}:${backendId}`, options);
    this.name = "BackendError";
    this.code = code;
    this.backendId = backendId;
  }
}

export function isBackendError(err: unknown, code?: BackendErrorCode): err is BackendError {
  return err instanceof BackendError && (code === undefined || err.code === code);
}

export type ObjectStat = {
  size: number;
  digest: string;
};

export type BackendKind = "memory" | "local" | "http";

/**
 * One physical object store. Calls may do network or disk I/O but never retry;
 * retrying belongs to the write coordinator and the propagator.
 *
 * `put` overwrites by key, so repeating it with identical bytes leaves the same
 * state behind. It resolves with the SHA-256 hex digest of what the store holds.
 */
export interface StorageBackend {
  readonly id: string;
  readonly kind: BackendKind;
  put(key: string, data: Buffer): Promise<string>;
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
  stat(key: string): Promise<ObjectStat>;
}
