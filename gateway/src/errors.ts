export type GatewayErrorCode =
  | "primary_write_failed"
  | "primary_delete_failed"
  | "object_not_found"
  | "object_unavailable"
  | "invalid_key"
  | "object_too_large"
  | "invalid_config";

const STATUS: Record<GatewayErrorCode, number> = {
  primary_write_failed: 502,
  primary_delete_failed: 502,
  object_not_found: 404,
  object_unavailable: 503,
  invalid_key: 400,
  object_too_large: 413,
  invalid_config: 500
};

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly statusCode: number;
  readonly detail?: string;

  constructor(code: GatewayErrorCode, detail?: string, options?: { cause?: unknown }) {
    super(detail ? `${code}:${detail}` : code, options);
    this.name = "GatewayError";
    this.code = code;
    this.statusCode = STATUS[code];
    this.detail = detail;
  }
}

export function isGatewayError(err: unknown, code?: GatewayErrorCode): err is GatewayError {
  return err instanceof GatewayError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return String(err instanceof Error ? err.message : err);
}
