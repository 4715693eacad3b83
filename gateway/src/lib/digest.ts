import crypto from "node:crypto";

export function sha256Hex(bytes: Uint8Array | string): string {
  const buf = typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes;
  return crypto.createHash("sha256").update(buf).digest("hex");
}

export function normalizeDigest(value: string | null | undefined): string | null {
  const v = String(value || "").trim().toLowerCase().replace(/^sha256[:=]/, "").replace(/^0x/, "");
  return /^[a-f0-9]{64}$/.test(v) ? v : null;
}
