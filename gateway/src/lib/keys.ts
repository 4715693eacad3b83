export const OBJECT_KEY_MAX_BYTES = 1024;

const CONTROL_RE = /[\u0000-\u001f\u007f]/;

export function validateObjectKey(raw: unknown): { ok: true; key: string } | { ok: false; error: string } {
  if (typeof raw !== "string" || raw.length === 0) return { ok: false, error: "key_required" };
  if (Buffer.byteLength(raw, "utf8") > OBJECT_KEY_MAX_BYTES) return { ok: false, error: "key_too_long" };
  if (CONTROL_RE.test(raw)) return { ok: false, error: "key_has_control_characters" };
  if (raw.startsWith("/")) return { ok: false, error: "key_must_not_start_with_slash" };
  if (raw.includes("\\")) return { ok: false, error: "key_must_not_contain_backslash" };
  const segments = raw.split("/");
  if (segments.some((s) => s === "." || s === "..")) return { ok: false, error: "key_has_dot_segment" };
  if (segments.some((s) => s === "")) return { ok: false, error: "key_has_empty_segment" };
  return { ok: true, key: raw };
}
