import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  BackendRole,
  defaultRetryScheduleFromEnv,
  validateTopology,
  type RetrySchedule
} from "@replistore/replication-policy";
import type { AdapterSpec } from "./backends/index.js";
import { GatewayError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./lib/log.js";

const AdapterSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("memory"), maxBytes: z.number().int().positive().optional() }),
  z.object({ type: z.literal("local"), root: z.string().min(1) }),
  z.object({
    type: z.literal("http"),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive().optional()
  })
]);

export const BackendDescriptorSchema = z.object({
  id: z
    .string()
    .min(1, "backend id cannot be empty")
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "backend id must be alphanumeric with dots, dashes and underscores"),
  role: z.nativeEnum(BackendRole),
  adapter: AdapterSchema
});

export const BackendListSchema = z.array(BackendDescriptorSchema).superRefine((list, ctx) => {
  const topology = validateTopology(list);
  if (!topology.ok) ctx.addIssue({ code: z.ZodIssueCode.custom, message: topology.error });
});

export type BackendDescriptor = {
  readonly id: string;
  readonly role: BackendRole;
  readonly adapter: AdapterSpec;
};

export type GatewayConfig = Readonly<{
  port: number;
  host: string;
  logLevel: LogLevel;
  dataDir: string;
  backends: readonly BackendDescriptor[];
  journalPath: string | null;
  catalogPath: string | null;
  eventsSpoolPath: string | null;
  syncWriteAttempts: number;
  retry: Readonly<RetrySchedule>;
  propagationWorkers: number;
  propagationPollMs: number;
  maxObjectBytes: number;
  maxSyncBytes: number;
}>;

type Env = Record<string, string | undefined>;

function num(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) throw new GatewayError("invalid_config", `${name} must be a number >= ${min}`);
  return n;
}

// "memory" (or "off" for the spool) keeps state in process only.
function optionalPath(env: Env, name: string, fallback: string | null): string | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const v = raw.trim();
  if (v === "memory" || v === "off") return null;
  return path.resolve(v);
}

function resolveRoots(list: BackendDescriptor[], baseDir: string): BackendDescriptor[] {
  return list.map((b) =>
    b.adapter.type === "local" ? { ...b, adapter: { ...b.adapter, root: path.resolve(baseDir, b.adapter.root) } } : b
  );
}

export function parseBackendList(raw: unknown, baseDir = process.cwd()): BackendDescriptor[] {
  const parsed = BackendListSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "backends"}: ${i.message}`).join("; ");
    throw new GatewayError("invalid_config", detail);
  }
  return resolveRoots(parsed.data, baseDir);
}

function readJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new GatewayError("invalid_config", `${origin} is not valid JSON`);
  }
}

export function defaultBackends(dataDir: string): BackendDescriptor[] {
  return [
    { id: "primary", role: BackendRole.PRIMARY, adapter: { type: "local", root: path.join(dataDir, "objects", "primary") } },
    { id: "backup", role: BackendRole.ASYNC_REPLICA, adapter: { type: "local", root: path.join(dataDir, "objects", "backup") } }
  ];
}

function loadBackends(env: Env, dataDir: string): BackendDescriptor[] {
  if (env.BACKENDS && env.BACKENDS.trim()) {
    return parseBackendList(readJson(env.BACKENDS, "BACKENDS"));
  }
  if (env.BACKENDS_PATH && env.BACKENDS_PATH.trim()) {
    const file = path.resolve(env.BACKENDS_PATH);
    if (!fs.existsSync(file)) throw new GatewayError("invalid_config", `BACKENDS_PATH not found: ${file}`);
    const raw = readJson(fs.readFileSync(file, "utf8"), file);
    const list = typeof raw === "object" && raw !== null && "backends" in raw ? raw.backends : raw;
    return parseBackendList(list, path.dirname(file));
  }
  return defaultBackends(dataDir);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

/** Reads the whole configuration once; the result is frozen and passed down explicitly. */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const dataDir = path.resolve(env.DATA_DIR || ".data");
  const retry = defaultRetryScheduleFromEnv(env);
  const config: GatewayConfig = {
    port: num(env, "PORT", 8070),
    host: env.HOST || "0.0.0.0",
    logLevel: parseLogLevel(env.LOG_LEVEL, env.NODE_ENV),
    dataDir,
    backends: loadBackends(env, dataDir),
    journalPath: optionalPath(env, "JOURNAL_PATH", path.join(dataDir, "journal.jsonl")),
    catalogPath: optionalPath(env, "CATALOG_PATH", path.join(dataDir, "catalog.jsonl")),
    eventsSpoolPath: optionalPath(env, "EVENTS_SPOOL_PATH", null),
    syncWriteAttempts: num(env, "SYNC_WRITE_ATTEMPTS", 3, 1),
    retry,
    propagationWorkers: num(env, "PROPAGATION_WORKERS", 4, 1),
    propagationPollMs: num(env, "PROPAGATION_POLL_MS", 1000, 10),
    maxObjectBytes: num(env, "MAX_OBJECT_BYTES", 64 * 1024 * 1024, 1),
    maxSyncBytes: num(env, "REPLICATION_MAX_SYNC_BYTES", 0)
  };
  return deepFreeze(config);
}
