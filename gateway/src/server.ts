import express from "express";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DIGEST_HEADER } from "./backends/index.js";
import { loadConfig } from "./config.js";
import { GatewayError, errorMessage, isGatewayError } from "./errors.js";
import { createGateway, type Gateway } from "./gateway.js";

const OBJECTS_PREFIX = "/objects/";
const REPLICATION_PREFIX = "/v1/replication/";

function keyFromPath(reqPath: string, prefix: string): string {
  try {
    return decodeURIComponent(reqPath.slice(prefix.length));
  } catch {
    throw new GatewayError("invalid_key", "malformed_percent_encoding");
  }
}

function isTooLarge(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.too.large";
}

export function createApp(gateway: Gateway) {
  const { coordinator, journal, catalog, propagator, events, config } = gateway;
  const log = gateway.log.child("http");
  const app = express();
  app.disable("x-powered-by");

  function sendError(res: express.Response, err: unknown) {
    if (isGatewayError(err)) {
      return res.status(err.statusCode).json({ error: err.code, detail: err.detail });
    }
    log.error("request failed", { error: errorMessage(err) });
    return res.status(500).json({ error: "internal_error" });
  }

  app.get("/healthz", (_req, res) => {
    return res.json({ ok: true });
  });

  app.get("/v1/status", (_req, res) => {
    return res.json({
      ok: true,
      service: "replistore",
      primary: coordinator.primaryId,
      backends: config.backends.map((b) => ({ id: b.id, role: b.role, kind: b.adapter.type })),
      objects: catalog.size(),
      journal: journal.counts(),
      propagator: propagator.stats(),
      recent_events: events.recent()
    });
  });

  app.put(
    `${OBJECTS_PREFIX}*`,
    express.raw({ type: () => true, limit: config.maxObjectBytes }),
    async (req, res) => {
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });
      try {
        const key = keyFromPath(req.path, OBJECTS_PREFIX);
        const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const result = await coordinator.putObject(key, body, {
          contentType: req.get("content-type") || undefined,
          signal: controller.signal
        });
        return res.status(201).set(DIGEST_HEADER, result.digest).json(result);
      } catch (err) {
        return sendError(res, err);
      }
    }
  );

  app.head(`${OBJECTS_PREFIX}*`, (req, res) => {
    try {
      const record = coordinator.statObject(keyFromPath(req.path, OBJECTS_PREFIX));
      return res
        .status(200)
        .set({
          "content-type": record.contentType,
          "content-length": String(record.size),
          [DIGEST_HEADER]: record.digest,
          "x-object-version": String(record.version)
        })
        .end();
    } catch (err) {
      const status = isGatewayError(err) ? err.statusCode : 500;
      return res.status(status).end();
    }
  });

  app.get(`${OBJECTS_PREFIX}*`, async (req, res) => {
    try {
      const out = await coordinator.getObject(keyFromPath(req.path, OBJECTS_PREFIX));
      return res
        .status(200)
        .set({
          "content-type": out.record.contentType,
          [DIGEST_HEADER]: out.record.digest,
          "x-object-version": String(out.record.version),
          "x-served-by": out.servedBy
        })
        .send(out.data);
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.delete(`${OBJECTS_PREFIX}*`, async (req, res) => {
    try {
      const out = await coordinator.deleteObject(keyFromPath(req.path, OBJECTS_PREFIX));
      if (out.replicaFailures.length) res.set("x-replica-failures", out.replicaFailures.join(","));
      return res.status(204).end();
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.get(`${REPLICATION_PREFIX}*`, (req, res) => {
    try {
      const record = coordinator.statObject(keyFromPath(req.path, REPLICATION_PREFIX));
      return res.json({
        key: record.key,
        version: record.version,
        digest: record.digest,
        replicas: record.replicas,
        tasks: journal.list({ key: record.key })
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.post(`${REPLICATION_PREFIX}*`, async (req, res) => {
    try {
      const requeued = await coordinator.repair(keyFromPath(req.path, REPLICATION_PREFIX));
      return res.status(202).json({ requeued });
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.use((_req, res) => {
    return res.status(404).json({ error: "not_found" });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isTooLarge(err)) return res.status(413).json({ error: "object_too_large" });
    return sendError(res, err);
  });

  return app;
}

async function main() {
  const config = loadConfig();
  const gateway = createGateway(config);
  gateway.start();
  const app = createApp(gateway);
  const server = app.listen(config.port, config.host, () => {
    gateway.log.info(`Listening on ${config.host}:${config.port}`, {
      backends: config.backends.map((b) => `${b.id}:${b.role}`)
    });
  });

  const shutdown = (signal: string) => {
    gateway.log.info(`${signal} received, draining`);
    server.close();
    gateway
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        gateway.log.error("shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

const modulePath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (modulePath === entryPath) {
  main().catch((err) => {
    process.stderr.write(errorMessage(err) + "\n");
    process.exit(1);
  });
}
