import express from "express";
import type { QueryEngine } from "./engine.js";
import type { Logger } from "./log.js";

export type HttpAppDeps = {
  engine: QueryEngine;
  logger: Logger;
  now?: () => number;
};

export function createApp(deps: HttpAppDeps) {
  const app = express();
  const now = deps.now ?? Date.now;
  const startedAtMs = now();

  app.use("/dns-query", express.raw({ type: ["application/dns-message"], limit: "64kb" }));

  app.get("/healthz", (_req, res) => res.json({ status: "ok" }));

  app.get("/v1/status", (_req, res) => {
    const stats = deps.engine.stats();
    return res.json({
      ok: true,
      service: "dns-txt-llm",
      now_utc: new Date(now()).toISOString(),
      uptime_s: Math.max(0, Math.floor((now() - startedAtMs) / 1000)),
      queries: {
        received: stats.received,
        malformed: stats.malformed,
        rate_limited: stats.rateLimited,
        unsupported: stats.unsupported,
        answered: stats.answered,
        fallbacks: stats.fallbacks,
        truncated: stats.truncated,
        faults: stats.faults
      },
      rate_limit: { tracked_addresses: deps.engine.trackedAddresses() }
    });
  });

  async function answerWire(wire: Buffer, req: express.Request, res: express.Response) {
    if (!wire.length) return res.status(400).json({ error: "empty_dns_query" });
    const source = req.ip || req.socket.remoteAddress || "unknown";
    const out = await deps.engine.handle(wire, source);
    if (out.kind === "discarded") {
      if (out.reason === "malformed") return res.status(400).json({ error: "invalid_dns_query" });
      return res.status(429).json({ error: "rate_limited" });
    }
    return res
      .set("content-type", "application/dns-message")
      .set("cache-control", "no-store")
      .status(200)
      .send(out.wire);
  }

  app.get("/dns-query", async (req, res) => {
    const dnsParam = typeof req.query.dns === "string" ? req.query.dns : "";
    if (!dnsParam) return res.status(400).json({ error: "missing_dns_param" });
    try {
      return await answerWire(Buffer.from(dnsParam, "base64url"), req, res);
    } catch (err) {
      deps.logger.error("GET /dns-query failed", err);
      return res.status(500).json({ error: "internal_error" });
    }
  });

  app.post("/dns-query", async (req, res) => {
    const body: unknown = req.body;
    const wire = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
    try {
      return await answerWire(wire, req, res);
    } catch (err) {
      deps.logger.error("POST /dns-query failed", err);
      return res.status(500).json({ error: "internal_error" });
    }
  });

  return app;
}
