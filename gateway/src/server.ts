#!/usr/bin/env node
import path from "node:path";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { fileURLToPath } from "node:url";
import { loadConfig, type GatewayConfig } from "./config.js";
import { createQueryEngine, type QueryEngine } from "./engine.js";
import { createApp } from "./http_app.js";
import { createLlmClient, type ChatFetch } from "./llm_client.js";
import { createLogger } from "./log.js";
import { TokenBucketLimiter } from "./rate_limit.js";
import { createUdpServer, type UdpServer } from "./udp_server.js";

export type Gateway = {
  engine: QueryEngine;
  udp: UdpServer;
  dnsAddress: AddressInfo;
  http: Server | null;
  close(): Promise<void>;
};

export async function startGateway(config: GatewayConfig, overrides: { fetchImpl?: ChatFetch } = {}): Promise<Gateway> {
  const logger = createLogger(config.logLevel);
  const llm = createLlmClient({
    ...config.llm,
    maxChars: config.maxChars,
    deadlineMs: config.deadlineMs,
    fetchImpl: overrides.fetchImpl
  });
  const engine = createQueryEngine({
    limiter: new TokenBucketLimiter(config.rateLimit.capacity, config.rateLimit.refillPerSec),
    llm,
    logger: logger.child("engine"),
    domainSuffix: config.domainSuffix,
    ttlS: config.ttlS,
    maxChars: config.maxChars,
    maxUdpPayload: config.maxUdpPayload,
    rateLimitPolicy: config.rateLimit.policy
  });

  const udp = createUdpServer({ host: config.dnsHost, port: config.dnsPort, engine, logger: logger.child("udp") });
  const dnsAddress = await udp.start();
  logger.info(`backend ${llm.url} model=${config.llm.model} suffix=${config.domainSuffix || "(none)"}`);

  let http: Server | null = null;
  if (config.httpPort > 0) {
    const app = createApp({ engine, logger: logger.child("http") });
    const listening = app.listen(config.httpPort, config.httpHost);
    http = listening;
    try {
      await new Promise<void>((resolve, reject) => {
        listening.once("listening", () => resolve());
        listening.once("error", reject);
      });
    } catch (err) {
      await udp.stop();
      throw err;
    }
    logger.info(`http surface on ${config.httpHost}:${config.httpPort}`);
  }

  async function close() {
    await udp.stop();
    const server = http;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  }

  return { engine, udp, dnsAddress, http, close };
}

async function main() {
  const config = loadConfig();
  const gateway = await startGateway(config);
  console.log(`DNS-TXT LLM gateway listening on udp://${config.dnsHost}:${config.dnsPort}`);

  const shutdown = () => {
    console.log("\nShutting down DNS gateway...");
    gateway.close().then(
      () => process.exit(0),
      (err) => {
        console.error("shutdown failed:", err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

const modulePath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (modulePath === entryPath) {
  main().catch((err) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
}
