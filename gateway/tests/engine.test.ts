import { describe, expect, it, vi } from "vitest";
import dnsPacket from "dns-packet";
import type { RateLimitPolicy } from "../src/config.js";
import { createQueryEngine } from "../src/engine.js";
import { BACKEND_FALLBACK_TEXT, createLlmClient, type GenerationResult } from "../src/llm_client.js";
import { TokenBucketLimiter } from "../src/rate_limit.js";
import { rawQuery, recordingLogger, txtStrings, unreachableFetch } from "./fixtures.js";

const QUESTION = ["what-is-dns", "example", "test"];

function setup(
  opts: {
    generate?: (prompt: string) => Promise<GenerationResult>;
    capacity?: number;
    policy?: RateLimitPolicy;
  } = {}
) {
  const impl: (prompt: string) => Promise<GenerationResult> =
    opts.generate ?? (async () => ({ text: "DNS maps names to addresses.", reason: "complete" }));
  const generate = vi.fn(impl);
  const logger = recordingLogger();
  const engine = createQueryEngine({
    limiter: new TokenBucketLimiter(opts.capacity ?? 60, 1, () => 0),
    llm: { generate },
    logger,
    domainSuffix: ".example.test",
    ttlS: 60,
    maxChars: 500,
    maxUdpPayload: 1232,
    rateLimitPolicy: opts.policy ?? "empty"
  });
  return { engine, generate, logger };
}

function answerText(wire: Buffer): string {
  return (dnsPacket.decode(wire).answers ?? [])
    .flatMap((a) => (a.type === "TXT" ? txtStrings(a.data) : []))
    .join("");
}

describe("query engine", () => {
  it("answers a TXT question with generated text", async () => {
    const { engine, generate } = setup();
    const wire = await engine.resolve(rawQuery({ id: 0x2a2a, labels: QUESTION }), "10.0.0.1");

    expect(generate).toHaveBeenCalledWith("Answer in 500 characters or less, no markdown formatting: what-is-dns");
    expect(wire).not.toBeNull();
    if (!wire) return;
    expect(wire.readUInt16BE(0)).toBe(0x2a2a);
    expect(answerText(wire)).toBe("DNS maps names to addresses.");
    expect(engine.stats()).toMatchObject({ received: 1, answered: 1, fallbacks: 0 });
  });

  it("discards malformed datagrams before rate limiting", async () => {
    const { engine, generate } = setup();
    const out = await engine.handle(Buffer.from([0, 1, 2]), "10.0.0.1");
    expect(out).toEqual({ kind: "discarded", reason: "malformed" });
    expect(generate).not.toHaveBeenCalled();
    expect(engine.stats().malformed).toBe(1);
    expect(engine.trackedAddresses()).toBe(0);
  });

  it("answers rate-limited queries with an empty response", async () => {
    const { engine, generate } = setup({ capacity: 1 });
    await engine.resolve(rawQuery({ labels: QUESTION }), "10.0.0.1");
    const limited = await engine.resolve(rawQuery({ labels: QUESTION }), "10.0.0.1");

    expect(generate).toHaveBeenCalledTimes(1);
    expect(limited?.readUInt16BE(6)).toBe(0);
    expect(limited?.readUInt16BE(2)).toBe(0x8500);
    expect(engine.stats().rateLimited).toBe(1);
  });

  it("sends nothing for rate-limited queries under the drop policy", async () => {
    const { engine } = setup({ capacity: 1, policy: "drop" });
    await engine.handle(rawQuery({ labels: QUESTION }), "10.0.0.1");
    const out = await engine.handle(rawQuery({ labels: QUESTION }), "10.0.0.1");
    expect(out).toEqual({ kind: "discarded", reason: "rate_limited" });

    const other = await engine.handle(rawQuery({ labels: QUESTION }), "10.0.0.2");
    expect(other.kind).toBe("response");
  });

  it("gives non-TXT questions an empty answer without generating", async () => {
    const { engine, generate } = setup();
    const wire = await engine.resolve(rawQuery({ labels: QUESTION, qtype: 1 }), "10.0.0.1");
    expect(generate).not.toHaveBeenCalled();
    expect(wire?.readUInt16BE(6)).toBe(0);
    expect(engine.stats().unsupported).toBe(1);
  });

  it("gives the bare zone an empty answer", async () => {
    const { engine, generate } = setup();
    const wire = await engine.resolve(rawQuery({ labels: ["example", "test"] }), "10.0.0.1");
    expect(generate).not.toHaveBeenCalled();
    expect(wire?.readUInt16BE(6)).toBe(0);
  });

  it("serves the fallback text when the backend fails", async () => {
    const { engine, logger } = setup({
      generate: async () => ({ text: "error contacting language model", reason: "backend_error", error: "fetch failed" })
    });
    const wire = await engine.resolve(rawQuery({ id: 0x1234, labels: QUESTION }), "10.0.0.1");
    expect(wire && answerText(wire)).toBe("error contacting language model");
    expect(engine.stats().fallbacks).toBe(1);
    expect(logger.lines.warn).toEqual(["generation failed for 0x1234"]);
  });

  it("drops fragments past the classic UDP limit and sets TC", async () => {
    const { engine } = setup({ generate: async () => ({ text: "z".repeat(500), reason: "capped" }) });
    const wire = await engine.resolve(rawQuery({ labels: QUESTION }), "10.0.0.1");
    expect(wire?.length).toBe(334);
    expect((wire?.readUInt16BE(2) ?? 0) & 0x0200).toBe(0x0200);
    expect(engine.stats().truncated).toBe(1);
  });

  it("fits the whole answer under EDNS", async () => {
    const { engine } = setup({ generate: async () => ({ text: "z".repeat(500), reason: "capped" }) });
    const wire = await engine.resolve(rawQuery({ labels: QUESTION, ednsUdpSize: 1232 }), "10.0.0.1");
    expect(wire && answerText(wire)).toBe("z".repeat(500));
    expect(engine.stats().truncated).toBe(0);
  });

  it("answers empty and logs the stage when handling throws", async () => {
    const { engine, logger } = setup({
      generate: async () => {
        throw new Error("boom");
      }
    });
    const wire = await engine.resolve(rawQuery({ id: 0x0042, labels: QUESTION }), "10.0.0.1");
    expect(wire?.readUInt16BE(0)).toBe(0x0042);
    expect(wire?.readUInt16BE(6)).toBe(0);
    expect(engine.stats().faults).toBe(1);
    expect(logger.lines.error).toEqual(["0x0042 failed in GENERATING"]);
  });

  it("admits exactly capacity queries from one address under concurrency", async () => {
    const { engine, generate } = setup({
      capacity: 2,
      generate: () => new Promise((resolve) => setTimeout(() => resolve({ text: "ok", reason: "complete" }), 10))
    });
    const outcomes = await Promise.all(
      [1, 2, 3, 4].map((id) => engine.resolve(rawQuery({ id, labels: QUESTION }), "10.0.0.9"))
    );
    const answered = outcomes.filter((w) => w !== null && w.readUInt16BE(6) > 0);
    expect(answered).toHaveLength(2);
    expect(generate).toHaveBeenCalledTimes(2);
    expect(engine.stats()).toMatchObject({ received: 4, answered: 2, rateLimited: 2 });
  });

  it("answers with the fallback text when the backend is unreachable", async () => {
    const logger = recordingLogger();
    const llm = createLlmClient({
      protocol: "http",
      host: "127.0.0.1",
      port: 11434,
      model: "llama3.2",
      maxChars: 500,
      deadlineMs: 1000,
      fetchImpl: unreachableFetch()
    });
    const engine = createQueryEngine({
      limiter: new TokenBucketLimiter(60, 1),
      llm,
      logger,
      domainSuffix: ".example.test",
      ttlS: 60,
      maxChars: 500,
      maxUdpPayload: 1232,
      rateLimitPolicy: "empty"
    });
    const wire = await engine.resolve(rawQuery({ id: 0x3131, labels: QUESTION }), "10.0.0.1");
    if (!wire) throw new Error("expected a response");
    expect(wire.readUInt16BE(0)).toBe(0x3131);
    expect(wire.readUInt16BE(2) & 0x0f).toBe(0);
    expect(wire.readUInt16BE(6)).toBe(1);
    expect(answerText(wire)).toBe(BACKEND_FALLBACK_TEXT);
  });
});
