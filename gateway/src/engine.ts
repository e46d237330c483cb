import type { RateLimitPolicy } from "./config.js";
import { fragmentText } from "./fragment.js";
import type { LlmClient } from "./llm_client.js";
import type { Logger } from "./log.js";
import { buildPrompt, questionTextFromName } from "./normalize.js";
import type { TokenBucketLimiter } from "./rate_limit.js";
import { decodeQuery, encodeEmptyResponse, encodeResponse, isTxtQuestion, type DnsQuery } from "./wire.js";

export type QueryStage = "RECEIVED" | "DECODED" | "RATE_CHECKED" | "GENERATING" | "FRAGMENTED" | "SENT";

export type QueryContext = {
  sourceAddress: string;
  query: DnsQuery;
  questionText: string;
};

export type EngineStats = {
  received: number;
  malformed: number;
  rateLimited: number;
  unsupported: number;
  answered: number;
  fallbacks: number;
  truncated: number;
  faults: number;
};

export type QueryEngineDeps = {
  limiter: TokenBucketLimiter;
  llm: Pick<LlmClient, "generate">;
  logger: Logger;
  domainSuffix: string;
  ttlS: number;
  maxChars: number;
  maxUdpPayload: number;
  rateLimitPolicy: RateLimitPolicy;
};

export type QueryOutcome =
  | { kind: "response"; wire: Buffer }
  | { kind: "discarded"; reason: "malformed" | "rate_limited" };

export type QueryEngine = {
  handle(datagram: Buffer, sourceAddress: string): Promise<QueryOutcome>;
  /** Resolves to the response datagram, or null when nothing must be sent. */
  resolve(datagram: Buffer, sourceAddress: string): Promise<Buffer | null>;
  stats(): EngineStats;
  trackedAddresses(): number;
};

export function createQueryEngine(deps: QueryEngineDeps): QueryEngine {
  const log = deps.logger;
  const counters: EngineStats = {
    received: 0,
    malformed: 0,
    rateLimited: 0,
    unsupported: 0,
    answered: 0,
    fallbacks: 0,
    truncated: 0,
    faults: 0
  };

  function empty(query: DnsQuery): QueryOutcome {
    return { kind: "response", wire: encodeEmptyResponse(query, { maxUdpPayload: deps.maxUdpPayload }) };
  }

  async function answer(ctx: QueryContext, advance: (stage: QueryStage) => void): Promise<QueryOutcome> {
    const { query } = ctx;
    if (!deps.limiter.allow(ctx.sourceAddress)) {
      counters.rateLimited += 1;
      log.info(`rate limited ${ctx.sourceAddress} (policy=${deps.rateLimitPolicy})`);
      return deps.rateLimitPolicy === "drop" ? { kind: "discarded", reason: "rate_limited" } : empty(query);
    }
    advance("RATE_CHECKED");

    if (!isTxtQuestion(query) || !ctx.questionText.trim()) {
      counters.unsupported += 1;
      return empty(query);
    }

    advance("GENERATING");
    const result = await deps.llm.generate(buildPrompt(ctx.questionText, deps.maxChars));
    if (result.reason === "backend_error") {
      counters.fallbacks += 1;
      log.warn(`generation failed for ${hexId(query.id)}`, result.error);
    }

    advance("FRAGMENTED");
    const encoded = encodeResponse(
      { query, fragments: fragmentText(result.text), ttlS: deps.ttlS },
      { maxUdpPayload: deps.maxUdpPayload }
    );
    if (encoded.dropped > 0) {
      counters.truncated += 1;
      log.info(`${hexId(query.id)}: dropped ${encoded.dropped} TXT fragment(s) over the UDP ceiling`);
    }
    counters.answered += 1;
    log.info(`${hexId(query.id)} "${ctx.questionText}" -> ${result.reason}, ${encoded.written} record(s)`);
    return { kind: "response", wire: encoded.wire };
  }

  async function handle(datagram: Buffer, sourceAddress: string): Promise<QueryOutcome> {
    counters.received += 1;
    let stage: QueryStage = "RECEIVED";

    const decoded = decodeQuery(datagram);
    if (!decoded.ok) {
      counters.malformed += 1;
      log.info(`discarding datagram from ${sourceAddress}: ${decoded.reason}`);
      return { kind: "discarded", reason: "malformed" };
    }
    stage = "DECODED";
    const { query } = decoded;

    try {
      const ctx: QueryContext = {
        sourceAddress,
        query,
        questionText: questionTextFromName(query.name, deps.domainSuffix)
      };
      return await answer(ctx, (next) => {
        stage = next;
      });
    } catch (err) {
      counters.faults += 1;
      log.error(`${hexId(query.id)} failed in ${stage}`, err);
      return empty(query);
    }
  }

  async function resolve(datagram: Buffer, sourceAddress: string): Promise<Buffer | null> {
    const outcome = await handle(datagram, sourceAddress);
    return outcome.kind === "response" ? outcome.wire : null;
  }

  return {
    handle,
    resolve,
    stats: () => ({ ...counters }),
    trackedAddresses: () => deps.limiter.size()
  };
}

function hexId(id: number): string {
  return `0x${id.toString(16).padStart(4, "0")}`;
}
