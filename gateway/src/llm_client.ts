import { describeError } from "./log.js";

export const BACKEND_FALLBACK_TEXT = "error contacting language model";
export const TIMEOUT_FALLBACK_TEXT = "request timed out";

export type ChatResponse = {
  ok: boolean;
  status: number;
  body: AsyncIterable<Uint8Array> | null;
};

export type ChatFetch = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<ChatResponse>;

export type LlmClientConfig = {
  protocol: string;
  host: string;
  port: number;
  model: string;
  maxChars: number;
  deadlineMs: number;
  ellipsis?: boolean;
  fetchImpl?: ChatFetch;
};

export type GenerationReason = "complete" | "capped" | "deadline" | "backend_error";

export type GenerationResult = {
  text: string;
  reason: GenerationReason;
  error?: string;
};

export type LlmClient = {
  url: string;
  generate(prompt: string, opts?: { deadlineMs?: number }): Promise<GenerationResult>;
};

const DEADLINE = Symbol("deadline");

type ChatLine = { delta: string; done: boolean };

export function createLlmClient(cfg: LlmClientConfig): LlmClient {
  const url = `${cfg.protocol}://${cfg.host}:${cfg.port}/api/chat`;
  const fetchImpl: ChatFetch = cfg.fetchImpl ?? ((target, init) => fetch(target, init));
  const maxChars = Math.max(1, Math.floor(cfg.maxChars));

  function capped(text: string): GenerationResult {
    const chars = Array.from(text).slice(0, maxChars);
    if (cfg.ellipsis && maxChars > 3) {
      return { text: `${chars.slice(0, maxChars - 3).join("")}...`, reason: "capped" };
    }
    return { text: chars.join(""), reason: "capped" };
  }

  async function generate(prompt: string, opts: { deadlineMs?: number } = {}): Promise<GenerationResult> {
    const deadlineMs = Math.max(0, opts.deadlineMs ?? cfg.deadlineMs);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof DEADLINE>((resolve) => {
      timer = setTimeout(() => resolve(DEADLINE), deadlineMs);
    });

    let text = "";
    let count = 0;
    try {
      const res = await raceDeadline(
        fetchImpl(url, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({
            model: cfg.model,
            messages: [{ role: "user", content: prompt }],
            stream: true
          }),
          signal: controller.signal
        }),
        deadline
      );
      if (res === DEADLINE) return { text: TIMEOUT_FALLBACK_TEXT, reason: "deadline" };
      if (!res.ok) throw new Error(`LLM_HTTP_${res.status}`);
      if (!res.body) throw new Error("LLM_EMPTY_BODY");

      const deltas = streamChatDeltas(res.body)[Symbol.asyncIterator]();
      for (;;) {
        const next = await raceDeadline(deltas.next(), deadline);
        if (next === DEADLINE) {
          return { text: text || TIMEOUT_FALLBACK_TEXT, reason: "deadline" };
        }
        if (next.done) break;
        text += next.value;
        count += Array.from(next.value).length;
        if (count >= maxChars) {
          await raceDeadline(deltas.return(undefined), deadline);
          return capped(text);
        }
      }
      return { text: text || TIMEOUT_FALLBACK_TEXT, reason: "complete" };
    } catch (err) {
      return { text: text || BACKEND_FALLBACK_TEXT, reason: "backend_error", error: describeError(err) };
    } finally {
      clearTimeout(timer);
      // releases the connection whichever way the stream ended
      controller.abort();
    }
  }

  return { url, generate };
}

function raceDeadline<T>(work: Promise<T>, deadline: Promise<typeof DEADLINE>): Promise<T | typeof DEADLINE> {
  // a read abandoned at the deadline rejects once the request is aborted
  work.catch(() => undefined);
  return Promise.race([work, deadline]);
}

/**
 * Text deltas from an Ollama `/api/chat` NDJSON stream. Lazy and finite:
 * stopping iteration early cancels the underlying body.
 */
export async function* streamChatDeltas(body: AsyncIterable<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder();
  let buffered = "";
  for await (const chunk of body) {
    buffered += decoder.decode(chunk, { stream: true });
    let newline = buffered.indexOf("\n");
    while (newline !== -1) {
      const parsed = parseChatLine(buffered.slice(0, newline));
      buffered = buffered.slice(newline + 1);
      if (parsed) {
        if (parsed.delta) yield parsed.delta;
        if (parsed.done) return;
      }
      newline = buffered.indexOf("\n");
    }
  }
  const tail = parseChatLine(buffered + decoder.decode());
  if (tail?.delta) yield tail.delta;
}

export function parseChatLine(line: string): ChatLine | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    throw new Error("LLM_STREAM_INVALID_JSON");
  }
  if (!isRecord(data)) throw new Error("LLM_STREAM_INVALID_JSON");
  if (typeof data.error === "string") throw new Error(`LLM_BACKEND_ERROR: ${data.error}`);

  const message = data.message;
  const delta = isRecord(message) && typeof message.content === "string" ? message.content : "";
  return { delta, done: data.done === true };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
