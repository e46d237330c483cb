import type { ChatFetch } from "../src/llm_client.js";
import type { Logger } from "../src/log.js";

export function rawQuery(opts: {
  labels: Array<string | Buffer>;
  id?: number;
  flags?: number;
  qtype?: number;
  qclass?: number;
  ednsUdpSize?: number;
}): Buffer {
  const header = Buffer.alloc(12);
  header.writeUInt16BE(opts.id ?? 0x1234, 0);
  header.writeUInt16BE(opts.flags ?? 0x0100, 2);
  header.writeUInt16BE(1, 4);
  header.writeUInt16BE(opts.ednsUdpSize === undefined ? 0 : 1, 10);

  const parts: Buffer[] = [header];
  for (const label of opts.labels) {
    const bytes = Buffer.isBuffer(label) ? label : Buffer.from(label, "utf8");
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  const tail = Buffer.alloc(5);
  tail.writeUInt16BE(opts.qtype ?? 16, 1);
  tail.writeUInt16BE(opts.qclass ?? 1, 3);
  parts.push(tail);

  if (opts.ednsUdpSize !== undefined) {
    const opt = Buffer.alloc(11);
    opt.writeUInt16BE(41, 1);
    opt.writeUInt16BE(opts.ednsUdpSize, 3);
    parts.push(opt);
  }
  return Buffer.concat(parts);
}

export function txtStrings(data: unknown): string[] {
  const chunks: unknown[] = Array.isArray(data) ? data : [data];
  return chunks.map((chunk) => (Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk)));
}

export function chatLine(content: string, done = false): string {
  return `${JSON.stringify({ message: { role: "assistant", content }, done })}\n`;
}

export function streamingFetch(
  chunks: Array<string | Uint8Array>,
  opts: { status?: number; stallAfter?: boolean } = {}
) {
  const calls: Array<{ url: string; body: string }> = [];
  const encoder = new TextEncoder();
  const status = opts.status ?? 200;

  async function* body(signal: AbortSignal): AsyncGenerator<Uint8Array> {
    for (const chunk of chunks) {
      yield typeof chunk === "string" ? encoder.encode(chunk) : chunk;
    }
    if (opts.stallAfter) {
      await new Promise<void>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
  }

  const fetchImpl: ChatFetch = async (url, init) => {
    calls.push({ url, body: init.body });
    return { ok: status >= 200 && status < 300, status, body: body(init.signal) };
  };
  return { fetchImpl, calls };
}

export function unreachableFetch(): ChatFetch {
  return async () => {
    throw new TypeError("fetch failed");
  };
}

export type RecordingLogger = Logger & {
  lines: { info: string[]; warn: string[]; error: string[] };
};

export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = { info: [], warn: [], error: [] };
  const logger: RecordingLogger = {
    lines,
    info: (message) => {
      lines.info.push(message);
    },
    warn: (message) => {
      lines.warn.push(message);
    },
    error: (message) => {
      lines.error.push(message);
    },
    child: () => logger
  };
  return logger;
}
