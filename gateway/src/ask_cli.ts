#!/usr/bin/env node
import dgram from "node:dgram";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dnsPacket from "dns-packet";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { normalizeSuffix } from "./normalize.js";

const MAX_LABEL_BYTES = 63;
const EDNS_UDP_SIZE = 1232;

/**
 * Builds `<question>.<domain>`, rejecting segments that cannot be one DNS label.
 * Backslashes are doubled so the server reads them back literally.
 */
export function questionToName(question: string, domain: string): string {
  const segments = question
    .trim()
    .split(".")
    .filter(Boolean)
    .map((segment) => segment.replace(/\\/g, "\\\\"));
  if (!segments.length) throw new Error("EMPTY_QUESTION");
  for (const segment of segments) {
    if (Buffer.byteLength(segment, "utf8") > MAX_LABEL_BYTES) {
      throw new Error(`QUESTION_SEGMENT_TOO_LONG: "${segment.slice(0, 20)}..." exceeds ${MAX_LABEL_BYTES} bytes; split it with dots`);
    }
  }
  const zone = normalizeSuffix(domain);
  return zone ? `${segments.join(".")}.${zone}` : segments.join(".");
}

export function encodeAskQuery(name: string, id: number): Buffer {
  return dnsPacket.encode({
    type: "query",
    id,
    flags: dnsPacket.RECURSION_DESIRED,
    questions: [{ type: "TXT", name, class: "IN" }],
    additionals: [
      {
        type: "OPT",
        name: ".",
        udpPayloadSize: EDNS_UDP_SIZE,
        extendedRcode: 0,
        ednsVersion: 0,
        flags: 0,
        flag_do: false,
        options: []
      }
    ]
  });
}

export function txtAnswerText(response: Buffer): { id: number; text: string; truncated: boolean; rcode: number } {
  const decoded = dnsPacket.decode(response);
  const pieces: string[] = [];
  for (const answer of decoded.answers ?? []) {
    if (answer.type !== "TXT") continue;
    pieces.push(...txtStrings(answer.data));
  }
  const flags = response.readUInt16BE(2);
  return {
    id: decoded.id ?? 0,
    text: pieces.join(""),
    truncated: (flags & 0x0200) !== 0,
    rcode: flags & 0x0f
  };
}

function txtStrings(data: unknown): string[] {
  const chunks: unknown[] = Array.isArray(data) ? data : [data];
  return chunks.map((chunk) => (Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk ?? "")));
}

function sendQuery(wire: Buffer, server: string, port: number, timeoutMs: number): Promise<Buffer> {
  const socket = dgram.createSocket(server.includes(":") ? "udp6" : "udp4");
  return new Promise<Buffer>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error("DNS_TIMEOUT")), timeoutMs);
    socket.once("message", (msg) => {
      clearTimeout(timer);
      resolve(msg);
    });
    socket.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    socket.send(wire, port, server);
  }).finally(() => socket.close());
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("question", { alias: "q", type: "string", demandOption: true })
    .option("server", { type: "string", default: process.env.DNS_SERVER || "127.0.0.1" })
    .option("port", { type: "number", default: Number(process.env.DNS_PORT || "5353") })
    .option("domain", { type: "string", default: process.env.DOMAIN_SUFFIX ?? ".example.test" })
    .option("timeout-ms", { type: "number", default: 10000 })
    .option("json", { type: "boolean", default: false, describe: "print id, rcode and truncation alongside the text" })
    .strict()
    .parse();

  const id = Math.floor(Math.random() * 65535);
  const name = questionToName(argv.question, argv.domain);
  const response = await sendQuery(encodeAskQuery(name, id), argv.server, argv.port, argv["timeout-ms"]);
  const out = txtAnswerText(response);
  if (out.id !== id) throw new Error("DNS_ID_MISMATCH");

  if (argv.json) {
    process.stdout.write(JSON.stringify({ name, ...out }, null, 2) + "\n");
  } else {
    process.stdout.write(`${out.text}${out.truncated ? " [truncated]" : ""}\n`);
  }
}

const modulePath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (modulePath === entryPath) {
  main().catch((err) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
}
