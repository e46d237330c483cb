/**
 * DNS wire format for the TXT gateway: decodes the first question of a query
 * datagram and encodes TXT answers back (RFC 1035 §4, EDNS(0) per RFC 6891).
 */
import dnsPacket from "dns-packet";
import type { Answer, DecodedPacket, OptAnswer, Packet, Question, TxtAnswer } from "dns-packet";
import { describeError } from "./log.js";

export const RCODE = {
  NOERROR: 0,
  SERVFAIL: 2
} as const;

export const CLASSIC_UDP_LIMIT = 512;
export const MAX_CHARACTER_STRING = 255;

const HEADER_LEN = 12;
const OPCODE_MASK = 0x7800;

export type DnsQuery = {
  id: number;
  flags: number; // header flags without QR
  question: Question; // echoed as decoded
  name: string; // question name, "" for the root
  ednsUdpSize?: number;
};

export type DecodeResult =
  | { ok: true; query: DnsQuery }
  | { ok: false; error: "MALFORMED_PACKET"; reason: string };

export type ResponseMessage = {
  query: DnsQuery;
  fragments: Buffer[];
  ttlS: number;
  rcode?: number;
};

export type EncodeOptions = {
  maxUdpPayload?: number;
};

export type EncodedResponse = {
  wire: Buffer;
  written: number;
  dropped: number;
};

export function decodeQuery(datagram: Buffer): DecodeResult {
  let packet: DecodedPacket;
  try {
    packet = decodePacket(datagram);
  } catch (err) {
    return malformed(describeError(err));
  }

  if (packet.flag_qr) return malformed("not_a_query");
  const question = packet.questions?.[0];
  if (!question) return malformed("no_question");
  // the response must carry the question exactly as it arrived
  const echoed = encodeQuestion(question);
  if (!echoed.equals(datagram.subarray(HEADER_LEN, HEADER_LEN + echoed.length))) {
    return malformed("question_not_echoable");
  }

  const query: DnsQuery = {
    id: packet.id ?? 0,
    flags: packet.flags ?? 0,
    question,
    name: question.name === "." ? "" : question.name
  };
  for (const rr of packet.additionals ?? []) {
    if (rr.type === "OPT") {
      query.ednsUdpSize = rr.udpPayloadSize;
      break;
    }
  }
  return { ok: true, query };
}

// Records after the question are optional; a broken one only loses EDNS.
function decodePacket(datagram: Buffer): DecodedPacket {
  try {
    return dnsPacket.decode(datagram);
  } catch {
    const questionOnly = Buffer.from(datagram);
    if (questionOnly.length >= HEADER_LEN) questionOnly.fill(0, 6, HEADER_LEN);
    return dnsPacket.decode(questionOnly);
  }
}

function encodeQuestion(question: Question): Buffer {
  return dnsPacket.encode({ questions: [question] }).subarray(HEADER_LEN);
}

export function responseCeiling(query: DnsQuery, maxUdpPayload = 1232): number {
  if (query.ednsUdpSize === undefined) return CLASSIC_UDP_LIMIT;
  return Math.max(CLASSIC_UDP_LIMIT, Math.min(query.ednsUdpSize, maxUdpPayload));
}

/**
 * Serializes one TXT record per fragment. Fragments that would push the
 * message past the ceiling are dropped from the tail and TC is set.
 */
export function encodeResponse(msg: ResponseMessage, opts: EncodeOptions = {}): EncodedResponse {
  const { query } = msg;
  const ceiling = responseCeiling(query, opts.maxUdpPayload);
  const additionals: Answer[] = query.ednsUdpSize === undefined ? [] : [optRecord(ceiling)];

  const answers: TxtAnswer[] = [];
  for (const fragment of msg.fragments) {
    if (fragment.length > MAX_CHARACTER_STRING) {
      throw new Error("TXT_FRAGMENT_TOO_LONG");
    }
    const rr: TxtAnswer = { type: "TXT", class: "IN", name: query.question.name, ttl: msg.ttlS, data: [fragment] };
    if (dnsPacket.encodingLength({ questions: [query.question], answers: [...answers, rr], additionals }) > ceiling) {
      break;
    }
    answers.push(rr);
  }
  const dropped = msg.fragments.length - answers.length;

  const packet: Packet = {
    type: "response",
    id: query.id,
    flags:
      (query.flags & OPCODE_MASK) |
      dnsPacket.AUTHORITATIVE_ANSWER |
      (dropped > 0 ? dnsPacket.TRUNCATED_RESPONSE : 0) |
      (query.flags & dnsPacket.RECURSION_DESIRED) |
      ((msg.rcode ?? RCODE.NOERROR) & 0x0f),
    questions: [query.question],
    answers,
    additionals
  };
  return { wire: dnsPacket.encode(packet), written: answers.length, dropped };
}

export function encodeEmptyResponse(query: DnsQuery, opts: EncodeOptions = {}): Buffer {
  return encodeResponse({ query, fragments: [], ttlS: 0 }, opts).wire;
}

function optRecord(udpPayloadSize: number): OptAnswer {
  return {
    type: "OPT",
    name: ".",
    udpPayloadSize,
    extendedRcode: 0,
    ednsVersion: 0,
    flags: 0,
    flag_do: false,
    options: []
  };
}

export function isTxtQuestion(query: DnsQuery): boolean {
  return query.question.type === "TXT" && query.question.class === "IN";
}

function malformed(reason: string): DecodeResult {
  return { ok: false, error: "MALFORMED_PACKET", reason };
}
