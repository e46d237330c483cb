import { MAX_CHARACTER_STRING } from "./wire.js";

export function fragmentText(text: string, maxBytes = MAX_CHARACTER_STRING): Buffer[] {
  if (!Number.isInteger(maxBytes) || maxBytes < 4) {
    throw new Error("FRAGMENT_SIZE_TOO_SMALL");
  }
  const bytes = Buffer.from(text, "utf8");
  const out: Buffer[] = [];
  let start = 0;
  while (start < bytes.length) {
    let end = Math.min(start + maxBytes, bytes.length);
    // never end a piece in front of a UTF-8 continuation byte
    while (end < bytes.length && end > start && (bytes.readUInt8(end) & 0xc0) === 0x80) {
      end -= 1;
    }
    out.push(bytes.subarray(start, end));
    start = end;
  }
  return out.length ? out : [Buffer.alloc(0)];
}
