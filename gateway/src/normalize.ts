const ESCAPE_RE = /\\(?:(\d{3})|([\s\S]))/g;

export function normalizeSuffix(suffix: string): string {
  return suffix.trim().toLowerCase().replace(/^\.+/, "").replace(/\.+$/, "");
}

/**
 * Recovers the question a client typed from the queried name:
 * `tell\032me.example.test` with suffix `.example.test` gives `tell me`.
 * Names outside the suffix are taken whole.
 */
export function questionTextFromName(name: string, suffix: string): string {
  const trimmed = name.replace(/\.$/, "");
  const zone = normalizeSuffix(suffix);
  const lowered = trimmed.toLowerCase();

  let question = trimmed;
  if (zone) {
    if (lowered === zone) {
      question = "";
    } else if (lowered.endsWith(`.${zone}`)) {
      question = trimmed.slice(0, trimmed.length - zone.length - 1);
    }
  }
  return unescapeLabelText(question);
}

/**
 * Master-file escapes: `\DDD` is the byte with that decimal value, `\X` is X.
 * Bytes are reassembled as UTF-8 so escaped multi-byte characters survive.
 */
export function unescapeLabelText(text: string): string {
  const bytes: Buffer[] = [];
  let last = 0;
  for (const m of text.matchAll(ESCAPE_RE)) {
    const at = m.index ?? 0;
    bytes.push(Buffer.from(text.slice(last, at), "utf8"));
    const [whole, digits, literal] = m;
    if (digits !== undefined && Number(digits) <= 255) {
      bytes.push(Buffer.from([Number(digits)]));
    } else if (digits !== undefined) {
      bytes.push(Buffer.from(whole, "utf8"));
    } else {
      bytes.push(Buffer.from(literal ?? "", "utf8"));
    }
    last = at + whole.length;
  }
  bytes.push(Buffer.from(text.slice(last), "utf8"));
  return Buffer.concat(bytes).toString("utf8");
}

export function buildPrompt(questionText: string, maxChars: number): string {
  return `Answer in ${maxChars} characters or less, no markdown formatting: ${questionText}`;
}
