import { DecodeError } from "../core/errors";

/** Labels HTTP stacks fall back to when no charset was sent at all. */
const UNTRUSTED_DECLARATIONS = new Set(["iso-8859-1", "latin1", "latin-1", "us-ascii", "ascii"]);

const FALLBACK_ENCODINGS = ["utf-8", "euc-kr"];

export interface DecodedBody {
  text: string;
  encoding: string;
}

export function charsetFromContentType(contentType: string | null | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const match = contentType.match(/charset\s*=\s*["']?([\w.:-]+)/i);
  return match ? match[1].toLowerCase() : undefined;
}

/** Looks for `<meta charset>` or the http-equiv form in the first few KB, read as ASCII. */
export function charsetFromMeta(bytes: Uint8Array): string | undefined {
  const head = Buffer.from(bytes.subarray(0, 4096)).toString("latin1");
  const direct = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i);
  return direct ? direct[1].toLowerCase() : undefined;
}

function tryDecode(bytes: Uint8Array, encoding: string): string | undefined {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    // unknown label or malformed sequence for this encoding
    return undefined;
  }
}

function normalizeLabel(label: string): string {
  const lower = label.toLowerCase();
  if (lower === "utf8") {
    return "utf-8";
  }
  if (lower === "ks_c_5601-1987" || lower === "cp949" || lower === "ms949" || lower === "x-windows-949") {
    return "euc-kr";
  }
  return lower;
}

export function decodeBody(bytes: Uint8Array, contentType: string | null | undefined, url: string): DecodedBody {
  const declared = charsetFromContentType(contentType);
  const candidates: string[] = [];
  if (declared && !UNTRUSTED_DECLARATIONS.has(declared)) {
    candidates.push(normalizeLabel(declared));
  }
  const meta = charsetFromMeta(bytes);
  if (meta && !UNTRUSTED_DECLARATIONS.has(meta)) {
    candidates.push(normalizeLabel(meta));
  }
  candidates.push(...FALLBACK_ENCODINGS);

  const tried = new Set<string>();
  for (const encoding of candidates) {
    if (tried.has(encoding)) {
      continue;
    }
    tried.add(encoding);
    const text = tryDecode(bytes, encoding);
    if (text !== undefined) {
      return { text, encoding };
    }
  }

  throw new DecodeError(`body could not be decoded as any of ${[...tried].join(", ")}`, url);
}
