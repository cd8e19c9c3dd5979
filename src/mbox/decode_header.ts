import { decodeWords } from "libmime";

export type HeaderName = "from" | "to" | "cc" | "date" | "subject";

export type HeaderSet = Record<HeaderName, string>;

export type RawHeaders = ReadonlyMap<string, string>;

const HEADER_NAMES: readonly HeaderName[] = ["from", "to", "cc", "date", "subject"];

/**
 * Decodes RFC 2047 encoded words (`=?charset?B|Q?...?=`) into readable text.
 * Broken encodings come back as the raw header text.
 */
export function decodeHeader(raw: string | null | undefined): string {
  if (raw == null) return "";
  try {
    return decodeWords(raw);
  } catch {
    return raw;
  }
}

export function decodeHeaderSet(headers: RawHeaders): HeaderSet {
  const out: HeaderSet = { from: "", to: "", cc: "", date: "", subject: "" };
  for (const name of HEADER_NAMES) {
    out[name] = decodeHeader(headers.get(name));
  }
  return out;
}
