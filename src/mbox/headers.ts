import type { RawHeaders } from "./decode_header";

function headerSectionEnd(raw: Buffer): number {
  if (raw.length > 0 && raw[0] === 0x0a) return 0;
  if (raw.length > 1 && raw[0] === 0x0d && raw[1] === 0x0a) return 0;
  const lf = raw.indexOf("\n\n");
  const crlf = raw.indexOf("\r\n\r\n");
  if (lf === -1) return crlf === -1 ? raw.length : crlf;
  if (crlf === -1) return lf;
  return Math.min(lf, crlf);
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

// Raw 8-bit headers that are not UTF-8 are kept byte for byte as latin1.
function headerText(bytes: Buffer): string {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return bytes.toString("latin1");
  }
}

// First occurrence of a header wins; continuation lines are joined with a single space.
export function parseHeaderBlock(raw: Buffer): RawHeaders {
  const headers = new Map<string, string>();
  const text = headerText(raw.subarray(0, headerSectionEnd(raw)));

  let name: string | null = null;
  let value = "";
  const commit = () => {
    if (name != null && !headers.has(name)) headers.set(name, value.trim());
    name = null;
    value = "";
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (/^[ \t]/.test(line)) {
      if (name != null) value += ` ${line.trim()}`;
      continue;
    }
    commit();
    const m = /^([^:\s]+):(.*)$/.exec(line);
    if (!m) continue;
    name = (m[1] ?? "").toLowerCase();
    value = m[2] ?? "";
  }
  commit();

  return headers;
}
