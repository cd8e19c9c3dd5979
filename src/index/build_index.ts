import { decodeHeaderSet } from "../mbox/decode_header";
import type { MboxReader, MessageKey } from "../mbox/reader";
import { toErrorMessage } from "../utils/cli";

export type IndexRow = {
  key: MessageKey;
  /** Position in the archive at build time; the tie-break for every ordering. */
  ordinal: number;
  from: string;
  to: string;
  subject: string;
  dateDisplay: string;
  /** Epoch milliseconds, null when the Date header did not parse. */
  dateSort: number | null;
};

export type IndexTable = readonly IndexRow[];

export type BuildIndexOptions = {
  onProgress?: (indexed: number) => void;
  progressEvery?: number;
};

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const MONTH_NAME =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?(?=[\s,]|$)/i;
const DAY_TOKEN = /(?:^|[\s,])\d{1,2}(?=[\s,]|$)/;
const YEAR_TOKEN = /(?:^|[\s,])\d{4}(?=[\s,]|$)/;
const ZONE_TOKEN = /(?:^|\s)(?:[+-]\d{4}|Z|UTC?|GMT|[ECMP][SD]T)(?=\s|$)/i;

function parseIsoDate(text: string): number | null {
  const m = ISO_DATE.exec(text);
  if (!m) return null;
  const zone = (m[3] ?? "Z").toUpperCase().replace(/^([+-]\d{2})(\d{2})$/, "$1:$2");
  const ms = Date.parse(`${m[1] ?? ""}T${m[2] ?? "00:00"}${zone}`);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Date header parse used only for ordering. Accepts ISO dates and texts carrying a
 * month name, a day and a four-digit year; anything else is null. Parenthesised
 * comments such as "(PST)" are dropped and a missing zone is read as UTC.
 */
export function parseSortableDate(dateText: string): number | null {
  const cleaned = dateText.replace(/\([^)]*\)/g, " ").replace(/\s+/g, " ").trim();
  if (!cleaned) return null;
  if (ISO_DATE.test(cleaned)) return parseIsoDate(cleaned);
  if (!MONTH_NAME.test(cleaned) || !DAY_TOKEN.test(cleaned) || !YEAR_TOKEN.test(cleaned)) return null;

  const ms = Date.parse(ZONE_TOKEN.test(cleaned) ? cleaned : `${cleaned} +0000`);
  return Number.isNaN(ms) ? null : ms;
}

export function formatShortDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function buildIndex(reader: MboxReader, options: BuildIndexOptions = {}): IndexTable {
  const progressEvery = options.progressEvery ?? 1000;
  const rows: IndexRow[] = [];

  for (const key of reader.keys()) {
    const message = reader.get(key);
    const ordinal = rows.length;
    try {
      const headers = decodeHeaderSet(message.headers);
      const dateSort = parseSortableDate(headers.date);
      rows.push({
        key,
        ordinal,
        from: headers.from,
        to: headers.to,
        subject: headers.subject,
        dateDisplay: dateSort != null ? formatShortDate(dateSort) : headers.date,
        dateSort
      });
    } catch (err) {
      console.error(`[index] message ${key}: header extraction failed\n${toErrorMessage(err)}`);
      rows.push({ key, ordinal, from: "", to: "", subject: "", dateDisplay: "", dateSort: null });
    }

    if (options.onProgress && rows.length % progressEvery === 0) options.onProgress(rows.length);
  }

  return rows;
}
