import { formatShortDate } from "./build_index";
import type { IndexRow, IndexTable } from "./build_index";
import type { MboxMessage, MboxReader } from "../mbox/reader";
import { PositionOutOfRangeError } from "../errors";

export type SortField = "from" | "date" | "subject";

export const SORT_FIELDS: readonly SortField[] = ["from", "date", "subject"];

export type Page = {
  rows: IndexRow[];
  /** Position of the first row returned. */
  start: number;
  /** Position one past the last row returned. */
  end: number;
  /** Cursor for the next call; 0 once the end of the table is reached. */
  cursor: number;
};

export function page(table: IndexTable, cursor: number, n: number): Page {
  if (n < 1) return { rows: [], start: cursor, end: cursor, cursor };
  const start = Math.max(0, cursor);
  const end = Math.min(start + n, table.length);
  const rows = start < table.length ? table.slice(start, end) : [];
  return { rows, start, end: Math.max(start, end), cursor: end < table.length ? end : 0 };
}

/** Start of the page before the one that began at `pageStart`. */
export function pageBackward(pageStart: number, n: number): number {
  return Math.max(pageStart - Math.max(0, n), 0);
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortRows(table: IndexTable, field: SortField, ascending: boolean): IndexRow[] {
  const direction = ascending ? 1 : -1;

  const compare = (a: IndexRow, b: IndexRow): number => {
    if (field === "date") {
      if (a.dateSort == null || b.dateSort == null) {
        if (a.dateSort == null && b.dateSort == null) return 0;
        return a.dateSort == null ? 1 : -1;
      }
      return (a.dateSort - b.dateSort) * direction;
    }
    return compareText(a[field], b[field]) * direction;
  };

  return [...table].sort((a, b) => compare(a, b) || a.ordinal - b.ordinal);
}

/** Rows whose sender or subject contains `query`, case-insensitively. Null for a blank query. */
export function filterRows(table: IndexTable, query: string): IndexRow[] | null {
  const q = query.trim().toLowerCase();
  if (!q) return null;
  return table.filter((row) => row.from.toLowerCase().includes(q) || row.subject.toLowerCase().includes(q));
}

export function rowAt(table: IndexTable, idx: number): IndexRow {
  const row = Number.isInteger(idx) && idx >= 0 ? table[idx] : undefined;
  if (!row) throw new PositionOutOfRangeError(idx, table.length);
  return row;
}

export function getByPosition(table: IndexTable, reader: MboxReader, idx: number): MboxMessage {
  return reader.get(rowAt(table, idx).key);
}

export type MailboxStats = {
  messages: number;
  earliest: string | null;
  latest: string | null;
  topDomains: Array<{ domain: string; count: number }>;
};

export function computeStats(table: IndexTable, topN = 5): MailboxStats {
  let min: number | null = null;
  let max: number | null = null;
  const domains = new Map<string, number>();

  for (const row of table) {
    if (row.dateSort != null) {
      if (min == null || row.dateSort < min) min = row.dateSort;
      if (max == null || row.dateSort > max) max = row.dateSort;
    }
    const domain = /@([\w.-]+)/.exec(row.from)?.[1];
    if (domain) domains.set(domain, (domains.get(domain) ?? 0) + 1);
  }

  // Map keeps first-seen order, and the sort is stable, so equal counts stay in archive order.
  const topDomains = [...domains.entries()]
    .map(([domain, count]) => ({ domain, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);

  return {
    messages: table.length,
    earliest: min != null ? formatShortDate(min) : null,
    latest: max != null ? formatShortDate(max) : null,
    topDomains
  };
}
