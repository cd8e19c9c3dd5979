import fs from "node:fs/promises";
import { buildIndex, type BuildIndexOptions, type IndexRow, type IndexTable } from "./build_index";
import {
  computeStats,
  filterRows,
  getByPosition,
  page,
  pageBackward,
  sortRows,
  type MailboxStats,
  type Page,
  type SortField
} from "./query";
import type { MboxMessage, MboxReader } from "../mbox/reader";

export type DisplayColumn = "from" | "date" | "subject" | "to";

export const DISPLAY_COLUMNS: readonly DisplayColumn[] = ["from", "date", "subject", "to"];

export const DEFAULT_DISPLAY_COLUMNS: readonly DisplayColumn[] = ["date", "from", "subject"];

export type PositionedRow = { position: number; row: IndexRow };

export type SearchResult = { total: number; matches: PositionedRow[] };

export type SessionStats = MailboxStats & { path: string; sizeBytes: number };

function isDisplayColumn(value: string): value is DisplayColumn {
  return DISPLAY_COLUMNS.some((c) => c === value);
}

/**
 * State of one browsing session over an indexed archive: the current row order,
 * the paging cursor and the displayed columns. Nothing here writes to the archive.
 */
export class NavigatorSession {
  private table: IndexTable;
  private cursor = 0;
  private lastPageStart = 0;
  private columns: DisplayColumn[] = [...DEFAULT_DISPLAY_COLUMNS];

  constructor(
    readonly reader: MboxReader,
    table: IndexTable
  ) {
    this.table = table;
  }

  static open(reader: MboxReader, options: BuildIndexOptions = {}): NavigatorSession {
    return new NavigatorSession(reader, buildIndex(reader, options));
  }

  get rows(): IndexTable {
    return this.table;
  }

  get position(): number {
    return this.cursor;
  }

  get displayColumns(): readonly DisplayColumn[] {
    return this.columns;
  }

  list(n: number): Page {
    return this.pageFrom(this.cursor, n);
  }

  /** Shows the page before the one last listed. */
  pageBackward(n: number): Page {
    return this.pageFrom(pageBackward(this.lastPageStart, n), n);
  }

  /** Keeps the recognised names, in the given order. Returns null when none is recognised. */
  setDisplayColumns(requested: string[]): readonly DisplayColumn[] | null {
    const valid = requested.map((c) => c.trim()).filter(isDisplayColumn);
    if (valid.length === 0) return null;
    this.columns = [...new Set(valid)];
    return this.columns;
  }

  fetch(idx: number): MboxMessage {
    return getByPosition(this.table, this.reader, idx);
  }

  /** Null when the query is blank. */
  search(text: string, limit: number): SearchResult | null {
    const positions = new Map<IndexRow, number>();
    this.table.forEach((row, i) => positions.set(row, i));

    const found = filterRows(this.table, text);
    if (found == null) return null;
    return {
      total: found.length,
      matches: found.slice(0, limit).map((row) => ({ position: positions.get(row) ?? -1, row }))
    };
  }

  async save(idx: number, outFile: string): Promise<number> {
    const message = this.fetch(idx);
    await fs.writeFile(outFile, message.raw);
    return message.raw.length;
  }

  sort(field: SortField, ascending: boolean): void {
    this.table = sortRows(this.table, field, ascending);
    this.cursor = 0;
    this.lastPageStart = 0;
  }

  stats(): SessionStats {
    return { ...computeStats(this.table), path: this.reader.path, sizeBytes: this.reader.size() };
  }

  private pageFrom(cursor: number, n: number): Page {
    const result = page(this.table, cursor, n);
    if (result.rows.length > 0) this.lastPageStart = result.start;
    this.cursor = result.cursor;
    return result;
  }
}
