import type { PositionedRow, DisplayColumn } from "../index/session";

function cellValue(row: PositionedRow["row"], column: DisplayColumn): string {
  return column === "date" ? row.dateDisplay : row[column];
}

function truncate(value: string, max: number): string {
  const flat = value.replace(/\s+/g, " ");
  return flat.length > max ? flat.slice(0, max) : flat;
}

export function columnWidthLimit(column: DisplayColumn, terminalWidth: number): number {
  if (column === "from") return 30;
  if (column === "subject") return Math.max(10, terminalWidth - 60);
  return Number.POSITIVE_INFINITY;
}

/** psql-style grid with the row position as the leading column. */
export function renderTable(rows: PositionedRow[], columns: readonly DisplayColumn[], terminalWidth: number): string[] {
  const headers = ["", ...columns];
  const body = rows.map(({ position, row }) => [
    String(position),
    ...columns.map((c) => truncate(cellValue(row, c), columnWidthLimit(c, terminalWidth)))
  ]);

  const widths = headers.map((h, i) => Math.max(h.length, ...body.map((cells) => (cells[i] ?? "").length)));
  const rule = (edge: string) => `${edge}${widths.map((w) => "-".repeat(w + 2)).join("+")}${edge}`;
  const line = (cells: string[], alignRightFirst: boolean) =>
    `| ${cells
      .map((cell, i) => {
        const w = widths[i] ?? 0;
        return i === 0 && alignRightFirst ? cell.padStart(w) : cell.padEnd(w);
      })
      .join(" | ")} |`;

  return [
    rule("+"),
    line(headers, false),
    rule("|"),
    ...body.map((cells) => line(cells, true)),
    rule("+")
  ];
}

export function wrapText(text: string, width: number): string[] {
  const out: string[] = [];
  for (const paragraph of text.replace(/\r\n/g, "\n").split("\n")) {
    let current = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      if (current && current.length + 1 + word.length > width) {
        out.push(current);
        current = word;
      } else {
        current = current ? `${current} ${word}` : word;
      }
    }
    out.push(current);
  }
  return out;
}
