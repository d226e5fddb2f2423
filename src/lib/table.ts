import { theme } from "./theme.js";

function stripAnsi(value: string): string {
  return value.replace(/\x1b\[[0-9;]*m/g, "");
}

export interface TableOptions {
  headers: string[];
  rows: string[][];
  /** Left indent in spaces (default: 2) */
  indent?: number;
}

function computeColumnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((header, index) => {
    const cellWidths = rows.map((row) => stripAnsi(row[index] ?? "").length);
    return Math.max(stripAnsi(header).length, ...cellWidths);
  });
}

/** Lay out a table as lines; colour codes do not count towards column widths. */
export function formatTable(options: TableOptions): string[] {
  const { headers, rows, indent = 2 } = options;
  const widths = computeColumnWidths(headers, rows);
  const pad = " ".repeat(indent);
  const render = (cols: string[]): string =>
    pad +
    cols
      .map((col, index) => {
        const gap = index < cols.length - 1 ? 2 : 0;
        const padding = (widths[index] ?? 0) - stripAnsi(col).length + gap;
        return `${col}${" ".repeat(Math.max(0, padding))}`;
      })
      .join("")
      .trimEnd();

  return [render(headers.map((h) => theme.muted(h))), ...rows.map(render)];
}

export function renderTable(options: TableOptions): void {
  for (const line of formatTable(options)) {
    console.log(line);
  }
}
