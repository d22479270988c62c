import { TableShapeError } from "./errors.js";
import type { ColumnDescriptor, TableRow, ValueKind } from "./types.js";

export const EMPTY_TABLE = "Nothing";

/**
 * Renders rows as a bordered ASCII table.
 * Column widths fit the widest header or value of each column; numeric columns are right-aligned.
 * @param rows The rows to render. Without rows there is no schema, so the placeholder is returned.
 * @param columns Column order and kinds. Defaults to the schema of the first row.
 * @throws TableShapeError when a row has no value for one of the columns.
 */
export function renderTable(
  rows: readonly TableRow[],
  columns?: readonly ColumnDescriptor[],
): string {
  const first = rows[0];
  if (!first) return EMPTY_TABLE;
  const cols = columns ?? first.columns;

  // All cells are materialized before any line is built: any row may be the widest.
  const cells = rows.map((row, rowIndex) =>
    cols.map((col) => {
      const text = row.text(col.name);
      if (text === undefined) throw new TableShapeError(col.name, rowIndex);
      return text;
    }),
  );
  const widths = cells.reduce(
    (sizes, line) => sizes.map((size, i) => Math.max(size, line[i]?.length ?? 0)),
    cols.map((col) => col.name.length),
  );

  const separator = "+" + widths.map((w) => "-".repeat(w)).join("+") + "+";
  const header = "|" + cols.map((col, i) => col.name.padEnd(widths[i] ?? 0)).join("|") + "|";
  const body = cells.map(
    (line) => "|" + line.map((text, i) => pad(text, widths[i] ?? 0, cols[i]?.kind ?? "other")).join("|") + "|",
  );

  return [separator, header, separator, ...body, separator].join("\n");
}

function pad(text: string, width: number, kind: ValueKind): string {
  return kind === "numeric" ? text.padStart(width, " ") : text.padEnd(width, " ");
}

/**
 * Writes the rendered table followed by a newline.
 */
export function printTable(
  rows: readonly TableRow[],
  columns?: readonly ColumnDescriptor[],
  write: (text: string) => void = (text) => process.stdout.write(text),
): void {
  write(renderTable(rows, columns) + "\n");
}
