import type { ColumnDescriptor, TableRow, ValueKind } from "./types.js";

/**
 * Natural text form of a cell value.
 * Collections print as `[a, b]`, maps and user-defined types as `{k=v}`, blobs as `0x` hex,
 * dates in ISO form and missing values as `null`.
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `0x${value.toString("hex")}`;
  if (value instanceof Map) {
    const pairs = Array.from(value.entries(), ([k, v]) => `${formatCell(k)}=${formatCell(v)}`);
    return `{${pairs.join(", ")}}`;
  }
  if (Array.isArray(value) || value instanceof Set) {
    return `[${Array.from(value, formatCell).join(", ")}]`;
  }
  if (isPlainRecord(value)) {
    const pairs = Object.entries(value).map(([k, v]) => `${k}=${formatCell(v)}`);
    return `{${pairs.join(", ")}}`;
  }
  return String(value);
}

// Driver values such as Uuid or BigDecimal carry their own toString.
function isPlainRecord(value: unknown): value is object {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return !Object.prototype.hasOwnProperty.call(value, "toString");
}

class RecordRow implements TableRow {
  constructor(
    readonly columns: readonly ColumnDescriptor[],
    private readonly record: Readonly<Record<string, unknown>>,
  ) {}

  text(column: string): string | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.record, column)) return undefined;
    return formatCell(this.record[column]);
  }
}

/**
 * Wraps plain objects as table rows.
 * The keys of the first record give the column order; columns missing from `kinds` are `other`.
 */
export function recordRows(
  records: ReadonlyArray<Readonly<Record<string, unknown>>>,
  kinds: Readonly<Record<string, ValueKind>> = {},
): TableRow[] {
  const first = records[0];
  if (!first) return [];
  const columns: ColumnDescriptor[] = Object.keys(first).map((name) => ({
    name,
    kind: kinds[name] ?? "other",
  }));
  return records.map((record) => new RecordRow(columns, record));
}
