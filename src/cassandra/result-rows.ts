import { types } from "cassandra-driver";

import { formatCell } from "../core/rows.js";
import type { ColumnDescriptor, TableRow, ValueKind } from "../core/types.js";
import type { QueryColumn, QueryResult, QueryRow } from "./session.js";

const NUMERIC_TYPES: ReadonlySet<number> = new Set<number>([
  types.dataTypes.int,
  types.dataTypes.bigint,
  types.dataTypes.smallint,
  types.dataTypes.tinyint,
  types.dataTypes.varint,
  types.dataTypes.counter,
  types.dataTypes.float,
  types.dataTypes.double,
  types.dataTypes.decimal,
]);

export function valueKindOf(typeCode: number): ValueKind {
  return NUMERIC_TYPES.has(typeCode) ? "numeric" : "other";
}

/**
 * Resolves the kind of every column once, from the protocol type codes of the result metadata.
 */
export function describeColumns(columns: readonly QueryColumn[] | null): ColumnDescriptor[] {
  return (columns ?? []).map((col) => ({ name: col.name, kind: valueKindOf(col.type.code) }));
}

class DriverRow implements TableRow {
  constructor(
    readonly columns: readonly ColumnDescriptor[],
    private readonly row: QueryRow,
  ) {}

  text(column: string): string | undefined {
    if (!this.row.keys().includes(column)) return undefined;
    return formatCell(this.row.get(column));
  }
}

/**
 * Adapts the rows of a query result to table rows sharing the result's column descriptors.
 */
export function resultRows(result: QueryResult): TableRow[] {
  const columns = describeColumns(result.columns);
  return result.rows.map((row) => new DriverRow(columns, row));
}
