/**
 * Table definitions shared by every sheet the pipeline reads or writes.
 *
 * A table schema fixes the column order and header labels, so a table with
 * zero rows still renders with its full header.
 */

export type Cell = string | number | null;

export type TableRow<Row> = { [K in keyof Row]: Cell };

export type ColumnMap<Row> = { readonly [K in keyof Row]-?: string };

export interface TableSchema<Row extends TableRow<Row>> {
  readonly name: string;
  readonly columns: ColumnMap<Row>;
  readonly keys: readonly (keyof Row & string)[];
  readonly headers: readonly string[];
}

export interface Table<Row extends TableRow<Row>> {
  readonly schema: TableSchema<Row>;
  readonly headers: readonly string[];
  readonly rows: readonly Row[];
}

export function defineTable<Row extends TableRow<Row>>(
  name: string,
  columns: ColumnMap<Row>
): TableSchema<Row> {
  const keys = Object.keys(columns).filter(
    (key): key is keyof Row & string => Object.prototype.hasOwnProperty.call(columns, key)
  );
  return {
    name,
    columns,
    keys,
    headers: keys.map((key) => columns[key]),
  };
}

export function createTable<Row extends TableRow<Row>>(
  schema: TableSchema<Row>,
  rows: readonly Row[]
): Table<Row> {
  return {
    schema,
    headers: schema.headers,
    rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
  };
}

/**
 * Flatten a table to a header row followed by one value array per row,
 * in schema column order.
 */
export function tableToGrid<Row extends TableRow<Row>>(table: Table<Row>): Cell[][] {
  const { keys } = table.schema;
  return [[...table.headers], ...table.rows.map((row) => keys.map((key) => row[key]))];
}

// Cell coercion

/**
 * Trimmed string form of a cell; empty for null/undefined and non-finite numbers.
 */
export function cellText(value: Cell | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  return value.trim();
}

/**
 * Integer form of a cell, truncating decimals. Unparseable or empty cells are `fallback`.
 */
export function cellInt(value: Cell | undefined, fallback = 0): number {
  if (value === null || value === undefined) return fallback;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  const normalized = value.trim().replace(/,/g, '');
  if (!normalized) return fallback;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
}
