// Postgres caps bind parameters per statement
export const MAX_BIND_PARAMS = 65535;

export function quoteIdent(ident: string): string {
  return `"${ident.replace(/"/g, '""')}"`;
}

export function qualifiedName(schema: string, name: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(name)}`;
}

export function buildTruncateSql(tables: { schema: string; name: string }[]): string {
  if (tables.length === 0) return "";
  return `TRUNCATE TABLE ${tables.map((t) => qualifiedName(t.schema, t.name)).join(", ")} CASCADE`;
}

/**
 * One page of a keyset scan. Without `afterKey` the page starts at the
 * lowest key; with it, $1 is the last key of the previous page.
 */
export function buildSelectChunkSql(params: {
  schema: string;
  table: string;
  primaryKey: string;
  columns: string[];
  keyType: string;
  search?: string;
  afterKey: boolean;
}): string {
  const { schema, table, primaryKey, columns, keyType, search, afterKey } = params;
  const pk = quoteIdent(primaryKey);
  const selected = [primaryKey, ...columns.filter((c) => c !== primaryKey)].map(quoteIdent);

  const where: string[] = [];
  if (search) where.push(`(${search})`);
  if (afterKey) where.push(`${pk} > $1::${keyType}`);
  const limitParam = afterKey ? "$2" : "$1";

  return [
    `SELECT ${selected.join(", ")}`,
    `FROM ${qualifiedName(schema, table)}`,
    where.length ? `WHERE ${where.join(" AND ")}` : "",
    `ORDER BY ${pk}`,
    `LIMIT ${limitParam}`,
  ]
    .filter(Boolean)
    .join("\n");
}

export type UpdateRow = {
  key: unknown;
  values: unknown[];
};

/**
 * Largest number of rows one UPDATE can carry for the given column count.
 */
export function maxRowsPerUpdate(columnCount: number): number {
  return Math.max(1, Math.floor(MAX_BIND_PARAMS / (columnCount + 1)));
}

/**
 * UPDATE ... FROM (VALUES ...) for a batch of rows. Every parameter is cast
 * to its column type since VALUES entries would otherwise be typed as text.
 */
export function buildBatchUpdateSql(params: {
  schema: string;
  table: string;
  primaryKey: string;
  columns: string[];
  /** Cast expression per column, primary key included. */
  types: Record<string, string>;
  rows: UpdateRow[];
}): { sql: string; values: unknown[] } {
  const { schema, table, primaryKey, columns, types, rows } = params;
  if (rows.length === 0 || columns.length === 0) return { sql: "", values: [] };

  const values: unknown[] = [];
  let idx = 1;

  const tuples = rows.map((row) => {
    const cells = [`$${idx++}::${types[primaryKey]}`];
    values.push(row.key);
    columns.forEach((c, i) => {
      cells.push(`$${idx++}::${types[c]}`);
      values.push(row.values[i]);
    });
    return `(${cells.join(", ")})`;
  });

  const pk = quoteIdent(primaryKey);
  const sets = columns.map((c) => `${quoteIdent(c)} = v.${quoteIdent(c)}`);
  const aliases = [pk, ...columns.map(quoteIdent)];

  const sql = [
    `UPDATE ${qualifiedName(schema, table)} AS t`,
    `SET ${sets.join(", ")}`,
    `FROM (VALUES ${tuples.join(", ")}) AS v(${aliases.join(", ")})`,
    `WHERE t.${pk} = v.${pk}`,
  ].join("\n");

  return { sql, values };
}
