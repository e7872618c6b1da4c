import { SqlClient } from "../executor/executor";

type Row = Record<string, unknown>;

export type FakeTable = {
  /** column -> udt_name, all in pg_catalog */
  columns: Record<string, string>;
  primaryKey: string;
  rows: Row[];
};

export type RecordedQuery = {
  text: string;
  values?: unknown[];
};

/**
 * In-memory stand-in for a pg Client. It understands exactly the statements
 * the executor issues and records every call.
 */
export class FakePgClient implements SqlClient {
  readonly queries: RecordedQuery[] = [];
  failOn?: RegExp;

  constructor(private readonly tables: Record<string, FakeTable>) {}

  async query(text: string, values?: unknown[]) {
    this.queries.push({ text, values });
    if (this.failOn && this.failOn.test(text)) throw new Error(`fake failure on: ${text}`);

    if (text.includes("information_schema.columns")) {
      const table = this.tables[String(values?.[1])];
      const rows = table
        ? Object.entries(table.columns).map(([column_name, udt_name]) => ({
            column_name,
            udt_schema: "pg_catalog",
            udt_name,
          }))
        : [];
      return { rows, rowCount: rows.length };
    }

    if (text.startsWith("SELECT")) {
      const match = /FROM "[^"]+"\."([^"]+)"/.exec(text);
      const table = match ? this.tables[match[1]] : undefined;
      if (!table) return { rows: [], rowCount: 0 };

      const params = values ?? [];
      const after = params.length === 2 ? Number(params[0]) : undefined;
      const limit = Number(params[params.length - 1]);
      const rows = table.rows
        .filter((r) => after === undefined || Number(r[table.primaryKey]) > after)
        .sort((a, b) => Number(a[table.primaryKey]) - Number(b[table.primaryKey]))
        .slice(0, limit);
      return { rows, rowCount: rows.length };
    }

    if (text.startsWith("UPDATE")) {
      const tuples = text.match(/\(\$\d+::/g) ?? [];
      return { rows: [], rowCount: tuples.length };
    }

    return { rows: [], rowCount: null };
  }

  texts(): string[] {
    return this.queries.map((q) => q.text);
  }
}
