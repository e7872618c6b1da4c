import { SchemaValidationError } from "../errors";
import { PlannedExclude, PlannedTable, Plan } from "../planner/plan-types";
import { valueText } from "../providers/args";
import { logger } from "../utils/logger";
import {
  buildBatchUpdateSql,
  buildSelectChunkSql,
  buildTruncateSql,
  maxRowsPerUpdate,
  quoteIdent,
  UpdateRow,
} from "./query-builder";

/**
 * The slice of a pg Client the executor needs; tests pass an in-memory fake.
 */
export type SqlClient = {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
};

export type TableResult = {
  updated: number;
  skipped: number;
};

export type RunResult = {
  truncated: string[];
  byTable: Record<string, TableResult>;
};

/**
 * Cast expression ("schema"."type") for every column of a table, read from
 * information_schema.
 */
async function readColumnTypes(
  client: SqlClient,
  schema: string,
  table: string
): Promise<Record<string, string>> {
  const sql = `
    SELECT column_name, udt_schema, udt_name
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
  `;
  const res = await client.query(sql, [schema, table]);

  const out: Record<string, string> = {};
  for (const r of res.rows) {
    out[String(r.column_name)] = `${quoteIdent(String(r.udt_schema))}.${quoteIdent(String(r.udt_name))}`;
  }
  return out;
}

/**
 * A row is left alone when any exclude pattern matches its column value.
 */
export function isExcluded(row: Record<string, unknown>, excludes: PlannedExclude[]): boolean {
  return excludes.some((e) => {
    const value = row[e.column];
    if (value === null || value === undefined) return false;
    const text = valueText(value);
    return e.patterns.some((p) => p.test(text));
  });
}

/**
 * New values for one row, in field order. `append` only decorates non-null
 * results.
 */
export function anonymizeRow(row: Record<string, unknown>, table: PlannedTable): unknown[] {
  return table.fields.map((f) => {
    const value = f.provider.alterValue(row[f.column], f.args);
    if (f.append && value !== null && value !== undefined) return `${String(value)}${f.append}`;
    return value;
  });
}

export async function anonymizeTable(client: SqlClient, table: PlannedTable): Promise<TableResult> {
  const result: TableResult = { updated: 0, skipped: 0 };
  if (table.fields.length === 0) {
    logger.info(`Skipping ${table.table} (no fields)`);
    return result;
  }

  const types = await readColumnTypes(client, table.schema, table.name);
  const columns = table.fields.map((f) => f.column);
  const readColumns = [...new Set([...columns, ...table.excludes.map((e) => e.column)])];

  const missing = [table.primaryKey, ...readColumns].filter((c) => !(c in types));
  if (missing.length > 0) {
    throw new SchemaValidationError(`${table.table}: unknown column(s) ${missing.join(", ")}`);
  }

  const batchSize = maxRowsPerUpdate(columns.length);
  let lastKey: unknown;
  let hasLastKey = false;

  for (;;) {
    const sql = buildSelectChunkSql({
      schema: table.schema,
      table: table.name,
      primaryKey: table.primaryKey,
      columns: readColumns,
      keyType: types[table.primaryKey],
      search: table.search,
      afterKey: hasLastKey,
    });
    const res = await client.query(sql, hasLastKey ? [lastKey, table.chunkSize] : [table.chunkSize]);
    if (res.rows.length === 0) break;

    const updates: UpdateRow[] = [];
    for (const row of res.rows) {
      if (isExcluded(row, table.excludes)) {
        result.skipped++;
        continue;
      }
      updates.push({ key: row[table.primaryKey], values: anonymizeRow(row, table) });
    }

    for (let i = 0; i < updates.length; i += batchSize) {
      const { sql: updateSql, values } = buildBatchUpdateSql({
        schema: table.schema,
        table: table.name,
        primaryKey: table.primaryKey,
        columns,
        types,
        rows: updates.slice(i, i + batchSize),
      });
      const updated = await client.query(updateSql, values);
      result.updated += updated.rowCount ?? 0;
    }

    logger.debug(`${table.table}: processed ${res.rows.length} rows (${updates.length} updated in this chunk)`);

    lastKey = res.rows[res.rows.length - 1][table.primaryKey];
    hasLastKey = true;
    if (res.rows.length < table.chunkSize) break;
  }

  return result;
}

/**
 * Runs the whole plan in one transaction. A dry run rolls back at the end;
 * any error rolls back and is re-thrown, so no half-anonymized state is kept.
 */
export async function executePlan({
  client,
  plan,
  dryrun,
  initSql,
}: {
  client: SqlClient;
  plan: Plan;
  dryrun: boolean;
  initSql?: string;
}): Promise<RunResult> {
  const result: RunResult = { truncated: [], byTable: {} };

  await client.query("BEGIN");

  try {
    if (initSql) {
      logger.info(`Executing initialisation sql ${initSql}`);
      await client.query(initSql);
    }

    const truncateSql = buildTruncateSql(plan.truncate);
    if (truncateSql) {
      await client.query(truncateSql);
      result.truncated = plan.truncate.map((t) => `${t.schema}.${t.name}`);
      logger.info(`Truncated ${result.truncated.join(", ")}`);
    }

    for (const table of plan.tables) {
      const tableResult = await anonymizeTable(client, table);
      result.byTable[table.table] = tableResult;
      logger.info(
        `${dryrun ? "[dryrun]" : "[apply]"} ${table.table}: ${tableResult.updated} rows updated, ${tableResult.skipped} excluded`
      );
    }

    if (dryrun) {
      await client.query("ROLLBACK");
      logger.info("Dry run completed, transaction rolled back");
    } else {
      await client.query("COMMIT");
    }

    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    logger.error("Anonymization failed, transaction rolled back");
    throw err;
  }
}
