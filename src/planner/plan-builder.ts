import { AnonymizationSchema, FieldRule } from "../config/anonymization-schema.types";
import { DEFAULT_DB_SCHEMA } from "../config/constants";
import { ProviderRegistry } from "../providers";
import { Plan, PlannedField } from "./plan-types";

/**
 * Split "schema.table"; a bare name lives in the default schema.
 */
export function splitTable(full: string): { schema: string; name: string } {
  const dot = full.indexOf(".");
  if (dot === -1) return { schema: DEFAULT_DB_SCHEMA, name: full };

  const schema = full.slice(0, dot);
  const name = full.slice(dot + 1);
  if (!schema || !name) {
    throw new Error(`Invalid table name "${full}". Expected format: table or schema.table`);
  }
  return { schema, name };
}

/**
 * Patterns match from the start of the value, like the rule identifiers do.
 */
export function compileExcludePattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`);
}

function planField(field: FieldRule, registry: ProviderRegistry): PlannedField {
  // the rule keeps its name: the fake provider reads the method from it
  return {
    column: field.column,
    rule: field.provider.name,
    provider: registry.resolve(field.provider.name),
    args: { ...field.provider },
    append: field.append,
  };
}

/**
 * Build execution plan from the schema. Providers are resolved here so an
 * unknown rule fails before any row is touched.
 */
export function buildPlan(schema: AnonymizationSchema, registry: ProviderRegistry): Plan {
  const tables = schema.tables.map((rule) => {
    const { schema: dbSchema, name } = splitTable(rule.table);

    return {
      table: rule.table,
      schema: dbSchema,
      name,
      primaryKey: rule.primaryKey,
      chunkSize: rule.chunkSize,
      search: rule.search,
      fields: rule.fields.map((f) => planField(f, registry)),
      excludes: rule.excludes.map((e) => ({
        column: e.column,
        patterns: e.patterns.map(compileExcludePattern),
      })),
    };
  });

  return {
    createdAt: new Date().toISOString(),
    truncate: schema.truncate.map(splitTable),
    tables,
  };
}
