import { AnonymizationSchema } from "../config/anonymization-schema.types";
import { SchemaValidationError } from "../errors";
import { FakerResolver } from "../faker/faker-resolver";
import { ProviderRegistry } from "../providers";
import { compileExcludePattern, splitTable } from "../planner/plan-builder";

/**
 * Collect every configuration problem the schema has, then fail once with
 * all of them. Runs before the database connection is opened.
 */
export function preflightValidate(
  schema: AnonymizationSchema,
  registry: ProviderRegistry,
  fakers: FakerResolver
): void {
  const problems: string[] = [];
  const { defaultLocale, locales } = schema.options.faker;

  if (defaultLocale && !locales.includes(defaultLocale)) {
    problems.push(`options.faker.default_locale "${defaultLocale}" is not listed in options.faker.locales`);
  }

  try {
    fakers.warmUp();
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
  }

  for (const t of [...schema.truncate, ...schema.tables.map((r) => r.table)]) {
    try {
      splitTable(t);
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  }

  for (const table of schema.tables) {
    const seen = new Set<string>();

    for (const field of table.fields) {
      const where = `${table.table}.${field.column}`;

      if (seen.has(field.column)) problems.push(`${where}: column listed more than once`);
      seen.add(field.column);

      if (field.column === table.primaryKey) {
        problems.push(`${where}: the primary key cannot be anonymized in place`);
      }

      if (!registry.has(field.provider.name)) {
        problems.push(`${where}: could not find provider with id "${field.provider.name}"`);
      }

      const locale = field.provider.locale;
      if (locale !== undefined && (typeof locale !== "string" || !locales.includes(locale))) {
        problems.push(`${where}: locale "${String(locale)}" is not listed in options.faker.locales`);
      }
    }

    for (const exclude of table.excludes) {
      for (const pattern of exclude.patterns) {
        try {
          compileExcludePattern(pattern);
        } catch {
          problems.push(`${table.table}: exclude pattern for "${exclude.column}" is not a valid regular expression: ${pattern}`);
        }
      }
    }
  }

  if (problems.length > 0) {
    throw new SchemaValidationError(`Schema has ${problems.length} problem(s):\n- ${problems.join("\n- ")}`);
  }
}
