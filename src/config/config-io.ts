import fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SchemaValidationError } from "../errors";
import { describeZodError } from "../providers/args";
import {
  AnonymizationSchema,
  ExcludeRule,
  FieldRule,
  TableRule,
} from "./anonymization-schema.types";
import { DEFAULT_CHUNK_SIZE, DEFAULT_PRIMARY_KEY } from "./constants";

/**
 * Entries like `- auth_user: {...}` are one-key mappings; unwrap them to
 * [key, value].
 */
function singleKey<T extends z.ZodTypeAny>(value: T) {
  return z
    .record(z.string(), value)
    .refine((r) => Object.keys(r).length === 1, { message: "Expected a mapping with exactly one key" })
    .transform((r): [string, z.output<T>] => {
      const [entry] = Object.entries(r);
      return [entry[0], entry[1]];
    });
}

const ProviderRuleZ = z.object({ name: z.string().min(1) }).passthrough();

const FieldZ = singleKey(
  z.object({
    provider: ProviderRuleZ,
    append: z.string().optional(),
  })
).transform(([column, rule]): FieldRule => ({
  column,
  provider: rule.provider,
  append: rule.append,
}));

const ExcludeZ = singleKey(z.array(z.string())).transform(
  ([column, patterns]): ExcludeRule => ({ column, patterns })
);

const TableZ = singleKey(
  z.object({
    primary_key: z.string().default(DEFAULT_PRIMARY_KEY),
    chunk_size: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    search: z.string().optional(),
    fields: z.array(FieldZ).default([]),
    excludes: z.array(ExcludeZ).default([]),
  })
).transform(
  ([table, t]): TableRule => ({
    table,
    primaryKey: t.primary_key,
    chunkSize: t.chunk_size,
    search: t.search,
    fields: t.fields,
    excludes: t.excludes,
  })
);

const AnonymizationSchemaZ: z.ZodType<AnonymizationSchema, z.ZodTypeDef, unknown> = z
  .object({
    options: z
      .object({
        faker: z
          .object({
            default_locale: z.string().optional(),
            locales: z.array(z.string()).default([]),
          })
          .default({}),
      })
      .default({}),
    truncate: z.array(z.string()).default([]),
    tables: z.array(TableZ).default([]),
  })
  .transform((s) => ({
    options: {
      faker: {
        defaultLocale: s.options.faker.default_locale,
        locales: s.options.faker.locales,
      },
    },
    truncate: s.truncate,
    tables: s.tables,
  }));

export function parseAnonymizationSchema(raw: unknown, source = "schema"): AnonymizationSchema {
  // an empty YAML document parses to null
  const res = AnonymizationSchemaZ.safeParse(raw ?? {});
  if (!res.success) {
    throw new SchemaValidationError(`Invalid ${source}: ${describeZodError(res.error)}`);
  }
  return res.data;
}

export function parseAnonymizationSchemaYaml(text: string, source = "schema"): AnonymizationSchema {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new SchemaValidationError(`Invalid ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseAnonymizationSchema(raw, source);
}

export function readAnonymizationSchema(filePath: string): AnonymizationSchema {
  const text = fs.readFileSync(filePath, "utf8");
  return parseAnonymizationSchemaYaml(text, filePath);
}
