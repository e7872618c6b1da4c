/**
 * Provider rule of one field: `name` selects the provider, every other key is
 * handed to it as an argument (values, value, sign, kwargs, locale, ...).
 */
export type ProviderRule = {
  name: string;
  [arg: string]: unknown;
};

export type FieldRule = {
  column: string;
  provider: ProviderRule;
  /** Suffix added to every non-null replacement value. */
  append?: string;
};

export type ExcludeRule = {
  column: string;
  patterns: string[];
};

export type TableRule = {
  /** As written in the schema, optionally "schema.table". */
  table: string;
  primaryKey: string;
  chunkSize: number;
  search?: string;
  fields: FieldRule[];
  excludes: ExcludeRule[];
};

export type FakerSchemaOptions = {
  defaultLocale?: string;
  locales: string[];
};

export type AnonymizationSchema = {
  options: {
    faker: FakerSchemaOptions;
  };
  truncate: string[];
  tables: TableRule[];
};
