import { Provider, ProviderArgs } from "../providers";

export type PlannedField = {
  column: string;
  rule: string;
  provider: Provider;
  /** The whole provider rule, name included, passed to alterValue. */
  args: ProviderArgs;
  append?: string;
};

export type PlannedExclude = {
  column: string;
  patterns: RegExp[];
};

export type PlannedTable = {
  table: string;
  schema: string;
  name: string;
  primaryKey: string;
  chunkSize: number;
  search?: string;
  fields: PlannedField[];
  excludes: PlannedExclude[];
};

export type Plan = {
  createdAt: string;
  truncate: { schema: string; name: string }[];
  tables: PlannedTable[];
};
