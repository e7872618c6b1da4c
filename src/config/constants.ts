export const DEFAULT_SCHEMA_FILE = "schema.yml";

export const DEFAULT_PRIMARY_KEY = "id";
export const DEFAULT_CHUNK_SIZE = 2000;
export const DEFAULT_DB_SCHEMA = "public";
