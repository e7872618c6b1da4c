export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl?: boolean;
};

export type ToolConfig = {
  db: DbConfig;
};

export type DbOverrides = Partial<Omit<DbConfig, "ssl">>;

function env(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

/**
 * Connection settings from the PG* environment (dotenv-loaded), with command
 * line flags taking precedence.
 */
export function loadToolConfig(overrides: DbOverrides = {}): ToolConfig {
  const port = overrides.port ?? Number(env("PGPORT", "5432"));
  if (!Number.isInteger(port) || port <= 0) throw new Error(`Invalid database port: ${port}`);

  return {
    db: {
      host: overrides.host ?? env("PGHOST", "localhost"),
      port,
      user: overrides.user ?? env("PGUSER"),
      password: overrides.password ?? env("PGPASSWORD", ""),
      database: overrides.database ?? env("PGDATABASE"),
      ssl: env("PGSSLMODE", "").toLowerCase() === "require",
    },
  };
}
