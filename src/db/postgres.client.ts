import { Client } from "pg";
import { DbConfig } from "../config/tool.config";
import { logger } from "../utils/logger";

export async function withPgClient<T>(
  db: DbConfig,
  fn: (client: Client) => Promise<T>
): Promise<T> {
  const client = new Client({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
    ssl: db.ssl ? { rejectUnauthorized: false } : undefined,
    application_name: "pg-field-anonymizer",
  });

  await client.connect();
  logger.debug(`Connected to ${db.user}@${db.host}:${db.port}/${db.database}`);
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}
