import { execFileSync } from "child_process";
import { DbConfig } from "../config/tool.config";

/**
 * pg_dump arguments for a compressed custom-format dump of the database.
 */
export function pgDumpArgs(db: DbConfig, dumpFile: string): string[] {
  return [
    "-Fc",
    "-Z",
    "9",
    "-h",
    db.host,
    "-p",
    String(db.port),
    "-U",
    db.user,
    "-f",
    dumpFile,
    db.database,
  ];
}

export function createDatabaseDump(db: DbConfig, dumpFile: string) {
  execFileSync("pg_dump", pgDumpArgs(db, dumpFile), {
    stdio: "inherit",
    env: { ...process.env, PGPASSWORD: db.password },
  });
}
