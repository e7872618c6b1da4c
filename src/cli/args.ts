import { DEFAULT_SCHEMA_FILE } from "../config/constants";
import { DbOverrides } from "../config/tool.config";

export type CliArgs = {
  verbose: boolean;
  listProviders: boolean;
  schemaFile: string;
  dryRun: boolean;
  dumpFile?: string;
  initSql?: string;
  reportFile?: string;
  db: DbOverrides;
};

const BOOLEAN_FLAGS = new Set(["-v", "--verbose", "-l", "--list-providers", "--dry-run"]);
const VALUE_FLAGS = new Set([
  "--schema",
  "--dbname",
  "--user",
  "--password",
  "--host",
  "--port",
  "--dump-file",
  "--init-sql",
  "--report",
]);

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid --port value: "${raw}"`);
  }
  return port;
}

/**
 * Accepts `--flag value` and `--flag=value` for value flags.
 */
export function parseArgs(argv: string[]): CliArgs {
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;

    if (BOOLEAN_FLAGS.has(name)) {
      flags.add(name);
      continue;
    }

    if (!VALUE_FLAGS.has(name)) {
      throw new Error(`Unknown argument: ${arg}. Use --list-providers, --schema, --dry-run, ...`);
    }

    if (eq !== -1 && name !== arg) {
      values.set(name, arg.slice(eq + 1));
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("-")) {
      throw new Error(`Missing value for ${name}`);
    }
    values.set(name, next);
    i++;
  }

  const port = values.get("--port");

  return {
    verbose: flags.has("-v") || flags.has("--verbose"),
    listProviders: flags.has("-l") || flags.has("--list-providers"),
    schemaFile: values.get("--schema") ?? DEFAULT_SCHEMA_FILE,
    dryRun: flags.has("--dry-run"),
    dumpFile: values.get("--dump-file"),
    initSql: values.get("--init-sql"),
    reportFile: values.get("--report"),
    db: {
      database: values.get("--dbname"),
      user: values.get("--user"),
      password: values.get("--password"),
      host: values.get("--host"),
      port: port === undefined ? undefined : parsePort(port),
    },
  };
}
