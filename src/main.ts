#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "./cli/args";
import { formatProviderList } from "./cli/formatters";
import { readAnonymizationSchema } from "./config/config-io";
import { loadToolConfig } from "./config/tool.config";
import { createDatabaseDump } from "./db/dump";
import { withPgClient } from "./db/postgres.client";
import { executePlan } from "./executor/executor";
import { FakerResolver } from "./faker/faker-resolver";
import { buildPlan } from "./planner/plan-builder";
import { createProviderRegistry } from "./providers";
import { totalRowsUpdated, writeJsonReport } from "./reporting/report-writer";
import { logger, setVerbose } from "./utils/logger";
import { preflightValidate } from "./validators/preflight";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  setVerbose(args.verbose);

  // -----------------------------
  // LIST PROVIDERS
  // -----------------------------
  if (args.listProviders) {
    const registry = createProviderRegistry(new FakerResolver());
    process.stdout.write(`${formatProviderList(registry.list())}\n`);
    return;
  }

  // -----------------------------
  // SCHEMA + PLAN (no database yet)
  // -----------------------------
  const schema = readAnonymizationSchema(args.schemaFile);
  const fakers = new FakerResolver(schema.options.faker);
  const registry = createProviderRegistry(fakers);

  preflightValidate(schema, registry, fakers);
  const plan = buildPlan(schema, registry);
  logger.info(`Plan built with ${plan.tables.length} tables from ${args.schemaFile}`);

  // -----------------------------
  // RUN
  // -----------------------------
  const toolConfig = loadToolConfig(args.db);
  const startedAt = new Date();
  const mode = args.dryRun ? "dryrun" : "apply";
  logger.info(`Running anonymizer in "${mode}" mode`);

  const result = await withPgClient(toolConfig.db, (client) =>
    executePlan({ client, plan, dryrun: args.dryRun, initSql: args.initSql })
  );

  const durationMs = Date.now() - startedAt.getTime();
  logger.info(`Anonymization took ${(durationMs / 1000).toFixed(2)}s, ${totalRowsUpdated(result)} rows updated`);

  if (args.reportFile) {
    writeJsonReport(args.reportFile, {
      mode,
      startedAt: startedAt.toISOString(),
      durationMs,
      schemaFile: args.schemaFile,
      result,
      totalRowsUpdated: totalRowsUpdated(result),
    });
    logger.info(`Report written to ${args.reportFile}`);
  }

  if (args.dumpFile) {
    if (args.dryRun) {
      logger.warn("Skipping dump: a dry run leaves the database unchanged");
    } else {
      createDatabaseDump(toolConfig.db, args.dumpFile);
      logger.info(`Dump written to ${args.dumpFile}`);
    }
  }
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
