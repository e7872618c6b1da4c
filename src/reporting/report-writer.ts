import fs from "fs";
import { RunResult } from "../executor/executor";

export type RunReport = {
  mode: "dryrun" | "apply";
  startedAt: string;
  durationMs: number;
  schemaFile: string;
  result: RunResult;
  totalRowsUpdated: number;
};

export function totalRowsUpdated(result: RunResult): number {
  return Object.values(result.byTable).reduce((sum, t) => sum + t.updated, 0);
}

export function writeJsonReport(filePath: string, report: RunReport) {
  fs.writeFileSync(filePath, JSON.stringify(report, null, 2), "utf8");
}
