import pino from "pino";

export const logger = pino({
  name: "pg-field-anonymizer",
  level: process.env.LOG_LEVEL ?? "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function setVerbose(verbose: boolean) {
  if (verbose) logger.level = "debug";
}
