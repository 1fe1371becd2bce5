import path from "node:path";
import { ConsoleLogger } from "../adapters/console-logger";
import { loadSummaryConfig, type SummaryConfig } from "../application/config";

function stripOuterQuotes(input: string): string {
  return input.replace(/^"(.*)"$/, "$1");
}

/** Shared setup for the dev scripts: config, logger and the results dir argument. */
export function devRuntime(usage: string): {
  config: SummaryConfig;
  logger: ConsoleLogger;
  resultsDir: string;
} {
  const rawDir = process.argv[2];
  if (!rawDir) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }

  const config = loadSummaryConfig();
  const logger = new ConsoleLogger({
    service: "dir-summary",
    level: config.logLevel,
    format: config.logFormat,
  });

  return { config, logger, resultsDir: path.resolve(stripOuterQuotes(rawDir)) };
}

export function exitOnError(err: unknown): never {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
}
