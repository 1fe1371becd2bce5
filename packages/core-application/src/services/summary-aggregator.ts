import path from "node:path";
import { collectedBytesOf, type DirectorySummary } from "@dir-summary/core-domain";

import type { SummaryStore } from "../ports/summary-store";
import type { DirectoryScanner } from "../ports/directory-scanner";
import { noopLogger, type Logger } from "../ports/logger";
import { deleteMissingEntries, mergeSummaries } from "./summary-merge";

export type AggregateResult = {
  // collected bytes on the root after the final merge and deletion passes
  collectedBytes: number;
  // collected bytes from the summary files alone, before the final scan
  clientCollectedBytes: number;
  summary: DirectorySummary;
};

export type SummaryAggregatorDeps = {
  store: SummaryStore;
  scanner: DirectoryScanner;
  logger?: Logger;
};

/**
 * Replays every summary file in a results directory in the order the files
 * were written, then merges the directory as it is now and reconciles what
 * was deleted since.
 */
export class SummaryAggregator {
  private readonly store: SummaryStore;
  private readonly scanner: DirectoryScanner;
  private readonly logger: Logger;

  constructor(deps: SummaryAggregatorDeps) {
    this.store = deps.store;
    this.scanner = deps.scanner;
    this.logger = deps.logger ?? noopLogger;
  }

  async aggregate(resultsDir: string): Promise<AggregateResult> {
    const dir = path.resolve(resultsDir);
    const files = await this.store.list(dir);
    this.logger.info("Merging directory summaries", { dir, files: files.length });

    const merged: DirectorySummary = new Map();
    for (const file of files) {
      // a summary that cannot be loaded aborts the run: skipping it would misstate the totals
      const snapshot = await this.store.load(file);
      const { collectedBytes } = mergeSummaries(merged, snapshot);
      this.logger.debug("Merged summary file", { file: file.name, collectedBytes });
    }

    const clientCollectedBytes = collectedBytesOf(merged);

    const live = await this.scanner.scan(dir);
    mergeSummaries(merged, live, true);
    deleteMissingEntries(merged, live);

    const collectedBytes = collectedBytesOf(merged);
    this.logger.info("Merged directory summaries", { dir, clientCollectedBytes, collectedBytes });

    return { collectedBytes, clientCollectedBytes, summary: merged };
  }
}
