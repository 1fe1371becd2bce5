import path from "node:path";
import { rootEntry } from "@dir-summary/core-domain";

import type { DirectoryScanner } from "../ports/directory-scanner";
import type { SummaryStore } from "../ports/summary-store";
import { noopLogger, type Logger } from "../ports/logger";

/** Takes one summary of a results directory and stores it beside the results. */
export class SummaryRecorder {
  constructor(
    private readonly scanner: DirectoryScanner,
    private readonly store: SummaryStore,
    private readonly logger: Logger = noopLogger
  ) {}

  async record(resultsDir: string): Promise<string> {
    const dir = path.resolve(resultsDir);
    const summary = await this.scanner.scan(dir);
    const file = await this.store.save(dir, summary);

    this.logger.info("Directory summary recorded", {
      dir,
      file,
      originalSizeBytes: rootEntry(summary)?.originalSizeBytes ?? 0,
    });
    return file;
  }
}
