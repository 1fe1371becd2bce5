import path from "node:path";

import type { FileWatcher, TreeChangeEvent } from "../ports/file-watcher";
import { noopLogger, type Logger } from "../ports/logger";
import { isSummaryFileName } from "../adapters/node-summary-store";
import { DEFAULT_WATCH_DEBOUNCE_MS } from "../application/config";

export interface Recorder {
  record(resultsDir: string): Promise<string>;
}

export type SummaryWatcherOptions = {
  debounceMs?: number;
  logger?: Logger;
};

/**
 * Records a new summary each time a results directory stops changing for
 * `debounceMs`. Writing the summary file does not trigger another one.
 */
export class SummaryWatcher {
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private recording: Promise<void> | null = null;
  private pendingChanges = 0;
  private resultsDir = "";

  constructor(
    private readonly watcher: FileWatcher,
    private readonly recorder: Recorder,
    options: SummaryWatcherOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS;
    this.logger = options.logger ?? noopLogger;
  }

  async start(resultsDir: string): Promise<void> {
    this.resultsDir = path.resolve(resultsDir);
    this.watcher.onEvent((event) => this.onChange(event));
    await this.watcher.start({
      rootDir: this.resultsDir,
      ignore: (p) => isSummaryFileName(path.basename(p)),
    });
    this.logger.info("Watching results directory", { dir: this.resultsDir });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.watcher.stop();
    // let a recording already in progress finish writing
    if (this.recording) await this.recording;
  }

  private onChange(event: TreeChangeEvent): void {
    this.pendingChanges++;
    this.logger.debug("Results changed", { type: event.type, path: event.path });

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      // one recording at a time, in order
      const previous = this.recording ?? Promise.resolve();
      this.recording = previous.then(() => this.flush());
    }, this.debounceMs);
  }

  private async flush(): Promise<void> {
    const changes = this.pendingChanges;
    this.pendingChanges = 0;

    try {
      const file = await this.recorder.record(this.resultsDir);
      this.logger.debug("Recorded summary after changes", { file, changes });
    } catch (err) {
      this.logger.error("Failed to record directory summary", {
        dir: this.resultsDir,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
