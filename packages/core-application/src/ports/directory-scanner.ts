import type { DirectorySummary } from "@dir-summary/core-domain";

export interface DirectoryScanner {
  /** Summarize the current on-disk state of `dirPath`, rooted at the empty-string key. */
  scan(dirPath: string): Promise<DirectorySummary>;
}
