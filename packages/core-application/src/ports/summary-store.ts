import type { DirectorySummary, SummaryFile } from "@dir-summary/core-domain";

export interface SummaryStore {
  /** Summary files under `dir`, oldest modification time first. */
  list(dir: string): Promise<SummaryFile[]>;
  load(file: SummaryFile): Promise<DirectorySummary>;
  /** Writes a new summary file under `dir` and returns its path. */
  save(dir: string, summary: DirectorySummary): Promise<string>;
}
