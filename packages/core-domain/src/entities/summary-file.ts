export type SummaryFileName = string;

/** A written directory summary. Never modified after creation. */
export interface SummaryFile {
  path: string;
  name: SummaryFileName;
  modifiedAtMs: number;
}
