/** Key of the synthetic root directory, so summaries taken from different walk roots still line up. */
export const ROOT_DIR = "";

export type SizeFields = {
  originalSizeBytes: number;
  trimmedSizeBytes?: number;
  collectedSizeBytes?: number;
};

export interface FileEntry extends SizeFields {
  kind: "file";
}

export interface DirectoryEntry extends SizeFields {
  kind: "directory";
  children: DirectorySummary;
}

export type SummaryEntry = FileEntry | DirectoryEntry;

/** Entries of one directory level, by name. Iteration follows insertion order. */
export type DirectorySummary = Map<string, SummaryEntry>;

export function createFileEntry(sizes: SizeFields): FileEntry {
  return { kind: "file", ...sizes };
}

export function createDirectoryEntry(children: DirectorySummary = new Map()): DirectoryEntry {
  return { kind: "directory", originalSizeBytes: 0, children };
}

export function isDirectory(entry: SummaryEntry): entry is DirectoryEntry {
  return entry.kind === "directory";
}

export function originalSize(entry: SummaryEntry): number {
  return entry.originalSizeBytes;
}

/** Trimmed size, or the original size while no trimming was recorded. */
export function trimmedSize(entry: SummaryEntry): number {
  return entry.trimmedSizeBytes ?? entry.originalSizeBytes;
}

/** Collected size, falling back to trimmed and then original size. */
export function collectedSize(entry: SummaryEntry): number {
  return entry.collectedSizeBytes ?? trimmedSize(entry);
}

/**
 * Re-derive a directory's three sizes from its direct children.
 * Children must already be up to date, so callers walk bottom-up.
 */
export function recomputeSizes(entry: SummaryEntry): void {
  if (entry.kind !== "directory") return;

  let original = 0;
  let trimmed = 0;
  let collected = 0;
  for (const child of entry.children.values()) {
    original += originalSize(child);
    trimmed += trimmedSize(child);
    collected += collectedSize(child);
  }

  entry.originalSizeBytes = original;
  entry.trimmedSizeBytes = trimmed;
  entry.collectedSizeBytes = collected;
}

export function cloneEntry(entry: SummaryEntry): SummaryEntry {
  const sizes: SizeFields = { originalSizeBytes: entry.originalSizeBytes };
  if (entry.trimmedSizeBytes !== undefined) sizes.trimmedSizeBytes = entry.trimmedSizeBytes;
  if (entry.collectedSizeBytes !== undefined) sizes.collectedSizeBytes = entry.collectedSizeBytes;

  if (entry.kind === "file") return createFileEntry(sizes);
  return { kind: "directory", ...sizes, children: cloneSummary(entry.children) };
}

export function cloneSummary(summary: DirectorySummary): DirectorySummary {
  const copy: DirectorySummary = new Map();
  for (const [name, entry] of summary) {
    copy.set(name, cloneEntry(entry));
  }
  return copy;
}

export function rootEntry(summary: DirectorySummary): SummaryEntry | undefined {
  return summary.get(ROOT_DIR);
}

/** Collected bytes recorded on the root, 0 for a summary without one. */
export function collectedBytesOf(summary: DirectorySummary): number {
  const root = rootEntry(summary);
  return root ? collectedSize(root) : 0;
}
