import {
  cloneEntry,
  collectedBytesOf,
  collectedSize,
  createDirectoryEntry,
  recomputeSizes,
  trimmedSize,
  type DirectoryEntry,
  type DirectorySummary,
} from "@dir-summary/core-domain";

/**
 * Process bookkeeping files that are removed from the results before
 * collection ends. They carry no transfer cost, so they are dropped from the
 * summary instead of being counted as deleted.
 */
export const FILES_TO_IGNORE: ReadonlySet<string> = new Set(["control.autoserv.state"]);

export type MergeResult = {
  // running total across every merge into this summary, read from the root
  collectedBytes: number;
  summary: DirectorySummary;
};

/**
 * Merge a newer directory summary into an older one, in place.
 *
 * Entries only in `newSummary` are copied in. A file whose original size
 * changed was transferred again, so its new collected size is added to the
 * collected size already recorded. A file replaced by a directory becomes an
 * empty directory before merging; a directory replaced by a file is left
 * alone, since the transfer cannot overwrite a directory with a file.
 *
 * With `isFinal`, `newSummary` is the results directory as it finally is.
 * A file whose trimmed size is unchanged is then not counted again: the final
 * copy does not know the size the file had before trimming.
 */
export function mergeSummaries(
  oldSummary: DirectorySummary,
  newSummary: DirectorySummary,
  isFinal = false
): MergeResult {
  for (const [name, incoming] of newSummary) {
    const existing = oldSummary.get(name);

    if (existing === undefined) {
      const copy = cloneEntry(incoming);
      oldSummary.set(name, copy);
      recomputeSizes(copy);
      continue;
    }

    if (incoming.kind === "directory") {
      let target: DirectoryEntry;
      if (existing.kind === "directory") {
        target = existing;
      } else {
        target = createDirectoryEntry();
        target.trimmedSizeBytes = 0;
        target.collectedSizeBytes = 0;
        oldSummary.set(name, target);
      }

      mergeSummaries(target.children, incoming.children, isFinal);
      recomputeSizes(target);
      continue;
    }

    if (existing.kind === "directory") continue;
    if (incoming.originalSizeBytes === existing.originalSizeBytes) continue;
    if (isFinal && trimmedSize(incoming) === trimmedSize(existing)) continue;

    existing.collectedSizeBytes = collectedSize(existing) + collectedSize(incoming);
    existing.trimmedSizeBytes = trimmedSize(incoming);
    existing.originalSizeBytes = incoming.originalSizeBytes;
  }

  return { collectedBytes: collectedBytesOf(oldSummary), summary: oldSummary };
}

const EMPTY: DirectorySummary = new Map();

/**
 * Reconcile entries that are gone from the final results directory.
 *
 * A missing file keeps what was collected for it but is trimmed to 0, so it
 * no longer counts toward what is uploaded. Missing directories have every
 * descendant treated the same way. Ignored bookkeeping files are removed.
 */
export function deleteMissingEntries(
  oldSummary: DirectorySummary,
  newSummary: DirectorySummary
): void {
  for (const [name, existing] of [...oldSummary]) {
    const current = newSummary.get(name);

    if (existing.kind === "directory") {
      const currentChildren = current?.kind === "directory" ? current.children : EMPTY;
      deleteMissingEntries(existing.children, currentChildren);
      recomputeSizes(existing);
      continue;
    }

    if (current !== undefined) continue;

    if (FILES_TO_IGNORE.has(name)) {
      oldSummary.delete(name);
      continue;
    }

    existing.collectedSizeBytes = collectedSize(existing);
    existing.trimmedSizeBytes = 0;
  }
}
