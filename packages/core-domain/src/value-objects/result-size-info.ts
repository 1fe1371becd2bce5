import { originalSize, rootEntry, trimmedSize } from "../entities/summary-entry";
import type { DirectorySummary } from "../entities/summary-entry";

/**
 * Sizes reported for one results directory, in whole KB.
 *
 * `clientResultCollectedKB` can exceed `resultUploadedKB` even without
 * trimming, since the same file may be collected more than once.
 */
export type ResultSizeInfo = {
  clientResultCollectedKB: number;
  originalResultTotalKB: number;
  resultUploadedKB: number;
  // true when the trimmed total differs from the original total
  resultThrottled: boolean;
};

const toKB = (bytes: number) => Math.floor(bytes / 1024);

export function getResultSizeInfo(
  clientCollectedBytes: number,
  summary: DirectorySummary
): ResultSizeInfo {
  const root = rootEntry(summary);
  const original = root ? originalSize(root) : 0;
  const trimmed = root ? trimmedSize(root) : 0;

  return {
    clientResultCollectedKB: toKB(clientCollectedBytes),
    originalResultTotalKB: toKB(original),
    resultUploadedKB: toKB(trimmed),
    resultThrottled: original !== trimmed,
  };
}
