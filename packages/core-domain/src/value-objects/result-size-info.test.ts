import { describe, it, expect } from "vitest";
import { createDirectoryEntry, ROOT_DIR } from "../entities/summary-entry";
import { getResultSizeInfo } from "./result-size-info";

describe("getResultSizeInfo", () => {
  it("reports whole KB and flags trimming", () => {
    const root = createDirectoryEntry();
    root.originalSizeBytes = 4096;
    root.trimmedSizeBytes = 3000;

    const info = getResultSizeInfo(5000, new Map([[ROOT_DIR, root]]));

    expect(info).toEqual({
      clientResultCollectedKB: 4,
      originalResultTotalKB: 4,
      resultUploadedKB: 2,
      resultThrottled: true,
    });
  });

  it("is not throttled when the root was never trimmed", () => {
    const root = createDirectoryEntry();
    root.originalSizeBytes = 2048;

    const info = getResultSizeInfo(2048, new Map([[ROOT_DIR, root]]));

    expect(info.resultThrottled).toBe(false);
    expect(info.resultUploadedKB).toBe(2);
  });

  it("reports zeros for an empty summary", () => {
    expect(getResultSizeInfo(0, new Map())).toEqual({
      clientResultCollectedKB: 0,
      originalResultTotalKB: 0,
      resultUploadedKB: 0,
      resultThrottled: false,
    });
  });
});
