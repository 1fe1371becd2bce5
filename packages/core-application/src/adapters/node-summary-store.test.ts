import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createDirectoryEntry,
  createFileEntry,
  ROOT_DIR,
  type DirectorySummary,
} from "@dir-summary/core-domain";

import { NodeSummaryStore } from "./node-summary-store";
import { InsufficientDiskSpaceError, SummaryFormatError } from "../application/errors";

const fixedClock = { now: () => 1_700_000_000_123 };
const plentyOfSpace = async () => 1024 * 1024 * 1024;

function sampleSummary(): DirectorySummary {
  const root = createDirectoryEntry(new Map([["a.txt", createFileEntry({ originalSizeBytes: 3 })]]));
  root.originalSizeBytes = 3;
  return new Map([[ROOT_DIR, root]]);
}

describe("NodeSummaryStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "dir-summary-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes summaries under unique timestamped names", async () => {
    const store = new NodeSummaryStore({ clock: fixedClock, freeSpace: plentyOfSpace });

    const first = await store.save(dir, sampleSummary());
    const second = await store.save(dir, sampleSummary());
    const third = await store.save(dir, sampleSummary());

    expect(path.basename(first)).toBe("dir_summary_1700000000.json");
    expect(path.basename(second)).toBe("dir_summary_1700000000_1.json");
    expect(path.basename(third)).toBe("dir_summary_1700000000_2.json");
    expect(await fs.readFile(first, "utf-8")).toBe('{"":{"/S":3,"/D":{"a.txt":{"/S":3}}}}');
  });

  it("refuses to write when too little disk space would remain", async () => {
    const store = new NodeSummaryStore({
      clock: fixedClock,
      minFreeDiskBytes: 10,
      freeSpace: async () => 40,
    });

    await expect(store.save(dir, sampleSummary())).rejects.toBeInstanceOf(InsufficientDiskSpaceError);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("lists summary files by modification time", async () => {
    await fs.writeFile(path.join(dir, "dir_summary_1.json"), "{}");
    await fs.writeFile(path.join(dir, "dir_summary_2.json"), "{}");
    await fs.writeFile(path.join(dir, "other.json"), "{}");
    await fs.mkdir(path.join(dir, "dir_summary_3.json"));
    await fs.utimes(path.join(dir, "dir_summary_1.json"), 2000, 2000);
    await fs.utimes(path.join(dir, "dir_summary_2.json"), 1000, 1000);

    const files = await new NodeSummaryStore().list(dir);

    expect(files.map((f) => f.name)).toEqual(["dir_summary_2.json", "dir_summary_1.json"]);
    expect(files[0]?.modifiedAtMs).toBe(1_000_000);
  });

  it("loads what it saved", async () => {
    const store = new NodeSummaryStore({ clock: fixedClock, freeSpace: plentyOfSpace });
    await store.save(dir, sampleSummary());

    const [file] = await store.list(dir);
    if (!file) throw new Error("no summary file listed");

    expect(await store.load(file)).toEqual(sampleSummary());
  });

  it("rejects a summary file that is not JSON", async () => {
    const filePath = path.join(dir, "dir_summary_5.json");
    await fs.writeFile(filePath, "{");

    const error = await new NodeSummaryStore()
      .load({ path: filePath, name: "dir_summary_5.json", modifiedAtMs: 0 })
      .catch((e: unknown) => e);

    if (!(error instanceof SummaryFormatError)) throw new Error("expected a SummaryFormatError");
    expect(error.filePath).toBe(filePath);
  });

  it("rejects a summary file with invalid sizes", async () => {
    const filePath = path.join(dir, "dir_summary_6.json");
    await fs.writeFile(filePath, '{"":{"/S":-1}}');

    await expect(
      new NodeSummaryStore().load({ path: filePath, name: "dir_summary_6.json", modifiedAtMs: 0 })
    ).rejects.toBeInstanceOf(SummaryFormatError);
  });
});
