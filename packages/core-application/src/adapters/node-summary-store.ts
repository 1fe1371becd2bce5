import fs from "node:fs/promises";
import path from "node:path";

import type { DirectorySummary, SummaryFile } from "@dir-summary/core-domain";
import type { SummaryStore } from "../ports/summary-store";
import { systemClock, type Clock } from "../ports/clock";
import { noopLogger, type Logger } from "../ports/logger";
import { parseSummary, serializeSummary } from "../services/summary-codec";
import {
  InsufficientDiskSpaceError,
  isErrnoException,
  SummaryFormatError,
} from "../application/errors";
import { DEFAULT_MIN_FREE_DISK_BYTES } from "../application/config";

export const SUMMARY_FILE_PREFIX = "dir_summary_";
export const SUMMARY_FILE_EXT = ".json";

/** Free bytes available to unprivileged writers on the filesystem holding `dir`. */
export type FreeSpaceProbe = (dir: string) => Promise<number>;

export const statfsFreeSpace: FreeSpaceProbe = async (dir) => {
  const s = await fs.statfs(dir);
  return s.bsize * s.bavail;
};

export function isSummaryFileName(name: string): boolean {
  return name.startsWith(SUMMARY_FILE_PREFIX) && name.endsWith(SUMMARY_FILE_EXT);
}

export type NodeSummaryStoreOptions = {
  clock?: Clock;
  logger?: Logger;
  minFreeDiskBytes?: number;
  freeSpace?: FreeSpaceProbe;
};

/**
 * Summary files live directly in the results directory they describe, named
 * `dir_summary_<unix seconds>.json`. They are written once and never changed.
 */
export class NodeSummaryStore implements SummaryStore {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly minFreeDiskBytes: number;
  private readonly freeSpace: FreeSpaceProbe;

  constructor(options: NodeSummaryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
    this.minFreeDiskBytes = options.minFreeDiskBytes ?? DEFAULT_MIN_FREE_DISK_BYTES;
    this.freeSpace = options.freeSpace ?? statfsFreeSpace;
  }

  async list(dir: string): Promise<SummaryFile[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    const files: SummaryFile[] = [];
    for (const e of entries) {
      if (!e.isFile() || !isSummaryFileName(e.name)) continue;
      const abs = path.join(dir, e.name);
      const stat = await fs.stat(abs);
      files.push({ path: abs, name: e.name, modifiedAtMs: stat.mtimeMs });
    }

    // transfer order is modification order, whatever the name says
    return files.sort(
      (a, b) => a.modifiedAtMs - b.modifiedAtMs || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
    );
  }

  async load(file: SummaryFile): Promise<DirectorySummary> {
    let text: string;
    try {
      text = await fs.readFile(file.path, "utf-8");
    } catch (err) {
      throw new SummaryFormatError(`Cannot read summary file ${file.path}`, file.path, err);
    }

    try {
      return parseSummary(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SummaryFormatError(`${file.path}: ${reason}`, file.path, err);
    }
  }

  async save(dir: string, summary: DirectorySummary): Promise<string> {
    const json = serializeSummary(summary);
    const summaryBytes = Buffer.byteLength(json, "utf-8");

    const free = await this.freeSpace(dir);
    if (free - summaryBytes < this.minFreeDiskBytes) {
      throw new InsufficientDiskSpaceError(
        `Not enough disk space after saving the summary file. Available free disk: ${free} bytes. Summary file size: ${summaryBytes} bytes.`,
        free,
        summaryBytes
      );
    }

    const file = await this.uniqueFilePath(dir);
    await fs.writeFile(file, json, { encoding: "utf-8", flag: "wx" });

    this.logger.info("Saved directory summary", { dir, file, bytes: summaryBytes });
    return file;
  }

  async uniqueFilePath(dir: string): Promise<string> {
    const stem = `${SUMMARY_FILE_PREFIX}${Math.floor(this.clock.now() / 1000)}`;

    let candidate = path.join(dir, `${stem}${SUMMARY_FILE_EXT}`);
    for (let count = 1; await exists(candidate); count++) {
      candidate = path.join(dir, `${stem}_${count}${SUMMARY_FILE_EXT}`);
    }
    return candidate;
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (isErrnoException(err, "ENOENT")) return false;
    throw err;
  }
}
