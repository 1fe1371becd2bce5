import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";

import {
  createDirectoryEntry,
  createFileEntry,
  ROOT_DIR,
  type DirectoryEntry,
  type DirectorySummary,
  type SummaryEntry,
} from "@dir-summary/core-domain";
import type { DirectoryScanner } from "../ports/directory-scanner";
import { noopLogger, type Logger } from "../ports/logger";
import { InvalidInputError, isErrnoException, NotFoundError } from "../application/errors";

type WalkContext = {
  // real path of the directory being summarized
  topReal: string;
  // real paths of directories already walked during this scan
  visited: Set<string>;
};

function isInside(realPath: string, topReal: string): boolean {
  return realPath === topReal || realPath.startsWith(topReal + path.sep);
}

/**
 * Builds a directory summary from disk. Only sizes are read, never file
 * contents.
 *
 * Results are copied back as symlinks, not as the data they point to, so a
 * symlinked directory that resolves inside the summarized tree is recorded as
 * an empty directory. Directories reached twice are only walked once.
 */
export class NodeDirectoryScanner implements DirectoryScanner {
  constructor(private readonly logger: Logger = noopLogger) {}

  async scan(dirPath: string): Promise<DirectorySummary> {
    const abs = path.resolve(dirPath);

    let stat: Stats;
    try {
      stat = await fs.stat(abs);
    } catch (err) {
      // ENOTDIR: a parent on the path is a file
      if (isErrnoException(err, "ENOENT") || isErrnoException(err, "ENOTDIR")) {
        throw new NotFoundError(`Path ${abs} does not exist.`, abs, err);
      }
      throw err;
    }

    if (!stat.isDirectory()) {
      throw new InvalidInputError(`The given path ${abs} is a file. It must be a directory.`);
    }

    const ctx: WalkContext = { topReal: await fs.realpath(abs), visited: new Set() };
    const root = await this.summarizeDirectory(abs, false, ctx);

    this.logger.debug("Scanned directory", {
      path: abs,
      directories: ctx.visited.size,
      originalSizeBytes: root.originalSizeBytes,
    });

    return new Map([[ROOT_DIR, root]]);
  }

  private async summarizeEntry(abs: string, ctx: WalkContext): Promise<SummaryEntry> {
    const linkStat = await fs.lstat(abs);
    const isLink = linkStat.isSymbolicLink();

    let stat = linkStat;
    if (isLink) {
      try {
        stat = await fs.stat(abs);
      } catch (err) {
        if (isErrnoException(err, "ENOENT") || isErrnoException(err, "ELOOP")) {
          // dangling link, nothing to follow
          return createFileEntry({ originalSizeBytes: 0 });
        }
        throw err;
      }
    }

    if (!stat.isDirectory()) return createFileEntry({ originalSizeBytes: stat.size });
    return this.summarizeDirectory(abs, isLink, ctx);
  }

  private async summarizeDirectory(
    abs: string,
    isLink: boolean,
    ctx: WalkContext
  ): Promise<DirectoryEntry> {
    const entry = createDirectoryEntry();
    const real = await fs.realpath(abs);

    if ((isLink && isInside(real, ctx.topReal)) || ctx.visited.has(real)) {
      return entry;
    }
    ctx.visited.add(real);

    const names = (await fs.readdir(abs)).sort();
    for (const name of names) {
      const child = await this.summarizeEntry(path.join(abs, name), ctx);
      entry.children.set(name, child);
      entry.originalSizeBytes += child.originalSizeBytes;
    }

    return entry;
  }
}
