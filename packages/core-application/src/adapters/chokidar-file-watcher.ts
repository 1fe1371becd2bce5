import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "node:path";
import type {
  FileWatcher,
  FileWatcherOptions,
  TreeChangeEvent,
  TreeChangeType,
} from "../ports/file-watcher";

const DEFAULT_STABILITY_THRESHOLD_MS = 250;

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: TreeChangeEvent) => void) | null = null;

  onEvent(handler: (event: TreeChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);

    this.watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      // symlinks are summarized as links, not walked by the watcher
      followSymlinks: false,
      awaitWriteFinish: {
        stabilityThreshold: options.stabilityThresholdMs ?? DEFAULT_STABILITY_THRESHOLD_MS,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });

    const emit = (type: TreeChangeType, isDirectory: boolean) => (changedPath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(changedPath),
        isDirectory,
        occurredAt: new Date(),
      });
    };

    this.watcher
      .on("add", emit("added", false))
      .on("addDir", emit("added", true))
      .on("change", emit("changed", false))
      .on("unlink", emit("removed", false))
      .on("unlinkDir", emit("removed", true));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
