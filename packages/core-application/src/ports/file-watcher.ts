export type TreeChangeType = "added" | "changed" | "removed";

export type TreeChangeEvent = {
  type: TreeChangeType;
  path: string;
  isDirectory: boolean;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  ignore: (path: string) => boolean;
  // how long a file's size must hold still before it is reported
  stabilityThresholdMs?: number;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: TreeChangeEvent) => void): void;
}
