// Public API of the core-application package: ports, services and the Node
// adapters that back them.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type * from "./ports/summary-store";
export type * from "./ports/directory-scanner";
export type * from "./ports/file-watcher";

// Errors and configuration
export * from "./application/errors";
export * from "./application/config";

// Services
export * from "./services/summary-codec";
export * from "./services/summary-merge";
export * from "./services/summary-aggregator";
export * from "./services/summary-recorder";
export * from "./services/summary-watcher";

// Node adapters
export * from "./adapters/node-directory-scanner";
export * from "./adapters/node-summary-store";
export * from "./adapters/console-logger";
export * from "./adapters/chokidar-file-watcher";
