export * from "./entities/summary-entry";
export * from "./entities/summary-file";
export * from "./value-objects/result-size-info";
