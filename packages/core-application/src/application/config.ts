import { z } from "zod";
import { InvalidInputError } from "./errors";

export const DEFAULT_MIN_FREE_DISK_BYTES = 10 * 1024 * 1024;
export const DEFAULT_WATCH_DEBOUNCE_MS = 2000;

// Number("") is 0, so a variable set to nothing falls back to its default.
const blankAsUnset = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  DIR_SUMMARY_MIN_FREE_DISK_BYTES: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().nonnegative().default(DEFAULT_MIN_FREE_DISK_BYTES)
  ),
  DIR_SUMMARY_WATCH_DEBOUNCE_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(DEFAULT_WATCH_DEBOUNCE_MS)
  ),
});

export type SummaryConfig = {
  logLevel: z.output<typeof EnvSchema>["LOG_LEVEL"];
  logFormat: "pretty" | "json";
  minFreeDiskBytes: number;
  watchDebounceMs: number;
};

export function loadSummaryConfig(env: NodeJS.ProcessEnv = process.env): SummaryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InvalidInputError(`Invalid configuration: ${detail}`, parsed.error);
  }

  const v = parsed.data;
  return {
    logLevel: v.LOG_LEVEL,
    logFormat: v.LOG_FORMAT,
    minFreeDiskBytes: v.DIR_SUMMARY_MIN_FREE_DISK_BYTES,
    watchDebounceMs: v.DIR_SUMMARY_WATCH_DEBOUNCE_MS,
  };
}
