import { z } from "zod";
import {
  createFileEntry,
  type DirectorySummary,
  type SummaryEntry,
} from "@dir-summary/core-domain";
import { SummaryFormatError } from "../application/errors";

// Keys start with "/" so they can never clash with a file name. Short keys
// keep summary files small.
export const ORIGINAL_SIZE_KEY = "/S";
export const TRIMMED_SIZE_KEY = "/T";
export const COLLECTED_SIZE_KEY = "/C";
export const DIRS_KEY = "/D";

export type RawSummaryEntry = {
  "/S": number;
  "/T"?: number;
  "/C"?: number;
  "/D"?: RawDirectorySummary;
};

export type RawDirectorySummary = { [name: string]: RawSummaryEntry };

const sizeSchema = z.number().int().nonnegative();

// Validates one entry's own fields. Child levels are walked by hand so that
// every name read from the file survives, "__proto__" included.
const rawEntrySchema = z.object({
  "/S": sizeSchema,
  "/T": sizeSchema.optional(),
  "/C": sizeSchema.optional(),
  "/D": z.record(z.unknown()).optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function encodeEntry(entry: SummaryEntry): RawSummaryEntry {
  const raw: RawSummaryEntry = { [ORIGINAL_SIZE_KEY]: entry.originalSizeBytes };
  if (entry.trimmedSizeBytes !== undefined) raw[TRIMMED_SIZE_KEY] = entry.trimmedSizeBytes;
  if (entry.collectedSizeBytes !== undefined) raw[COLLECTED_SIZE_KEY] = entry.collectedSizeBytes;
  if (entry.kind === "directory") raw[DIRS_KEY] = encodeSummary(entry.children);
  return raw;
}

export function encodeSummary(summary: DirectorySummary): RawDirectorySummary {
  // fromEntries defines own properties, so a "__proto__" name is kept as a key
  return Object.fromEntries(
    [...summary].map(([name, entry]) => [name, encodeEntry(entry)] as const)
  );
}

function formatError(at: (string | number)[], message: string, cause?: unknown): SummaryFormatError {
  const where = at.length > 0 ? ` at ${at.join(" > ")}` : "";
  return new SummaryFormatError(`Invalid directory summary${where}: ${message}`, undefined, cause);
}

function decodeEntry(value: unknown, at: string[]): SummaryEntry {
  if (!isRecord(value)) throw formatError(at, "Expected object");

  const parsed = rawEntrySchema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw formatError([...at, ...(first?.path ?? [])], first?.message ?? "unknown error", parsed.error);
  }

  const raw = parsed.data;
  const sizes = {
    originalSizeBytes: raw[ORIGINAL_SIZE_KEY],
    ...(raw[TRIMMED_SIZE_KEY] !== undefined ? { trimmedSizeBytes: raw[TRIMMED_SIZE_KEY] } : {}),
    ...(raw[COLLECTED_SIZE_KEY] !== undefined ? { collectedSizeBytes: raw[COLLECTED_SIZE_KEY] } : {}),
  };

  const dirs = value[DIRS_KEY];
  if (dirs === undefined) return createFileEntry(sizes);
  return { kind: "directory", ...sizes, children: decodeLevel(dirs, [...at, DIRS_KEY]) };
}

function decodeLevel(value: unknown, at: string[]): DirectorySummary {
  if (!isRecord(value)) throw formatError(at, "Expected object");

  const summary: DirectorySummary = new Map();
  // same name order as a directory scan; object key order puts integer-like names first
  for (const name of Object.keys(value).sort()) {
    summary.set(name, decodeEntry(value[name], [...at, name]));
  }
  return summary;
}

/** Validate an already-parsed JSON value and turn it into a summary tree. */
export function decodeSummary(value: unknown): DirectorySummary {
  return decodeLevel(value, []);
}

export function serializeSummary(summary: DirectorySummary): string {
  return JSON.stringify(encodeSummary(summary));
}

export function parseSummary(text: string): DirectorySummary {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new SummaryFormatError("Directory summary is not valid JSON", undefined, err);
  }
  return decodeSummary(value);
}
