// ─── Decode Options Schema ───────────────────────────────────────────────────
//
// Serializable knobs for the sequence builder. Runtime-only hooks (warning
// sink, abort signal) sit beside these in DecodeOptions and are not
// validated here.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { WarningSink } from "../types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const EMPTY_TRACK_POLICIES = ["drop", "keep"] as const;

export const DecodeOptionsSchema = z.object({
  /** Tracks with control changes but no notes: "drop" (default) or "keep". */
  emptyTracks: z.enum(EMPTY_TRACK_POLICIES).default("drop"),
  /** Sort each track's notes by start, then pitch. Default: close order. */
  sortNotes: z.boolean().default(false),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type EmptyTrackPolicy = (typeof EMPTY_TRACK_POLICIES)[number];

/** Options after defaults have been applied. */
export type ResolvedDecodeOptions = z.infer<typeof DecodeOptionsSchema>;

/** What callers pass to decode(). Every field is optional. */
export type DecodeOptions = z.input<typeof DecodeOptionsSchema> & {
  /** Receives recoverable problems. Default: silent. */
  warnings?: WarningSink;
  /** Aborts decoding between messages. */
  signal?: AbortSignal;
};

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate an options object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateOptions(options: unknown): ConfigError[] {
  const result = DecodeOptionsSchema.safeParse(options);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Apply defaults to the serializable part of the options.
 * Throws a ZodError on invalid values.
 */
export function resolveOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  return DecodeOptionsSchema.parse({
    emptyTracks: options.emptyTracks,
    sortNotes: options.sortNotes,
  });
}
