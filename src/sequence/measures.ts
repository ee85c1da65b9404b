// ─── Measure Slicing ─────────────────────────────────────────────────────────
//
// Places notes into measures using the time-signature timeline. A signature
// change starts a new measure at its own time, even mid-measure.
// ─────────────────────────────────────────────────────────────────────────────

import type { Note, TimeSignature } from "../types.js";
import { DEFAULT_CLOCKS_PER_CLICK, DEFAULT_THIRTY_SECONDS_PER_QUARTER } from "./meta.js";
import { noteEnd } from "./timing.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** A bucket of notes belonging to a single measure. */
export interface MeasureBucket {
  /** 1-based measure number. */
  number: number;
  /** Quarter-note time where this measure starts. */
  start: number;
  /** Quarter-note time where the next measure starts. */
  end: number;
  signature: TimeSignature;
  /** Notes whose start falls within this measure. */
  notes: Note[];
}

/** 4/4 from time 0, in effect when a file has no time signature. */
export const COMMON_TIME: Readonly<TimeSignature> = Object.freeze({
  time: 0,
  numerator: 4,
  denominator: 4,
  clocksPerClick: DEFAULT_CLOCKS_PER_CLICK,
  thirtySecondsPerQuarter: DEFAULT_THIRTY_SECONDS_PER_QUARTER,
});

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Measure length in quarter notes: 4/4 → 4, 3/8 → 1.5, 6/8 → 3.
 */
export function quartersPerMeasure(signature: Pick<TimeSignature, "numerator" | "denominator">): number {
  return signature.numerator * (4 / signature.denominator);
}

/**
 * The signature in effect at `time`: the last one at or before it, or a
 * fresh copy of COMMON_TIME when there is none.
 */
export function signatureAt(time: number, signatures: readonly TimeSignature[]): TimeSignature {
  let current: TimeSignature | undefined;
  for (const signature of signatures) {
    if (signature.time > time) break;
    current = signature;
  }
  return current ?? { ...COMMON_TIME };
}

/**
 * Offset of `start` inside the current signature's bar grid, counted in
 * numerator units: `(start - signature.time) mod numerator`.
 */
export function positionInMeasure(start: number, signatures: readonly TimeSignature[]): number {
  const signature = signatureAt(start, signatures);
  return (start - signature.time) % signature.numerator;
}

/**
 * Slice notes into measure buckets covering everything up to the last note
 * end. Always returns at least one measure.
 */
export function sliceIntoMeasures(
  notes: readonly Note[],
  signatures: readonly TimeSignature[],
): MeasureBucket[] {
  let horizon = 0;
  let lastStart = -1;
  for (const note of notes) {
    horizon = Math.max(horizon, noteEnd(note));
    lastStart = Math.max(lastStart, note.start);
  }

  const buckets: MeasureBucket[] = [];
  let start = 0;

  while (buckets.length === 0 || start < horizon || start <= lastStart) {
    const signature = signatureAt(start, signatures);
    const change = signatures.find((s) => s.time > start);
    const end = Math.min(start + quartersPerMeasure(signature), change?.time ?? Infinity);

    buckets.push({
      number: buckets.length + 1,
      start,
      end,
      signature,
      notes: notes.filter((n) => n.start >= start && n.start < end),
    });
    start = end;
  }

  return buckets;
}
