// ─── Key Signatures ─────────────────────────────────────────────────────────
//
// SMF key signature meta: sf (signed, -7 = 7 flats .. 7 = 7 sharps) and
// mi (0 = major, 1 = minor). Tonics follow the circle of fifths.
// ─────────────────────────────────────────────────────────────────────────────

import type { KeyMode } from "../types.js";

/** Index = sharps + 7. */
const MAJOR_KEYS = [
  "Cb", "Gb", "Db", "Ab", "Eb", "Bb", "F",
  "C",
  "G", "D", "A", "E", "B", "F#", "C#",
] as const;

/** Relative minors, same indexing. */
const MINOR_KEYS = [
  "Ab", "Eb", "Bb", "F", "C", "G", "D",
  "A",
  "E", "B", "F#", "C#", "G#", "D#", "A#",
] as const;

export const MAX_ACCIDENTALS = 7;

/**
 * Tonic name for a sharps/flats count, or null when the count is outside
 * -7..7.
 */
export function keyName(sharps: number, mode: KeyMode): string | null {
  if (!Number.isInteger(sharps) || Math.abs(sharps) > MAX_ACCIDENTALS) return null;
  const table = mode === "major" ? MAJOR_KEYS : MINOR_KEYS;
  return table[sharps + MAX_ACCIDENTALS];
}

/** "Eb major", "F# minor". */
export function formatKey(sharps: number, mode: KeyMode): string | null {
  const name = keyName(sharps, mode);
  return name === null ? null : `${name} ${mode}`;
}
