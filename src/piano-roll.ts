// ─── Piano Roll ──────────────────────────────────────────────────────────────
//
// Quantizes tracks onto a pitch × step grid for numeric consumers.
//
//   step     = floor(quarters * quantize + 0.5)
//   active   = 1 on every step a note sounds, [startStep, endStep)
//   onsets   = 1 on the first step of each note
//
// Both planes are row-major: index = pitch * length + step.
// ─────────────────────────────────────────────────────────────────────────────

import type { Note, Sequence, Track } from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface PianoRollOptions {
  /** Steps per quarter note. Default: 24 */
  quantize?: number;
  /** Number of steps. Default: end of the last note */
  length?: number;
}

export interface PianoRoll {
  /** Steps per quarter note. */
  quantize: number;
  /** Number of steps per pitch row. */
  length: number;
  active: Uint8Array;
  onsets: Uint8Array;
}

export const PITCH_ROWS = 128;
export const DEFAULT_QUANTIZE = 24;

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Render one track. Notes reaching past `length` are cut off there.
 */
export function trackToPianoRoll(track: Pick<Track, "notes">, options: PianoRollOptions = {}): PianoRoll {
  const quantize = checkQuantize(options.quantize ?? DEFAULT_QUANTIZE);
  const length = options.length ?? contentLength(track.notes, quantize);

  const roll: PianoRoll = {
    quantize,
    length,
    active: new Uint8Array(PITCH_ROWS * length),
    onsets: new Uint8Array(PITCH_ROWS * length),
  };

  for (const note of track.notes) {
    const { startStep, endStep } = quantizeNote(note, quantize);
    const row = note.pitch * length;
    if (startStep < length) roll.onsets[row + startStep] = 1;
    roll.active.fill(1, row + Math.min(startStep, length), row + Math.min(endStep, length));
  }

  return roll;
}

/**
 * Render every track onto rolls of the same length.
 * Throws if an explicit `length` would cut notes off.
 */
export function sequenceToPianoRoll(sequence: Sequence, options: PianoRollOptions = {}): PianoRoll[] {
  const quantize = checkQuantize(options.quantize ?? DEFAULT_QUANTIZE);
  const needed = Math.max(0, ...sequence.tracks.map((t) => contentLength(t.notes, quantize)));
  const length = options.length ?? needed;

  if (length < needed) {
    throw new Error(`Piano roll length ${length} is shorter than the sequence (${needed} steps)`);
  }

  return sequence.tracks.map((track) => trackToPianoRoll(track, { quantize, length }));
}

export function isActive(roll: PianoRoll, pitch: number, step: number): boolean {
  return inRange(roll, pitch, step) && roll.active[pitch * roll.length + step] === 1;
}

export function isOnset(roll: PianoRoll, pitch: number, step: number): boolean {
  return inRange(roll, pitch, step) && roll.onsets[pitch * roll.length + step] === 1;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function quantizeNote(note: Note, quantize: number): { startStep: number; endStep: number } {
  const startStep = Math.floor(note.start * quantize + 0.5);
  const endStep = startStep + Math.floor(note.duration * quantize + 0.5);
  return { startStep, endStep };
}

function contentLength(notes: readonly Note[], quantize: number): number {
  let length = 0;
  for (const note of notes) {
    length = Math.max(length, quantizeNote(note, quantize).endStep);
  }
  return length;
}

function checkQuantize(quantize: number): number {
  if (!Number.isInteger(quantize) || quantize <= 0) {
    throw new Error(`Invalid quantize: ${quantize} (expected a positive integer)`);
  }
  return quantize;
}

function inRange(roll: PianoRoll, pitch: number, step: number): boolean {
  return pitch >= 0 && pitch < PITCH_ROWS && step >= 0 && step < roll.length;
}
