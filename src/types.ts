// ─── midiseq: Shared Types ───────────────────────────────────────────────────
//
// The decoded musical model. All times are in quarter notes from the start
// of the file (tick / ticks-per-quarter), never raw ticks or seconds.
// ─────────────────────────────────────────────────────────────────────────────

import type { SmfFormat } from "./midi/types.js";

// ─── Notes & Controls ───────────────────────────────────────────────────────

/** A note closed by a matching note-off (or zero-velocity note-on). */
export interface Note {
  /** MIDI note number 0–127. 60 = middle C. */
  pitch: number;
  /** Start in quarter notes. */
  start: number;
  /** Length in quarter notes, never negative. */
  duration: number;
  /** Velocity of the opening note-on, 1–127. */
  velocity: number;
}

export interface ControlChange {
  time: number;
  /** 7-bit controller value. */
  value: number;
}

// ─── Global Timelines ───────────────────────────────────────────────────────

export interface Tempo {
  time: number;
  /** Quarter notes per minute. */
  qpm: number;
}

export interface TimeSignature {
  time: number;
  numerator: number;
  /** Power of two: 2, 4, 8, ... */
  denominator: number;
  /** MIDI clocks per metronome click. */
  clocksPerClick: number;
  /** Notated 32nd notes per MIDI quarter note (24 clocks). */
  thirtySecondsPerQuarter: number;
}

export type KeyMode = "major" | "minor";

export interface KeySignature {
  time: number;
  /** Positive = sharps, negative = flats, -7..7. */
  sharps: number;
  mode: KeyMode;
  /** Tonic spelled from the circle of fifths, e.g. "Eb", "F#". */
  name: string;
}

// ─── Tracks & Sequence ──────────────────────────────────────────────────────

/**
 * Notes and controls of one channel inside one MTrk chunk. A chunk that
 * interleaves several channels yields one Track per channel.
 */
export interface Track {
  /** Track-name meta text of the source chunk, "" when absent. */
  name: string;
  /** Index of the source MTrk chunk, 0-based. */
  trackIndex: number;
  /** MIDI channel 0–15. */
  channel: number;
  /** Program in effect on this channel when the track was first used. */
  program: number;
  /** Channel 10 (index 9) is the General MIDI percussion channel. */
  isDrum: boolean;
  notes: Note[];
  /** Control changes grouped by controller number. */
  controls: Record<number, ControlChange[]>;
}

export interface Sequence {
  format: SmfFormat;
  ticksPerQuarter: number;
  /** Ordered by source track index, then channel. */
  tracks: Track[];
  /** Sorted by time; always starts with an entry at time 0. */
  tempos: Tempo[];
  /** Sorted by time. */
  timeSignatures: TimeSignature[];
  /** Sorted by time. */
  keySignatures: KeySignature[];
}

// ─── Diagnostics ────────────────────────────────────────────────────────────

/** A recoverable problem found while decoding. Never aborts the decode. */
export interface DecodeWarning {
  /** Where it happened, e.g. "track 1 tick 480". */
  location: string;
  message: string;
}

/** Receives warnings as the builder finds them. */
export interface WarningSink {
  warn(warning: DecodeWarning): void;
}
