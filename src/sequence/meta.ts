// ─── Meta Payloads ──────────────────────────────────────────────────────────
//
// Decoders for the meta events the sequence builder keeps. Payloads found in
// the wild are often short or garbled, so each decoder falls back to a
// documented default and reports a problem string instead of throwing.
// ─────────────────────────────────────────────────────────────────────────────

import type { KeyMode } from "../types.js";
import { keyName } from "./keys.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** 120 quarter notes per minute. */
export const DEFAULT_TEMPO = 500_000;
export const DEFAULT_QPM = 120;
export const DEFAULT_CLOCKS_PER_CLICK = 24;
export const DEFAULT_THIRTY_SECONDS_PER_QUARTER = 8;

const MICROSECONDS_PER_MINUTE = 60_000_000;
/** 2^7: 128th notes. Larger exponents are treated as garbage. */
const MAX_DENOMINATOR_POWER = 7;

// ─── Types ───────────────────────────────────────────────────────────────────

/** A decoded value plus the reason a default was used, if one was. */
export interface MetaValue<T> {
  value: T;
  problem?: string;
}

export interface TimeSignatureValue {
  numerator: number;
  denominator: number;
  clocksPerClick: number;
  thirtySecondsPerQuarter: number;
}

export interface KeySignatureValue {
  sharps: number;
  mode: KeyMode;
  name: string;
}

// ─── Public API ──────────────────────────────────────────────────────────────

export function tempoToQpm(microsecondsPerQuarter: number): number {
  return MICROSECONDS_PER_MINUTE / microsecondsPerQuarter;
}

/** 24-bit big-endian microseconds per quarter note. */
export function decodeTempo(data: Uint8Array): MetaValue<number> {
  if (data.length < 3) {
    return { value: DEFAULT_TEMPO, problem: `set tempo payload has ${data.length} byte(s), expected 3` };
  }
  const tempo = (data[0] << 16) | (data[1] << 8) | data[2];
  if (tempo === 0) {
    return { value: DEFAULT_TEMPO, problem: "set tempo of 0 microseconds per quarter" };
  }
  return { value: tempo };
}

/**
 * nn dd cc bb: numerator, denominator as a power of two, clocks per click,
 * 32nd notes per quarter. The last two are optional.
 */
export function decodeTimeSignature(data: Uint8Array): MetaValue<TimeSignatureValue> {
  const fallback: TimeSignatureValue = {
    numerator: 4,
    denominator: 4,
    clocksPerClick: DEFAULT_CLOCKS_PER_CLICK,
    thirtySecondsPerQuarter: DEFAULT_THIRTY_SECONDS_PER_QUARTER,
  };

  if (data.length < 2) {
    return { value: fallback, problem: `time signature payload has ${data.length} byte(s), expected 4` };
  }
  if (data[0] === 0) {
    return { value: fallback, problem: "time signature numerator is 0" };
  }
  if (data[1] > MAX_DENOMINATOR_POWER) {
    return { value: fallback, problem: `time signature denominator 2^${data[1]} is out of range` };
  }

  return {
    value: {
      numerator: data[0],
      denominator: 2 ** data[1],
      clocksPerClick: data.length > 2 ? data[2] : DEFAULT_CLOCKS_PER_CLICK,
      thirtySecondsPerQuarter: data.length > 3 ? data[3] : DEFAULT_THIRTY_SECONDS_PER_QUARTER,
    },
  };
}

/** sf (signed byte) + mi. */
export function decodeKeySignature(data: Uint8Array): MetaValue<KeySignatureValue> {
  const fallback: KeySignatureValue = { sharps: 0, mode: "major", name: "C" };

  if (data.length < 2) {
    return { value: fallback, problem: `key signature payload has ${data.length} byte(s), expected 2` };
  }

  const sharps = data[0] > 127 ? data[0] - 256 : data[0];
  const mode: KeyMode = data[1] === 0 ? "major" : "minor";
  if (data[1] > 1) {
    return { value: fallback, problem: `key signature mode ${data[1]} is neither major nor minor` };
  }

  const name = keyName(sharps, mode);
  if (name === null) {
    return { value: fallback, problem: `key signature with ${sharps} sharps is out of range` };
  }
  return { value: { sharps, mode, name } };
}

/** UTF-8 text; invalid byte sequences give "". */
export function decodeText(data: Uint8Array): MetaValue<string> {
  try {
    return { value: new TextDecoder("utf-8", { fatal: true }).decode(data) };
  } catch (err) {
    return { value: "", problem: err instanceof Error ? err.message : String(err) };
  }
}
