// ─── Timing Utilities ───────────────────────────────────────────────────────
//
// Quarter-note time helpers over a decoded Sequence.
// ─────────────────────────────────────────────────────────────────────────────

import type { Note, Sequence, Tempo } from "../types.js";
import { DEFAULT_QPM } from "./meta.js";

/** Where a note stops sounding, in quarter notes. */
export function noteEnd(note: Note): number {
  return note.start + note.duration;
}

/** Latest note end over all tracks, 0 for a sequence without notes. */
export function sequenceEnd(sequence: Sequence): number {
  let end = 0;
  for (const track of sequence.tracks) {
    for (const note of track.notes) {
      end = Math.max(end, noteEnd(note));
    }
  }
  return end;
}

/**
 * Convert a quarter-note position to seconds, respecting tempo changes.
 *
 * @param tempos Sorted tempo map, as found on a Sequence.
 */
export function quarterToSeconds(time: number, tempos: readonly Tempo[]): number {
  let seconds = 0;
  let current = 0;
  let qpm = tempos.length > 0 && tempos[0].time <= 0 ? tempos[0].qpm : DEFAULT_QPM;

  for (const tempo of tempos) {
    if (tempo.time >= time) break;

    if (tempo.time > current) {
      seconds += ((tempo.time - current) * 60) / qpm;
      current = tempo.time;
    }
    qpm = tempo.qpm;
  }

  if (current < time) {
    seconds += ((time - current) * 60) / qpm;
  }

  return seconds;
}

/** Wall-clock length of the sequence up to its last note end. */
export function sequenceDurationSeconds(sequence: Sequence): number {
  return quarterToSeconds(sequenceEnd(sequence), sequence.tempos);
}
