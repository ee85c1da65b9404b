// ─── Columnar Notes ─────────────────────────────────────────────────────────
//
// Struct-of-arrays view of a track, for numeric consumers that want one
// array per field.
// ─────────────────────────────────────────────────────────────────────────────

import type { Track } from "../types.js";

export interface NoteColumns {
  pitch: number[];
  start: number[];
  duration: number[];
  velocity: number[];
}

export function toColumns(track: Pick<Track, "notes">): NoteColumns {
  const columns: NoteColumns = { pitch: [], start: [], duration: [], velocity: [] };
  for (const note of track.notes) {
    columns.pitch.push(note.pitch);
    columns.start.push(note.start);
    columns.duration.push(note.duration);
    columns.velocity.push(note.velocity);
  }
  return columns;
}
