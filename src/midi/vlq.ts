// ─── Variable-Length Quantities ──────────────────────────────────────────────
//
// MIDI packs delta-times and meta/sysex lengths as big-endian groups of
// 7 bits, with the top bit of every byte but the last set.
// ─────────────────────────────────────────────────────────────────────────────

import { DecodeError } from "../errors.js";

/** A quantity never spans more than this many bytes. */
export const MAX_VLQ_BYTES = 4;

export interface VariableLength {
  value: number;
  /** Bytes consumed, 1–4. */
  length: number;
}

/**
 * Decode the quantity starting at `offset`.
 *
 * Bytes at or past `end` read as zero, so a quantity cut off by the end of
 * the buffer terminates there instead of reading foreign bytes; the caller
 * catches the overrun when it advances past `end`.
 */
export function readVariableLength(
  data: Uint8Array,
  offset: number,
  end: number = data.length,
): VariableLength {
  let value = 0;

  for (let i = 0; i < MAX_VLQ_BYTES; i++) {
    const pos = offset + i;
    const byte = pos < end ? data[pos] : 0;
    value = value * 128 + (byte & 0x7f);
    if ((byte & 0x80) === 0) {
      return { value, length: i + 1 };
    }
  }

  throw new DecodeError(
    "malformed-stream",
    `Variable-length quantity longer than ${MAX_VLQ_BYTES} bytes`,
    offset,
  );
}
