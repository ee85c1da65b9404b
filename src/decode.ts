// ─── Decode Entry Point ─────────────────────────────────────────────────────
//
// buffer → chunks → one MessageDecoder per MTrk → SequenceBuilder → Sequence
//
// Reading the buffer from disk or the network is the caller's job.
// ─────────────────────────────────────────────────────────────────────────────

import { DecodeError } from "./errors.js";
import { readChunks } from "./midi/chunks.js";
import { MessageDecoder, decodeTrack } from "./midi/decoder.js";
import type { DecodedMessage, SmfHeader } from "./midi/types.js";
import { SequenceBuilder } from "./sequence/builder.js";
import type { DecodeOptions } from "./config/schema.js";
import type { Sequence } from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type DecodeResult =
  | { success: true; sequence: Sequence }
  | { success: false; error: DecodeError };

/** Flat, per-track message lists without any musical interpretation. */
export interface DecodedTracks {
  header: SmfHeader;
  tracks: DecodedMessage[][];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Decode a Standard MIDI File.
 *
 * @throws DecodeError on a malformed container, SMPTE timing, or a corrupt
 *   track. Nothing partial is returned.
 */
export function decode(buffer: Uint8Array | ArrayBuffer, options: DecodeOptions = {}): Sequence {
  const { header, tracks } = readChunks(toBytes(buffer));
  const builder = new SequenceBuilder(header.division, options);

  tracks.forEach((chunk, index) => {
    builder.addTrack(index, new MessageDecoder(chunk.data, { signal: options.signal }));
  });

  return builder.build(header.format);
}

/**
 * Like decode(), but returns decode failures instead of throwing them.
 * Other errors (an aborted signal, invalid options) still throw.
 */
export function safeDecode(
  buffer: Uint8Array | ArrayBuffer,
  options: DecodeOptions = {},
): DecodeResult {
  try {
    return { success: true, sequence: decode(buffer, options) };
  } catch (err) {
    if (err instanceof DecodeError) return { success: false, error: err };
    throw err;
  }
}

/**
 * Decode every track to its message list. Works for any division, including
 * SMPTE, and for format 2 files whose tracks are independent patterns.
 */
export function decodeTracks(
  buffer: Uint8Array | ArrayBuffer,
  options: Pick<DecodeOptions, "signal"> = {},
): DecodedTracks {
  const { header, tracks } = readChunks(toBytes(buffer));
  return {
    header,
    tracks: tracks.map((chunk) => decodeTrack(chunk.data, { signal: options.signal })),
  };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function toBytes(buffer: Uint8Array | ArrayBuffer): Uint8Array {
  return buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
}
