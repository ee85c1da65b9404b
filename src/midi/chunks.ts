// ─── Chunk Reader ───────────────────────────────────────────────────────────
//
// Splits an SMF buffer into its MThd header and MTrk payloads. Chunks of any
// other type (vendor data, XMF wrappers, ...) are skipped by their length.
// ─────────────────────────────────────────────────────────────────────────────

import { DecodeError } from "../errors.js";
import type { Division, RawChunk, SmfFile, SmfFormat, SmfHeader } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const HEADER_CHUNK = "MThd";
export const TRACK_CHUNK = "MTrk";

/** Type tag + u32 length. */
const CHUNK_PREFIX_BYTES = 8;
const HEADER_BODY_BYTES = 6;

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Read the header and exactly `trackCount` track chunks.
 * Chunks after the last expected track are never looked at.
 */
export function readChunks(buffer: Uint8Array): SmfFile {
  const header = readHeader(buffer);
  const headerLength = readUint32(buffer, 4);

  const tracks: RawChunk[] = [];
  let offset = CHUNK_PREFIX_BYTES + headerLength;

  while (tracks.length < header.trackCount) {
    if (offset + CHUNK_PREFIX_BYTES > buffer.length) {
      throw new DecodeError(
        "malformed-container",
        `Expected ${header.trackCount} track chunk(s), found ${tracks.length}`,
        offset,
      );
    }

    const type = readTag(buffer, offset);
    const length = readUint32(buffer, offset + 4);
    const start = offset + CHUNK_PREFIX_BYTES;
    const end = start + length;

    if (end > buffer.length) {
      throw new DecodeError(
        "malformed-container",
        `Chunk "${type}" declares ${length} bytes but only ${buffer.length - start} remain`,
        offset,
      );
    }

    if (type === TRACK_CHUNK) {
      tracks.push({ type, length, data: buffer.subarray(start, end) });
    }
    offset = end;
  }

  return { header, tracks };
}

/** Validate the MThd chunk and read its fixed body. */
export function readHeader(buffer: Uint8Array): SmfHeader {
  if (buffer.length < 4 || readTag(buffer, 0) !== HEADER_CHUNK) {
    throw new DecodeError("malformed-container", `Not a MIDI file: ${HEADER_CHUNK} expected`, 0);
  }
  if (buffer.length < CHUNK_PREFIX_BYTES + HEADER_BODY_BYTES) {
    throw new DecodeError("malformed-container", "Truncated header chunk", 0);
  }

  const headerLength = readUint32(buffer, 4);
  if (headerLength < HEADER_BODY_BYTES) {
    throw new DecodeError(
      "malformed-container",
      `Header chunk too short: ${headerLength} bytes`,
      4,
    );
  }
  if (CHUNK_PREFIX_BYTES + headerLength > buffer.length) {
    throw new DecodeError(
      "malformed-container",
      `Header chunk declares ${headerLength} bytes but only ${buffer.length - CHUNK_PREFIX_BYTES} remain`,
      4,
    );
  }

  return {
    format: readFormat(buffer),
    trackCount: readUint16(buffer, 10),
    division: readUint16(buffer, 12),
  };
}

/**
 * Split the division word. Bit 15 clear: ticks per quarter note.
 * Bit 15 set: negative SMPTE frame rate in the high byte, ticks per frame in
 * the low byte.
 */
export function parseDivision(division: number): Division {
  if ((division & 0x8000) === 0) {
    return { kind: "ticks", ticksPerQuarter: division };
  }
  return {
    kind: "smpte",
    framesPerSecond: 256 - ((division >> 8) & 0xff),
    ticksPerFrame: division & 0xff,
  };
}

// ─── Internal: Header Fields ─────────────────────────────────────────────────

function readFormat(buffer: Uint8Array): SmfFormat {
  const format = readUint16(buffer, 8);
  if (format === 0 || format === 1 || format === 2) return format;
  throw new DecodeError("malformed-container", `Unsupported MIDI format: ${format}`, 8);
}

// ─── Internal: Byte Access ───────────────────────────────────────────────────

function readTag(buffer: Uint8Array, offset: number): string {
  return String.fromCharCode(
    buffer[offset],
    buffer[offset + 1],
    buffer[offset + 2],
    buffer[offset + 3],
  );
}

function readUint16(buffer: Uint8Array, offset: number): number {
  return (buffer[offset] << 8) | buffer[offset + 1];
}

function readUint32(buffer: Uint8Array, offset: number): number {
  // Multiply instead of shifting so lengths with the top bit set stay positive.
  return (
    buffer[offset] * 0x1000000 +
    ((buffer[offset + 1] << 16) | (buffer[offset + 2] << 8) | buffer[offset + 3])
  );
}
