// ─── Status Byte Tables ─────────────────────────────────────────────────────
//
// Fixed mapping from status and meta type bytes to message classes.
// Lengths include the status byte itself.
// ─────────────────────────────────────────────────────────────────────────────

import type { ChannelEvent, MetaType, SystemEvent } from "./types.js";

export const META_STATUS = 0xff;
export const SYSEX_START = 0xf0;
export const SYSEX_CONTINUE = 0xf7;

/** Channel message class by high nibble, 0x8–0xE. */
export const CHANNEL_STATUS: Record<number, { type: ChannelEvent["type"]; length: number }> = {
  0x8: { type: "noteOff", length: 3 },
  0x9: { type: "noteOn", length: 3 },
  0xa: { type: "polyAftertouch", length: 3 },
  0xb: { type: "controlChange", length: 3 },
  0xc: { type: "programChange", length: 2 },
  0xd: { type: "channelAftertouch", length: 2 },
  0xe: { type: "pitchBend", length: 3 },
};

/** System common and real-time bytes that may appear in a track. */
export const SYSTEM_STATUS: Partial<Record<number, { type: SystemEvent["type"]; length: number }>> = {
  0xf1: { type: "mtcQuarterFrame", length: 2 },
  0xf2: { type: "songPosition", length: 3 },
  0xf3: { type: "songSelect", length: 2 },
  0xf6: { type: "tuneRequest", length: 1 },
  0xf8: { type: "timingClock", length: 1 },
  0xfa: { type: "start", length: 1 },
  0xfb: { type: "continue", length: 1 },
  0xfc: { type: "stop", length: 1 },
  0xfe: { type: "activeSensing", length: 1 },
};

export const META_TYPES: Partial<Record<number, MetaType>> = {
  0x00: "sequenceNumber",
  0x01: "text",
  0x02: "copyright",
  0x03: "trackName",
  0x04: "instrumentName",
  0x05: "lyric",
  0x06: "marker",
  0x07: "cuePoint",
  0x20: "channelPrefix",
  0x2f: "endOfTrack",
  0x51: "setTempo",
  0x54: "smpteOffset",
  0x58: "timeSignature",
  0x59: "keySignature",
  0x7f: "sequencerSpecific",
};

export function isChannelStatus(status: number): boolean {
  return status >= 0x80 && status <= 0xef;
}

export function metaTypeOf(code: number): MetaType {
  return META_TYPES[code] ?? "unknown";
}
