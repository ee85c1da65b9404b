// ─── SMF Message Types ──────────────────────────────────────────────────────
//
// Low-level output of the chunk reader and the per-track message decoder.
// Times here are absolute ticks; conversion to quarter notes happens in the
// sequence builder.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Container ──────────────────────────────────────────────────────────────

/** 0 = single track, 1 = simultaneous tracks, 2 = independent patterns. */
export type SmfFormat = 0 | 1 | 2;

export interface SmfHeader {
  format: SmfFormat;
  /** Number of MTrk chunks declared by the header. */
  trackCount: number;
  /** Raw 16-bit division word. */
  division: number;
}

/** One chunk as found in the file: 4-character type, declared length, payload. */
export interface RawChunk {
  type: string;
  length: number;
  data: Uint8Array;
}

export interface SmfFile {
  header: SmfHeader;
  /** MTrk chunks in file order; other chunk types are already skipped. */
  tracks: RawChunk[];
}

export type Division =
  | { kind: "ticks"; ticksPerQuarter: number }
  | { kind: "smpte"; framesPerSecond: number; ticksPerFrame: number };

// ─── Channel Events ─────────────────────────────────────────────────────────

interface EventBase {
  kind: "event";
  /** Absolute time in ticks from the start of the track. */
  time: number;
}

interface ChannelEventBase extends EventBase {
  /** MIDI channel 0–15. */
  channel: number;
}

export interface NoteOffEvent extends ChannelEventBase {
  type: "noteOff";
  note: number;
  velocity: number;
}

export interface NoteOnEvent extends ChannelEventBase {
  type: "noteOn";
  note: number;
  /** 0 acts as a note-off. */
  velocity: number;
}

export interface PolyAftertouchEvent extends ChannelEventBase {
  type: "polyAftertouch";
  note: number;
  pressure: number;
}

export interface ControlChangeEvent extends ChannelEventBase {
  type: "controlChange";
  controller: number;
  value: number;
}

export interface ProgramChangeEvent extends ChannelEventBase {
  type: "programChange";
  program: number;
}

export interface ChannelAftertouchEvent extends ChannelEventBase {
  type: "channelAftertouch";
  pressure: number;
}

export interface PitchBendEvent extends ChannelEventBase {
  type: "pitchBend";
  /** 14-bit value, 8192 = centre. */
  value: number;
}

export type ChannelEvent =
  | NoteOffEvent
  | NoteOnEvent
  | PolyAftertouchEvent
  | ControlChangeEvent
  | ProgramChangeEvent
  | ChannelAftertouchEvent
  | PitchBendEvent;

// ─── System Common / Real-Time Events ───────────────────────────────────────

export interface MtcQuarterFrameEvent extends EventBase {
  type: "mtcQuarterFrame";
  value: number;
}

export interface SongPositionEvent extends EventBase {
  type: "songPosition";
  /** 14-bit position in MIDI beats (sixteenth notes). */
  position: number;
}

export interface SongSelectEvent extends EventBase {
  type: "songSelect";
  song: number;
}

export interface RealTimeEvent extends EventBase {
  type:
    | "tuneRequest"
    | "timingClock"
    | "start"
    | "continue"
    | "stop"
    | "activeSensing";
}

export type SystemEvent =
  | MtcQuarterFrameEvent
  | SongPositionEvent
  | SongSelectEvent
  | RealTimeEvent;

export type MidiEvent = ChannelEvent | SystemEvent;

// ─── Meta / SysEx ───────────────────────────────────────────────────────────

export type MetaType =
  | "sequenceNumber"
  | "text"
  | "copyright"
  | "trackName"
  | "instrumentName"
  | "lyric"
  | "marker"
  | "cuePoint"
  | "channelPrefix"
  | "endOfTrack"
  | "setTempo"
  | "smpteOffset"
  | "timeSignature"
  | "keySignature"
  | "sequencerSpecific"
  | "unknown";

export interface MetaMessage {
  kind: "meta";
  time: number;
  type: MetaType;
  /** Raw meta type byte, kept for types this decoder does not name. */
  code: number;
  data: Uint8Array;
}

export interface SysExMessage {
  kind: "sysex";
  time: number;
  /** 0xF0 for a new message, 0xF7 for a continuation or escape packet. */
  status: 0xf0 | 0xf7;
  data: Uint8Array;
}

/** Everything the message decoder can produce. Switch on `kind`, then `type`. */
export type DecodedMessage = MidiEvent | MetaMessage | SysExMessage;
