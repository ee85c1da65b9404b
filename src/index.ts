// ─── midiseq ────────────────────────────────────────────────────────────────
//
// Standard MIDI File decoder. Turns an SMF byte buffer into per-channel note
// tracks plus tempo, time-signature and key-signature timelines, timed in
// quarter notes.
//
// Usage:
//   import { readFileSync } from "node:fs";
//   import { decode } from "midiseq";
//   const sequence = decode(readFileSync("song.mid"));
// ─────────────────────────────────────────────────────────────────────────────

// Export entry points
export { decode, safeDecode, decodeTracks } from "./decode.js";
export type { DecodeResult, DecodedTracks } from "./decode.js";

// Export errors
export { DecodeError, isDecodeError } from "./errors.js";
export type { DecodeErrorCode } from "./errors.js";

// Export options
export {
  DecodeOptionsSchema,
  EMPTY_TRACK_POLICIES,
  resolveOptions,
  validateOptions,
} from "./config/schema.js";
export type {
  DecodeOptions,
  ResolvedDecodeOptions,
  EmptyTrackPolicy,
  ConfigError,
} from "./config/schema.js";
export { loadDecodeOptions } from "./config/loader.js";

// Export warning sinks
export {
  createConsoleWarningSink,
  createSilentWarningSink,
  createRecordingWarningSink,
} from "./warnings.js";

// Export low-level SMF decoding
export { readVariableLength, MAX_VLQ_BYTES } from "./midi/vlq.js";
export type { VariableLength } from "./midi/vlq.js";
export { readChunks, readHeader, parseDivision, HEADER_CHUNK, TRACK_CHUNK } from "./midi/chunks.js";
export { MessageDecoder, decodeTrack } from "./midi/decoder.js";
export type { MessageDecoderOptions } from "./midi/decoder.js";
export type {
  SmfFormat,
  SmfHeader,
  SmfFile,
  RawChunk,
  Division,
  DecodedMessage,
  MidiEvent,
  ChannelEvent,
  SystemEvent,
  NoteOffEvent,
  NoteOnEvent,
  PolyAftertouchEvent,
  ControlChangeEvent,
  ProgramChangeEvent,
  ChannelAftertouchEvent,
  PitchBendEvent,
  MtcQuarterFrameEvent,
  SongPositionEvent,
  SongSelectEvent,
  RealTimeEvent,
  MetaMessage,
  MetaType,
  SysExMessage,
} from "./midi/types.js";

// Export sequence building
export { SequenceBuilder, buildSequence, DRUM_CHANNEL } from "./sequence/builder.js";
export {
  DEFAULT_TEMPO,
  DEFAULT_QPM,
  tempoToQpm,
  decodeTempo,
  decodeTimeSignature,
  decodeKeySignature,
  decodeText,
} from "./sequence/meta.js";
export type { MetaValue, TimeSignatureValue, KeySignatureValue } from "./sequence/meta.js";
export { keyName, formatKey } from "./sequence/keys.js";

// Export sequence accessors
export { noteEnd, sequenceEnd, quarterToSeconds, sequenceDurationSeconds } from "./sequence/timing.js";
export {
  COMMON_TIME,
  quartersPerMeasure,
  signatureAt,
  positionInMeasure,
  sliceIntoMeasures,
} from "./sequence/measures.js";
export type { MeasureBucket } from "./sequence/measures.js";
export { toColumns } from "./sequence/columns.js";
export type { NoteColumns } from "./sequence/columns.js";

// Export piano roll
export {
  trackToPianoRoll,
  sequenceToPianoRoll,
  isActive,
  isOnset,
  DEFAULT_QUANTIZE,
  PITCH_ROWS,
} from "./piano-roll.js";
export type { PianoRoll, PianoRollOptions } from "./piano-roll.js";

// Export types
export type {
  Note,
  ControlChange,
  Tempo,
  TimeSignature,
  KeyMode,
  KeySignature,
  Track,
  Sequence,
  DecodeWarning,
  WarningSink,
} from "./types.js";
