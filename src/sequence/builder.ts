// ─── Sequence Builder ───────────────────────────────────────────────────────
//
// Turns per-track message streams into a Sequence:
//
//   program change   → current program for the channel
//   control change   → ControlChange on the (track, channel) entry
//   note on / off    → Note, matched per channel and pitch
//   set tempo        → Tempo            ┐
//   time signature   → TimeSignature    ├ global, whatever track carries them
//   key signature    → KeySignature     ┘
//   track name       → name of every channel track split from that chunk
//
// Note matching state lives inside addTrack(), so tracks never share it.
// ─────────────────────────────────────────────────────────────────────────────

import { DecodeError } from "../errors.js";
import { parseDivision } from "../midi/chunks.js";
import type { DecodedMessage, MetaMessage, SmfFormat } from "../midi/types.js";
import { resolveOptions, type DecodeOptions, type ResolvedDecodeOptions } from "../config/schema.js";
import { createSilentWarningSink } from "../warnings.js";
import type {
  KeySignature,
  Note,
  Sequence,
  Tempo,
  TimeSignature,
  Track,
  WarningSink,
} from "../types.js";
import {
  DEFAULT_QPM,
  decodeKeySignature,
  decodeTempo,
  decodeText,
  decodeTimeSignature,
  tempoToQpm,
} from "./meta.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const CHANNELS = 16;
const PITCHES = 128;
export const DRUM_CHANNEL = 9;

// ─── Types ───────────────────────────────────────────────────────────────────

/** A note-on waiting for its note-off. Velocity 0 marks an empty slot. */
interface OpenNote {
  tick: number;
  velocity: number;
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export class SequenceBuilder {
  readonly ticksPerQuarter: number;

  private readonly options: ResolvedDecodeOptions;
  private readonly warnings: WarningSink;

  /** Keyed by trackIndex * 16 + channel. */
  private readonly tracks = new Map<number, Track>();
  private readonly trackNames = new Map<number, string>();
  private readonly tempos: Tempo[] = [];
  private readonly timeSignatures: TimeSignature[] = [];
  private readonly keySignatures: KeySignature[] = [];

  constructor(division: number, options: DecodeOptions = {}) {
    const parsed = parseDivision(division);
    if (parsed.kind === "smpte") {
      throw new DecodeError(
        "unsupported-timing",
        `SMPTE timing (${parsed.framesPerSecond} fps, ${parsed.ticksPerFrame} ticks per frame) is not supported`,
      );
    }
    if (parsed.ticksPerQuarter === 0) {
      throw new DecodeError("malformed-container", "Division of 0 ticks per quarter note");
    }

    this.ticksPerQuarter = parsed.ticksPerQuarter;
    this.options = resolveOptions(options);
    this.warnings = options.warnings ?? createSilentWarningSink();
  }

  /**
   * Scan one track's messages in order. Each call gets fresh program and
   * open-note tables.
   */
  addTrack(trackIndex: number, messages: Iterable<DecodedMessage>): void {
    const programs = new Array<number>(CHANNELS).fill(0);
    const openNotes: OpenNote[][] = Array.from({ length: CHANNELS }, () =>
      Array.from({ length: PITCHES }, () => ({ tick: 0, velocity: 0 })),
    );

    for (const message of messages) {
      switch (message.kind) {
        case "meta":
          this.addMeta(trackIndex, message);
          break;

        case "sysex":
          break;

        case "event":
          switch (message.type) {
            case "programChange":
              programs[message.channel] = message.program;
              break;

            case "controlChange": {
              const track = this.trackFor(trackIndex, message.channel, programs);
              const curve = track.controls[message.controller] ?? [];
              curve.push({ time: this.toQuarters(message.time), value: message.value });
              track.controls[message.controller] = curve;
              break;
            }

            case "noteOn":
            case "noteOff": {
              const slot = openNotes[message.channel][message.note];

              if (message.type === "noteOn" && message.velocity > 0) {
                // Re-striking an open pitch restarts it.
                slot.tick = message.time;
                slot.velocity = message.velocity;
                break;
              }

              if (slot.velocity === 0) {
                this.warn(trackIndex, message.time, `note-off for pitch ${message.note} on channel ${message.channel} has no open note-on`);
                break;
              }

              const track = this.trackFor(trackIndex, message.channel, programs);
              track.notes.push({
                pitch: message.note,
                start: this.toQuarters(slot.tick),
                duration: this.toQuarters(message.time - slot.tick),
                velocity: slot.velocity,
              });
              slot.velocity = 0;
              break;
            }

            default:
              break;
          }
          break;
      }
    }
  }

  /** Sort, fill defaults and flatten. The builder can be read again after. */
  build(format: SmfFormat): Sequence {
    const tempos = sortByTime(this.tempos);
    if (tempos.length === 0 || tempos[0].time > 0) {
      tempos.unshift({ time: 0, qpm: DEFAULT_QPM });
    }

    const keys = [...this.tracks.keys()].sort((a, b) => a - b);
    const tracks: Track[] = [];

    for (const key of keys) {
      const draft = this.tracks.get(key);
      if (draft === undefined) continue;
      if (draft.notes.length === 0 && this.options.emptyTracks === "drop") continue;

      const notes = this.options.sortNotes ? sortNotes(draft.notes) : [...draft.notes];
      const controls: Track["controls"] = {};
      for (const [controller, curve] of Object.entries(draft.controls)) {
        controls[Number(controller)] = [...curve];
      }

      tracks.push({
        ...draft,
        name: this.trackNames.get(draft.trackIndex) ?? "",
        notes,
        controls,
      });
    }

    return {
      format,
      ticksPerQuarter: this.ticksPerQuarter,
      tracks,
      tempos,
      timeSignatures: sortByTime(this.timeSignatures),
      keySignatures: sortByTime(this.keySignatures),
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private addMeta(trackIndex: number, message: MetaMessage): void {
    const time = this.toQuarters(message.time);

    switch (message.type) {
      case "setTempo": {
        const tempo = decodeTempo(message.data);
        if (tempo.problem) this.warn(trackIndex, message.time, tempo.problem);
        this.tempos.push({ time, qpm: tempoToQpm(tempo.value) });
        break;
      }
      case "timeSignature": {
        const signature = decodeTimeSignature(message.data);
        if (signature.problem) this.warn(trackIndex, message.time, signature.problem);
        this.timeSignatures.push({ time, ...signature.value });
        break;
      }
      case "keySignature": {
        const key = decodeKeySignature(message.data);
        if (key.problem) this.warn(trackIndex, message.time, key.problem);
        this.keySignatures.push({ time, ...key.value });
        break;
      }
      case "trackName": {
        const name = decodeText(message.data);
        if (name.problem) this.warn(trackIndex, message.time, `track name: ${name.problem}`);
        this.trackNames.set(trackIndex, name.value);
        break;
      }
      default:
        break;
    }
  }

  /** Get or create the (track, channel) entry, seeding program and drum flag. */
  private trackFor(trackIndex: number, channel: number, programs: readonly number[]): Track {
    const key = trackIndex * CHANNELS + channel;
    let track = this.tracks.get(key);
    if (track === undefined) {
      track = {
        name: "",
        trackIndex,
        channel,
        program: programs[channel],
        isDrum: channel === DRUM_CHANNEL,
        notes: [],
        controls: {},
      };
      this.tracks.set(key, track);
    }
    return track;
  }

  private toQuarters(tick: number): number {
    return tick / this.ticksPerQuarter;
  }

  private warn(trackIndex: number, tick: number, message: string): void {
    this.warnings.warn({ location: `track ${trackIndex} tick ${tick}`, message });
  }
}

// ─── Public Helpers ──────────────────────────────────────────────────────────

/** Build a Sequence from already split track message lists. */
export function buildSequence(
  format: SmfFormat,
  division: number,
  tracks: Iterable<Iterable<DecodedMessage>>,
  options: DecodeOptions = {},
): Sequence {
  const builder = new SequenceBuilder(division, options);
  let index = 0;
  for (const messages of tracks) {
    builder.addTrack(index++, messages);
  }
  return builder.build(format);
}

// ─── Internal: Sorting ───────────────────────────────────────────────────────

/** Stable: entries at the same time keep file order. */
function sortByTime<T extends { time: number }>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => a.time - b.time);
}

function sortNotes(notes: readonly Note[]): Note[] {
  return [...notes].sort((a, b) => a.start - b.start || a.pitch - b.pitch);
}
