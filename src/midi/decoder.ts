// ─── Track Message Decoder ──────────────────────────────────────────────────
//
// Resumable cursor over one MTrk payload. Each call to read() decodes the
// next delta-time + message pair, expanding running status, and returns a
// self-contained message stamped with its absolute tick.
//
//   0x00–0x7F  data byte: running status (previous channel status reused)
//   0x80–0xEF  channel voice/mode message, fixed length by high nibble
//   0xF0/0xF7  system exclusive, VLQ length
//   0xF1–0xFE  system common / real-time, fixed length, no running status
//   0xFF       meta event: type byte + VLQ length
// ─────────────────────────────────────────────────────────────────────────────

import { DecodeError } from "../errors.js";
import { readVariableLength } from "./vlq.js";
import {
  CHANNEL_STATUS,
  META_STATUS,
  SYSEX_CONTINUE,
  SYSEX_START,
  SYSTEM_STATUS,
  isChannelStatus,
  metaTypeOf,
} from "./status.js";
import type {
  ChannelEvent,
  DecodedMessage,
  MetaMessage,
  SysExMessage,
  SystemEvent,
} from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MessageDecoderOptions {
  /** Checked before every message; an aborted signal throws its reason. */
  signal?: AbortSignal;
}

// ─── Decoder ─────────────────────────────────────────────────────────────────

export class MessageDecoder implements IterableIterator<DecodedMessage> {
  private readonly data: Uint8Array;
  private readonly signal?: AbortSignal;

  private pos = 0;
  private ticks = 0;
  /** Last channel status byte, null until one has been seen. */
  private runningStatus: number | null = null;
  /** Length (status included) of the message the running status implies. */
  private runningLength = 0;
  /** An F0 packet was not closed by F7 yet. */
  private sysexOpen = false;

  constructor(data: Uint8Array, options: MessageDecoderOptions = {}) {
    this.data = data;
    this.signal = options.signal;
  }

  /** Byte offset of the next message within the payload. */
  get offset(): number {
    return this.pos;
  }

  /** Absolute tick of the last decoded message. */
  get tick(): number {
    return this.ticks;
  }

  get done(): boolean {
    return this.pos >= this.data.length;
  }

  /**
   * Decode the next message, or return null once the payload is exhausted.
   */
  read(): DecodedMessage | null {
    if (this.done) {
      if (this.sysexOpen) {
        throw new DecodeError(
          "malformed-stream",
          "System exclusive message not terminated by 0xF7",
          this.pos,
        );
      }
      return null;
    }
    this.signal?.throwIfAborted();

    const delta = readVariableLength(this.data, this.pos);
    this.pos += delta.length;
    this.ticks += delta.value;
    const time = this.ticks;

    const status = this.peek();

    if (status < 0x80) {
      if (this.runningStatus === null) {
        throw new DecodeError(
          "malformed-stream",
          "Running status used before any channel status byte",
          this.pos,
        );
      }
      const bytes = this.takeData(this.runningLength - 1);
      return createChannelEvent(this.runningStatus, bytes, time);
    }

    if (isChannelStatus(status)) {
      const { length } = CHANNEL_STATUS[status >> 4];
      this.runningStatus = status;
      this.runningLength = length;
      this.pos += 1;
      return createChannelEvent(status, this.takeData(length - 1), time);
    }

    if (status === META_STATUS) return this.readMeta(time);
    if (status === SYSEX_START || status === SYSEX_CONTINUE) return this.readSysEx(status, time);

    const system = SYSTEM_STATUS[status];
    if (system === undefined) {
      throw new DecodeError(
        "malformed-stream",
        `Status byte 0x${status.toString(16).toUpperCase()} not implemented`,
        this.pos,
      );
    }
    this.pos += 1;
    return createSystemEvent(system.type, this.takeData(system.length - 1), time);
  }

  next(): IteratorResult<DecodedMessage> {
    const message = this.read();
    return message === null
      ? { done: true, value: undefined }
      : { done: false, value: message };
  }

  [Symbol.iterator](): MessageDecoder {
    return this;
  }

  // ─── Internal: Variable-Length Messages ───────────────────────────────────

  private readMeta(time: number): MetaMessage {
    this.pos += 1;
    const code = this.peek();
    this.pos += 1;
    const length = readVariableLength(this.data, this.pos);
    this.pos += length.length;

    return {
      kind: "meta",
      time,
      type: metaTypeOf(code),
      code,
      data: this.take(length.value),
    };
  }

  private readSysEx(status: 0xf0 | 0xf7, time: number): SysExMessage {
    if (status === SYSEX_START && this.sysexOpen) {
      throw new DecodeError(
        "malformed-stream",
        "System exclusive message not terminated by 0xF7",
        this.pos,
      );
    }
    this.pos += 1;
    const length = readVariableLength(this.data, this.pos);
    this.pos += length.length;
    const data = this.take(length.value);
    const terminated = data.length > 0 && data[data.length - 1] === SYSEX_CONTINUE;

    if (status === SYSEX_START) {
      this.sysexOpen = !terminated;
    } else if (this.sysexOpen) {
      this.sysexOpen = !terminated;
    }
    // An F7 packet outside an open F0 run is an escape and carries raw bytes.

    return { kind: "sysex", time, status, data };
  }

  // ─── Internal: Byte Access ────────────────────────────────────────────────

  private peek(): number {
    if (this.pos >= this.data.length) {
      throw new DecodeError("malformed-stream", "Message runs past end of track", this.pos);
    }
    return this.data[this.pos];
  }

  /** Copy the next `count` bytes out of the payload and advance. */
  private take(count: number): Uint8Array {
    const end = this.pos + count;
    if (end > this.data.length) {
      throw new DecodeError("malformed-stream", "Message runs past end of track", this.pos);
    }
    const bytes = this.data.slice(this.pos, end);
    this.pos = end;
    return bytes;
  }

  /** take() for channel and system messages, whose bytes are all 7-bit. */
  private takeData(count: number): Uint8Array {
    const start = this.pos;
    const bytes = this.take(count);
    const bad = bytes.findIndex((byte) => byte >= 0x80);
    if (bad !== -1) {
      throw new DecodeError(
        "malformed-stream",
        `Data byte 0x${bytes[bad].toString(16).toUpperCase()} has its top bit set`,
        start + bad,
      );
    }
    return bytes;
  }
}

// ─── Public Helpers ──────────────────────────────────────────────────────────

/** Decode a whole track payload eagerly. */
export function decodeTrack(
  data: Uint8Array,
  options: MessageDecoderOptions = {},
): DecodedMessage[] {
  return Array.from(new MessageDecoder(data, options));
}

// ─── Internal: Event Construction ────────────────────────────────────────────

function createChannelEvent(status: number, bytes: Uint8Array, time: number): ChannelEvent {
  const type = CHANNEL_STATUS[status >> 4].type;
  const channel = status & 0x0f;

  switch (type) {
    case "noteOff":
      return { kind: "event", type, time, channel, note: bytes[0], velocity: bytes[1] };
    case "noteOn":
      return { kind: "event", type, time, channel, note: bytes[0], velocity: bytes[1] };
    case "polyAftertouch":
      return { kind: "event", type, time, channel, note: bytes[0], pressure: bytes[1] };
    case "controlChange":
      return { kind: "event", type, time, channel, controller: bytes[0], value: bytes[1] };
    case "programChange":
      return { kind: "event", type, time, channel, program: bytes[0] };
    case "channelAftertouch":
      return { kind: "event", type, time, channel, pressure: bytes[0] };
    case "pitchBend":
      return { kind: "event", type, time, channel, value: bytes[0] | (bytes[1] << 7) };
  }
}

function createSystemEvent(
  type: SystemEvent["type"],
  bytes: Uint8Array,
  time: number,
): SystemEvent {
  switch (type) {
    case "mtcQuarterFrame":
      return { kind: "event", type, time, value: bytes[0] };
    case "songPosition":
      return { kind: "event", type, time, position: bytes[0] | (bytes[1] << 7) };
    case "songSelect":
      return { kind: "event", type, time, song: bytes[0] };
    default:
      return { kind: "event", type, time };
  }
}
