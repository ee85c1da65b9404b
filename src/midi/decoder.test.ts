import { describe, it, expect } from "vitest";
import { MessageDecoder, decodeTrack } from "./decoder.js";
import { catchDecodeError } from "../testing/errors.js";

function decodeBytes(bytes: number[]) {
  return decodeTrack(new Uint8Array(bytes));
}

describe("MessageDecoder: channel messages", () => {
  it("decodes a note-on with its absolute tick", () => {
    const [msg] = decodeBytes([0x83, 0x60, 0x91, 60, 100]);
    expect(msg).toEqual({ kind: "event", type: "noteOn", time: 480, channel: 1, note: 60, velocity: 100 });
  });

  it("accumulates delta-times", () => {
    const messages = decodeBytes([0x10, 0x90, 60, 100, 0x20, 0x80, 60, 0, 0x00, 0x90, 62, 100]);
    expect(messages.map((m) => m.time)).toEqual([16, 48, 48]);
  });

  it("expands running status", () => {
    const messages = decodeBytes([0x00, 0x90, 60, 100, 0x00, 62, 100]);
    expect(messages).toHaveLength(2);
    expect(messages[1]).toEqual({ kind: "event", type: "noteOn", time: 0, channel: 0, note: 62, velocity: 100 });
  });

  it("expands running status for two-byte messages", () => {
    const messages = decodeBytes([0x00, 0xc1, 5, 0x00, 7]);
    expect(messages).toEqual([
      { kind: "event", type: "programChange", time: 0, channel: 1, program: 5 },
      { kind: "event", type: "programChange", time: 0, channel: 1, program: 7 },
    ]);
  });

  it("decodes the remaining channel message types", () => {
    const messages = decodeBytes([
      0x00, 0x82, 60, 64,
      0x00, 0xa3, 61, 50,
      0x00, 0xb4, 64, 127,
      0x00, 0xd5, 90,
      0x00, 0xe6, 0x00, 0x40,
    ]);
    expect(messages).toEqual([
      { kind: "event", type: "noteOff", time: 0, channel: 2, note: 60, velocity: 64 },
      { kind: "event", type: "polyAftertouch", time: 0, channel: 3, note: 61, pressure: 50 },
      { kind: "event", type: "controlChange", time: 0, channel: 4, controller: 64, value: 127 },
      { kind: "event", type: "channelAftertouch", time: 0, channel: 5, pressure: 90 },
      { kind: "event", type: "pitchBend", time: 0, channel: 6, value: 8192 },
    ]);
  });
});

describe("MessageDecoder: system and meta messages", () => {
  it("keeps running status across real-time bytes", () => {
    const messages = decodeBytes([0x00, 0x90, 60, 100, 0x00, 0xf8, 0x10, 62, 0]);
    expect(messages).toEqual([
      { kind: "event", type: "noteOn", time: 0, channel: 0, note: 60, velocity: 100 },
      { kind: "event", type: "timingClock", time: 0 },
      { kind: "event", type: "noteOn", time: 16, channel: 0, note: 62, velocity: 0 },
    ]);
  });

  it("keeps running status across meta events", () => {
    const messages = decodeBytes([0x00, 0x90, 60, 100, 0x00, 0xff, 0x01, 0x01, 0x41, 0x00, 60, 0]);
    expect(messages[2]).toEqual({ kind: "event", type: "noteOn", time: 0, channel: 0, note: 60, velocity: 0 });
  });

  it("decodes system common messages", () => {
    const messages = decodeBytes([0x00, 0xf2, 0x10, 0x01, 0x00, 0xf3, 0x02, 0x00, 0xf1, 0x23]);
    expect(messages).toEqual([
      { kind: "event", type: "songPosition", time: 0, position: 144 },
      { kind: "event", type: "songSelect", time: 0, song: 2 },
      { kind: "event", type: "mtcQuarterFrame", time: 0, value: 0x23 },
    ]);
  });

  it("decodes meta events with their payload", () => {
    const [msg] = decodeBytes([0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20]);
    expect(msg.kind).toBe("meta");
    if (msg.kind !== "meta") return;
    expect(msg.type).toBe("setTempo");
    expect(msg.code).toBe(0x51);
    expect(Array.from(msg.data)).toEqual([0x07, 0xa1, 0x20]);
  });

  it("names unrecognized meta types unknown", () => {
    const [msg] = decodeBytes([0x00, 0xff, 0x60, 0x01, 0x05]);
    expect(msg).toMatchObject({ kind: "meta", type: "unknown", code: 0x60 });
  });

  it("decodes a terminated system exclusive message", () => {
    const [msg] = decodeBytes([0x00, 0xf0, 0x03, 0x7e, 0x09, 0xf7]);
    expect(msg.kind).toBe("sysex");
    if (msg.kind !== "sysex") return;
    expect(msg.status).toBe(0xf0);
    expect(Array.from(msg.data)).toEqual([0x7e, 0x09, 0xf7]);
  });

  it("accepts a system exclusive message split into continuation packets", () => {
    const messages = decodeBytes([0x00, 0xf0, 0x02, 0x7e, 0x09, 0x10, 0xf7, 0x02, 0x01, 0xf7]);
    expect(messages.map((m) => m.kind)).toEqual(["sysex", "sysex"]);
    expect(messages[1].time).toBe(16);
  });

  it("accepts an escape packet outside a system exclusive run", () => {
    const messages = decodeBytes([0x00, 0xf7, 0x01, 0xf8]);
    expect(messages).toHaveLength(1);
  });
});

describe("MessageDecoder: malformed streams", () => {
  it("rejects running status before any status byte", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 60, 100]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("Running status used before any channel status byte");
    expect(err.offset).toBe(1);
  });

  it("rejects undefined status bytes", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0xf4]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("Status byte 0xF4 not implemented");
  });

  it("rejects a message cut off by the end of the track", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0x90, 60]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("Message runs past end of track");
  });

  it("rejects a meta payload longer than the track", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0xff, 0x01, 0x05, 0x41]));
    expect(err.code).toBe("malformed-stream");
  });

  it("rejects an unterminated system exclusive message", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0xf0, 0x02, 0x7e, 0x09]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("System exclusive message not terminated by 0xF7");
  });

  it("rejects a new system exclusive message while one is still open", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0xf0, 0x02, 0x7e, 0x09, 0x00, 0xf0, 0x01, 0xf7]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("System exclusive message not terminated by 0xF7");
    expect(err.offset).toBe(6);
  });

  it("rejects a data byte with its top bit set", () => {
    const err = catchDecodeError(() => decodeBytes([0x00, 0x90, 0x90, 0x40]));
    expect(err.code).toBe("malformed-stream");
    expect(err.message).toContain("Data byte 0x90 has its top bit set");
    expect(err.offset).toBe(2);
  });

  it("checks data bytes under running status and in system messages", () => {
    expect(catchDecodeError(() => decodeBytes([0x00, 0x90, 60, 100, 0x00, 62, 0xc0])).offset).toBe(6);
    expect(catchDecodeError(() => decodeBytes([0x00, 0xf3, 0x81])).code).toBe("malformed-stream");
  });
});

describe("MessageDecoder: cursor", () => {
  it("produces one message per read and null at the end", () => {
    const decoder = new MessageDecoder(new Uint8Array([0x00, 0x90, 60, 100, 0x83, 0x60, 0x80, 60, 0]));

    expect(decoder.done).toBe(false);
    expect(decoder.read()).toMatchObject({ type: "noteOn", time: 0 });
    expect(decoder.offset).toBe(4);

    expect(decoder.read()).toMatchObject({ type: "noteOff", time: 480 });
    expect(decoder.tick).toBe(480);
    expect(decoder.done).toBe(true);

    expect(decoder.read()).toBeNull();
    expect(decoder.next()).toEqual({ done: true, value: undefined });
  });

  it("works as an iterable", () => {
    const decoder = new MessageDecoder(new Uint8Array([0x00, 0x90, 60, 100, 0x00, 62, 100]));
    const notes: number[] = [];
    for (const msg of decoder) {
      if (msg.kind === "event" && msg.type === "noteOn") notes.push(msg.note);
    }
    expect(notes).toEqual([60, 62]);
  });

  it("stops when the signal is aborted", () => {
    const controller = new AbortController();
    const decoder = new MessageDecoder(
      new Uint8Array([0x00, 0x90, 60, 100, 0x00, 62, 100]),
      { signal: controller.signal },
    );

    decoder.read();
    controller.abort(new Error("cancelled"));
    expect(() => decoder.read()).toThrow("cancelled");
  });

  it("copies payload bytes out of the source buffer", () => {
    const bytes = new Uint8Array([0x00, 0xff, 0x03, 0x02, 0x41, 0x42]);
    const [msg] = decodeTrack(bytes);
    bytes[4] = 0x5a;

    if (msg.kind !== "meta") throw new Error("expected a meta message");
    expect(Array.from(msg.data)).toEqual([0x41, 0x42]);
  });
});
