import { describe, it, expect } from "vitest";
import {
  COMMON_TIME,
  positionInMeasure,
  quartersPerMeasure,
  signatureAt,
  sliceIntoMeasures,
} from "./measures.js";
import type { Note, TimeSignature } from "../types.js";

function sig(time: number, numerator: number, denominator: number): TimeSignature {
  return { time, numerator, denominator, clocksPerClick: 24, thirtySecondsPerQuarter: 8 };
}

function note(start: number, duration = 1, pitch = 60): Note {
  return { pitch, start, duration, velocity: 90 };
}

describe("quartersPerMeasure", () => {
  it("scales the numerator by the denominator", () => {
    expect(quartersPerMeasure({ numerator: 4, denominator: 4 })).toBe(4);
    expect(quartersPerMeasure({ numerator: 3, denominator: 8 })).toBe(1.5);
    expect(quartersPerMeasure({ numerator: 6, denominator: 8 })).toBe(3);
    expect(quartersPerMeasure({ numerator: 2, denominator: 2 })).toBe(4);
  });
});

describe("signatureAt", () => {
  const signatures = [sig(0, 4, 4), sig(8, 3, 4)];

  it("returns the last signature at or before the time", () => {
    expect(signatureAt(7.5, signatures)).toBe(signatures[0]);
    expect(signatureAt(8, signatures)).toBe(signatures[1]);
    expect(signatureAt(20, signatures)).toBe(signatures[1]);
  });

  it("defaults to common time", () => {
    expect(signatureAt(3, [])).toEqual(COMMON_TIME);
  });

  it("hands out a copy of the default that callers may change", () => {
    const first = signatureAt(0, []);
    first.numerator = 3;

    expect(signatureAt(0, []).numerator).toBe(4);
    expect(COMMON_TIME.numerator).toBe(4);
  });
});

describe("positionInMeasure", () => {
  it("counts from the governing signature's start", () => {
    expect(positionInMeasure(5, [sig(0, 4, 4)])).toBe(1);
    expect(positionInMeasure(6, [sig(0, 4, 4), sig(2, 3, 4)])).toBe(1);
  });

  it("is 0 on a downbeat", () => {
    expect(positionInMeasure(8, [sig(0, 4, 4)])).toBe(0);
    expect(positionInMeasure(5, [sig(2, 3, 4)])).toBe(0);
  });

  it("uses 4/4 without signatures", () => {
    expect(positionInMeasure(6.5, [])).toBe(2.5);
  });
});

describe("sliceIntoMeasures", () => {
  it("buckets notes by the measure they start in", () => {
    const notes = [note(0), note(3.5), note(4)];
    const measures = sliceIntoMeasures(notes, [sig(0, 4, 4)]);

    expect(measures.map((m) => [m.number, m.start, m.end])).toEqual([
      [1, 0, 4],
      [2, 4, 8],
    ]);
    expect(measures[0].notes).toEqual([notes[0], notes[1]]);
    expect(measures[1].notes).toEqual([notes[2]]);
  });

  it("covers a note that rings into the next measure", () => {
    const measures = sliceIntoMeasures([note(3, 2)], []);
    expect(measures).toHaveLength(2);
    expect(measures[1].notes).toEqual([]);
  });

  it("starts a new measure at a signature change", () => {
    const notes = [note(0), note(3)];
    const measures = sliceIntoMeasures(notes, [sig(0, 4, 4), sig(2, 3, 4)]);

    expect(measures.map((m) => [m.start, m.end, m.signature.numerator])).toEqual([
      [0, 2, 4],
      [2, 5, 3],
    ]);
    expect(measures[1].notes).toEqual([notes[1]]);
  });

  it("returns one empty measure when there are no notes", () => {
    expect(sliceIntoMeasures([], [])).toEqual([
      { number: 1, start: 0, end: 4, signature: COMMON_TIME, notes: [] },
    ]);
  });

  it("includes a zero-length note at the end", () => {
    const measures = sliceIntoMeasures([note(0, 4), note(4, 0)], []);
    expect(measures).toHaveLength(2);
    expect(measures[1].notes).toHaveLength(1);
  });
});
