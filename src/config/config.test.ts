import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveOptions, validateOptions } from "./schema.js";
import { loadDecodeOptions } from "./loader.js";
import { createRecordingWarningSink } from "../warnings.js";

describe("resolveOptions", () => {
  it("applies defaults", () => {
    expect(resolveOptions()).toEqual({ emptyTracks: "drop", sortNotes: false });
  });

  it("keeps given values and leaves runtime hooks out", () => {
    const warnings = createRecordingWarningSink();
    expect(resolveOptions({ emptyTracks: "keep", sortNotes: true, warnings })).toEqual({
      emptyTracks: "keep",
      sortNotes: true,
    });
  });
});

describe("validateOptions", () => {
  it("accepts an empty object", () => {
    expect(validateOptions({})).toEqual([]);
  });

  it("names the offending field", () => {
    const errors = validateOptions({ emptyTracks: "merge", sortNotes: "yes" });
    expect(errors.map((e) => e.field)).toEqual(["emptyTracks", "sortNotes"]);
  });

  it("reports a non-object at the root", () => {
    const errors = validateOptions(42);
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("root");
  });
});

describe("loadDecodeOptions", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "midiseq-config-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads and fills in defaults", () => {
    const file = join(dir, "keep.json");
    writeFileSync(file, JSON.stringify({ emptyTracks: "keep" }), "utf8");
    expect(loadDecodeOptions(file)).toEqual({ emptyTracks: "keep", sortNotes: false });
  });

  it("throws for a missing file", () => {
    const file = join(dir, "missing.json");
    expect(() => loadDecodeOptions(file)).toThrow(`Config not found: ${file}`);
  });

  it("lists every invalid field", () => {
    const file = join(dir, "bad.json");
    writeFileSync(file, JSON.stringify({ sortNotes: 1 }), "utf8");
    expect(() => loadDecodeOptions(file)).toThrow(/^Invalid config bad\.json:\n {2}sortNotes: /);
  });
});
