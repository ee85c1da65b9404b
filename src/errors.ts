// ─── Decode Errors ───────────────────────────────────────────────────────────
//
// Fatal failures while decoding a Standard MIDI File. Anything thrown as a
// DecodeError means no Sequence was produced. Recoverable problems (short
// meta payloads, orphaned note-offs) are reported as warnings instead.
// ─────────────────────────────────────────────────────────────────────────────

/**
 * - `malformed-container`: bad header tag, unsupported format, truncated chunk
 * - `unsupported-timing`: SMPTE division
 * - `malformed-stream`: undecodable bytes inside a track chunk
 */
export type DecodeErrorCode =
  | "malformed-container"
  | "unsupported-timing"
  | "malformed-stream";

export class DecodeError extends Error {
  readonly code: DecodeErrorCode;
  /** Byte offset where decoding stopped, relative to the buffer being read. */
  readonly offset?: number;

  constructor(code: DecodeErrorCode, message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = "DecodeError";
    this.code = code;
    this.offset = offset;
  }
}

/** Type guard usable on values caught from `decode`. */
export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}
