/**
 * Positions into the input buffer.
 *
 * A position is an offset+length window over a retained buffer handle. The
 * bytes are never copied; `remaining()` hands out a `subarray` view that
 * shares memory with the source.
 */

import { invariant } from "@bintrace/core";

export interface Position {
  /** The whole input buffer this position points into. */
  readonly source: Uint8Array;
  /** Byte offset from the start of `source`. */
  readonly offset: number;
  /** Number of bytes visible from `offset`. */
  readonly length: number;
}

/** Position at `offset` covering the rest of the buffer. `offset === source.length` is end of input. */
export function positionAt(source: Uint8Array, offset = 0): Position {
  invariant(
    Number.isInteger(offset) && offset >= 0 && offset <= source.length,
    `Offset ${offset} is outside a buffer of ${source.length} bytes`
  );
  return { source, offset, length: source.length - offset };
}

export function toPosition(input: Uint8Array | Position): Position {
  return input instanceof Uint8Array ? positionAt(input) : input;
}

/** Move forward by `n` bytes, shrinking the window. */
export function advance(position: Position, n: number): Position {
  invariant(
    Number.isInteger(n) && n >= 0 && n <= position.length,
    `Cannot advance ${n} bytes with ${position.length} remaining`
  );
  return { source: position.source, offset: position.offset + n, length: position.length - n };
}

/** Restrict the window to its first `n` bytes. */
export function limit(position: Position, n: number): Position {
  invariant(n >= 0 && n <= position.length, `Cannot limit to ${n} of ${position.length} bytes`);
  return { source: position.source, offset: position.offset, length: n };
}

/** The visible bytes, as a view sharing the source's memory. */
export function remaining(position: Position): Uint8Array {
  return position.source.subarray(position.offset, position.offset + position.length);
}

export function isAtEnd(position: Position): boolean {
  return position.length === 0;
}
