/**
 * Core types for @bintrace/parser
 *
 * Defines the parse result and the parser interface.
 */

import type { Position } from "./position.js";
import type { Trace } from "./trace.js";

/**
 * How far a failure propagates. An `"error"` lets an enclosing alternation
 * try its next branch; a `"failure"` aborts the whole alternation.
 */
export type Severity = "error" | "failure";

export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  /** Input left after the match. */
  readonly pos: Position;
}

export interface ParseFailure {
  readonly ok: false;
  readonly severity: Severity;
  readonly trace: Trace;
}

/** Result of a parse attempt: a value and the rest of the input, or a trace. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/** A parser is a function from a position to a ParseResult. */
export interface Parser<T> {
  /** Attempt to parse a whole buffer, or continue from a position. */
  parse(input: Uint8Array | Position): ParseResult<T>;
  /** Parse the full buffer, throwing a `ParseError` on failure or leftover bytes. */
  parseAll(input: Uint8Array): T;
}
