/**
 * Byte-level parser combinator API for @bintrace/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins.
 *
 * Failing primitives seed a trace with a raw classifier (`Tag`, `Eof`, ...).
 * Combinators pass traces through untouched unless noted; human-readable
 * breadcrumbs are added with `context()`.
 */

import { createLogger, invariant, unreachable } from "@bintrace/core";
import { ParseError } from "./errors.js";
import { advance, isAtEnd, limit, positionAt, remaining, toPosition, type Position } from "./position.js";
import { addContext, appendRawKind, fromRawKind, type RawKind } from "./trace.js";
import type { Parser, ParseFailure, ParseResult, ParseSuccess } from "./types.js";

const log = createLogger("parser");

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
export function createParser<T>(parseFn: (pos: Position) => ParseResult<T>): Parser<T> {
  return {
    parse(input: Uint8Array | Position): ParseResult<T> {
      return parseFn(toPosition(input));
    },
    parseAll(input: Uint8Array): T {
      const result = parseFn(positionAt(input));
      if (!result.ok) {
        throw raise(input, result);
      }
      if (!isAtEnd(result.pos)) {
        const trace = addContext(fromRawKind(result.pos, "Eof"), result.pos, "expected end of input");
        throw raise(input, { ok: false, severity: "error", trace });
      }
      return result.value;
    },
  };
}

function raise(input: Uint8Array, failure: ParseFailure): ParseError {
  log.debug(
    `parse of ${input.length} bytes failed (${failure.severity}) with ${failure.trace.entries.length} trace entries`
  );
  return new ParseError(input, failure);
}

export function succeed<T>(value: T, pos: Position): ParseSuccess<T> {
  return { ok: true, value, pos };
}

/** Recoverable failure seeded with a raw classifier. */
export function failRaw(pos: Position, tag: RawKind): ParseFailure {
  return { ok: false, severity: "error", trace: fromRawKind(pos, tag) };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();

/** Match exact bytes. A string is matched as its UTF-8 encoding. */
export function tag(expected: Uint8Array | string): Parser<Uint8Array> {
  const bytes = typeof expected === "string" ? encoder.encode(expected) : expected;
  return createParser((pos) => {
    if (pos.length < bytes.length) return failRaw(pos, "Tag");
    const window = remaining(pos);
    for (let i = 0; i < bytes.length; i++) {
      if (window[i] !== bytes[i]) return failRaw(pos, "Tag");
    }
    return succeed(window.subarray(0, bytes.length), advance(pos, bytes.length));
  });
}

/** Take exactly `n` bytes. */
export function take(n: number): Parser<Uint8Array> {
  invariant(Number.isInteger(n) && n >= 0, `take() needs a non-negative integer, got ${n}`);
  return createParser((pos) => {
    if (pos.length < n) return failRaw(pos, "Eof");
    return succeed(remaining(pos).subarray(0, n), advance(pos, n));
  });
}

/** Take every remaining byte. Always succeeds. */
export function rest(): Parser<Uint8Array> {
  return createParser((pos) => succeed(remaining(pos), advance(pos, pos.length)));
}

/** Take bytes while `pred` holds. Always succeeds. */
export function takeWhile(pred: (byte: number) => boolean): Parser<Uint8Array> {
  return createParser((pos) => {
    const window = remaining(pos);
    let n = 0;
    while (n < window.length && pred(window[n])) n++;
    return succeed(window.subarray(0, n), advance(pos, n));
  });
}

/** Match end of input. */
export function eof(): Parser<null> {
  return createParser((pos) => (isAtEnd(pos) ? succeed(null, pos) : failRaw(pos, "Eof")));
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

export type NumberType =
  | "uint8"
  | "uint16"
  | "uint32"
  | "int8"
  | "int16"
  | "int32"
  | "float32"
  | "float64";

/** Little-endian or big-endian. */
export type Endian = "le" | "be";

const NUMBER_SIZES: Record<NumberType, number> = {
  uint8: 1,
  uint16: 2,
  uint32: 4,
  int8: 1,
  int16: 2,
  int32: 4,
  float32: 4,
  float64: 8,
};

function readNumber(view: DataView, type: NumberType, le: boolean): number {
  switch (type) {
    case "uint8":
      return view.getUint8(0);
    case "uint16":
      return view.getUint16(0, le);
    case "uint32":
      return view.getUint32(0, le);
    case "int8":
      return view.getInt8(0);
    case "int16":
      return view.getInt16(0, le);
    case "int32":
      return view.getInt32(0, le);
    case "float32":
      return view.getFloat32(0, le);
    case "float64":
      return view.getFloat64(0, le);
    default:
      return unreachable(type);
  }
}

/** Read a fixed-size number. Fails with `Eof` when too few bytes remain. */
export function number(type: NumberType, endian: Endian = "le"): Parser<number> {
  const size = NUMBER_SIZES[type];
  const le = endian === "le";
  return createParser((pos) => {
    if (pos.length < size) return failRaw(pos, "Eof");
    const { source } = pos;
    const view = new DataView(source.buffer, source.byteOffset + pos.offset, size);
    return succeed(readNumber(view, type, le), advance(pos, size));
  });
}

export const u8 = (): Parser<number> => number("uint8");
export const i8 = (): Parser<number> => number("int8");
export const u16le = (): Parser<number> => number("uint16", "le");
export const u16be = (): Parser<number> => number("uint16", "be");
export const u32le = (): Parser<number> => number("uint32", "le");
export const u32be = (): Parser<number> => number("uint32", "be");
export const i16le = (): Parser<number> => number("int16", "le");
export const i16be = (): Parser<number> => number("int16", "be");
export const i32le = (): Parser<number> => number("int32", "le");
export const i32be = (): Parser<number> => number("int32", "be");
export const f32le = (): Parser<number> => number("float32", "le");
export const f64le = (): Parser<number> => number("float64", "le");

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return createParser((pos) => {
    const ra = a.parse(pos);
    if (!ra.ok) return ra;
    const rb = b.parse(ra.pos);
    if (!rb.ok) return rb;
    return succeed<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return createParser((pos) => {
    const ra = a.parse(pos);
    if (!ra.ok) return ra;
    const rb = b.parse(ra.pos);
    if (!rb.ok) return rb;
    const rc = c.parse(rb.pos);
    if (!rc.ok) return rc;
    return succeed<[A, B, C]>([ra.value, rb.value, rc.value], rc.pos);
  });
}

/** Run `a` then `b`, keeping `b`'s value. */
export function preceded<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map(seq(a, b), ([, value]) => value);
}

/** Run `a` then `b`, keeping `a`'s value. */
export function terminated<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(seq(a, b), ([value]) => value);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation (PEG): try each parser in turn from the same position.
 *
 * A recoverable failure moves on to the next branch and its trace is dropped.
 * A fatal failure is returned as-is. When every branch fails, the last
 * branch's trace gets an `Alt` entry.
 */
export function alt<T>(...parsers: [Parser<T>, ...Parser<T>[]]): Parser<T> {
  return createParser((pos) => {
    let last: ParseFailure | undefined;
    for (const p of parsers) {
      const r = p.parse(pos);
      if (r.ok || r.severity === "failure") return r;
      last = r;
    }
    invariant(last !== undefined, "alt() needs at least one parser");
    return { ok: false, severity: "error", trace: appendRawKind(last.trace, pos, "Alt") };
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Stops at the first recoverable failure. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return createParser((pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(cur);
      if (!r.ok) {
        if (r.severity === "failure") return r;
        break;
      }
      if (r.pos.offset === cur.offset) break; // prevent infinite loop on zero-width match
      results.push(r.value);
      cur = r.pos;
    }
    return succeed(results, cur);
  });
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  const tail = many(p);
  return createParser((pos) => {
    const first = p.parse(pos);
    if (!first.ok) {
      if (first.severity === "failure") return first;
      return { ok: false, severity: "error", trace: appendRawKind(first.trace, pos, "Many1") };
    }
    const more = tail.parse(first.pos);
    if (!more.ok) return more;
    return succeed([first.value, ...more.value], more.pos);
  });
}

/** Exactly `n` repetitions. */
export function count<T>(p: Parser<T>, n: number): Parser<T[]> {
  invariant(Number.isInteger(n) && n >= 0, `count() needs a non-negative integer, got ${n}`);
  return createParser((pos) => {
    const results: T[] = [];
    let cur = pos;
    for (let i = 0; i < n; i++) {
      const r = p.parse(cur);
      if (!r.ok) {
        if (r.severity === "failure") return r;
        return { ok: false, severity: "error", trace: appendRawKind(r.trace, cur, "Count") };
      }
      results.push(r.value);
      cur = r.pos;
    }
    return succeed(results, cur);
  });
}

/** Optional: succeed with `null` if `p` fails recoverably. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (r.ok || r.severity === "failure") return r;
    return succeed(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Length-prefixed data
// ---------------------------------------------------------------------------

function lengthWindow(
  lengthParser: Parser<number>,
  pos: Position
): ParseFailure | { window: Position; after: Position } {
  const rl = lengthParser.parse(pos);
  if (!rl.ok) return rl;
  if (!Number.isInteger(rl.value) || rl.value < 0 || rl.value > rl.pos.length) {
    return failRaw(rl.pos, "LengthValue");
  }
  return { window: limit(rl.pos, rl.value), after: advance(rl.pos, rl.value) };
}

/** Read a length, then that many bytes. */
export function lengthData(lengthParser: Parser<number>): Parser<Uint8Array> {
  return createParser((pos) => {
    const w = lengthWindow(lengthParser, pos);
    if ("ok" in w) return w;
    return succeed(remaining(w.window), w.after);
  });
}

/**
 * Read a length, then run `p` over exactly that many bytes. Bytes `p` leaves
 * unread inside the window are skipped.
 */
export function lengthValue<T>(lengthParser: Parser<number>, p: Parser<T>): Parser<T> {
  return createParser((pos) => {
    const w = lengthWindow(lengthParser, pos);
    if ("ok" in w) return w;
    const r = p.parse(w.window);
    if (!r.ok) return r;
    return succeed(r.value, w.after);
  });
}

// ---------------------------------------------------------------------------
// Transformation and checks
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return succeed(f(r.value), r.pos);
  });
}

/** Run `p`, then the parser `f` picks from its value (e.g. a count read from a header). */
export function flatMap<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return f(r.value).parse(r.pos);
  });
}

function convert<A, B>(f: (a: A) => B | Error, value: A): B | Error {
  try {
    return f(value);
  } catch (e) {
    if (e instanceof Error) return e;
    throw e;
  }
}

/**
 * Transform a parser's result with a conversion that may reject it, by
 * returning or throwing an `Error`. The rejection becomes a `MapRes` entry
 * followed by the error's message as context. Anything else thrown is not
 * a rejection and propagates.
 */
export function mapResult<A, B>(p: Parser<A>, f: (a: A) => B | Error): Parser<B> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    const converted = convert(f, r.value);
    if (converted instanceof Error) {
      return {
        ok: false,
        severity: "error",
        trace: addContext(fromRawKind(pos, "MapRes"), pos, converted.message),
      };
    }
    return succeed(converted, r.pos);
  });
}

/** Succeed only if `pred` accepts the parsed value. */
export function verify<T>(p: Parser<T>, pred: (value: T) => boolean): Parser<T> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return pred(r.value) ? r : failRaw(pos, "Verify");
  });
}

/** Turn recoverable failures of `p` into fatal ones: no sibling branch is tried after it. */
export function cut<T>(p: Parser<T>): Parser<T> {
  return createParser((pos) => {
    const r = p.parse(pos);
    if (r.ok || r.severity === "failure") return r;
    return { ok: false, severity: "failure", trace: r.trace };
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return createParser((pos) => {
    if (!cached) cached = f();
    return cached.parse(pos);
  });
}
