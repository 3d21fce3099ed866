/**
 * @bintrace/parser
 *
 * Byte-level parser combinators that keep every failure on the way out.
 *
 * Provides:
 * - Positions: offset+length windows over the input buffer
 * - Traces: innermost-first records of failure points
 * - `context()`: label a step so its failures carry a breadcrumb
 * - `renderTrace()`: an xxd-style hexdump report with a caret per entry
 *
 * @module
 */

// Core types
export type { ParseResult, ParseSuccess, ParseFailure, Parser, Severity } from "./types.js";

// Positions
export {
  positionAt,
  toPosition,
  advance,
  limit,
  remaining,
  isAtEnd,
  type Position,
} from "./position.js";

// Traces
export {
  seed,
  append,
  fromEntries,
  fromRawKind,
  appendRawKind,
  fromContext,
  addContext,
  traceEquals,
  cloneTrace,
  contextCount,
  rawKind,
  contextLabel,
  type RawKind,
  type Annotation,
  type TraceEntry,
  type Trace,
} from "./trace.js";

// Context annotation
export {
  context,
  label,
  resolveLabel,
  fail,
  fatal,
  bail,
  type LabelSource,
  type Describable,
} from "./context.js";

// Combinator API
export {
  createParser,
  succeed,
  failRaw,
  tag,
  take,
  rest,
  takeWhile,
  eof,
  number,
  u8,
  i8,
  u16le,
  u16be,
  u32le,
  u32be,
  i16le,
  i16be,
  i32le,
  i32be,
  f32le,
  f64le,
  seq,
  seq3,
  preceded,
  terminated,
  alt,
  many,
  many1,
  count,
  optional,
  lengthData,
  lengthValue,
  map,
  flatMap,
  mapResult,
  verify,
  cut,
  lazy,
  type NumberType,
  type Endian,
} from "./combinators.js";

// Rendering
export {
  renderTrace,
  printTrace,
  offsetOf,
  caretColumn,
  hexdumpRow,
  type RenderOptions,
  type PrintOptions,
} from "./render.js";

// Errors
export { ParseError } from "./errors.js";
