/**
 * Failure traces.
 *
 * A trace is the ordered record of every failure point met while a parse
 * attempt unwinds: the failing primitive seeds it, and each enclosing
 * `context()` appends one entry on the way out. Entries are innermost first.
 *
 * Traces are values. `append` returns a new trace and leaves its argument
 * alone, so two alternatives that share a prefix never see each other's
 * entries.
 */

import { invariant } from "@bintrace/core";
import type { Position } from "./position.js";

/** Classifier emitted by a primitive or combinator when it fails. */
export type RawKind =
  | "Tag" // literal bytes did not match
  | "Eof" // not enough input, or trailing input where none was expected
  | "Verify" // value rejected by a predicate
  | "Alt" // every alternative failed
  | "Many1" // zero repetitions where one was required
  | "Count" // fewer repetitions than required
  | "LengthValue" // length prefix runs past the input
  | "MapRes"; // conversion of a parsed value failed

export type Annotation =
  | { readonly kind: "raw"; readonly tag: RawKind }
  | { readonly kind: "context"; readonly label: string };

export interface TraceEntry {
  readonly position: Position;
  readonly annotation: Annotation;
}

export interface Trace {
  readonly entries: readonly TraceEntry[];
}

export function rawKind(tag: RawKind): Annotation {
  return { kind: "raw", tag };
}

export function contextLabel(label: string): Annotation {
  return { kind: "context", label };
}

function entry(position: Position, annotation: Annotation): TraceEntry {
  return Object.freeze({ position, annotation });
}

/** One-entry trace, built by the innermost failing step. */
export function seed(position: Position, annotation: Annotation): Trace {
  return { entries: [entry(position, annotation)] };
}

/** A new trace with one more entry at the end. */
export function append(trace: Trace, position: Position, annotation: Annotation): Trace {
  return { entries: [...trace.entries, entry(position, annotation)] };
}

/** Build a trace in one pass; same result as `seed` followed by `append`s. */
export function fromEntries(entries: Iterable<TraceEntry>): Trace {
  const list = Array.from(entries, (e) => entry(e.position, e.annotation));
  invariant(list.length > 0, "A trace needs at least one entry");
  return { entries: list };
}

export function fromRawKind(position: Position, tag: RawKind): Trace {
  return seed(position, rawKind(tag));
}

export function appendRawKind(trace: Trace, position: Position, tag: RawKind): Trace {
  return append(trace, position, rawKind(tag));
}

export function fromContext(position: Position, label: string): Trace {
  return seed(position, contextLabel(label));
}

export function addContext(trace: Trace, position: Position, label: string): Trace {
  return append(trace, position, contextLabel(label));
}

function positionEquals(a: Position, b: Position): boolean {
  return a.source === b.source && a.offset === b.offset && a.length === b.length;
}

function annotationEquals(a: Annotation, b: Annotation): boolean {
  if (a.kind === "raw") return b.kind === "raw" && a.tag === b.tag;
  return b.kind === "context" && a.label === b.label;
}

/** Structural equality: same entries in the same order. */
export function traceEquals(a: Trace, b: Trace): boolean {
  return (
    a.entries.length === b.entries.length &&
    a.entries.every(
      (e, i) =>
        positionEquals(e.position, b.entries[i].position) &&
        annotationEquals(e.annotation, b.entries[i].annotation)
    )
  );
}

/** Copy of the entry list; positions keep pointing at the same buffers. */
export function cloneTrace(trace: Trace): Trace {
  return fromEntries(trace.entries);
}

/** Number of entries carrying a human label. */
export function contextCount(trace: Trace): number {
  return trace.entries.filter((e) => e.annotation.kind === "context").length;
}
