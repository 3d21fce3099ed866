/**
 * Context annotation.
 *
 * `context(label, parser)` is the breadcrumb combinator: when `parser` fails,
 * the label and the position the attempt *started* at are appended to the
 * trace, so each entry reads "while attempting X from here, parsing failed
 * deeper in". Success passes through untouched and the label is never built.
 *
 * @example
 * ```ts
 * const header = context("section header", seq(tag("SECT"), u32le()));
 * const field = context(label`field \`${name}\` (4-byte little-endian)`, u32le());
 * ```
 */

import { createParser } from "./combinators.js";
import { toPosition, type Position } from "./position.js";
import { addContext, fromContext } from "./trace.js";
import type { Parser, ParseFailure } from "./types.js";

/** Anything with a textual rendering. */
export interface Describable {
  toString(): string;
}

/**
 * Where a label comes from: a fixed string, a deferred builder, or a value
 * whose `String()` rendering is the label.
 */
export type LabelSource = string | (() => string) | Describable;

function isDeferred(source: LabelSource): source is () => string {
  return typeof source === "function";
}

/** Build the label text. Only called on the failure path. */
export function resolveLabel(source: LabelSource): string {
  if (typeof source === "string") return source;
  if (isDeferred(source)) return source();
  return String(source);
}

/**
 * Deferred label from a template literal. The interpolated values are
 * captured as-is and stringified only when the label is needed.
 */
export function label(strings: TemplateStringsArray, ...values: readonly unknown[]): () => string {
  return () => {
    let text = strings[0];
    values.forEach((value, i) => {
      text += String(value) + strings[i + 1];
    });
    return text;
  };
}

/**
 * Wrap `parser` so that a failure gains a context entry at the position this
 * wrapper was invoked at. The failure's severity is kept, so an enclosing
 * `alt()` still stops on a fatal failure.
 */
export function context<T>(source: LabelSource, parser: Parser<T>): Parser<T> {
  return createParser((pos) => {
    const r = parser.parse(pos);
    if (r.ok) return r;
    return {
      ok: false,
      severity: r.severity,
      trace: addContext(r.trace, pos, resolveLabel(source)),
    };
  });
}

/** Recoverable failure seeded with a context entry. */
export function fail(input: Uint8Array | Position, source: LabelSource): ParseFailure {
  return { ok: false, severity: "error", trace: fromContext(toPosition(input), resolveLabel(source)) };
}

/** Fatal failure seeded with a context entry. */
export function fatal(input: Uint8Array | Position, source: LabelSource): ParseFailure {
  return { ok: false, severity: "failure", trace: fromContext(toPosition(input), resolveLabel(source)) };
}

/** A parser that always fails recoverably with the given context. */
export function bail<T = never>(source: LabelSource): Parser<T> {
  return createParser((pos) => fail(pos, source));
}
