/**
 * Trace rendering.
 *
 * Turns a trace into an `xxd`-style report: one block per labelled entry,
 * innermost first, each showing the 16-byte row that holds the entry's
 * offset and a caret under the byte itself.
 *
 * ```
 * 0: at offset 0x11, field X:
 * 00000010: 1011 1213 1415 1617 1819 1a1b 1c1d 1e1f  ................
 *             ^---
 * ```
 */

import { config } from "@bintrace/core";
import type { Position } from "./position.js";
import type { Annotation, Trace } from "./trace.js";

export interface RenderOptions {
  /** Also render raw classifier entries (default: the `verbose` config flag) */
  rawKinds?: boolean;
}

export interface PrintOptions extends RenderOptions {
  /** Custom writer function (default: console.error) */
  writer?: (report: string) => void;
}

const CARET = "^---";
const ROW_BYTES = 16;
/** Width of `00000000: ` before the first hex digit. */
const ROW_HEADER_WIDTH = 10;

/**
 * Byte offset of `position` within `input`.
 *
 * A position taken from a different view of the same memory is rebased by
 * the distance between the views. The result is clamped to the buffer, so
 * end of input (`input.length`) is a valid answer.
 */
export function offsetOf(input: Uint8Array, position: Position): number {
  let offset = position.offset;
  if (position.source !== input && position.source.buffer === input.buffer) {
    offset += position.source.byteOffset - input.byteOffset;
  }
  return Math.min(Math.max(offset, 0), input.length);
}

/** Column the caret marker is right-aligned to for a byte at `offset`. */
export function caretColumn(offset: number): number {
  const lineOffset = offset % ROW_BYTES;
  return (
    ROW_HEADER_WIDTH + CARET.length + Math.floor(lineOffset / 2) * 5 + (lineOffset % 2) * 2
  );
}

function isPrintable(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

/**
 * One hexdump row starting at `lineBegin`:
 *
 * ```
 * 00000000: 0000 0000 0000 0000 0000 0000 0000 0000  ................
 * ```
 *
 * Columns past the end of the buffer are blank; the ASCII panel just stops.
 */
export function hexdumpRow(input: Uint8Array, lineBegin: number): string {
  let row = `${lineBegin.toString(16).padStart(8, "0")}:`;

  for (let i = 0; i < ROW_BYTES; i++) {
    if (i % 2 === 0) row += " ";
    const index = lineBegin + i;
    row += index < input.length ? input[index].toString(16).padStart(2, "0") : "  ";
  }

  row += "  ";

  for (const byte of input.subarray(lineBegin, lineBegin + ROW_BYTES)) {
    row += isPrintable(byte) ? String.fromCharCode(byte) : ".";
  }

  return row;
}

function annotationText(annotation: Annotation): string {
  return annotation.kind === "context" ? annotation.label : annotation.tag;
}

/**
 * Render `trace` against the buffer it was produced from.
 *
 * Raw classifier entries stay silent unless `rawKinds` is set; block numbers
 * are trace indices, so silenced entries leave gaps.
 */
export function renderTrace(input: Uint8Array, trace: Trace, options: RenderOptions = {}): string {
  const rawKinds = options.rawKinds ?? config.has("verbose");
  let result = "";

  trace.entries.forEach(({ position, annotation }, i) => {
    if (input.length === 0) {
      result += `${i}: in ${annotationText(annotation)}, got empty input\n\n`;
      return;
    }

    if (annotation.kind === "raw" && !rawKinds) return;

    const offset = offsetOf(input, position);
    const line = hexdumpRow(input, offset - (offset % ROW_BYTES));
    const caret = CARET.padStart(caretColumn(offset));
    const caption =
      annotation.kind === "context" ? annotation.label : `in ${annotation.tag}`;

    result += `${i}: at offset 0x${offset.toString(16)}, ${caption}:\n${line}\n${caret}\n\n`;
  });

  return result;
}

/**
 * Print a rendered trace (stderr by default).
 */
export function printTrace(input: Uint8Array, trace: Trace, options: PrintOptions = {}): void {
  const writer = options.writer ?? ((report: string) => console.error(report));
  writer(renderTrace(input, trace, options));
}
