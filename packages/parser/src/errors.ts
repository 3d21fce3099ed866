/**
 * Parse errors thrown by `Parser.parseAll`.
 */

import type { ParseFailure, Severity } from "./types.js";
import type { Trace } from "./trace.js";
import { renderTrace, type RenderOptions } from "./render.js";

/** Terminal parse failure carrying the full trace and the input it refers to. */
export class ParseError extends Error {
  /** The buffer the trace's positions point into. */
  readonly input: Uint8Array;
  readonly trace: Trace;
  /** Whether the failure was recoverable when it reached the top. */
  readonly severity: Severity;

  constructor(input: Uint8Array, failure: ParseFailure, options: RenderOptions = {}) {
    const report = renderTrace(input, failure.trace, options);
    super(
      report.length > 0
        ? `Parse error:\n${report}`
        : `Parse error: no context recorded (${failure.trace.entries.length} raw entries)`
    );
    this.name = "ParseError";
    this.input = input;
    this.trace = failure.trace;
    this.severity = failure.severity;
  }

  /** Render the trace again, e.g. with raw classifier entries shown. */
  report(options: RenderOptions = {}): string {
    return renderTrace(this.input, this.trace, options);
  }
}
