import { describe, it, expect } from "vitest";
import {
  context,
  label,
  resolveLabel,
  fail,
  fatal,
  bail,
  alt,
  cut,
  preceded,
  seq,
  tag,
  u8,
  u16le,
  positionAt,
  type Annotation,
  type ParseResult,
} from "../index.js";

const bytes = (...values: number[]): Uint8Array => new Uint8Array(values);
const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);

function annotations<T>(r: ParseResult<T>): Annotation[] {
  if (r.ok) throw new Error("expected a failure");
  return r.trace.entries.map((e) => e.annotation);
}

function offsets<T>(r: ParseResult<T>): number[] {
  if (r.ok) throw new Error("expected a failure");
  return r.trace.entries.map((e) => e.position.offset);
}

describe("resolveLabel", () => {
  it("uses fixed strings as-is", () => {
    expect(resolveLabel("section header")).toBe("section header");
  });

  it("calls deferred builders", () => {
    expect(resolveLabel(() => "built")).toBe("built");
  });

  it("stringifies payload values", () => {
    expect(resolveLabel(42)).toBe("42");
    expect(resolveLabel({ toString: () => "chunk #3" })).toBe("chunk #3");
  });
});

describe("label", () => {
  it("interpolates its values when called", () => {
    const name = "count";
    expect(label`field \`${name}\` (${4}-byte little-endian)`()).toBe(
      "field `count` (4-byte little-endian)"
    );
  });

  it("stringifies values only when the label is built", () => {
    let renders = 0;
    const payload = {
      toString() {
        renders++;
        return "payload";
      },
    };
    const deferred = label`got ${payload}`;
    expect(renders).toBe(0);
    expect(deferred()).toBe("got payload");
    expect(renders).toBe(1);
  });
});

describe("context", () => {
  it("is transparent on success and never builds the label", () => {
    let builds = 0;
    const inner = u16le();
    const wrapped = context(() => {
      builds++;
      return "length";
    }, inner);
    const input = bytes(0x34, 0x12, 0xff);

    expect(wrapped.parse(input)).toEqual(inner.parse(input));
    expect(builds).toBe(0);
  });

  it("does not stringify payload or template values on success", () => {
    let renders = 0;
    const payload = {
      toString() {
        renders++;
        return "payload";
      },
    };
    const input = bytes(1, 2);
    expect(context(payload, u8()).parse(input).ok).toBe(true);
    expect(context(label`after ${payload}`, u8()).parse(input).ok).toBe(true);
    expect(renders).toBe(0);

    expect(context(payload, u8()).parse(new Uint8Array(0)).ok).toBe(false);
    expect(renders).toBe(1);
  });

  it("records the label at the position the attempt started", () => {
    const record = context("record", preceded(u8(), context("body", tag("AB"))));
    const r = record.parse(bytes(0x01, 0x58, 0x59));

    expect(annotations(r)).toEqual([
      { kind: "raw", tag: "Tag" },
      { kind: "context", label: "body" },
      { kind: "context", label: "record" },
    ]);
    expect(offsets(r)).toEqual([1, 1, 0]);
  });

  it("records the start position even when the failure is deeper", () => {
    const pair = context("pair", seq(u8(), u8()));
    const r = pair.parse(bytes(0x07));
    expect(offsets(r)).toEqual([1, 0]);
  });

  it("keeps recoverable failures recoverable", () => {
    const r = context("magic", tag("MZ")).parse(ascii("PE"));
    expect(r.ok).toBe(false);
    expect(!r.ok && r.severity).toBe("error");
  });

  it("keeps fatal failures fatal so alternation stops", () => {
    const committed = context("committed", cut(tag("A")));
    const fallback = tag("B");

    const r = committed.parse(ascii("B"));
    expect(!r.ok && r.severity).toBe("failure");
    expect(annotations(r)).toEqual([
      { kind: "raw", tag: "Tag" },
      { kind: "context", label: "committed" },
    ]);

    expect(alt(committed, fallback).parse(ascii("B")).ok).toBe(false);
    expect(alt(context("optional", tag("A")), fallback).parse(ascii("B")).ok).toBe(true);
  });

  it("does not touch the input buffer", () => {
    const input = bytes(1, 2, 3);
    context("nope", tag("xyz")).parse(input);
    expect(Array.from(input)).toEqual([1, 2, 3]);
  });
});

describe("fail, fatal and bail", () => {
  it("seed a context entry with the matching severity", () => {
    const input = bytes(9, 9);
    const pos = positionAt(input, 1);

    const soft = fail(pos, "bad checksum");
    expect(soft.severity).toBe("error");
    expect(soft.trace.entries).toEqual([{ position: pos, annotation: { kind: "context", label: "bad checksum" } }]);

    const hard = fatal(input, label`bad ${"magic"}`);
    expect(hard.severity).toBe("failure");
    expect(hard.trace.entries[0].annotation).toEqual({ kind: "context", label: "bad magic" });
    expect(hard.trace.entries[0].position.offset).toBe(0);
  });

  it("bail always fails at the current position", () => {
    const unknown = preceded(u8(), bail<number>("unknown chunk type"));
    const r = unknown.parse(bytes(1, 2));
    expect(annotations(r)).toEqual([{ kind: "context", label: "unknown chunk type" }]);
    expect(offsets(r)).toEqual([1]);
  });
});
