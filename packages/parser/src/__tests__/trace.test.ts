import { describe, it, expect } from "vitest";
import {
  positionAt,
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
  type TraceEntry,
} from "../index.js";

const input = new Uint8Array([0x10, 0x20, 0x30, 0x40, 0x50]);

const e1: TraceEntry = { position: positionAt(input, 3), annotation: rawKind("Tag") };
const e2: TraceEntry = { position: positionAt(input, 2), annotation: contextLabel("inner") };
const e3: TraceEntry = { position: positionAt(input, 0), annotation: contextLabel("outer") };

describe("seed", () => {
  it("builds a one-entry trace", () => {
    const trace = seed(e1.position, e1.annotation);
    expect(trace.entries).toHaveLength(1);
    expect(trace.entries[0].position.offset).toBe(3);
    expect(trace.entries[0].annotation).toEqual({ kind: "raw", tag: "Tag" });
  });

  it("freezes its entries", () => {
    const trace = seed(e1.position, e1.annotation);
    expect(Object.isFrozen(trace.entries[0])).toBe(true);
  });
});

describe("append", () => {
  it("adds to the end and leaves the argument untouched", () => {
    const first = seed(e1.position, e1.annotation);
    const second = append(first, e2.position, e2.annotation);
    expect(first.entries).toHaveLength(1);
    expect(second.entries).toHaveLength(2);
    expect(second.entries[1].annotation).toEqual({ kind: "context", label: "inner" });
  });

  it("matches building the same entries in one pass", () => {
    const stepwise = append(
      append(seed(e1.position, e1.annotation), e2.position, e2.annotation),
      e3.position,
      e3.annotation
    );
    const oneShot = fromEntries([e1, e2, e3]);
    expect(traceEquals(stepwise, oneShot)).toBe(true);
    expect(stepwise).toEqual(oneShot);
  });

  it("never reorders or deduplicates", () => {
    const trace = append(append(seed(e2.position, e2.annotation), e2.position, e2.annotation), e1.position, e1.annotation);
    expect(trace.entries.map((e) => e.position.offset)).toEqual([2, 2, 3]);
  });

  it("lets two branches grow from a shared prefix independently", () => {
    const base = seed(e1.position, e1.annotation);
    const left = addContext(base, e2.position, "left");
    const right = addContext(base, e2.position, "right");
    expect(left.entries.map((e) => e.annotation)).toEqual([rawKind("Tag"), contextLabel("left")]);
    expect(right.entries.map((e) => e.annotation)).toEqual([rawKind("Tag"), contextLabel("right")]);
  });
});

describe("fromEntries", () => {
  it("rejects an empty list", () => {
    expect(() => fromEntries([])).toThrow("A trace needs at least one entry");
  });
});

describe("shorthands", () => {
  it("seed and append raw kinds and context labels", () => {
    const pos = positionAt(input, 1);
    const trace = addContext(appendRawKind(fromContext(pos, "first"), pos, "Alt"), pos, "last");
    expect(trace.entries.map((e) => e.annotation)).toEqual([
      { kind: "context", label: "first" },
      { kind: "raw", tag: "Alt" },
      { kind: "context", label: "last" },
    ]);
    expect(traceEquals(fromRawKind(pos, "Eof"), seed(pos, rawKind("Eof")))).toBe(true);
  });

  it("counts context entries", () => {
    expect(contextCount(fromEntries([e1, e2, e3]))).toBe(2);
  });
});

describe("traceEquals", () => {
  it("compares annotations", () => {
    expect(traceEquals(fromContext(e2.position, "a"), fromContext(e2.position, "b"))).toBe(false);
    expect(traceEquals(fromContext(e2.position, "a"), fromRawKind(e2.position, "Tag"))).toBe(false);
  });

  it("compares offsets and lengths", () => {
    expect(traceEquals(fromContext(positionAt(input, 1), "a"), fromContext(positionAt(input, 2), "a"))).toBe(
      false
    );
    const full = positionAt(input, 1);
    const short = { ...full, length: 1 };
    expect(traceEquals(fromContext(full, "a"), fromContext(short, "a"))).toBe(false);
  });

  it("compares buffers by identity", () => {
    const copy = new Uint8Array(input);
    expect(traceEquals(fromContext(positionAt(input, 1), "a"), fromContext(positionAt(copy, 1), "a"))).toBe(
      false
    );
  });

  it("compares lengths of the entry lists", () => {
    const one = fromEntries([e1]);
    expect(traceEquals(one, fromEntries([e1, e2]))).toBe(false);
  });
});

describe("cloneTrace", () => {
  it("copies structure and keeps buffer references", () => {
    const original = fromEntries([e1, e2]);
    const clone = cloneTrace(original);
    expect(clone).not.toBe(original);
    expect(clone.entries).not.toBe(original.entries);
    expect(traceEquals(clone, original)).toBe(true);
    expect(clone.entries[0].position.source).toBe(input);
  });
});
