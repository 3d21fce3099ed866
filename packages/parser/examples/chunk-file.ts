/**
 * Example: diagnosing a small chunked binary format.
 *
 * Layout (little-endian):
 *
 * ```
 * "BTRC"  u16 version (= 1)  u8 chunk count
 * chunk*  "TEXT" u16 length, bytes
 *       | "PNT " i16 x, i16 y
 * ```
 *
 * Each chunk commits once its tag matches (`cut`), so a truncated point is
 * reported as a broken point rather than as "unknown chunk type".
 *
 * ```ts
 * const report = describeChunkFile(bytes);
 * console.log(report);
 * ```
 */

import {
  alt,
  bail,
  context,
  count,
  cut,
  flatMap,
  i16le,
  lengthData,
  map,
  ParseError,
  preceded,
  seq,
  tag,
  u16le,
  u8,
  verify,
  type Parser,
  type RenderOptions,
} from "../src/index.js";

export type Chunk = { kind: "text"; text: string } | { kind: "point"; x: number; y: number };

export interface ChunkFile {
  version: number;
  chunks: Chunk[];
}

const decoder = new TextDecoder();

const textChunk: Parser<Chunk> = context(
  "TEXT chunk",
  preceded(
    tag("TEXT"),
    cut(
      map(context("text payload", lengthData(u16le())), (bytes): Chunk => ({
        kind: "text",
        text: decoder.decode(bytes),
      }))
    )
  )
);

const pointChunk: Parser<Chunk> = context(
  "PNT chunk",
  preceded(
    tag("PNT "),
    cut(
      map(
        seq(context("x coordinate", i16le()), context("y coordinate", i16le())),
        ([x, y]): Chunk => ({ kind: "point", x, y })
      )
    )
  )
);

const chunk: Parser<Chunk> = alt(textChunk, pointChunk, bail<Chunk>("unknown chunk type"));

const header: Parser<number> = context(
  "file header",
  preceded(
    context("magic", tag("BTRC")),
    context("version", verify(u16le(), (v) => v === 1))
  )
);

export const chunkFile: Parser<ChunkFile> = context(
  "chunk file",
  flatMap(seq(header, context("chunk count", u8())), ([version, n]) =>
    map(count(chunk, n), (chunks) => ({ version, chunks }))
  )
);

function describeChunk(c: Chunk): string {
  return c.kind === "text" ? `text ${JSON.stringify(c.text)}` : `point (${c.x}, ${c.y})`;
}

/** One line per chunk, or the failure report. */
export function describeChunkFile(bytes: Uint8Array, options: RenderOptions = {}): string {
  try {
    const file = chunkFile.parseAll(bytes);
    return [`version ${file.version}`, ...file.chunks.map(describeChunk)].join("\n");
  } catch (e) {
    if (e instanceof ParseError) return e.report(options);
    throw e;
  }
}
