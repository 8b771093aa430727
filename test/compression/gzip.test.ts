/**
 * Tests for gzip compression and streaming decompression
 */

import { Effect } from "effect";
import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionService, GzipDecompressor } from "../../src/compression";
import { compress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";

const TEXT = "chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1\n".repeat(50);
const BYTES = new TextEncoder().encode(TEXT);

function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

async function readText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  const reader = stream.getReader();
  let text = "";
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}

describe("GzipDecompressor", () => {
  test("should round-trip through compress and decompress", async () => {
    const compressed = await compress(BYTES, { level: 9 });

    expect(new TextDecoder().decode(await GzipDecompressor.decompress(compressed))).toBe(TEXT);
  });

  test("should reject data without gzip magic bytes", async () => {
    await expect(GzipDecompressor.decompress(new Uint8Array([0x50, 0x4b, 0x03]))).rejects.toThrow(
      /Invalid gzip magic bytes/
    );
  });

  test("should reject empty data", async () => {
    await expect(GzipDecompressor.decompress(new Uint8Array(0))).rejects.toThrow(
      /must not be empty/
    );
  });

  test("should reject out-of-range levels", async () => {
    await expect(compress(BYTES, { level: 10 })).rejects.toThrow("Invalid gzip level 10");
  });

  test("should decompress a stream split at arbitrary points", async () => {
    const compressed = gzipSync(BYTES);
    const middle = Math.floor(compressed.length / 2);

    const stream = GzipDecompressor.wrapStream(
      streamOf(compressed.subarray(0, 1), compressed.subarray(1, middle), compressed.subarray(middle))
    );

    expect(await readText(stream)).toBe(TEXT);
  });

  test("should fail a stream that is not gzip", async () => {
    const stream = GzipDecompressor.wrapStream(streamOf(BYTES));

    await expect(readText(stream)).rejects.toThrow(CompressionError);
  });

  test("should enforce the output size limit", async () => {
    const stream = GzipDecompressor.wrapStream(streamOf(gzipSync(BYTES)), { maxOutputSize: 100 });

    await expect(readText(stream)).rejects.toThrow(/exceeds maximum 100/);
  });
});

describe("CompressionService", () => {
  const run = <A>(program: Effect.Effect<A, CompressionError, CompressionService>): Promise<A> =>
    Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));

  test("should pass data through for format none", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.compress(BYTES, "none");
      })
    );

    expect(result).toBe(BYTES);
  });

  test("should gzip data for format gzip", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.compress(BYTES, "gzip", 6);
      })
    );

    expect([result[0], result[1]]).toEqual([0x1f, 0x8b]);
  });
});
