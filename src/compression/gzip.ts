/**
 * Gzip compression for annotation files
 *
 * Buffer-based compression for writing and a streaming decompressor for
 * reading, both on fflate so the same code runs wherever Web Streams exist.
 */

import { Gunzip, gunzipSync, gzipSync, type GzipOptions } from "fflate";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";
import { CompressionDetector } from "./detector";

const DEFAULT_MAX_OUTPUT_SIZE = 10_737_418_240; // 10GB safety limit
const GZIP_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

function toGzipLevel(level: number): GzipOptions["level"] {
  const match = GZIP_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(`Invalid gzip level ${level} (expected 0-9)`, "gzip", "compress");
  }
  return match;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (CompressionDetector.fromMagicBytes(compressed) !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

/**
 * Compress data with gzip
 *
 * @param data Uncompressed bytes
 * @param options Compression level (0-9, default 6)
 * @throws {CompressionError} If the level is out of range or compression fails
 */
export async function compress(
  data: Uint8Array,
  options: { level?: number } = {}
): Promise<Uint8Array> {
  const level = toGzipLevel(options.level ?? 6);
  try {
    return gzipSync(data, { level });
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "compress", err);
  }
}

/**
 * Decompress a complete gzip buffer
 *
 * @throws {CompressionError} If the data is not gzip or is corrupted
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }

  try {
    validateGzipFormat(compressed);
    return gunzipSync(compressed);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err, 0);
  }
}

/**
 * Create gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const lines = readLines(compressedStream.pipeThrough(createStream()));
 * ```
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  const maxOutputSize = options.maxOutputSize ?? DEFAULT_MAX_OUTPUT_SIZE;
  const state = { bytesIn: 0, bytesOut: 0, headerChecked: false };
  const pending: Uint8Array[] = [];
  const header: number[] = [];
  const gunzip = new Gunzip((chunk) => {
    state.bytesOut += chunk.length;
    pending.push(chunk);
  });

  const drain = (controller: { enqueue(chunk: Uint8Array): void }): void => {
    if (state.bytesOut > maxOutputSize) {
      throw new CompressionError(
        `Decompressed size ${state.bytesOut} exceeds maximum ${maxOutputSize}`,
        "gzip",
        "stream",
        state.bytesIn
      );
    }
    for (const chunk of pending.splice(0)) {
      controller.enqueue(chunk);
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    transform: (chunk, controller) => {
      if (options.signal?.aborted === true) {
        throw new CompressionError("Decompression aborted", "gzip", "stream", state.bytesIn);
      }
      if (!state.headerChecked) {
        // the magic bytes may straddle the first two chunks
        header.push(...chunk.subarray(0, 2 - header.length));
        if (header.length === 2) {
          validateGzipFormat(Uint8Array.from(header));
          state.headerChecked = true;
        }
      }
      state.bytesIn += chunk.length;
      try {
        gunzip.push(chunk, false);
      } catch (err) {
        throw CompressionError.fromSystemError("gzip", "stream", err, state.bytesIn);
      }
      drain(controller);
    },
    flush: (controller) => {
      if (!state.headerChecked) {
        if (header.length > 0) {
          validateGzipFormat(Uint8Array.from(header));
        }
        return;
      }
      try {
        gunzip.push(new Uint8Array(0), true);
      } catch (err) {
        throw CompressionError.fromSystemError("gzip", "stream", err, state.bytesIn);
      }
      drain(controller);
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

export const GzipDecompressor = {
  decompress,
  createStream,
  wrapStream,
} as const;
