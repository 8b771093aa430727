/**
 * Effect-based compression service for symmetric I/O
 *
 * The file reader and writer ask for a `CompressionService` instead of calling
 * gzip directly; `CompressionService.Live` provides the fflate implementation.
 *
 * @example Using the compression service with Effect
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat, DecompressorOptions } from "../types";
import { compress as compressGzip, createStream as createGzipDecompressionStream } from "./gzip";

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   *
   * @param level - Compression level (1-9)
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Create a decompression transform stream
   */
  readonly createDecompressionStream: (
    format: CompressionFormat,
    options?: DecompressorOptions
  ) => TransformStream<Uint8Array, Uint8Array>;
}

/**
 * Compression service tag for Effect dependency injection
 */
export class CompressionService extends Context.Tag("@gtf-refflat/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) => {
      if (format === "none") {
        return Effect.succeed(data);
      }
      return Effect.tryPromise({
        try: () => compressGzip(data, { level: level ?? 6 }),
        catch: (error) => CompressionError.fromSystemError("gzip", "compress", error),
      });
    },

    createDecompressionStream: (format, options) =>
      format === "none" ? createPassthroughStream() : createGzipDecompressionStream(options),
  };
}
