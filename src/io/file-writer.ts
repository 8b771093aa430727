/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing stays behind Promise-based functions. Output paths ending
 * in `.gz` are gzip-compressed unless `autoCompress` is false.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { type CompressionError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform, runFileEffect } from "./runtime";

const encoder = new TextEncoder();

function validateWriteOptions(options: WriteOptions): void {
  const validationResult = WriteOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validationResult.summary}`);
  }
}

/**
 * Compress data when the options or the file extension ask for it
 */
function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError, CompressionService> {
  return Effect.gen(function* () {
    if (options.autoCompress === false) {
      return data;
    }

    const requested = options.compressionFormat ?? "none";
    const format = requested === "none" ? CompressionDetector.fromExtension(filePath) : requested;
    if (format === "none") {
      return data;
    }

    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(data, format, options.compressionLevel ?? 6);
  });
}

/**
 * Handle for writing to a file multiple times within a scope
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails or the path is invalid
 *
 * @example
 * ```typescript
 * await writeString("genes.refflat", rows);
 * await writeString("genes.refflat.gz", rows); // gzip-compressed
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);
  validateWriteOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const finalData = yield* applyCompression(encoder.encode(content), validatedPath, options);
    yield* fs.writeFile(validatedPath, finalData);
  });

  await runFileEffect(
    program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live)),
    validatedPath,
    "write"
  );
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is closed when the callback settles. Content is written through
 * as it arrives; compression is not applied to handle writes.
 *
 * @returns The callback's return value
 * @throws {FileError} When file operations fail; errors thrown by the
 *   callback propagate unchanged
 *
 * @example
 * ```typescript
 * await openForWriting("genes.gtf.gff3", async (handle) => {
 *   await handle.writeString("chr1\t...");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs.open(validatedPath, { flag: "w", mode: 0o644 });

    const handle: FileWriteHandle = {
      writeString: (content: string): Promise<void> =>
        runFileEffect(file.writeAll(encoder.encode(content)), validatedPath, "write"),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runFileEffect(
    program.pipe(Effect.scoped, Effect.provide(getPlatform())),
    validatedPath,
    "open"
  );
}
