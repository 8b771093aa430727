/**
 * File reading utilities
 *
 * Streams annotation files through the Effect platform FileSystem and applies
 * gzip decompression when the path asks for it.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema, isFilePath } from "../types";
import { getPlatform, runFileEffect } from "./runtime";

const DEFAULT_OPTIONS: Required<Omit<FileReaderOptions, "signal">> = {
  bufferSize: 65536,
  maxFileSize: 10_737_418_240, // 10GB, annotation releases are large
  autoDecompress: true,
  compressionFormat: "none", // auto-detected from the extension
};

type MergedReaderOptions = typeof DEFAULT_OPTIONS & Pick<FileReaderOptions, "signal">;

/**
 * Validate file accessibility and constraints
 */
async function validateFile(
  path: FilePath,
  options: MergedReaderOptions
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return { isValid: false, error: "File does not exist or is not accessible" };
  }

  const metadata = await getMetadata(path);
  if (metadata.size > options.maxFileSize) {
    return {
      isValid: false,
      metadata,
      error: `File size ${metadata.size} exceeds maximum ${options.maxFileSize}`,
    };
  }

  return { isValid: true, metadata };
}

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  return runFileEffect(program.pipe(Effect.provide(getPlatform())), validatedPath, "stat");
}

/**
 * Get file metadata
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrUndefined(info.mtime),
      extension: dot === -1 ? "" : validatedPath.substring(dot),
    };
  });

  return runFileEffect(program.pipe(Effect.provide(getPlatform())), validatedPath, "stat");
}

/**
 * Create a streaming reader for a file
 *
 * Gzip input (`.gz`) is decompressed transparently unless `autoDecompress`
 * is false.
 *
 * @throws {FileError} If the file cannot be opened or fails validation
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error, validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;

    const stream = Stream.toReadableStream(
      fs.stream(validatedPath, { chunkSize: mergedOptions.bufferSize })
    );
    if (!mergedOptions.autoDecompress) {
      return stream;
    }

    const format =
      mergedOptions.compressionFormat === "none"
        ? CompressionDetector.fromExtension(validatedPath)
        : mergedOptions.compressionFormat;

    return stream.pipeThrough(
      compression.createDecompressionStream(format, { signal: mergedOptions.signal })
    );
  });

  return runFileEffect(
    program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live)),
    validatedPath,
    "open"
  );
}

/**
 * Read entire file to string, decompressing gzip input
 *
 * @throws {FileError} If the file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const stream = await createStream(path, options);
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let content = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      content += decoder.decode(value, { stream: true });
    }
    return content + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 *
 * @throws {FileError} If the path is empty or unsafe
 */
export function validatePath(path: string): FilePath {
  if (!isFilePath(path)) {
    const validationResult = FilePathSchema(path);
    const summary =
      validationResult instanceof type.errors ? validationResult.summary : "unrecognised path";
    throw new FileError(`Invalid file path: ${summary}`, path, "stat");
  }
  return path;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): MergedReaderOptions {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
