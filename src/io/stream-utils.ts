/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into complete lines regardless of how chunk boundaries
 * fall, and provides the small async-iterable helpers the converter composes.
 */

import { AnnotationError, StreamError, BufferError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000; // 1MB max line length
const MAX_BUFFER_SIZE = 10_485_760; // 10MB max buffer

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * A final line without a terminator is yielded unless it is blank. If the
 * consumer stops early the stream is cancelled so its source is released.
 *
 * @param stream Stream of binary data to process
 * @yields Complete lines of text without their line endings
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a line is too long
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream("/data/genes.gtf.gz");
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith("#")) console.log(line.split("\t")[2]);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;
    if (result.remainder.trim() !== "") {
      yield result.remainder.replace(/\r$/, "");
    }
  } catch (error) {
    if (error instanceof AnnotationError) {
      throw error;
    }
    // the stream itself failed; there is nothing left to cancel
    settled = true;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n`, `\r\n` and lone `\r` endings. A trailing `\r` stays in the
 * remainder because the next chunk may start with `\n`.
 *
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];
    let lineEnd = -1;

    if (char === "\n") {
      lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lineEnd = position;
    }

    if (lineEnd !== -1) {
      const line = buffer.slice(lineStart, lineEnd);
      if (line.length > MAX_LINE_LENGTH) {
        throw new BufferError(
          `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
          line.length,
          "overflow",
          `Line starts with: ${line.slice(0, 100)}...`
        );
      }
      lines.push(line);
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Wrap a synchronous iterable as an async iterable
 */
export async function* fromIterable<T>(items: Iterable<T>): AsyncIterable<T> {
  yield* items;
}

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
