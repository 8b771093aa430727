/**
 * GTF to RefFlat conversion
 *
 * Wires the stages together: raw lines are normalized (and optionally written
 * to an intermediate file), parsed into features, reduced to one row per
 * transcript and written out.
 *
 * File conversion never throws; it returns a {@link ConversionResult} whose
 * failure branch says whether the problem was I/O or the annotation itself.
 * {@link assertConverted} turns a failure into a single
 * {@link GtfConversionError}.
 *
 * @module refflat/convert
 */

import { resolve } from "node:path";
import { type } from "arktype";
import {
  AnnotationError,
  BufferError,
  CompressionError,
  FileError,
  GtfConversionError,
  StreamError,
  ValidationError,
} from "../../errors";
import { normalizeGtfLines } from "../../formats/gtf/attributes";
import { FeatureParser } from "../../formats/gtf/parser";
import type { FeatureParserOptions } from "../../formats/gtf/types";
import type { RefFlatRow } from "../../formats/refflat/types";
import { RefFlatWriter } from "../../formats/refflat/writer";
import { createStream } from "../../io/file-reader";
import type { FileWriteHandle } from "../../io/file-writer";
import { openForWriting, writeString } from "../../io/file-writer";
import { collect, fromIterable, readLines } from "../../io/stream-utils";
import { accumulateTranscripts, TranscriptAccumulator } from "./accumulator";
import type { AccumulatorOptions } from "./accumulator";
import { groupFeaturesByTranscript } from "./group";
import type { StrandConflict } from "./state";

const ConvertOptionsSchema = type({
  "outputPath?": "string>0 | undefined",
  "normalizedPath?": "string>0 | undefined",
  "writeNormalized?": "boolean | undefined",
  "groupByTranscript?": "boolean | undefined",
  "signal?": "unknown",
  "onConflict?": "Function | undefined",
  "onWarning?": "Function | undefined",
}).narrow((options, ctx) => {
  if (options.outputPath !== undefined && options.outputPath === options.normalizedPath) {
    return ctx.reject("outputPath and normalizedPath must differ");
  }
  return true;
});

/**
 * Options shared by the file and in-memory entry points
 *
 * @public
 */
export interface ReduceOptions extends AccumulatorOptions {
  /** Regroup interleaved input by transcript id before reduction */
  groupByTranscript?: boolean;
  signal?: AbortSignal;
}

/**
 * File conversion options
 *
 * @public
 */
export interface ConvertOptions extends ReduceOptions {
  /** RefFlat destination, `<input>.refflat` by default; `.gz` compresses */
  outputPath?: string;
  /** Normalized intermediate destination, `<input>.gff3` by default */
  normalizedPath?: string;
  /** Write the normalized intermediate file (default true) */
  writeNormalized?: boolean;
}

/**
 * Resolved destinations of one conversion
 *
 * @public
 */
export interface OutputPaths {
  readonly outputPath: string;
  /** null when the intermediate file is turned off */
  readonly normalizedPath: string | null;
}

export interface ConversionSuccess {
  readonly success: true;
  readonly outputPath: string;
  readonly normalizedPath: string | null;
  readonly rowCount: number;
  readonly conflicts: readonly StrandConflict[];
}

export interface ConversionFailure {
  readonly success: false;
  /** "io" for file, stream and compression failures, "conversion" otherwise */
  readonly kind: "io" | "conversion";
  readonly error: AnnotationError;
}

/**
 * Outcome of {@link convertGtfToRefFlat}
 *
 * @public
 */
export type ConversionResult = ConversionSuccess | ConversionFailure;

/**
 * Outcome of {@link convertGtfString}
 *
 * @public
 */
export interface StringConversion {
  readonly refFlat: string;
  readonly normalized: string;
  readonly rows: readonly RefFlatRow[];
  readonly conflicts: readonly StrandConflict[];
}

interface Reduction {
  readonly rows: RefFlatRow[];
  readonly conflicts: readonly StrandConflict[];
}

/**
 * Output locations for an input path
 *
 * A trailing `.gz` on the input is dropped before the suffixes are added.
 *
 * @example
 * ```typescript
 * deriveOutputPaths("/data/genes.gtf.gz");
 * // => { outputPath: "/data/genes.gtf.refflat", normalizedPath: "/data/genes.gtf.gff3" }
 * ```
 *
 * @public
 */
export function deriveOutputPaths(
  inputPath: string,
  options: Pick<ConvertOptions, "outputPath" | "normalizedPath" | "writeNormalized"> = {}
): OutputPaths {
  const base = inputPath.replace(/\.gz$/i, "");
  return {
    outputPath: options.outputPath ?? `${base}.refflat`,
    normalizedPath:
      options.writeNormalized === false ? null : (options.normalizedPath ?? `${base}.gff3`),
  };
}

/**
 * Parse normalized lines and reduce them to rows
 */
async function reduceLines(
  normalizedLines: AsyncIterable<string>,
  options: ReduceOptions
): Promise<Reduction> {
  const parserOptions: FeatureParserOptions = {};
  if (options.signal !== undefined) parserOptions.signal = options.signal;
  if (options.onWarning !== undefined) parserOptions.onWarning = options.onWarning;

  const parser = new FeatureParser(parserOptions);
  const accumulator = new TranscriptAccumulator({
    onConflict: options.onConflict,
    onWarning: options.onWarning,
  });

  const features = parser.parseLines(normalizedLines);
  const ordered = options.groupByTranscript === true ? groupFeaturesByTranscript(features) : features;
  const rows = await collect(accumulateTranscripts(ordered, accumulator));

  return { rows, conflicts: accumulator.conflicts };
}

const TEE_FLUSH_SIZE = 65_536;

/**
 * Pass lines through while writing them to the intermediate file, `\n`-joined
 *
 * Writes are batched into chunks of about `flushSize` characters; the last
 * chunk is written once the source is drained.
 */
export async function* teeToFile(
  lines: AsyncIterable<string>,
  handle: FileWriteHandle,
  flushSize: number = TEE_FLUSH_SIZE
): AsyncIterable<string> {
  let pending = "";
  let first = true;
  for await (const line of lines) {
    pending += first ? line : `\n${line}`;
    first = false;
    if (pending.length >= flushSize) {
      await handle.writeString(pending);
      pending = "";
    }
    yield line;
  }
  if (pending !== "") {
    await handle.writeString(pending);
  }
}

function isIoError(error: AnnotationError): boolean {
  return (
    error instanceof FileError ||
    error instanceof CompressionError ||
    error instanceof StreamError ||
    error instanceof BufferError
  );
}

function toFailure(error: unknown): ConversionFailure {
  const annotationError =
    error instanceof AnnotationError
      ? error
      : new AnnotationError(error instanceof Error ? error.message : String(error), "UNKNOWN_ERROR");

  return {
    success: false,
    kind: isIoError(annotationError) ? "io" : "conversion",
    error: annotationError,
  };
}

function validateConvertOptions(options: ConvertOptions): void {
  const validationResult = ConvertOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid conversion options: ${validationResult.summary}`);
  }
}

/**
 * Convert a GTF file (plain or gzip) to a RefFlat file
 *
 * Input and output paths are resolved against the working directory first,
 * so `../genes.gtf` is accepted.
 *
 * @example
 * ```typescript
 * const result = await convertGtfToRefFlat("genes.gtf", { writeNormalized: false });
 * if (result.success) {
 *   console.log(`${result.rowCount} transcripts written to ${result.outputPath}`);
 * } else {
 *   console.error(result.kind, result.error.toString());
 * }
 * ```
 *
 * @public
 */
export async function convertGtfToRefFlat(
  inputPath: string,
  options: ConvertOptions = {}
): Promise<ConversionResult> {
  try {
    validateConvertOptions(options);
    const sourcePath = resolve(inputPath);
    const paths = deriveOutputPaths(sourcePath, {
      outputPath: options.outputPath === undefined ? undefined : resolve(options.outputPath),
      normalizedPath:
        options.normalizedPath === undefined ? undefined : resolve(options.normalizedPath),
      writeNormalized: options.writeNormalized,
    });
    const { signal } = options;

    const stream = await createStream(sourcePath, signal === undefined ? {} : { signal });
    const normalizedLines = normalizeGtfLines(readLines(stream));

    const { normalizedPath } = paths;
    const reduction =
      normalizedPath === null
        ? await reduceLines(normalizedLines, options)
        : await openForWriting(normalizedPath, (handle) =>
            reduceLines(teeToFile(normalizedLines, handle), options)
          );

    await writeString(paths.outputPath, new RefFlatWriter().formatRows(reduction.rows));

    return {
      success: true,
      outputPath: paths.outputPath,
      normalizedPath,
      rowCount: reduction.rows.length,
      conflicts: reduction.conflicts,
    };
  } catch (error) {
    return toFailure(error);
  }
}

/**
 * Convert GTF text in memory
 *
 * @throws {ParseError} On malformed lines
 * @throws {ValidationError} On invalid options or a transcript with no interval
 *
 * @public
 */
export async function convertGtfString(
  text: string,
  options: ReduceOptions = {}
): Promise<StringConversion> {
  validateConvertOptions(options);

  const normalized = await collect(normalizeGtfLines(fromIterable(text.split(/\r?\n/))));
  const { rows, conflicts } = await reduceLines(fromIterable(normalized), options);

  return {
    refFlat: new RefFlatWriter().formatRows(rows),
    normalized: normalized.join("\n"),
    rows,
    conflicts,
  };
}

/**
 * Unwrap a conversion result
 *
 * @throws {GtfConversionError} Carrying the failure's kind and error as cause
 *
 * @public
 */
export function assertConverted(result: ConversionResult): ConversionSuccess {
  if (!result.success) {
    throw new GtfConversionError(result.kind, result.error);
  }
  return result;
}
