/**
 * gtf-refflat - GTF annotation to RefFlat table conversion
 *
 * @example
 * ```typescript
 * import { assertConverted, convertGtfToRefFlat } from "gtf-refflat";
 *
 * const { outputPath, rowCount } = assertConverted(await convertGtfToRefFlat("genes.gtf.gz"));
 * ```
 */

// Compression infrastructure
export {
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
  GzipDecompressor,
} from "./compression";
// Error types
export {
  AnnotationError,
  BufferError,
  CompressionError,
  FileError,
  GtfConversionError,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors";
// GTF parsing and RefFlat output
export {
  FeatureParser,
  type FeatureParserOptions,
  type FeatureRecord,
  GTF_ATTRIBUTE_KEYS,
  GTF_LIMITS,
  isSkippableGtfLine,
  type KnownFeatureType,
  NORMALIZED_KEYS,
  normalizeGtfLine,
  normalizeGtfLines,
  parseNormalizedAttributes,
  parseNormalizedLine,
  REFFLAT_FORMAT,
  type RefFlatRow,
  RefFlatWriter,
} from "./formats";
// File I/O
export { createStream, exists, getMetadata, readToString } from "./io/file-reader";
export { type FileWriteHandle, openForWriting, writeString } from "./io/file-writer";
export { collect, fromIterable, readLines } from "./io/stream-utils";
// Transcript reduction and conversion
export {
  type AccumulatorOptions,
  type AccumulatorPhase,
  accumulateTranscripts,
  addFeatureInterval,
  assertConverted,
  type ConversionFailure,
  type ConversionResult,
  type ConversionSuccess,
  type ConvertOptions,
  convertGtfString,
  convertGtfToRefFlat,
  createTranscriptState,
  deriveOutputPaths,
  finalizeTranscript,
  flushMergeInterval,
  groupFeaturesByTranscript,
  type OutputPaths,
  type ReduceOptions,
  resolveCdsBounds,
  type StrandConflict,
  type StringConversion,
  TranscriptAccumulator,
  type TranscriptState,
} from "./operations/refflat";
// Shared types
export type {
  CompressionFormat,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  Strand,
  WriteOptions,
} from "./types";
