/**
 * GTF to RefFlat reduction
 *
 * @module refflat
 */

export type { AccumulatorOptions, AccumulatorPhase } from "./accumulator";
export { accumulateTranscripts, TranscriptAccumulator } from "./accumulator";
export { resolveCdsBounds } from "./cds";
export type {
  ConversionFailure,
  ConversionResult,
  ConversionSuccess,
  ConvertOptions,
  OutputPaths,
  ReduceOptions,
  StringConversion,
} from "./convert";
export { assertConverted, convertGtfString, convertGtfToRefFlat, deriveOutputPaths } from "./convert";
export { finalizeTranscript } from "./finalize";
export { groupFeaturesByTranscript } from "./group";
export { addFeatureInterval, flushMergeInterval } from "./intervals";
export type { StrandConflict, TranscriptState } from "./state";
export { createTranscriptState } from "./state";
