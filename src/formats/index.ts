/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FeatureParser, RefFlatWriter, normalizeGtfLines } from "../formats";
 * ```
 */

// GTF normalization and feature parsing
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
} from "./gtf";
// RefFlat output
export { REFFLAT_FORMAT, type RefFlatRow, RefFlatWriter } from "./refflat";
