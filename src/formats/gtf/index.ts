/**
 * GTF module exports
 *
 * Two stages: {@link normalizeGtfLines} rewrites raw GTF lines into the
 * compact attribute syntax, {@link FeatureParser} reads those lines back as
 * typed features.
 *
 * @example
 * ```typescript
 * import { FeatureParser, normalizeGtfLines } from "./formats/gtf";
 *
 * const parser = new FeatureParser();
 * for await (const feature of parser.parseLines(normalizeGtfLines(rawLines))) {
 *   console.log(`${feature.contig}:${feature.start}-${feature.end}`);
 * }
 * ```
 *
 * @module gtf
 */

export { isSkippableGtfLine, normalizeGtfLine, normalizeGtfLines } from "./attributes";
export { FeatureParser, parseNormalizedAttributes, parseNormalizedLine } from "./parser";
export type { FeatureParserOptions, FeatureRecord, KnownFeatureType } from "./types";
export { GTF_ATTRIBUTE_KEYS, GTF_LIMITS, NORMALIZED_KEYS } from "./types";
