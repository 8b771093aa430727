/**
 * GTF feature type definitions
 *
 * @module gtf/types
 */

import type { ParserOptions, Strand } from "../../types";

/**
 * Feature types the refFlat reduction treats specially (lower-cased column 3)
 *
 * @public
 */
export type KnownFeatureType = "exon" | "cds" | "start_codon" | "stop_codon";

/**
 * One parsed annotation line
 *
 * Coordinates are zero-based half-open: `start` is the source start minus
 * one, `end` is the source end unchanged.
 *
 * @public
 */
export interface FeatureRecord {
  /** Chromosome or contig name (column 1) */
  readonly contig: string;
  /** Zero-based inclusive start */
  readonly start: number;
  /** Exclusive end */
  readonly end: number;
  readonly strand: Strand;
  /** Feature type, lower-cased ("exon", "cds", "start_codon", ...) */
  readonly type: KnownFeatureType | (string & {});
  /** Gene identifier, empty when the line carried none */
  readonly geneId: string;
  readonly transcriptId: string;
  /** Source line number for debugging */
  readonly lineNumber?: number;
}

/**
 * Feature parser configuration options
 *
 * @public
 */
export type FeatureParserOptions = ParserOptions;

/**
 * Attribute keys recognised in source GTF lines and the keys they map to in
 * the normalized attribute column
 *
 * @public
 */
export const GTF_ATTRIBUTE_KEYS = {
  gene_id: "ID",
  transcript_id: "transcript_id",
} as const;

/**
 * Keys read back from the normalized attribute column
 *
 * @public
 */
export const NORMALIZED_KEYS = {
  GENE_ID: GTF_ATTRIBUTE_KEYS.gene_id,
  TRANSCRIPT_ID: GTF_ATTRIBUTE_KEYS.transcript_id,
} as const;

/**
 * GTF layout constants
 *
 * @public
 */
export const GTF_LIMITS = {
  /** Columns per annotation line */
  COLUMN_COUNT: 9,
  /** Minimum coordinate value - GTF is 1-based */
  MIN_COORDINATE: 1,
  COMMENT_PREFIX: "#",
} as const;
