/**
 * Per-transcript accumulation state
 *
 * @module refflat/state
 */

import type { FeatureRecord } from "../../formats/gtf/types";
import type { Strand } from "../../types";

/**
 * Mutable working state for the transcript being accumulated
 *
 * `exonStarts` and `exonEnds` always have equal length. `null` CDS bounds are
 * unresolved. The merge interval is only used while `hasExonRecord` is false.
 *
 * @public
 */
export interface TranscriptState {
  geneId: string;
  readonly transcriptId: string;
  chromosome: string;
  strand: Strand;
  /** Type of the last feature merged */
  type: string;
  readonly exonStarts: number[];
  readonly exonEnds: number[];
  /** One-based once resolved; converted back on finalization */
  cdsStart: number | null;
  cdsEnd: number | null;
  stopCodonSeen: boolean;
  hasExonRecord: boolean;
  mergeStart: number | null;
  mergeEnd: number | null;
}

/**
 * Strand disagreement inside one transcript
 *
 * @public
 */
export interface StrandConflict {
  readonly transcriptId: string;
  /** Strand of the transcript's earlier features */
  readonly expected: Strand;
  readonly found: Strand;
  readonly lineNumber: number | undefined;
}

/**
 * Fresh state for the transcript a feature opens
 *
 * Nothing is merged yet; the caller applies the feature afterwards.
 */
export function createTranscriptState(feature: FeatureRecord): TranscriptState {
  return {
    geneId: feature.geneId,
    transcriptId: feature.transcriptId,
    chromosome: feature.contig,
    strand: feature.strand,
    type: feature.type,
    exonStarts: [],
    exonEnds: [],
    cdsStart: null,
    cdsEnd: null,
    stopCodonSeen: false,
    hasExonRecord: false,
    mergeStart: null,
    mergeEnd: null,
  };
}
