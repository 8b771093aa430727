/**
 * Transcript finalization into a RefFlat row
 *
 * @module refflat/finalize
 */

import { ValidationError } from "../../errors";
import type { RefFlatRow } from "../../formats/refflat/types";
import { flushMergeInterval } from "./intervals";
import type { TranscriptState } from "./state";

const ascending = (a: number, b: number): number => a - b;

/**
 * Close a transcript and build its row
 *
 * Starts and ends are sorted independently. Unresolved CDS bounds fall back
 * to the transcript extent.
 *
 * @throws {ValidationError} If the transcript collected no interval
 */
export function finalizeTranscript(state: TranscriptState): RefFlatRow {
  flushMergeInterval(state);

  const exonStarts = [...state.exonStarts].sort(ascending);
  const exonEnds = [...state.exonEnds].sort(ascending);
  const txStart = exonStarts[0];
  const txEnd = exonEnds[exonEnds.length - 1];

  if (txStart === undefined || txEnd === undefined) {
    throw new ValidationError(
      `Transcript '${state.transcriptId}' has no intervals`,
      undefined,
      `Gene: ${state.geneId}, chromosome: ${state.chromosome}`
    );
  }

  return {
    geneName: state.geneId,
    transcriptName: state.transcriptId,
    chromosome: state.chromosome,
    strand: state.strand,
    txStart,
    txEnd,
    cdsStart: state.cdsStart === null ? txStart : state.cdsStart - 1,
    cdsEnd: state.cdsEnd ?? txEnd,
    exonCount: exonStarts.length,
    exonStarts,
    exonEnds,
  };
}
