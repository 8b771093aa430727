/**
 * Coding-region bounds from codon and CDS records
 *
 * On the forward strand the start codon opens the coding region and the stop
 * codon closes it; on any other strand the roles swap. `cdsStart` is kept
 * one-based until finalization.
 *
 * @module refflat/cds
 */

import type { TranscriptState } from "./state";

export function resolveCdsBounds(
  state: TranscriptState,
  type: string,
  start: number,
  end: number
): void {
  if (state.strand === "+") {
    if (type === "start_codon") {
      state.cdsStart = start + 1;
    } else if (type === "stop_codon") {
      state.cdsEnd = end;
      state.stopCodonSeen = true;
    }
  } else if (type === "stop_codon") {
    state.cdsStart = start + 1;
  } else if (type === "start_codon") {
    state.cdsEnd = end;
    state.stopCodonSeen = true;
  }

  if (type === "cds") {
    if (state.cdsStart === null) {
      state.cdsStart = start + 1;
    }
    // last CDS wins until a closing codon is seen
    if (!state.stopCodonSeen) {
      state.cdsEnd = end;
    }
  }
}
