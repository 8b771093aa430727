/**
 * Exon interval collection
 *
 * Exon records are taken as-is. Transcripts without any exon record get a
 * backbone built by merging their other features' intervals.
 *
 * @module refflat/intervals
 */

import type { TranscriptState } from "./state";

/**
 * Merge one feature interval into the transcript's exon lists
 *
 * The first exon record discards any backbone collected so far. Non-exon
 * features extend the running interval when `start <= runningEnd` or
 * `end <= runningEnd`, otherwise the running interval is pushed and a new one
 * is seeded; they are ignored once an exon has been seen. Duplicates and
 * unsorted appends are kept.
 */
export function addFeatureInterval(
  state: TranscriptState,
  type: string,
  start: number,
  end: number
): void {
  if (type === "exon") {
    if (!state.hasExonRecord) {
      state.mergeStart = null;
      state.mergeEnd = null;
      state.exonStarts.length = 0;
      state.exonEnds.length = 0;
      state.hasExonRecord = true;
    }
    state.exonStarts.push(start);
    state.exonEnds.push(end);
    return;
  }

  if (state.hasExonRecord) {
    return;
  }

  if (state.mergeStart === null || state.mergeEnd === null) {
    state.mergeStart = start;
    state.mergeEnd = end;
  } else if (start <= state.mergeEnd || end <= state.mergeEnd) {
    state.mergeStart = Math.min(state.mergeStart, start);
    state.mergeEnd = Math.max(state.mergeEnd, end);
  } else {
    state.exonStarts.push(state.mergeStart);
    state.exonEnds.push(state.mergeEnd);
    state.mergeStart = start;
    state.mergeEnd = end;
  }
}

/**
 * Push the pending backbone interval, if any, and clear it
 */
export function flushMergeInterval(state: TranscriptState): void {
  if (state.hasExonRecord || state.mergeStart === null || state.mergeEnd === null) {
    return;
  }
  state.exonStarts.push(state.mergeStart);
  state.exonEnds.push(state.mergeEnd);
  state.mergeStart = null;
  state.mergeEnd = null;
}
