/**
 * TranscriptAccumulator - contiguous grouping of features into transcripts
 *
 * Consumes features in order and emits one row each time the transcript id
 * changes. Features of one transcript are expected to arrive contiguously;
 * see {@link groupFeaturesByTranscript} for input that does not.
 *
 * A transcript whose features disagree on strand is dropped: the conflict is
 * reported, the id is flagged for the rest of the run and no row is emitted
 * for it, even if the id shows up again later.
 *
 * @module refflat/accumulator
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { FeatureRecord } from "../../formats/gtf/types";
import type { RefFlatRow } from "../../formats/refflat/types";
import { resolveCdsBounds } from "./cds";
import { finalizeTranscript } from "./finalize";
import { addFeatureInterval } from "./intervals";
import type { StrandConflict, TranscriptState } from "./state";
import { createTranscriptState } from "./state";

const AccumulatorOptionsSchema = type({
  "onConflict?": "Function | undefined",
  "onWarning?": "Function | undefined",
});

/**
 * Accumulator configuration
 *
 * @public
 */
export interface AccumulatorOptions {
  /** Called once per strand conflict, before the warning hook */
  onConflict?: (conflict: StrandConflict) => void;
  /** Warning handler, defaults to console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Where the accumulator stands between features
 *
 * @public
 */
export type AccumulatorPhase =
  | { readonly kind: "idle" }
  | { readonly kind: "accumulating"; readonly state: TranscriptState }
  | { readonly kind: "ignoring"; readonly transcriptId: string };

function applyFeature(state: TranscriptState, feature: FeatureRecord): void {
  state.geneId = feature.geneId;
  state.chromosome = feature.contig;
  state.strand = feature.strand;
  state.type = feature.type;
  addFeatureInterval(state, feature.type, feature.start, feature.end);
  resolveCdsBounds(state, feature.type, feature.start, feature.end);
}

/**
 * Single-pass state machine turning features into RefFlat rows
 *
 * @example
 * ```typescript
 * const accumulator = new TranscriptAccumulator();
 * for await (const feature of features) {
 *   const row = accumulator.push(feature);
 *   if (row !== null) rows.push(row);
 * }
 * const last = accumulator.finish();
 * if (last !== null) rows.push(last);
 * ```
 *
 * @public
 */
export class TranscriptAccumulator {
  private current: AccumulatorPhase = { kind: "idle" };
  private readonly ignoredIds = new Set<string>();
  private readonly recordedConflicts: StrandConflict[] = [];
  private readonly onConflict: ((conflict: StrandConflict) => void) | undefined;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;

  constructor(options: AccumulatorOptions = {}) {
    const validationResult = AccumulatorOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid accumulator options: ${validationResult.summary}`);
    }

    this.onConflict = options.onConflict;
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`refFlat Warning (line ${lineNumber}): ${warning}`);
      });
  }

  get phase(): AccumulatorPhase {
    return this.current;
  }

  /**
   * Strand conflicts seen so far, in input order
   */
  get conflicts(): readonly StrandConflict[] {
    return this.recordedConflicts;
  }

  /**
   * Feed the next feature
   *
   * @returns The row of the transcript this feature closed, if any
   * @throws {ValidationError} If the closed transcript has no intervals
   */
  push(feature: FeatureRecord): RefFlatRow | null {
    const phase = this.current;

    if (phase.kind === "accumulating" && phase.state.transcriptId === feature.transcriptId) {
      if (phase.state.strand !== feature.strand) {
        this.reportConflict(phase.state, feature);
        this.ignoredIds.add(feature.transcriptId);
        this.current = { kind: "ignoring", transcriptId: feature.transcriptId };
      } else {
        applyFeature(phase.state, feature);
      }
      return null;
    }

    if (phase.kind === "ignoring" && phase.transcriptId === feature.transcriptId) {
      return null;
    }

    const finished = phase.kind === "accumulating" ? finalizeTranscript(phase.state) : null;

    if (this.ignoredIds.has(feature.transcriptId)) {
      this.current = { kind: "ignoring", transcriptId: feature.transcriptId };
    } else {
      const state = createTranscriptState(feature);
      applyFeature(state, feature);
      this.current = { kind: "accumulating", state };
    }

    return finished;
  }

  /**
   * Close the live transcript at end of input
   *
   * @returns Its row, or null when nothing is being accumulated
   */
  finish(): RefFlatRow | null {
    const phase = this.current;
    this.current = { kind: "idle" };
    return phase.kind === "accumulating" ? finalizeTranscript(phase.state) : null;
  }

  private reportConflict(state: TranscriptState, feature: FeatureRecord): void {
    const conflict: StrandConflict = {
      transcriptId: feature.transcriptId,
      expected: state.strand,
      found: feature.strand,
      lineNumber: feature.lineNumber,
    };
    this.recordedConflicts.push(conflict);
    this.onConflict?.(conflict);
    this.onWarning(
      `Transcript '${conflict.transcriptId}' dropped: all group members must be on the same strand (expected ${conflict.expected}, found ${conflict.found})`,
      conflict.lineNumber
    );
  }
}

/**
 * Reduce an ordered feature stream to RefFlat rows
 *
 * @param features Features with each transcript's records contiguous
 * @param accumulator Accumulator to drive; pass one to read its conflicts afterwards
 * @yields One row per transcript, in order of first appearance
 *
 * @public
 */
export async function* accumulateTranscripts(
  features: AsyncIterable<FeatureRecord>,
  accumulator: TranscriptAccumulator = new TranscriptAccumulator()
): AsyncIterable<RefFlatRow> {
  for await (const feature of features) {
    const row = accumulator.push(feature);
    if (row !== null) {
      yield row;
    }
  }

  const last = accumulator.finish();
  if (last !== null) {
    yield last;
  }
}
