/**
 * Tests for transcript finalization
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../../src/errors";
import { finalizeTranscript } from "../../../src/operations/refflat/finalize";
import { addFeatureInterval } from "../../../src/operations/refflat/intervals";
import { createTranscriptState } from "../../../src/operations/refflat/state";
import { feature } from "./helpers";

describe("finalizeTranscript", () => {
  test("should sort exons and fall back to the transcript extent for CDS", () => {
    const state = createTranscriptState(feature());
    addFeatureInterval(state, "exon", 200, 250);
    addFeatureInterval(state, "exon", 100, 150);

    expect(finalizeTranscript(state)).toEqual({
      geneName: "G1",
      transcriptName: "T1",
      chromosome: "chr1",
      strand: "+",
      txStart: 100,
      txEnd: 250,
      cdsStart: 100,
      cdsEnd: 250,
      exonCount: 2,
      exonStarts: [100, 200],
      exonEnds: [150, 250],
    });
  });

  test("should convert a resolved CDS start back to zero-based", () => {
    const state = createTranscriptState(feature());
    addFeatureInterval(state, "exon", 100, 300);
    state.cdsStart = 121;
    state.cdsEnd = 230;

    expect(finalizeTranscript(state)).toMatchObject({ cdsStart: 120, cdsEnd: 230 });
  });

  test("should sort starts and ends independently", () => {
    const state = createTranscriptState(feature());
    addFeatureInterval(state, "exon", 100, 300);
    addFeatureInterval(state, "exon", 150, 200);

    expect(finalizeTranscript(state)).toMatchObject({
      exonStarts: [100, 150],
      exonEnds: [200, 300],
    });
  });

  test("should flush the backbone of a transcript without exons", () => {
    const state = createTranscriptState(feature({ type: "cds" }));
    addFeatureInterval(state, "cds", 10, 20);
    addFeatureInterval(state, "cds", 40, 50);

    expect(finalizeTranscript(state)).toMatchObject({
      txStart: 10,
      txEnd: 50,
      exonCount: 2,
      exonStarts: [10, 40],
      exonEnds: [20, 50],
    });
  });

  test("should reject a transcript without intervals", () => {
    const state = createTranscriptState(feature());

    expect(() => finalizeTranscript(state)).toThrow(ValidationError);
    expect(() => finalizeTranscript(state)).toThrow("Transcript 'T1' has no intervals");
  });
});
