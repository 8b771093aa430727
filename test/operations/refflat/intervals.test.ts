/**
 * Tests for exon interval collection and backbone merging
 */

import { describe, expect, test } from "vitest";
import { addFeatureInterval, flushMergeInterval } from "../../../src/operations/refflat/intervals";
import { createTranscriptState } from "../../../src/operations/refflat/state";
import { feature } from "./helpers";

describe("addFeatureInterval", () => {
  test("should append exon records as they arrive", () => {
    const state = createTranscriptState(feature());

    addFeatureInterval(state, "exon", 200, 250);
    addFeatureInterval(state, "exon", 100, 150);

    expect(state.exonStarts).toEqual([200, 100]);
    expect(state.exonEnds).toEqual([250, 150]);
    expect(state.hasExonRecord).toBe(true);
  });

  test("should merge overlapping non-exon intervals into a backbone", () => {
    const state = createTranscriptState(feature({ type: "cds" }));

    addFeatureInterval(state, "cds", 10, 20);
    addFeatureInterval(state, "cds", 15, 30);
    expect(state).toMatchObject({ mergeStart: 10, mergeEnd: 30, exonStarts: [] });

    addFeatureInterval(state, "cds", 40, 50);
    expect(state).toMatchObject({ mergeStart: 40, mergeEnd: 50, exonStarts: [10], exonEnds: [30] });

    flushMergeInterval(state);
    expect(state).toMatchObject({
      mergeStart: null,
      mergeEnd: null,
      exonStarts: [10, 40],
      exonEnds: [30, 50],
    });
  });

  test("should extend when the end falls inside the running interval", () => {
    const state = createTranscriptState(feature({ type: "cds" }));

    addFeatureInterval(state, "cds", 100, 200);
    addFeatureInterval(state, "cds", 250, 180);

    expect(state).toMatchObject({ mergeStart: 100, mergeEnd: 200, exonStarts: [] });
  });

  test("should discard the backbone once an exon arrives", () => {
    const state = createTranscriptState(feature({ type: "cds" }));

    addFeatureInterval(state, "cds", 10, 20);
    addFeatureInterval(state, "cds", 40, 50);
    addFeatureInterval(state, "exon", 100, 150);
    addFeatureInterval(state, "cds", 300, 400);
    flushMergeInterval(state);

    expect(state.exonStarts).toEqual([100]);
    expect(state.exonEnds).toEqual([150]);
    expect(state.mergeStart).toBeNull();
  });

  test("should keep duplicate exons", () => {
    const state = createTranscriptState(feature());

    addFeatureInterval(state, "exon", 100, 150);
    addFeatureInterval(state, "exon", 100, 150);

    expect(state.exonStarts).toEqual([100, 100]);
  });
});
