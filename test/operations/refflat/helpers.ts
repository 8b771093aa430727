import type { FeatureRecord } from "../../../src/formats/gtf/types";

/**
 * Build a feature with test defaults
 */
export function feature(overrides: Partial<FeatureRecord> = {}): FeatureRecord {
  return {
    contig: "chr1",
    start: 100,
    end: 200,
    strand: "+",
    type: "exon",
    geneId: "G1",
    transcriptId: "T1",
    lineNumber: 1,
    ...overrides,
  };
}
