/**
 * Stable regrouping of interleaved features by transcript id
 *
 * @module refflat/group
 */

import type { FeatureRecord } from "../../formats/gtf/types";

/**
 * Re-emit features so that each transcript's records are contiguous
 *
 * Buffers the whole input. Groups come out in order of first appearance and
 * records keep their input order within a group.
 *
 * @public
 */
export async function* groupFeaturesByTranscript(
  features: AsyncIterable<FeatureRecord>
): AsyncIterable<FeatureRecord> {
  const groups = new Map<string, FeatureRecord[]>();

  for await (const feature of features) {
    const group = groups.get(feature.transcriptId);
    if (group === undefined) {
      groups.set(feature.transcriptId, [feature]);
    } else {
      group.push(feature);
    }
  }

  for (const group of groups.values()) {
    yield* group;
  }
}
