#!/usr/bin/env -S npx tsx
/**
 * Getting started with gtf-refflat
 *
 * Converts a small in-memory annotation, then walks the same stages by hand.
 * Run with `npx tsx examples/getting-started.ts`.
 */

import {
  convertGtfString,
  FeatureParser,
  fromIterable,
  normalizeGtfLines,
  RefFlatWriter,
  TranscriptAccumulator,
} from "../src";

const ANNOTATION = [
  "#!genome-build example",
  'chr1\tdemo\texon\t1001\t1200\t.\t+\t.\tgene_id "GENE_A"; transcript_id "GENE_A.1";',
  'chr1\tdemo\tstart_codon\t1051\t1053\t.\t+\t0\tgene_id "GENE_A"; transcript_id "GENE_A.1";',
  'chr1\tdemo\texon\t1501\t1700\t.\t+\t.\tgene_id "GENE_A"; transcript_id "GENE_A.1";',
  'chr1\tdemo\tstop_codon\t1601\t1603\t.\t+\t0\tgene_id "GENE_A"; transcript_id "GENE_A.1";',
  'chr2\tdemo\texon\t501\t900\t.\t-\t.\tgene_id "GENE_B"; transcript_id "GENE_B.1";',
].join("\n");

async function oneCall(): Promise<void> {
  console.log("\n1. One call\n");

  const { refFlat, conflicts } = await convertGtfString(ANNOTATION);
  console.log(refFlat);
  console.log(`\n${conflicts.length} strand conflicts`);
}

async function stageByStage(): Promise<void> {
  console.log("\n2. Stage by stage\n");

  const parser = new FeatureParser();
  const accumulator = new TranscriptAccumulator();
  const writer = new RefFlatWriter();

  const normalized = normalizeGtfLines(fromIterable(ANNOTATION.split("\n")));
  for await (const feature of parser.parseLines(normalized)) {
    console.log(`  ${feature.transcriptId} ${feature.type} ${feature.start}-${feature.end}`);
    const row = accumulator.push(feature);
    if (row !== null) console.log(`  => ${writer.formatRow(row)}`);
  }

  const last = accumulator.finish();
  if (last !== null) console.log(`  => ${writer.formatRow(last)}`);
}

await oneCall();
await stageByStage();
