/**
 * Tests for GTF attribute normalization and normalized line parsing
 */

import { describe, expect, test, vi } from "vitest";
import { ParseError, ValidationError } from "../../src/errors";
import {
  FeatureParser,
  isSkippableGtfLine,
  normalizeGtfLine,
  normalizeGtfLines,
  parseNormalizedAttributes,
  parseNormalizedLine,
} from "../../src/formats/gtf";
import { collect, fromIterable } from "../../src/io/stream-utils";

const EXON_LINE = 'chr1\tsrc\texon\t101\t200\t.\t+\t.\tgene_id "G1"; transcript_id "T1";';

describe("normalizeGtfLine", () => {
  test("should rewrite gene and transcript ids into key=value form", () => {
    expect(normalizeGtfLine(EXON_LINE)).toBe(
      "chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1"
    );
  });

  test("should drop unrecognised attributes", () => {
    const line =
      'chr1\tsrc\texon\t101\t200\t.\t+\t.\tgene_id "G1"; gene_name "ABC"; transcript_id "T1"; exon_number "1";';

    expect(normalizeGtfLine(line)).toBe("chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1");
  });

  test("should leave the column alone when there is no trailing semicolon", () => {
    const line = 'chr1\tsrc\texon\t101\t200\t.\t+\t.\tgene_id "G1"; transcript_id "T1"';

    expect(normalizeGtfLine(line)).toBe("chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1");
  });

  test("should produce an empty attribute column when no id is present", () => {
    const line = 'chr1\tsrc\tgene\t101\t200\t.\t+\t.\tgene_name "ABC";';

    expect(normalizeGtfLine(line)).toBe("chr1\tsrc\tgene\t101\t200\t.\t+\t.\t");
  });

  test("should reject a key without a value", () => {
    const line = "chr1\tsrc\texon\t101\t200\t.\t+\t.\tgene_id";

    expect(() => normalizeGtfLine(line, 7)).toThrow(ParseError);
    expect(() => normalizeGtfLine(line, 7)).toThrow("Attribute 'gene_id' has no value");
  });
});

describe("isSkippableGtfLine", () => {
  test("should skip blank and comment lines only", () => {
    expect(isSkippableGtfLine("")).toBe(true);
    expect(isSkippableGtfLine("   ")).toBe(true);
    expect(isSkippableGtfLine("#!genome-build test")).toBe(true);
    expect(isSkippableGtfLine(EXON_LINE)).toBe(false);
  });
});

describe("normalizeGtfLines", () => {
  test("should drop comments and blank lines", async () => {
    const lines = await collect(normalizeGtfLines(fromIterable(["#header", "", EXON_LINE])));

    expect(lines).toEqual(["chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1"]);
  });

  test("should report the source line number on failure", async () => {
    const source = fromIterable(["#header", "chr1\tsrc\texon\t1\t2\t.\t+\t.\ttranscript_id"]);

    const error = await collect(normalizeGtfLines(source)).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ lineNumber: 2, format: "GTF" });
  });
});

describe("parseNormalizedAttributes", () => {
  test("should split pairs on the first equals sign", () => {
    const attributes = parseNormalizedAttributes("ID=G1;transcript_id=T1;junk;=x;k=a=b");

    expect([...attributes.entries()]).toEqual([
      ["ID", "G1"],
      ["transcript_id", "T1"],
      ["k", "a=b"],
    ]);
  });
});

describe("parseNormalizedLine", () => {
  test("should convert to zero-based starts and lower-case types", () => {
    const feature = parseNormalizedLine("chr1\tsrc\tCDS\t101\t200\t.\t-\t0\tID=G1;transcript_id=T1", 3);

    expect(feature).toEqual({
      contig: "chr1",
      start: 100,
      end: 200,
      strand: "-",
      type: "cds",
      geneId: "G1",
      transcriptId: "T1",
      lineNumber: 3,
    });
  });

  test("should return null without a transcript id", () => {
    expect(parseNormalizedLine("chr1\tsrc\tgene\t101\t200\t.\t+\t.\tID=G1", 1)).toBeNull();
  });

  test("should default a missing gene id to an empty string", () => {
    const feature = parseNormalizedLine("chr1\tsrc\texon\t5\t5\t.\t.\t.\ttranscript_id=T1", 1);

    expect(feature).toMatchObject({ geneId: "", strand: ".", start: 4, end: 5 });
  });

  test("should require nine columns", () => {
    expect(() => parseNormalizedLine("chr1\tsrc\texon\t1\t2\t.\t+\tID=G1", 1)).toThrow(
      "Expected 9 tab-separated columns, found 8"
    );
  });

  test("should reject malformed coordinates", () => {
    expect(() =>
      parseNormalizedLine("chr1\tsrc\texon\tabc\t200\t.\t+\t.\ttranscript_id=T1", 1)
    ).toThrow("Invalid start coordinate 'abc'");
    expect(() =>
      parseNormalizedLine("chr1\tsrc\texon\t0\t10\t.\t+\t.\ttranscript_id=T1", 1)
    ).toThrow("Invalid interval 0-10");
    expect(() =>
      parseNormalizedLine("chr1\tsrc\texon\t20\t10\t.\t+\t.\ttranscript_id=T1", 1)
    ).toThrow("Invalid interval 20-10");
  });

  test("should reject unknown strand symbols", () => {
    expect(() =>
      parseNormalizedLine("chr1\tsrc\texon\t1\t10\t.\t?\t.\ttranscript_id=T1", 9)
    ).toThrow(ParseError);
  });
});

describe("FeatureParser", () => {
  test("should count skipped lines when numbering features", async () => {
    const parser = new FeatureParser();
    const text = [
      "#comment",
      "",
      "chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1",
      "chr1\tsrc\texon\t301\t400\t.\t+\t.\tID=G1;transcript_id=T1",
    ].join("\n");

    const features = await collect(parser.parseString(text));

    expect(features.map((f) => f.lineNumber)).toEqual([3, 4]);
  });

  test("should warn about transcript-level features without a transcript id", async () => {
    const onWarning = vi.fn();
    const parser = new FeatureParser({ onWarning });
    const text = [
      "chr1\tsrc\tgene\t1\t500\t.\t+\t.\tID=G1",
      "chr1\tsrc\texon\t1\t10\t.\t+\t.\tID=G1",
    ].join("\n");

    const features = await collect(parser.parseString(text));

    expect(features).toEqual([]);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith("exon has no transcript_id and was skipped", 2);
  });

  test("should omit line numbers when tracking is off", async () => {
    const parser = new FeatureParser({ trackLineNumbers: false });

    const [feature] = await collect(
      parser.parseString("chr1\tsrc\texon\t1\t10\t.\t+\t.\ttranscript_id=T1")
    );

    expect(feature?.lineNumber).toBeUndefined();
  });

  test("should parse a byte stream", async () => {
    const bytes = new TextEncoder().encode("chr2\tsrc\texon\t11\t20\t.\t-\t.\tID=G2;transcript_id=T2\n");
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes);
        controller.close();
      },
    });

    const features = await collect(new FeatureParser().parse(stream));

    expect(features).toHaveLength(1);
    expect(features[0]).toMatchObject({ contig: "chr2", start: 10, end: 20, transcriptId: "T2" });
  });

  test("should stop when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const parser = new FeatureParser({ signal: controller.signal });

    await expect(
      collect(parser.parseString("chr1\tsrc\texon\t1\t10\t.\t+\t.\ttranscript_id=T1"))
    ).rejects.toThrow("Operation aborted during GTF parsing");
  });

  test("should report lines over the length limit", async () => {
    const parser = new FeatureParser({ maxLineLength: 10 });

    await expect(
      collect(parser.parseString("chr1\tsrc\texon\t1\t10\t.\t+\t.\ttranscript_id=T1"))
    ).rejects.toThrow("Line too long");
  });

  test("should validate options", () => {
    expect(() => new FeatureParser({ maxLineLength: -5 })).toThrow(ValidationError);
    expect(() => new FeatureParser({ maxLineLength: 20_000_000 })).toThrow(ValidationError);
  });
});
