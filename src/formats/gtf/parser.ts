/**
 * Normalized annotation line parser
 *
 * Reads the 9-column lines produced by {@link normalizeGtfLine} and turns them
 * into {@link FeatureRecord} values. Coordinates are shifted to zero-based
 * half-open on the way in.
 *
 * @module gtf/parser
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { fromIterable, readLines } from "../../io/stream-utils";
import type { Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { FeatureParserOptions, FeatureRecord, KnownFeatureType } from "./types";
import { GTF_LIMITS, NORMALIZED_KEYS } from "./types";

const FeatureParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > 10_000_000) {
    return ctx.reject("maxLineLength cannot exceed 10MB");
  }
  return true;
});

const TRANSCRIPT_LEVEL_TYPES: ReadonlySet<string> = new Set<KnownFeatureType>([
  "exon",
  "cds",
  "start_codon",
  "stop_codon",
]);

function isStrand(value: string): value is Strand {
  return value === "+" || value === "-" || value === ".";
}

/**
 * Parse one coordinate column, rejecting anything that is not a whole number
 */
function parseCoordinate(value: string, column: string, lineNumber: number, line: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ParseError(
      `Invalid ${column} coordinate '${value}'`,
      "GTF",
      lineNumber,
      `Line: ${line}`
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Split a normalized attribute column into key/value pairs
 *
 * Pairs are separated by `;` and split on the first `=`. Segments without `=`
 * are ignored; a repeated key keeps its last value.
 *
 * @example
 * ```typescript
 * parseNormalizedAttributes("ID=G1;transcript_id=T1");
 * // => Map { "ID" => "G1", "transcript_id" => "T1" }
 * ```
 *
 * @public
 */
export function parseNormalizedAttributes(column: string): Map<string, string> {
  const attributes = new Map<string, string>();

  for (const pair of column.split(";")) {
    const separator = pair.indexOf("=");
    if (separator <= 0) continue;
    attributes.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
  }

  return attributes;
}

/**
 * Parse one normalized line
 *
 * @returns The feature, or null when the line carries no transcript id
 * @throws {ParseError} On a wrong column count, a malformed coordinate, an
 *   inverted interval or an unknown strand symbol
 *
 * @public
 */
export function parseNormalizedLine(line: string, lineNumber: number): FeatureRecord | null {
  const fields = line.split("\t");
  if (fields.length !== GTF_LIMITS.COLUMN_COUNT) {
    throw new ParseError(
      `Expected ${GTF_LIMITS.COLUMN_COUNT} tab-separated columns, found ${fields.length}`,
      "GTF",
      lineNumber,
      `Line: ${line}`
    );
  }

  const [contig = "", , featureType = "", startText = "", endText = "", , strandText = ""] = fields;
  const attributeColumn = fields[8] ?? "";

  const start = parseCoordinate(startText, "start", lineNumber, line);
  const end = parseCoordinate(endText, "end", lineNumber, line);
  if (start < GTF_LIMITS.MIN_COORDINATE || end < start) {
    throw new ParseError(
      `Invalid interval ${start}-${end}: coordinates are 1-based and start must not exceed end`,
      "GTF",
      lineNumber,
      `Line: ${line}`
    );
  }

  if (!isStrand(strandText)) {
    throw new ParseError(
      `Invalid strand '${strandText}', expected '+', '-' or '.'`,
      "GTF",
      lineNumber,
      `Line: ${line}`
    );
  }

  const attributes = parseNormalizedAttributes(attributeColumn);
  const transcriptId = attributes.get(NORMALIZED_KEYS.TRANSCRIPT_ID);
  if (transcriptId === undefined) {
    return null;
  }

  return {
    contig,
    start: start - 1,
    end,
    strand: strandText,
    type: featureType.toLowerCase(),
    geneId: attributes.get(NORMALIZED_KEYS.GENE_ID) ?? "",
    transcriptId,
    lineNumber,
  };
}

/**
 * Streaming parser for normalized annotation lines
 *
 * @example
 * ```typescript
 * const parser = new FeatureParser();
 * for await (const feature of parser.parseLines(normalizeGtfLines(lines))) {
 *   console.log(feature.transcriptId, feature.start, feature.end);
 * }
 * ```
 *
 * @public
 */
export class FeatureParser extends AbstractParser<FeatureRecord, FeatureParserOptions> {
  constructor(options: FeatureParserOptions = {}) {
    const validationResult = FeatureParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid feature parser options: ${validationResult.summary}`);
    }

    super(options);
  }

  protected getFormatName(): string {
    return "GTF";
  }

  protected getDefaultOptions(): Partial<FeatureParserOptions> {
    return {};
  }

  /**
   * Parse features from normalized text
   */
  override async *parseString(data: string): AsyncIterable<FeatureRecord> {
    yield* this.parseLines(fromIterable(data.split(/\r?\n/)));
  }

  /**
   * Parse features from a normalized file (gzip accepted)
   */
  override async *parseFile(filePath: string): AsyncIterable<FeatureRecord> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }

    const { signal } = this.options;
    const stream = await createStream(filePath, signal === undefined ? {} : { signal });
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse features from a byte stream of normalized lines
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FeatureRecord> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse features from already-split normalized lines
   *
   * Blank and `#` lines are skipped but still counted. Lines without a
   * transcript id produce no record; exon, CDS and codon lines among them are
   * reported through `onWarning`.
   *
   * @throws {ParseError} On the first malformed line
   */
  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FeatureRecord> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.throwIfAborted("parsing");

      if (line.trim() === "" || line.startsWith(GTF_LIMITS.COMMENT_PREFIX)) {
        continue;
      }

      if (line.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      const feature = parseNormalizedLine(line, lineNumber);
      if (feature === null) {
        const featureType = (line.split("\t")[2] ?? "").toLowerCase();
        if (TRANSCRIPT_LEVEL_TYPES.has(featureType)) {
          this.options.onWarning(`${featureType} has no transcript_id and was skipped`, lineNumber);
        }
        continue;
      }

      yield this.options.trackLineNumbers ? feature : { ...feature, lineNumber: undefined };
    }
  }
}
