/**
 * GTF attribute normalization
 *
 * Rewrites the attribute column of a GTF line from `key "value";` tokens into
 * the compact `key=value` syntax read back by {@link FeatureParser}, keeping
 * only the gene and transcript identifiers. Columns 1-8 are untouched.
 *
 * @example
 * ```typescript
 * normalizeGtfLine('chr1\tsrc\texon\t101\t200\t.\t+\t.\tgene_id "G1"; transcript_id "T1";');
 * // => 'chr1\tsrc\texon\t101\t200\t.\t+\t.\tID=G1;transcript_id=T1'
 * ```
 *
 * @module gtf/attributes
 */

import { ParseError } from "../../errors";
import { GTF_ATTRIBUTE_KEYS, GTF_LIMITS } from "./types";

type RecognisedKey = keyof typeof GTF_ATTRIBUTE_KEYS;

function isRecognisedKey(token: string): token is RecognisedKey {
  return token === "gene_id" || token === "transcript_id";
}

/**
 * Whether a raw GTF line carries no feature (blank or comment)
 *
 * @public
 */
export function isSkippableGtfLine(line: string): boolean {
  return line.trim() === "" || line.startsWith(GTF_LIMITS.COMMENT_PREFIX);
}

/**
 * Rewrite the attribute column of one GTF line
 *
 * The column is split on single spaces. Each `gene_id` / `transcript_id`
 * token consumes the token after it, quotes are removed from that value and a
 * `key=value` fragment is emitted; everything else is dropped. Fragments are
 * concatenated as-is, so the `;` ending each source value separates them, and
 * one trailing `;` is removed from the result.
 *
 * @param line Raw GTF line (not blank, not a comment)
 * @param lineNumber Source line number for error reporting
 * @throws {ParseError} If a recognised key has no value token
 *
 * @public
 */
export function normalizeGtfLine(line: string, lineNumber?: number): string {
  const columns = line.split("\t");
  const attributeColumn = columns.pop() ?? "";
  const tokens = attributeColumn.split(" ");
  let normalized = "";

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || !isRecognisedKey(token)) {
      continue;
    }

    const value = tokens[i + 1];
    if (value === undefined) {
      throw new ParseError(
        `Attribute '${token}' has no value`,
        "GTF",
        lineNumber,
        `Attribute column: ${attributeColumn}`
      );
    }
    normalized += `${GTF_ATTRIBUTE_KEYS[token]}=${value.replace(/"/g, "")}`;
    i++;
  }

  columns.push(normalized.endsWith(";") ? normalized.slice(0, -1) : normalized);
  return columns.join("\t");
}

/**
 * Normalize a stream of raw GTF lines, dropping blank and comment lines
 *
 * @param lines Raw GTF lines in file order
 * @yields One normalized line per retained input line
 * @throws {ParseError} If a line cannot be normalized
 *
 * @public
 */
export async function* normalizeGtfLines(lines: AsyncIterable<string>): AsyncIterable<string> {
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (isSkippableGtfLine(line)) {
      continue;
    }
    yield normalizeGtfLine(line, lineNumber);
  }
}
