/**
 * RefFlat table writer
 *
 * Rows are separated by `\n` with no header and no trailing newline.
 *
 * @module refflat/writer
 */

import type { RefFlatRow } from "./types";
import { REFFLAT_FORMAT } from "./types";

/**
 * RefFlat row formatter
 *
 * @example
 * ```typescript
 * const writer = new RefFlatWriter();
 * writer.formatRow(row);
 * // => "G1\tT1\tchr1\t+\t100\t250\t100\t250\t2\t100,200\t150,250"
 * ```
 *
 * @public
 */
export class RefFlatWriter {
  /**
   * Format one row as 11 tab-separated fields
   */
  formatRow(row: RefFlatRow): string {
    const fields: string[] = [
      row.geneName,
      row.transcriptName,
      row.chromosome,
      row.strand,
      row.txStart.toString(),
      row.txEnd.toString(),
      row.cdsStart.toString(),
      row.cdsEnd.toString(),
      row.exonCount.toString(),
      row.exonStarts.join(REFFLAT_FORMAT.LIST_SEPARATOR),
      row.exonEnds.join(REFFLAT_FORMAT.LIST_SEPARATOR),
    ];

    return fields.join(REFFLAT_FORMAT.FIELD_SEPARATOR);
  }

  /**
   * Format rows as complete table content
   */
  formatRows(rows: readonly RefFlatRow[]): string {
    return rows.map((row) => this.formatRow(row)).join(REFFLAT_FORMAT.ROW_SEPARATOR);
  }

  /**
   * Write rows to a WritableStream, with the same separators as {@link formatRows}
   *
   * @returns Number of rows written
   */
  async writeToStream(
    rows: AsyncIterable<RefFlatRow>,
    stream: WritableStream<Uint8Array>
  ): Promise<number> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();
    let written = 0;

    try {
      for await (const row of rows) {
        const prefix = written === 0 ? "" : REFFLAT_FORMAT.ROW_SEPARATOR;
        await writer.write(encoder.encode(prefix + this.formatRow(row)));
        written++;
      }
    } finally {
      writer.releaseLock();
    }

    return written;
  }
}
