/**
 * RefFlat table types
 *
 * @module refflat/types
 */

import type { Strand } from "../../types";

/**
 * One transcript row of a RefFlat table
 *
 * Coordinates are zero-based half-open, as in the parsed features.
 *
 * @public
 */
export interface RefFlatRow {
  readonly geneName: string;
  readonly transcriptName: string;
  readonly chromosome: string;
  readonly strand: Strand;
  readonly txStart: number;
  readonly txEnd: number;
  readonly cdsStart: number;
  readonly cdsEnd: number;
  readonly exonCount: number;
  /** Ascending, same length as `exonEnds` */
  readonly exonStarts: readonly number[];
  readonly exonEnds: readonly number[];
}

/**
 * RefFlat layout constants
 *
 * @public
 */
export const REFFLAT_FORMAT = {
  FIELD_SEPARATOR: "\t",
  LIST_SEPARATOR: ",",
  ROW_SEPARATOR: "\n",
  FIELD_COUNT: 11,
} as const;
