/**
 * RefFlat module exports
 *
 * @module refflat
 */

export type { RefFlatRow } from "./types";
export { REFFLAT_FORMAT } from "./types";
export { RefFlatWriter } from "./writer";
