/**
 * Compression module for annotation files
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from "./compression";
 *
 * if (CompressionDetector.fromExtension("genes.gtf.gz") === "gzip") {
 *   const decompressed = await GzipDecompressor.decompress(compressedData);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipDecompressor } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
export type { CompressionFormat, DecompressorOptions } from "../types";
