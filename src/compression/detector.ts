/**
 * Compression format detection for annotation files
 *
 * Annotation releases are usually shipped gzip-compressed (`.gtf.gz`), so the
 * reader and writer consult the path extension before touching the bytes.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension("gencode.annotation.gtf.gz"); // "gzip"
 * CompressionDetector.fromExtension("gencode.annotation.gtf");    // "none"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @param filePath File path to analyze
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length >= 2 && bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE) {
      return "gzip";
    }
    return "none";
  }
}
