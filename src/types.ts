/**
 * Shared type definitions and validation schemas
 *
 * Format-specific records live beside their parsers (`formats/gtf/types.ts`,
 * `formats/refflat/types.ts`); this module carries what the I/O, compression
 * and parsing layers have in common.
 */

import { type } from "arktype";

/**
 * Strand orientation
 */
export type Strand = "+" | "-" | ".";

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to attach source line numbers to parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats understood by the I/O layer
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Decompression options
 */
export interface DecompressorOptions {
  /** Safety limit for decompressed output size in bytes */
  readonly maxOutputSize?: number;
  /** AbortController signal for cancelling decompression */
  readonly signal?: AbortSignal;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Maximum file size to prevent memory exhaustion (default: 10GB) */
  readonly maxFileSize?: number;
  /** AbortController signal for cancelling operations */
  readonly signal?: AbortSignal;
  /** Whether to automatically detect and decompress compressed files (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing configuration options
 *
 * Mirrors FileReaderOptions for symmetric read/write API design.
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File metadata used for validation before streaming
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly lastModified: Date | undefined;
  /** File extension for format detection */
  readonly extension: string;
}

/**
 * Line processing result for streaming text files
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

/**
 * File validation result
 */
export type FileValidationResult =
  | { readonly isValid: true; readonly metadata: FileMetadata }
  | { readonly isValid: false; readonly metadata?: FileMetadata; readonly error: string };

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const INVALID_PATH_CHARS = /[<>"|*?\0]/;

/**
 * File path validation schema
 * Rejects empty paths, control characters and directory traversal
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (INVALID_PATH_CHARS.test(path)) {
    return ctx.reject("a path without <>\"|*? or null characters");
  }
  const normalized = path.replace(/\\/g, "/");
  if (normalized.split("/").includes("..")) {
    return ctx.reject("a path without directory traversal");
  }
  return true;
});

/**
 * Narrow a string that passed {@link FilePathSchema} to the branded type
 */
export function isFilePath(path: string): path is FilePath {
  return !(FilePathSchema(path) instanceof type.errors);
}

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "maxFileSize?": "number>=0",
  "signal?": "unknown",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

/**
 * Write options validation schema
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1<=number.integer<=9",
});
