/**
 * Error handling for annotation conversion
 *
 * Every failure raised by the library derives from {@link AnnotationError}, so
 * callers can tell library failures apart from programming errors and the
 * converter can sort them into I/O and conversion failures at its boundary.
 */

/**
 * Base error class for all annotation-related errors
 */
export class AnnotationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AnnotationError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or inconsistent state
 */
export class ValidationError extends AnnotationError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends AnnotationError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends AnnotationError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    if (systemError instanceof CompressionError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return "File may be corrupted or not actually gzip compressed";
    }
    if (msg.includes("truncated") || msg.includes("unexpected eof")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends AnnotationError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends AnnotationError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number
  ) {
    super(message, "STREAM_ERROR");
    this.name = "StreamError";
  }
}

/**
 * Buffer overflow errors raised while splitting lines
 */
export class BufferError extends AnnotationError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Failure surfaced at the conversion boundary
 *
 * Collapses I/O and conversion failures into one error with a fixed message;
 * the underlying error is kept as `cause`.
 */
export class GtfConversionError extends AnnotationError {
  static readonly MESSAGE =
    "There was an error while converting the given GTF to a refFlat for CollectRnaSeqMetrics. " +
    "Make sure the GTF file is tab separated.";

  constructor(
    public readonly kind: "io" | "conversion",
    public override readonly cause: AnnotationError
  ) {
    super(GtfConversionError.MESSAGE, "CONVERSION_ERROR", cause.lineNumber, cause.message);
    this.name = "GtfConversionError";
  }
}
