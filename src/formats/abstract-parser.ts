/**
 * Abstract base parser with shared interrupt handling only
 *
 * Provides AbortSignal support and default error/warning hooks to format
 * parsers without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions &
  Required<Omit<ParserOptions, "signal">>;

/**
 * Abstract parser base class with shared interrupt handling only
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;

  constructor(options: TOptions) {
    // Merge in order: base -> format-specific -> user options
    this.options = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
      ...this.getDefaultOptions(),
      ...options,
    };
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check abortion with format context
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected throwIfAborted(context: string): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Parse records from string data
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Get format name for error messages and logging
   */
  protected abstract getFormatName(): string;
}
