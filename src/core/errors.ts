/**
 * Error types raised by the conversion pipeline.
 *
 * Every failure reaching a caller is one of these classes, so batch
 * orchestration can tell a malformed document from a failing page sink.
 *
 * @module core/errors
 */

/** Base class for every conversion failure. */
export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

/**
 * Structured text could not be parsed. Fatal for the document.
 *
 * `line` is 1-based; `offset` is the UTF-8 byte offset of the start of that
 * line in the decoded source.
 */
export class ParseError extends ConversionError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly offset: number,
  ) {
    super(`${message} (line ${line}, byte ${offset})`);
    this.name = 'ParseError';
  }
}

/** A page writer failed while receiving draw operations. */
export class RenderError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
  }
}

/** Conversion options failed validation. */
export class OptionsError extends ConversionError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'OptionsError';
  }
}

/** A file was handed to an entry point that cannot convert it. */
export class UnsupportedFileError extends ConversionError {
  constructor(public readonly path: string) {
    super(`Unsupported file type: ${path}`);
    this.name = 'UnsupportedFileError';
  }
}
