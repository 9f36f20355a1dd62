/**
 * Error types for pdf-splitter. Every handled failure is one of these;
 * the CLI reports them and exits with code 1.
 */

export class PdfSplitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PdfSplitError';
  }
}

/** Input file is missing, unreadable or not a parseable PDF. */
export class PdfOpenError extends PdfSplitError {
  constructor(message: string) {
    super(message);
    this.name = 'PdfOpenError';
  }
}

/** Encrypted PDF that cannot be opened with an empty password. */
export class PdfEncryptionError extends PdfSplitError {
  constructor(message: string) {
    super(message);
    this.name = 'PdfEncryptionError';
  }
}

/** Malformed token in a page-range expression. */
export class RangeSyntaxError extends PdfSplitError {
  constructor(message: string) {
    super(message);
    this.name = 'RangeSyntaxError';
  }
}

/** Interval outside the document, or inverted. */
export class RangeBoundsError extends PdfSplitError {
  constructor(message: string) {
    super(message);
    this.name = 'RangeBoundsError';
  }
}

/** Bad option value, e.g. a non-positive pages-per-file. */
export class InvalidArgumentError extends PdfSplitError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
