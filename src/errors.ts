/**
 * Custom error types for pdfsleuth.
 *
 * Object- and stream-scoped errors are caught inside the analysis and turned
 * into anomalies; document-scoped errors (xref, io, config) reject `analyze`.
 */

import type { PdfObject } from './parser/types.js';

export class PdfSleuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PdfSleuthError';
  }
}

/**
 * A malformed token. The library never throws it: PdfLexer yields a LexError
 * token and the parser records it as a `lex-error` anomaly. Code that drives
 * PdfLexer directly raises this when a lex fault must abort its own work.
 */
export class PdfLexError extends PdfSleuthError {
  constructor(message: string, public readonly offset?: number) {
    super(message);
    this.name = 'PdfLexError';
  }
}

/** A structural break inside one indirect object. */
export class PdfMalformedObjectError extends PdfSleuthError {
  constructor(
    message: string,
    public readonly offset?: number,
    /** Best-effort value parsed before the break, if any */
    public readonly partial?: PdfObject,
  ) {
    super(message);
    this.name = 'PdfMalformedObjectError';
  }
}

/** The cross-reference chain could not be recovered, even by a full scan. */
export class PdfXRefError extends PdfSleuthError {
  constructor(message: string, public readonly offset?: number) {
    super(message);
    this.name = 'PdfXRefError';
  }
}

export class PdfDecodeError extends PdfSleuthError {
  constructor(
    message: string,
    public readonly filter: string,
    /** Position of the failing filter in the /Filter chain */
    public readonly filterIndex: number,
  ) {
    super(message);
    this.name = 'PdfDecodeError';
  }
}

export class PdfIoError extends PdfSleuthError {
  constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'PdfIoError';
    if (options && 'cause' in options) this.cause = options.cause;
  }
}

export class PdfConfigError extends PdfSleuthError {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'PdfConfigError';
  }
}
