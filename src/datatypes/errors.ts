/**
 * Conversion error taxonomy
 *
 * Every error raised while a conversion is processed ends the conversion in
 * FAILED with its message kept verbatim. None of them are retried.
 */

import type { ConversionErrorCode, ConversionType } from '../model/Conversion.js';

export class ConversionError extends Error {
  constructor(
    message: string,
    readonly code: ConversionErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

/**
 * Input failed the format-specific structural check (missing MSH, malformed XML)
 */
export class ValidationError extends ConversionError {
  readonly format?: ConversionType;
  readonly expectedSegment?: string;
  readonly errors: string[];

  constructor(
    message: string,
    options: { format?: ConversionType; expectedSegment?: string; errors?: string[] }
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.format = options.format;
    this.expectedSegment = options.expectedSegment;
    this.errors = options.errors ?? [message];
  }
}

/**
 * Input passed validation but its structure could not be decomposed
 */
export class ParseError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PARSING_ERROR', cause === undefined ? undefined : { cause });
    this.name = 'ParseError';
  }
}

/**
 * A persistence collaborator failed
 */
export class PersistenceError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DATABASE_ERROR', cause === undefined ? undefined : { cause });
    this.name = 'PersistenceError';
  }
}

export class ConversionNotFoundError extends Error {
  constructor(readonly conversionId: string) {
    super(`Conversion not found: ${conversionId}`);
    this.name = 'ConversionNotFoundError';
  }
}

/**
 * Error code for any thrown value
 */
export function errorCodeOf(error: unknown): ConversionErrorCode {
  return error instanceof ConversionError ? error.code : 'GENERAL_ERROR';
}

/**
 * Message text for any thrown value
 */
export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
