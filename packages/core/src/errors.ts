/**
 * Parsing Errors
 *
 * Every failure the extraction pipeline surfaces is a ParsingError with a
 * stable code. Structural codes reject the whole document; field codes abort
 * assembly of the loan record.
 */

export type ParsingErrorCode =
  | 'DOCUMENT_EMPTY'
  | 'UNREADABLE_DOCUMENT'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD_FORMAT'
  | 'UNSUPPORTED_DOCUMENT_TYPE'
  | 'PROCESSING_ERROR';

export class ParsingError extends Error {
  readonly code: ParsingErrorCode;
  /** Field name for MISSING_REQUIRED_FIELD and INVALID_FIELD_FORMAT */
  readonly field?: string;

  constructor(
    code: ParsingErrorCode,
    message: string,
    options?: { field?: string; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ParsingError';
    this.code = code;
    this.field = options?.field;
  }

  static documentEmpty(): ParsingError {
    return new ParsingError('DOCUMENT_EMPTY', 'Document has no pages');
  }

  static unreadableDocument(): ParsingError {
    return new ParsingError('UNREADABLE_DOCUMENT', 'Document contains no extractable text');
  }

  static missingRequiredField(field: string): ParsingError {
    return new ParsingError('MISSING_REQUIRED_FIELD', `Missing required field: ${field}`, { field });
  }

  static invalidFieldFormat(field: string): ParsingError {
    return new ParsingError('INVALID_FIELD_FORMAT', `Invalid field format: ${field}`, { field });
  }

  static unsupportedDocumentType(documentType: string): ParsingError {
    return new ParsingError(
      'UNSUPPORTED_DOCUMENT_TYPE',
      `No extractor registered for document type: ${documentType}`
    );
  }

  static processingError(message: string, cause?: unknown): ParsingError {
    return new ParsingError('PROCESSING_ERROR', message, { cause });
  }
}

export function isParsingError(error: unknown): error is ParsingError {
  return error instanceof ParsingError;
}

/**
 * Wrap anything that is not already a ParsingError into PROCESSING_ERROR.
 */
export function toParsingError(error: unknown): ParsingError {
  if (isParsingError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return ParsingError.processingError(message, error);
}
