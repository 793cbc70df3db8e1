/**
 * Base Document Extractor
 *
 * Abstract base class providing the shared extraction run: normalization,
 * timing, logging and error conversion. Subclasses only read lines.
 */

import type { DocumentType, NormalizedDocument, RawPage } from '../types';
import type { DocumentExtractor, ExtractionContext, ExtractorResult } from './types';
import { normalizeDocument } from './text/normalize';
import { runStage } from '../context';
import { toParsingError } from '../errors';
import { logger } from '../logger';

export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly documentType: DocumentType;
  abstract readonly description: string;

  /**
   * Normalize pages and extract a loan record from the resulting lines.
   * Anything thrown that is not a ParsingError surfaces as PROCESSING_ERROR.
   */
  extract(pages: readonly RawPage[], ctx: ExtractionContext): ExtractorResult {
    return runStage(
      'extract',
      { correlationId: ctx.correlationId, documentType: this.documentType, pageCount: pages.length },
      () => this.run(pages, ctx)
    );
  }

  private run(pages: readonly RawPage[], ctx: ExtractionContext): ExtractorResult {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      document_type: this.documentType,
      page_count: pages.length,
    });

    try {
      const lines = normalizeDocument(pages, { minLineLength: ctx.minLineLength });
      const result = this.extractFromLines(lines, ctx);

      const durationMs = Date.now() - startTime;
      result.metadata.durationMs = durationMs;

      logger.info('Extraction complete', {
        document_type: this.documentType,
        line_count: lines.length,
        warning_count: result.warnings.length,
        duration_ms: durationMs,
      });

      return result;
    } catch (error) {
      const parsingError = toParsingError(error);
      logger.error('Extraction failed', parsingError, {
        document_type: this.documentType,
        code: parsingError.code,
        field: parsingError.field,
      });
      throw parsingError;
    }
  }

  /**
   * Document-specific extraction over normalized lines.
   */
  protected abstract extractFromLines(
    lines: NormalizedDocument,
    ctx: ExtractionContext
  ): ExtractorResult;
}
