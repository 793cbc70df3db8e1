/**
 * Document Extractor Types
 *
 * Each document type gets its own extractor. Extractors are synchronous:
 * page text arrives already materialized and nothing here performs I/O.
 */

import type { DocumentType, LoanRecord, RawPage } from '../types';

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Correlation ID for tracing */
  correlationId: string;
  /** Anchor for the date validity window; defaults to now */
  referenceDate?: Date;
  /** Minimum trimmed line length kept by normalization */
  minLineLength?: number;
  /** Lines searched for the servicer name */
  headerWindowLines?: number;
  /** Lines after which an open non-payment section is closed */
  sectionMaxLines?: number;
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  /** Assembled loan record */
  record: LoanRecord;
  /** Fallbacks and estimates applied during extraction */
  warnings: string[];
  /** Metadata about the extraction */
  metadata: ExtractorMetadata;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  /** Algorithm version */
  algorithmVersion?: string;
  /** Duration of extraction in milliseconds */
  durationMs?: number;
  /** Normalized lines scanned */
  lineCount?: number;
  /** Strategy that produced each field */
  fieldStrategies?: Record<string, string>;
}

/**
 * Interface for document-specific extractors.
 */
export interface DocumentExtractor {
  /** The document type this extractor handles */
  readonly documentType: DocumentType;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract a loan record from document pages.
   *
   * @param pages - Raw text by page; absent pages are skipped
   * @param ctx - Extraction context
   */
  extract(pages: readonly RawPage[], ctx: ExtractionContext): ExtractorResult;
}
