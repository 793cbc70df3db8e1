/**
 * Extractor Registry
 *
 * Registry pattern for document extractors.
 * Allows registering extractors for each document type and retrieving them.
 */

import type { DocumentType } from '../types';
import type { DocumentExtractor } from './types';
import { ParsingError } from '../errors';
import { logger } from '../logger';

/**
 * Map of document types to their extractors
 */
const extractorRegistry = new Map<string, DocumentExtractor>();

/**
 * Register an extractor for a document type.
 * Overwrites any existing extractor for that type.
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  extractorRegistry.set(extractor.documentType, extractor);

  logger.debug('Registered extractor', {
    document_type: extractor.documentType,
    description: extractor.description,
  });
}

export function getExtractor(documentType: string): DocumentExtractor | undefined {
  return extractorRegistry.get(documentType);
}

/**
 * Get the extractor for a document type.
 *
 * @throws ParsingError UNSUPPORTED_DOCUMENT_TYPE if none is registered
 */
export function getExtractorOrThrow(documentType: string): DocumentExtractor {
  const extractor = extractorRegistry.get(documentType);
  if (!extractor) {
    throw ParsingError.unsupportedDocumentType(documentType);
  }
  return extractor;
}

export function hasExtractor(documentType: string): boolean {
  return extractorRegistry.has(documentType);
}

export function getRegisteredTypes(): DocumentType[] {
  return Array.from(extractorRegistry.values(), (extractor) => extractor.documentType);
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}
