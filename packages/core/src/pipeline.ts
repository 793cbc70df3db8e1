/**
 * Loan Audit Pipeline
 *
 * The two entry points collaborators call: extract a loan record from page
 * text, then audit it. Each run gets its own correlation ID.
 */

import type { AuditFinding, DocumentType, LoanRecord, RawPage } from './types';
import { config, type AuditMode } from './config';
import { getCorrelationId, runStage } from './context';
import { ParsingError, toParsingError } from './errors';
import { getExtractorOrThrow, type ExtractorMetadata } from './extractors';
import { documentsProcessedCounter, extractionDurationHistogram } from './metrics';
import { toLoanRecordJson, validateLoanRecord } from './schemas';
import { AuditEngine } from './audit';

export interface ExtractOptions {
  documentType?: DocumentType | string;
  documentId?: string;
  correlationId?: string;
  /** Anchor for the date validity window; defaults to now */
  referenceDate?: Date;
  minLineLength?: number;
  headerWindowLines?: number;
  sectionMaxLines?: number;
}

export interface ExtractionOutcome {
  record: LoanRecord;
  warnings: string[];
  metadata: ExtractorMetadata;
  correlationId: string;
}

export type ExtractResult =
  | { ok: true; value: ExtractionOutcome }
  | { ok: false; error: ParsingError };

export interface AuditOptions {
  engine?: AuditEngine;
  mode?: AuditMode;
}

export interface AuditedDocument {
  record: LoanRecord;
  findings: AuditFinding[];
  correlationId: string;
}

const DEFAULT_DOCUMENT_TYPE: DocumentType = 'student_loan_statement';

let defaultEngine: AuditEngine | null = null;

function getDefaultEngine(): AuditEngine {
  if (!defaultEngine) {
    defaultEngine = new AuditEngine();
  }
  return defaultEngine;
}

/**
 * Extract a loan record from page text.
 *
 * @throws ParsingError for any structural, field-level or internal failure
 */
export function extract(pages: readonly RawPage[], options: ExtractOptions = {}): ExtractionOutcome {
  const documentType = options.documentType ?? DEFAULT_DOCUMENT_TYPE;
  const fields = {
    correlationId: options.correlationId,
    documentId: options.documentId,
    documentType,
    pageCount: pages.length,
  };

  return runStage('extract', fields, () => {
    const correlationId = getCorrelationId();
    const endTimer = extractionDurationHistogram.startTimer({ document_type: documentType });

    try {
      const extractor = getExtractorOrThrow(documentType);
      const result = extractor.extract(pages, {
        correlationId,
        referenceDate: options.referenceDate,
        minLineLength: options.minLineLength,
        headerWindowLines: options.headerWindowLines,
        sectionMaxLines: options.sectionMaxLines,
      });

      const validation = validateLoanRecord(toLoanRecordJson(result.record));
      if (!validation.valid) {
        throw ParsingError.processingError(
          `Loan record failed schema validation: ${(validation.errors ?? []).join('; ')}`
        );
      }

      documentsProcessedCounter.inc({ document_type: documentType, status: 'success' });
      return { ...result, correlationId };
    } catch (error) {
      const parsingError = toParsingError(error);
      documentsProcessedCounter.inc({ document_type: documentType, status: parsingError.code });
      throw parsingError;
    } finally {
      endTimer();
    }
  });
}

/**
 * Non-throwing variant of extract().
 */
export function tryExtract(pages: readonly RawPage[], options: ExtractOptions = {}): ExtractResult {
  try {
    return { ok: true, value: extract(pages, options) };
  } catch (error) {
    return { ok: false, error: toParsingError(error) };
  }
}

/**
 * Run every rule in registration order. Never throws.
 */
export function audit(record: LoanRecord, engine: AuditEngine = getDefaultEngine()): AuditFinding[] {
  return runStage('audit', {}, () => engine.performAudit(record));
}

export function auditConcurrent(
  record: LoanRecord,
  engine: AuditEngine = getDefaultEngine()
): Promise<AuditFinding[]> {
  return runStage('audit', {}, () => engine.performAuditConcurrent(record));
}

/**
 * Extract then audit in one run sharing a correlation ID.
 */
export async function extractAndAudit(
  pages: readonly RawPage[],
  options: ExtractOptions & AuditOptions = {}
): Promise<AuditedDocument> {
  const { record, correlationId } = extract(pages, options);
  const engine = options.engine ?? getDefaultEngine();
  const mode = options.mode ?? config.auditMode;

  const findings = await runStage(
    'audit',
    { correlationId, documentId: options.documentId, documentType: options.documentType },
    async () =>
      mode === 'concurrent' ? engine.performAuditConcurrent(record) : engine.performAudit(record)
  );

  return { record, findings, correlationId };
}
