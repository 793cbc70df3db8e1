/**
 * Prometheus Metrics
 *
 * Counters and histograms for extraction and audit runs. Nothing here serves
 * HTTP; callers scrape the registry through getMetrics().
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'loan_audit_documents_processed_total',
  help: 'Total number of documents run through extraction',
  labelNames: ['document_type', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'loan_audit_extraction_duration_seconds',
  help: 'Duration of document extraction',
  labelNames: ['document_type'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

export const fieldStrategyCounter = new promClient.Counter({
  name: 'loan_audit_field_strategy_total',
  help: 'Extraction strategy that produced each field value',
  labelNames: ['field', 'strategy'],
  registers: [register],
});

// ============================================================================
// Audit Metrics
// ============================================================================

export const auditFindingsCounter = new promClient.Counter({
  name: 'loan_audit_findings_total',
  help: 'Total number of audit findings by rule and severity',
  labelNames: ['rule_code', 'severity'],
  registers: [register],
});

export const auditDurationHistogram = new promClient.Histogram({
  name: 'loan_audit_audit_duration_seconds',
  help: 'Duration of a full audit run',
  labelNames: ['mode'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics endpoint
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
