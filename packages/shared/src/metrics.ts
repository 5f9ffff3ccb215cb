/**
 * Prometheus Metrics
 *
 * Per-run counters for the extraction pipeline. The CLI can dump the
 * registry in text exposition format for a node-exporter textfile collector.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Parser Metrics
// ============================================================================

export const linesScannedCounter = new promClient.Counter({
  name: 'cas_extractor_lines_scanned_total',
  help: 'Statement text lines visited by the parser',
  registers: [register],
});

export const fundHeadersCounter = new promClient.Counter({
  name: 'cas_extractor_fund_headers_total',
  help: 'Fund name / ISIN headers detected, by detection rule',
  labelNames: ['rule'],
  registers: [register],
});

export const transactionsCounter = new promClient.Counter({
  name: 'cas_extractor_transactions_total',
  help: 'Transaction records emitted, by row layout',
  labelNames: ['layout'],
  registers: [register],
});

export const unmatchedLinesCounter = new promClient.Counter({
  name: 'cas_extractor_unmatched_lines_total',
  help: 'Statement lines that matched no pattern',
  registers: [register],
});

export const invalidRecordsCounter = new promClient.Counter({
  name: 'cas_extractor_invalid_records_total',
  help: 'Records that failed schema validation',
  registers: [register],
});

// ============================================================================
// Reference Data Metrics
// ============================================================================

export const referenceSchemesGauge = new promClient.Gauge({
  name: 'cas_extractor_reference_schemes',
  help: 'Scheme rows loaded from the AMFI NAV table',
  registers: [register],
});

export const malformedReferenceRowsCounter = new promClient.Counter({
  name: 'cas_extractor_malformed_reference_rows_total',
  help: 'AMFI NAV table rows skipped for having too few fields',
  registers: [register],
});

export const navFetchDurationHistogram = new promClient.Histogram({
  name: 'cas_extractor_nav_fetch_duration_seconds',
  help: 'Duration of the AMFI NAV table download',
  labelNames: ['status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'cas_extractor_extraction_duration_seconds',
  help: 'Duration of a full statement extraction',
  labelNames: ['format', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Reset all metric values, keeping registrations
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
