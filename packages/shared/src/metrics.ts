/**
 * Prometheus Metrics
 *
 * Metrics for document extraction: outcome, duration, rows per table and
 * geometries that could not be read.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Document Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'nas_documents_processed_total',
  help: 'Total number of NAS documents extracted',
  labelNames: ['status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'nas_extraction_duration_seconds',
  help: 'Duration of document extraction in seconds',
  labelNames: ['status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

// ============================================================================
// Table Metrics
// ============================================================================

export const featuresExtractedCounter = new promClient.Counter({
  name: 'nas_features_extracted_total',
  help: 'Total number of rows extracted per table',
  labelNames: ['table'],
  registers: [register],
});

export const geometryFailuresCounter = new promClient.Counter({
  name: 'nas_geometry_failures_total',
  help: 'Geometries that were missing or could not be read',
  labelNames: ['reason'],
  registers: [register],
});

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics response
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
