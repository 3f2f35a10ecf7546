/**
 * Prometheus Metrics
 *
 * Counters and histograms for acquisition, extraction and the vision
 * fallback. A run is short-lived, so instead of serving /metrics the
 * registry is written to a textfile-collector file at the end of a run.
 */

import fs from 'fs';
import path from 'path';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Acquisition Metrics
// ============================================================================

export const acquisitionAttemptsCounter = new promClient.Counter({
  name: 'ratekeeper_acquisition_attempts_total',
  help: 'Document download attempts by mode and outcome',
  labelNames: ['mode', 'outcome'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'ratekeeper_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['extraction_path', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'ratekeeper_extraction_duration_seconds',
  help: 'Duration of document extraction',
  labelNames: ['extraction_path'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const currenciesWrittenCounter = new promClient.Counter({
  name: 'ratekeeper_currency_series_written_total',
  help: 'Number of per-currency series rewritten',
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'ratekeeper_llm_requests_total',
  help: 'Total number of vision LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'ratekeeper_llm_request_duration_seconds',
  help: 'Duration of vision LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Write the registry to a file for the node_exporter textfile collector.
 * Written to a temp file and renamed so the collector never reads a partial file.
 */
export async function writeMetricsFile(filePath: string): Promise<void> {
  const content = await getMetrics();
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp`);

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(tmpPath, content, 'utf-8');
  fs.renameSync(tmpPath, filePath);

  logger.debug('Metrics written', { filePath });
}
