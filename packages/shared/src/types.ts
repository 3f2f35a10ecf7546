/**
 * Shared TypeScript Types
 *
 * Types for the reference rate extraction pipeline, matching the JSON schema
 * in docs/contracts/
 */

// ============================================================================
// Documents
// ============================================================================

export type DocumentKind = 'pdf' | 'unknown';

/**
 * Fetched bytes plus their content classification.
 * Lives only for the duration of one extraction attempt.
 */
export interface RawDocument {
  bytes: Buffer;
  kind: DocumentKind;
  sourceUrl: string;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * One currency line of the rate table. `rates` are positional and follow
 * RATE_COLUMNS; values are kept as they were printed.
 */
export interface ExtractedRate {
  currency: string;
  rates: string[];
}

export interface TextExtractionResult {
  path: 'text';
  pageNumber: number;
  timestamp: Date;
  rates: ExtractedRate[];
}

export interface ImageExtractionResult {
  path: 'image';
  pageNumber: number;
  timestamp: Date;
  rates: ExtractedRate[];
  model: string;
  requestId: string;
}

export type ExtractionResult = TextExtractionResult | ImageExtractionResult;

export type ExtractionOutcome =
  | { path: 'text'; pageNumber: number }
  | { path: 'image'; pageNumber: number; model: string; requestId: string };

/**
 * Normalized pipeline output, identical whichever path produced it.
 * `timestamp` holds the publisher's wall-clock time at minute precision.
 */
export interface RateExtraction {
  timestamp: Date;
  rates: ExtractedRate[];
  outcome: ExtractionOutcome;
}

// ============================================================================
// Vision Model Response
// ============================================================================

export interface PageInterpretationRate {
  currency_code: string;
  rates: Array<number | string>;
}

export interface PageInterpretation {
  has_reference_rates: boolean;
  headers?: string[];
  date?: string;
  time?: string;
  forex_rates?: PageInterpretationRate[];
}

// ============================================================================
// Persisted Series
// ============================================================================

/**
 * One row of a currency series. `date` is `yyyy-MM-dd HH:mm` and is unique
 * within the series.
 */
export interface RateRecordRow {
  date: string;
  pdfFile: string;
  rates: string[];
}
