/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  newRunContext,
  runWithContextAsync,
  runForDocument,
  type RunContext,
} from './context';

// Logger
export { logger, serializeError, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  RatekeeperError,
  AcquisitionExhaustedError,
  MissingFieldError,
  DateParseError,
  AmbiguousDateError,
  TimeParseError,
  ExtractionExhaustedError,
  ConfigurationError,
  SeriesFormatError,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  acquisitionAttemptsCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
  currenciesWrittenCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  getMetrics,
  writeMetricsFile,
} from './metrics';

// Schemas
export { validatePageInterpretation, type ValidationResult } from './schemas';

// Templates
export {
  REFERENCE_RATES_TEMPLATE,
  PAGE_INTERPRETATION_SCHEMA,
  type VisionTemplate,
} from './templates';

// Extractors
export {
  RATE_COLUMNS,
  REFERENCE_RATES_MARKER,
  TEXT_SEARCH_PAGE_LIMIT,
  extractCurrencyRates,
  hasReferenceRatesMarker,
  findDisclosurePage,
  matchesRateColumns,
  TIMESTAMP_FORMAT,
  resolveDateTime,
  parseDateLine,
  parseTimeLine,
  formatTimestamp,
  parseTimestamp,
} from './extractors';
