/**
 * Reference Rate Extractors
 *
 * Pattern-based reading of the forex card rate sheet's text layer.
 */

export {
  RATE_COLUMNS,
  REFERENCE_RATES_MARKER,
  TEXT_SEARCH_PAGE_LIMIT,
  extractCurrencyRates,
  hasReferenceRatesMarker,
  findDisclosurePage,
  matchesRateColumns,
} from './patterns';

export {
  TIMESTAMP_FORMAT,
  resolveDateTime,
  parseDateLine,
  parseTimeLine,
  formatTimestamp,
  parseTimestamp,
} from './datetime';
