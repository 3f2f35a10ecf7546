/**
 * Forex Card Rate Sheet Patterns
 *
 * The rate sheet prints one line per currency:
 *   "USD/INR 83.10 84.20 83.05 84.35 83.05 84.35 82.40 84.90"
 * followed by eight columns in the order of RATE_COLUMNS. Text extraction
 * spaces these lines inconsistently, sometimes with no gap at all between
 * "INR" and the first rate.
 */

import type { ExtractedRate, PageText } from '../../types';

/**
 * Rate columns in sheet order, after the leading currency column
 */
export const RATE_COLUMNS = [
  'TT BUY',
  'TT SELL',
  'BILL BUY',
  'BILL SELL',
  'FOREX TRAVEL CARD BUY',
  'FOREX TRAVEL CARD SELL',
  'CN BUY',
  'CN SELL',
] as const;

/**
 * Phrase identifying the reference-rate disclosure page (matched lower-cased)
 */
export const REFERENCE_RATES_MARKER = 'to be used as reference rates';

/**
 * Number of leading pages searched for the disclosure during text extraction
 */
export const TEXT_SEARCH_PAGE_LIMIT = 2;

/**
 * Currency line: code, "/INR" with loose spacing, then whitespace-separated numbers
 */
const CURRENCY_LINE_PATTERN = /([A-Z]{3})\s*\/\s*INR\s*((?:\d+(?:\.\d+)?\s*)+)/;

/**
 * Extract every currency line from page text, in the order the lines appear.
 * Lines that do not look like a currency line are skipped.
 */
export function extractCurrencyRates(text: string): ExtractedRate[] {
  const rates: ExtractedRate[] = [];

  for (const line of text.split('\n')) {
    const match = line.match(CURRENCY_LINE_PATTERN);
    if (!match) continue;

    const [, currency, ratesText] = match;
    rates.push({
      currency,
      rates: ratesText.trim().split(/\s+/),
    });
  }

  return rates;
}

/**
 * Whether page text carries the reference-rate disclosure
 */
export function hasReferenceRatesMarker(text: string): boolean {
  return text.toLowerCase().includes(REFERENCE_RATES_MARKER);
}

/**
 * First page (within the first two) carrying the disclosure, or null
 */
export function findDisclosurePage(pages: PageText[]): PageText | null {
  return (
    pages.slice(0, TEXT_SEARCH_PAGE_LIMIT).find((page) => hasReferenceRatesMarker(page.text)) ?? null
  );
}

/**
 * Whether a header row (including its leading currency column) matches the sheet layout
 */
export function matchesRateColumns(headers: readonly string[]): boolean {
  const rateHeaders = headers.slice(1);
  return (
    rateHeaders.length === RATE_COLUMNS.length &&
    rateHeaders.every((header, index) => header === RATE_COLUMNS[index])
  );
}
