/**
 * Reference Rate Extraction Pipeline
 *
 * Text path first: the first two pages' text layer, date/time from page 1,
 * rates from the page carrying the reference-rate disclosure. Any failure on
 * that path falls back to rendering every page and asking a vision model,
 * one page at a time, until a page both claims the disclosure and shows the
 * expected columns. Both paths normalize to one RateExtraction.
 */

import {
  logger,
  extractionDurationHistogram,
  documentsProcessedCounter,
  ExtractionExhaustedError,
  extractCurrencyRates,
  findDisclosurePage,
  formatTimestamp,
  matchesRateColumns,
  resolveDateTime,
  TEXT_SEARCH_PAGE_LIMIT,
  type ExtractedRate,
  type ExtractionResult,
  type ImageExtractionResult,
  type PageInterpretation,
  type PageText,
  type RateExtraction,
  type TextExtractionResult,
} from '@ratekeeper/shared';
import type { PdfDocument } from './pdf';
import { parsePageInterpretation, type PageInterpreter } from './llm';

export interface PipelineOptions {
  /** Called only when the image fallback is reached */
  getInterpreter: () => PageInterpreter;
  /** Longest side of rendered page images, in pixels */
  renderMaxDimension: number;
}

type TextAttempt =
  | { ok: true; result: TextExtractionResult }
  | { ok: false; reason: string; error?: unknown };

/**
 * Text path. Never throws: every failure becomes a reason for the fallback.
 */
export async function attemptTextExtraction(document: PdfDocument): Promise<TextAttempt> {
  try {
    const pageCount = Math.min(document.numPages, TEXT_SEARCH_PAGE_LIMIT);
    if (pageCount === 0) {
      return { ok: false, reason: 'Document has no pages' };
    }

    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      pages.push({ pageNumber, text: await document.getPageText(pageNumber) });
    }

    const creationDate = await document.getCreationDate();
    const timestamp = resolveDateTime(pages[0].text, creationDate);

    const disclosurePage = findDisclosurePage(pages);
    if (!disclosurePage) {
      return {
        ok: false,
        reason: `Text about reference rates not found on the first ${TEXT_SEARCH_PAGE_LIMIT} pages`,
      };
    }

    const rates = extractCurrencyRates(disclosurePage.text);
    if (rates.length === 0) {
      return { ok: false, reason: 'No currency rates found in disclosure page text' };
    }

    return {
      ok: true,
      result: { path: 'text', pageNumber: disclosurePage.pageNumber, timestamp, rates },
    };
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
      error,
    };
  }
}

/**
 * Convert the model's rows to ExtractedRate, dropping rows without a
 * three-letter code
 */
function toExtractedRates(interpretation: PageInterpretation, pageNumber: number): ExtractedRate[] {
  const rates: ExtractedRate[] = [];

  for (const row of interpretation.forex_rates ?? []) {
    const currency = row.currency_code.trim().toUpperCase();
    if (!/^[A-Z]{3}$/.test(currency)) {
      logger.warn('Skipping rate row with invalid currency code', {
        pageNumber,
        currency_code: row.currency_code,
      });
      continue;
    }

    rates.push({ currency, rates: row.rates.map((rate) => String(rate).trim()) });
  }

  return rates;
}

/**
 * Image path. Pages are rendered and interpreted in order; the first
 * accepted page wins, later pages are not looked at.
 */
export async function extractFromImages(
  document: PdfDocument,
  options: PipelineOptions
): Promise<ImageExtractionResult> {
  logger.info('Processing PDF as images', { totalPages: document.numPages });

  const interpreter = options.getInterpreter();
  const creationDate = await document.getCreationDate();

  for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
    logger.info('Processing page', { pageNumber, totalPages: document.numPages });

    const image = await document.renderPageToJpeg(pageNumber, options.renderMaxDimension);
    const reply = await interpreter.interpretPage(image, pageNumber);

    const interpretation = parsePageInterpretation(reply.content, pageNumber);
    if (!interpretation) continue;

    if (!interpretation.has_reference_rates) {
      logger.debug('Page does not carry reference rates', { pageNumber });
      continue;
    }

    if (!matchesRateColumns(interpretation.headers ?? [])) {
      logger.warn('Page headers do not match rate columns', {
        pageNumber,
        headers: interpretation.headers,
      });
      continue;
    }

    let timestamp: Date;
    try {
      timestamp = resolveDateTime(
        `Date: ${interpretation.date ?? ''}\nTime: ${interpretation.time ?? ''}`,
        creationDate
      );
    } catch (error) {
      logger.warn('Could not resolve date/time reported for page', {
        pageNumber,
        date: interpretation.date,
        time: interpretation.time,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    const rates = toExtractedRates(interpretation, pageNumber);
    if (rates.length === 0) {
      logger.warn('Accepted page reported no rates', { pageNumber });
      continue;
    }

    logger.info('Successfully extracted data from image', {
      pageNumber,
      publishedAt: formatTimestamp(timestamp),
      currencies: rates.length,
    });

    return {
      path: 'image',
      pageNumber,
      timestamp,
      rates,
      model: interpreter.model,
      requestId: reply.requestId,
    };
  }

  throw new ExtractionExhaustedError(document.numPages);
}

/**
 * Collapse either path's result into the shape the writer consumes
 */
export function normalizeExtraction(result: ExtractionResult): RateExtraction {
  switch (result.path) {
    case 'text':
      return {
        timestamp: result.timestamp,
        rates: result.rates,
        outcome: { path: 'text', pageNumber: result.pageNumber },
      };
    case 'image':
      return {
        timestamp: result.timestamp,
        rates: result.rates,
        outcome: {
          path: 'image',
          pageNumber: result.pageNumber,
          model: result.model,
          requestId: result.requestId,
        },
      };
  }
}

/**
 * Extract the reference rates of one document
 */
export async function extractReferenceRates(
  document: PdfDocument,
  options: PipelineOptions
): Promise<RateExtraction> {
  const startTime = Date.now();

  logger.info('Attempting to extract text from PDF');
  const textAttempt = await attemptTextExtraction(document);

  let result: ExtractionResult;
  if (textAttempt.ok) {
    logger.info('Successfully extracted data using text parsing', {
      pageNumber: textAttempt.result.pageNumber,
    });
    result = textAttempt.result;
  } else {
    logger.warn('Failed to process PDF using text extraction, attempting to process as image', {
      reason: textAttempt.reason,
    });

    try {
      result = await extractFromImages(document, options);
    } catch (error) {
      documentsProcessedCounter.inc({ extraction_path: 'image', status: 'error' });
      throw error;
    }
  }

  const extraction = normalizeExtraction(result);

  const duration = (Date.now() - startTime) / 1000;
  extractionDurationHistogram.observe({ extraction_path: result.path }, duration);
  documentsProcessedCounter.inc({ extraction_path: result.path, status: 'success' });

  logger.info('Successfully parsed date time and currency rates', {
    extraction_path: result.path,
    publishedAt: formatTimestamp(extraction.timestamp),
    currencies: extraction.rates.length,
  });

  return extraction;
}
