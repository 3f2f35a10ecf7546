/**
 * Currency Series Store
 *
 * One CSV per currency, rows keyed by DATE (yyyy-MM-dd HH:mm). Every write
 * merges the new observation into the existing rows, keeps the newest row
 * per DATE and rewrites the file in ascending DATE order.
 */

import fs from 'fs';
import path from 'path';
import {
  logger,
  currenciesWrittenCounter,
  formatTimestamp,
  parseTimestamp,
  RATE_COLUMNS,
  SeriesFormatError,
  type RateExtraction,
  type RateRecordRow,
} from '@ratekeeper/shared';

export const SERIES_HEADERS: readonly string[] = ['DATE', 'PDF FILE', ...RATE_COLUMNS];

const LINE_TERMINATOR = '\r\n';

// ============================================================================
// CSV
// ============================================================================

/**
 * Parse CSV text into rows of fields. Handles quoted fields with embedded
 * commas, quotes and line breaks; accepts LF or CRLF line endings.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowStarted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowStarted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      rowStarted = true;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      if (rowStarted || field.length > 0) {
        row.push(field);
        rows.push(row);
      }
      row = [];
      field = '';
      rowStarted = false;
    } else {
      field += char;
      rowStarted = true;
    }
  }

  if (rowStarted || field.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize rows as CSV, quoting only fields that need it
 */
export function serializeCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeField).join(',') + LINE_TERMINATOR).join('');
}

// ============================================================================
// Series
// ============================================================================

/**
 * Build the row for one currency, fitting rates to the column count
 */
export function toRow(timestamp: Date, pdfFile: string, rates: readonly string[]): RateRecordRow {
  const fitted = RATE_COLUMNS.map((_, index) => rates[index] ?? '');
  return { date: formatTimestamp(timestamp), pdfFile, rates: fitted };
}

/**
 * Merge rows into a series: last row per timestamp wins, result sorted
 * ascending. DATE values are rewritten in canonical form.
 */
export function mergeSeries(
  existing: readonly RateRecordRow[],
  incoming: readonly RateRecordRow[],
  filePath = '<series>'
): RateRecordRow[] {
  const byTime = new Map<number, RateRecordRow>();

  for (const row of [...existing, ...incoming]) {
    const parsed = parseTimestamp(row.date);
    if (!parsed) {
      throw new SeriesFormatError(filePath, `unparsable DATE "${row.date}"`);
    }
    byTime.set(parsed.getTime(), { ...row, date: formatTimestamp(parsed) });
  }

  return [...byTime.entries()].sort(([a], [b]) => a - b).map(([, row]) => row);
}

/**
 * Persistence for per-currency series
 */
export interface SeriesStore {
  readSeries(currency: string): RateRecordRow[];

  /** Merge one extraction into every affected series; returns the currencies written */
  writeRates(extraction: RateExtraction, pdfFile: string): string[];
}

export class CsvSeriesStore implements SeriesStore {
  constructor(private readonly directory: string) {}

  seriesPath(currency: string): string {
    return path.join(this.directory, `REFERENCE_RATES_${currency}.csv`);
  }

  readSeries(currency: string): RateRecordRow[] {
    const filePath = this.seriesPath(currency);
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const rows = parseCsv(fs.readFileSync(filePath, 'utf-8'));
    if (rows.length === 0) {
      return [];
    }

    const [header, ...records] = rows;
    if (header[0] !== 'DATE') {
      throw new SeriesFormatError(filePath, `unexpected header "${header.join(',')}"`);
    }

    return records.map(([date = '', pdfFile = '', ...rates]) => ({ date, pdfFile, rates }));
  }

  writeRates(extraction: RateExtraction, pdfFile: string): string[] {
    fs.mkdirSync(this.directory, { recursive: true });

    const written: string[] = [];
    for (const rate of extraction.rates) {
      const filePath = this.seriesPath(rate.currency);
      const incoming = toRow(extraction.timestamp, pdfFile, rate.rates);
      const series = mergeSeries(this.readSeries(rate.currency), [incoming], filePath);

      this.writeSeries(filePath, series);
      currenciesWrittenCounter.inc();
      written.push(rate.currency);

      logger.debug('Series updated', { currency: rate.currency, rows: series.length });
    }

    logger.info('Stored reference rates', {
      date: formatTimestamp(extraction.timestamp),
      currencies: written.length,
    });

    return written;
  }

  private writeSeries(filePath: string, series: readonly RateRecordRow[]): void {
    const content = serializeCsv([
      SERIES_HEADERS,
      ...series.map((row) => [row.date, row.pdfFile, ...row.rates]),
    ]);

    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, content, 'utf-8');
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
