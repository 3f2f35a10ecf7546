/**
 * Currency Series Store Tests
 *
 * Writes into a fresh temporary directory per test.
 */

import fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SeriesFormatError, type RateExtraction } from '@ratekeeper/shared';
import {
  CsvSeriesStore,
  mergeSeries,
  parseCsv,
  serializeCsv,
  toRow,
} from '../../services/collector/src/lib/series-store';
import { DocumentArchive } from '../../services/collector/src/lib/archive';

const HEADER_LINE =
  'DATE,PDF FILE,TT BUY,TT SELL,BILL BUY,BILL SELL,FOREX TRAVEL CARD BUY,FOREX TRAVEL CARD SELL,CN BUY,CN SELL';

const USD_RATES = ['85.10', '85.90', '85.05', '86.00', '84.90', '86.10', '84.50', '86.50'];

function extraction(timestamp: Date, rates: Array<{ currency: string; rates: string[] }>): RateExtraction {
  return { timestamp, rates, outcome: { path: 'text', pageNumber: 1 } };
}

describe('CSV encoding', () => {
  it('parses quoted fields with commas, quotes and line breaks', () => {
    const text = 'a,"b,c","d""e"\r\nf,"multi\nline"\n\ng,\n';
    expect(parseCsv(text)).toEqual([
      ['a', 'b,c', 'd"e'],
      ['f', 'multi\nline'],
      ['g', ''],
    ]);
  });

  it('quotes only fields that need it and ends every row with CRLF', () => {
    expect(serializeCsv([['a,b', 'c"d', 'e'], ['1', '', '2']])).toBe('"a,b","c""d",e\r\n1,,2\r\n');
  });
});

describe('mergeSeries', () => {
  it('keeps the last row for a repeated DATE and sorts ascending', () => {
    const existing = [
      { date: '2025-04-04 09:15', pdfFile: 'b.pdf', rates: ['2'] },
      { date: '2025-04-03 09:15', pdfFile: 'a.pdf', rates: ['1'] },
    ];
    const incoming = [{ date: '2025-04-04 09:15', pdfFile: 'c.pdf', rates: ['3'] }];

    expect(mergeSeries(existing, incoming)).toEqual([
      { date: '2025-04-03 09:15', pdfFile: 'a.pdf', rates: ['1'] },
      { date: '2025-04-04 09:15', pdfFile: 'c.pdf', rates: ['3'] },
    ]);
  });

  it('orders rows of the same day by time', () => {
    const rows = [
      { date: '2025-04-03 15:00', pdfFile: 'pm.pdf', rates: [] },
      { date: '2025-04-03 09:00', pdfFile: 'am.pdf', rates: [] },
    ];
    expect(mergeSeries(rows, []).map((row) => row.pdfFile)).toEqual(['am.pdf', 'pm.pdf']);
  });

  it('treats DATE spellings of the same minute as one row in canonical form', () => {
    const existing = [{ date: '2025-04-03 9:15', pdfFile: 'old.pdf', rates: [] }];
    const incoming = [{ date: '2025-04-03 09:15', pdfFile: 'new.pdf', rates: [] }];

    expect(mergeSeries(existing, incoming)).toEqual([{ date: '2025-04-03 09:15', pdfFile: 'new.pdf', rates: [] }]);
  });

  it('rejects a row whose DATE does not parse', () => {
    const rows = [{ date: '03/04/2025', pdfFile: 'a.pdf', rates: [] }];
    expect(() => mergeSeries(rows, [], 'USD.csv')).toThrow(SeriesFormatError);
  });
});

describe('toRow', () => {
  const timestamp = new Date(2025, 3, 3, 9, 15);

  it('pads missing rates with empty values', () => {
    expect(toRow(timestamp, 'a.pdf', ['1', '2'])).toEqual({
      date: '2025-04-03 09:15',
      pdfFile: 'a.pdf',
      rates: ['1', '2', '', '', '', '', '', ''],
    });
  });

  it('drops rates beyond the eighth column', () => {
    const rates = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'];
    expect(toRow(timestamp, 'a.pdf', rates).rates).toEqual(['1', '2', '3', '4', '5', '6', '7', '8']);
  });
});

describe('CsvSeriesStore', () => {
  let directory: string;
  let store: CsvSeriesStore;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'ratekeeper-series-'));
    store = new CsvSeriesStore(path.join(directory, 'csv'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('creates one file per currency with the header and the new row', () => {
    const written = store.writeRates(
      extraction(new Date(2025, 3, 3, 9, 15), [
        { currency: 'USD', rates: USD_RATES },
        { currency: 'EUR', rates: ['92.1', '93.2'] },
      ]),
      'pdf_files/2025/4/2025-04-03.pdf'
    );

    expect(written).toEqual(['USD', 'EUR']);
    expect(fs.readFileSync(store.seriesPath('USD'), 'utf-8')).toBe(
      `${HEADER_LINE}\r\n` +
        '2025-04-03 09:15,pdf_files/2025/4/2025-04-03.pdf,85.10,85.90,85.05,86.00,84.90,86.10,84.50,86.50\r\n'
    );
    expect(fs.readFileSync(store.seriesPath('EUR'), 'utf-8')).toBe(
      `${HEADER_LINE}\r\n2025-04-03 09:15,pdf_files/2025/4/2025-04-03.pdf,92.1,93.2,,,,,,\r\n`
    );
    expect(path.basename(store.seriesPath('USD'))).toBe('REFERENCE_RATES_USD.csv');
  });

  it('is idempotent for the same extraction', () => {
    const sheet = extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'USD', rates: USD_RATES }]);

    store.writeRates(sheet, 'a.pdf');
    const first = fs.readFileSync(store.seriesPath('USD'), 'utf-8');
    store.writeRates(sheet, 'a.pdf');

    expect(fs.readFileSync(store.seriesPath('USD'), 'utf-8')).toBe(first);
    expect(store.readSeries('USD')).toHaveLength(1);
  });

  it('keeps the series sorted when older sheets arrive later', () => {
    store.writeRates(extraction(new Date(2025, 3, 4, 9, 15), [{ currency: 'USD', rates: ['2'] }]), 'b.pdf');
    store.writeRates(extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'USD', rates: ['1'] }]), 'a.pdf');

    expect(store.readSeries('USD').map((row) => [row.date, row.pdfFile])).toEqual([
      ['2025-04-03 09:15', 'a.pdf'],
      ['2025-04-04 09:15', 'b.pdf'],
    ]);
  });

  it('replaces the row for a republished timestamp', () => {
    const timestamp = new Date(2025, 3, 3, 9, 15);
    store.writeRates(extraction(timestamp, [{ currency: 'USD', rates: ['1'] }]), 'a.pdf');
    store.writeRates(extraction(timestamp, [{ currency: 'USD', rates: ['5'] }]), 'a.pdf');

    expect(store.readSeries('USD')).toEqual([
      { date: '2025-04-03 09:15', pdfFile: 'a.pdf', rates: ['5', '', '', '', '', '', '', ''] },
    ]);
  });

  it('leaves other currencies untouched', () => {
    store.writeRates(extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'GBP', rates: ['1'] }]), 'a.pdf');
    store.writeRates(extraction(new Date(2025, 3, 4, 9, 15), [{ currency: 'USD', rates: ['2'] }]), 'b.pdf');

    expect(store.readSeries('GBP')).toHaveLength(1);
    expect(store.readSeries('JPY')).toEqual([]);
  });

  it('fails on a stored DATE that does not parse and keeps the file as it was', () => {
    fs.mkdirSync(path.join(directory, 'csv'), { recursive: true });
    const corrupt = `${HEADER_LINE}\r\nyesterday,a.pdf,1\r\n`;
    fs.writeFileSync(store.seriesPath('USD'), corrupt);

    expect(() =>
      store.writeRates(extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'USD', rates: ['1'] }]), 'b.pdf')
    ).toThrow(SeriesFormatError);
    expect(fs.readFileSync(store.seriesPath('USD'), 'utf-8')).toBe(corrupt);
  });

  it('rejects a file without the DATE header', () => {
    fs.mkdirSync(path.join(directory, 'csv'), { recursive: true });
    fs.writeFileSync(store.seriesPath('USD'), 'WHEN,RATE\r\n2025-04-03 09:15,1\r\n');

    expect(() => store.readSeries('USD')).toThrow('unexpected header');
  });

  it('does not leave temporary files behind', () => {
    store.writeRates(extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'USD', rates: ['1'] }]), 'a.pdf');
    expect(fs.readdirSync(path.join(directory, 'csv'))).toEqual(['REFERENCE_RATES_USD.csv']);
  });

  it('removes the temporary file when the replace fails', () => {
    store.writeRates(extraction(new Date(2025, 3, 3, 9, 15), [{ currency: 'USD', rates: ['1'] }]), 'a.pdf');
    const before = fs.readFileSync(store.seriesPath('USD'), 'utf-8');
    const rename = jest.spyOn(fs, 'renameSync').mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    try {
      expect(() =>
        store.writeRates(extraction(new Date(2025, 3, 4, 9, 15), [{ currency: 'USD', rates: ['2'] }]), 'b.pdf')
      ).toThrow('disk full');
    } finally {
      rename.mockRestore();
    }

    expect(fs.readdirSync(path.join(directory, 'csv'))).toEqual(['REFERENCE_RATES_USD.csv']);
    expect(fs.readFileSync(store.seriesPath('USD'), 'utf-8')).toBe(before);
  });
});

describe('DocumentArchive', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'ratekeeper-archive-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('links to year/month/day without zero-padding the month folder', () => {
    const archive = new DocumentArchive(directory, 'pdf_files/');
    expect(archive.linkFor(new Date(2025, 3, 3, 9, 15))).toBe('pdf_files/2025/4/2025-04-03.pdf');
    expect(archive.linkFor(new Date(2024, 11, 31, 18, 0))).toBe('pdf_files/2024/12/2024-12-31.pdf');
  });

  it('saves the document under the same layout', () => {
    const archive = new DocumentArchive(directory, 'pdf_files');
    const saved = archive.save(Buffer.from('%PDF-1.4 test'), new Date(2025, 3, 3, 9, 15));

    expect(saved).toBe(path.join(directory, '2025', '4', '2025-04-03.pdf'));
    expect(fs.readFileSync(saved, 'utf-8')).toBe('%PDF-1.4 test');
  });
});
