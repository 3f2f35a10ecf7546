/**
 * Run Orchestration
 *
 * latest: acquire → extract → archive → write
 * backfill: the same, minus acquisition, for every PDF under a directory
 */

import fs from 'fs';
import path from 'path';
import {
  logger,
  config,
  runForDocument,
  formatTimestamp,
  type RateExtraction,
  type RawDocument,
} from '@ratekeeper/shared';
import { acquireDocument } from './acquisition';
import { DocumentArchive } from './archive';
import { fetchBinary } from './http';
import { createPageInterpreter } from './llm';
import { openPdf, type PdfDocument } from './pdf';
import { extractReferenceRates, type PipelineOptions } from './pipeline';
import { ProxyListProvider } from './proxy';
import { CsvSeriesStore, type SeriesStore } from './series-store';

export interface RunnerDeps {
  acquire: () => Promise<RawDocument>;
  openDocument: (bytes: Buffer) => Promise<PdfDocument>;
  pipeline: PipelineOptions;
  store: SeriesStore;
  archive: DocumentArchive;
}

export interface ProcessOptions {
  /** Keep a copy of the PDF in the archive */
  archive: boolean;
}

export interface BackfillSummary {
  processed: number;
  failed: number;
}

/**
 * Wire the runner to the real network, PDF engine, vision service and disk
 */
export function createRunnerDeps(): RunnerDeps {
  return {
    acquire: () =>
      acquireDocument({
        primaryUrl: config.forexPdfUrl,
        mirrorUrl: config.forexPdfMirrorUrl,
        proxyAttempts: config.proxyAttempts,
        timeoutMs: config.fetchTimeoutMs,
        fetcher: fetchBinary,
        proxyProvider: new ProxyListProvider(
          config.proxyListUrl,
          config.proxyListTimeoutMs,
          fetchBinary
        ),
      }),
    openDocument: openPdf,
    pipeline: {
      getInterpreter: () => createPageInterpreter(),
      renderMaxDimension: config.renderMaxDimension,
    },
    store: new CsvSeriesStore(config.csvDir),
    archive: new DocumentArchive(config.pdfDir, config.pdfLinkBase),
  };
}

/**
 * Extract one document and merge its rates into the series
 */
export async function processDocument(
  bytes: Buffer,
  options: ProcessOptions,
  deps: RunnerDeps
): Promise<RateExtraction> {
  const document = await deps.openDocument(bytes);

  let extraction: RateExtraction;
  try {
    extraction = await extractReferenceRates(document, deps.pipeline);
  } finally {
    await document.close();
  }

  if (options.archive) {
    deps.archive.save(bytes, extraction.timestamp);
  }

  const currencies = deps.store.writeRates(extraction, deps.archive.linkFor(extraction.timestamp));

  logger.info('Document processed', {
    date: formatTimestamp(extraction.timestamp),
    extraction_path: extraction.outcome.path,
    pageNumber: extraction.outcome.pageNumber,
    currencies: currencies.length,
  });

  return extraction;
}

/**
 * Download and process today's sheet. Errors propagate to the caller.
 */
export async function runLatest(deps: RunnerDeps): Promise<RateExtraction> {
  logger.info('Starting reference rate collection');

  const document = await deps.acquire();
  const extraction = await processDocument(document.bytes, { archive: true }, deps);

  logger.info('Successfully completed reference rate collection', {
    sourceUrl: document.sourceUrl,
  });
  return extraction;
}

/**
 * All *.pdf files under a directory, recursively, in sorted path order
 */
export function findPdfFiles(directory: string): string[] {
  const files: string[] = [];

  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...findPdfFiles(entryPath));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.pdf')) {
      files.push(entryPath);
    }
  }

  return files.sort();
}

/**
 * Process previously downloaded sheets one by one. A failing file is logged
 * and skipped.
 */
export async function runBackfill(
  directory: string,
  options: ProcessOptions,
  deps: RunnerDeps
): Promise<BackfillSummary> {
  const files = findPdfFiles(directory);
  logger.info('Found PDF files to process', { directory, count: files.length });

  const summary: BackfillSummary = { processed: 0, failed: 0 };

  for (const filePath of files) {
    await runForDocument(filePath, async () => {
      logger.info('Parsing document');
      try {
        await processDocument(fs.readFileSync(filePath), options, deps);
        summary.processed++;
      } catch (error) {
        summary.failed++;
        logger.error('Error processing document', error);
      }
    });
  }

  logger.info('Backfill complete', { ...summary });
  return summary;
}
