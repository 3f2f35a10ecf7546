/**
 * Runs one PDF through the real pdfjs-backed document and the extraction
 * pipeline, outside Jest (whose CommonJS loader cannot take pdfjs-dist).
 *
 * Usage: node --import tsx extract-document.ts <pdf> <result.json>
 */

import fs from 'fs';
import { ConfigurationError, formatTimestamp } from '@ratekeeper/shared';
import { openPdf } from '../../services/collector/src/lib/pdf';
import { extractReferenceRates } from '../../services/collector/src/lib/pipeline';

export interface DocumentReport {
  numPages: number;
  pageText: string;
  creationDate: string | null;
  jpegHeader: string;
  extraction: {
    timestamp: string;
    rates: Array<{ currency: string; rates: string[] }>;
    outcome: { path: string; pageNumber: number };
  };
}

async function main(): Promise<void> {
  const [pdfPath, resultPath] = process.argv.slice(2);
  if (!pdfPath || !resultPath) {
    throw new Error('Usage: extract-document <pdf> <result.json>');
  }

  const document = await openPdf(fs.readFileSync(pdfPath));
  try {
    const creationDate = await document.getCreationDate();
    const jpeg = await document.renderPageToJpeg(1, 400);
    const extraction = await extractReferenceRates(document, {
      renderMaxDimension: 400,
      getInterpreter: () => {
        throw new ConfigurationError('vision fallback not expected for a text document', 'OPENAI_API_KEY');
      },
    });

    const report: DocumentReport = {
      numPages: document.numPages,
      pageText: await document.getPageText(1),
      creationDate: creationDate ? formatTimestamp(creationDate) : null,
      jpegHeader: jpeg.subarray(0, 3).toString('hex'),
      extraction: {
        timestamp: formatTimestamp(extraction.timestamp),
        rates: extraction.rates,
        outcome: { path: extraction.outcome.path, pageNumber: extraction.outcome.pageNumber },
      },
    };
    fs.writeFileSync(resultPath, JSON.stringify(report));
  } finally {
    await document.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
