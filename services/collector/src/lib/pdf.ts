/**
 * PDF Access
 *
 * Text extraction, metadata and page rendering using pdfjs-dist. Rendering
 * draws onto @napi-rs/canvas, which pdfjs-dist also uses internally in Node.
 * Both modules load lazily so that nothing is pulled in unless a document
 * is actually opened.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { logger } from '@ratekeeper/shared';

type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');
type CanvasModule = typeof import('@napi-rs/canvas');

let pdfjsModule: PdfjsModule | null = null;
let canvasModule: CanvasModule | null = null;

async function getPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsModule) {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

    // Configure worker for Node.js environment
    const workerPath = path.join(
      path.dirname(require.resolve('pdfjs-dist/package.json')),
      'legacy/build/pdf.worker.mjs'
    );
    pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
    pdfjsModule = pdfjs;
  }
  return pdfjsModule;
}

async function getCanvas(): Promise<CanvasModule> {
  if (!canvasModule) {
    canvasModule = await import('@napi-rs/canvas');
  }
  return canvasModule;
}

/**
 * The operations the extraction pipeline needs from an open PDF
 */
export interface PdfDocument {
  readonly numPages: number;

  /** Text of a 1-based page, one visual line per text line */
  getPageText(pageNumber: number): Promise<string>;

  /** Creation date from the document info dictionary, as wall-clock time */
  getCreationDate(): Promise<Date | undefined>;

  /** Render a 1-based page to JPEG with its longest side at `maxDimension` px */
  renderPageToJpeg(pageNumber: number, maxDimension: number): Promise<Buffer>;

  close(): Promise<void>;
}

/**
 * Parse a PDF date string ("D:YYYYMMDDHHmmSS+05'30'") keeping the wall-clock
 * components as written. The offset is ignored: rate sheet timestamps are
 * compared as calendar dates in the publisher's own zone.
 */
export function parsePdfDate(raw: string): Date | undefined {
  const match = raw.match(/^(?:D:)?(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?/);
  if (!match) return undefined;

  const [, year, month = '01', day = '01', hour = '00', minute = '00', second = '00'] = match;
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );

  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Build page text preserving line structure.
 *
 * Groups text items by Y position; currency lines are only recognisable
 * when their code and rates stay on one line.
 */
async function extractPageText(page: PDFPageProxy): Promise<string> {
  const textContent = await page.getTextContent();

  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of textContent.items) {
    if (!('str' in item) || item.str.trim() === '') continue;

    // Round Y position to group items on the same line
    // (text on the same visual line may have slight Y variations)
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // Sort Y positions descending (top to bottom on page)
  const sortedYPositions = [...itemsByY.keys()].sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

class PdfjsDocument implements PdfDocument {
  constructor(private readonly pdf: PDFDocumentProxy) {}

  get numPages(): number {
    return this.pdf.numPages;
  }

  async getPageText(pageNumber: number): Promise<string> {
    const page = await this.pdf.getPage(pageNumber);
    try {
      return await extractPageText(page);
    } finally {
      page.cleanup();
    }
  }

  async getCreationDate(): Promise<Date | undefined> {
    const metadata = await this.pdf.getMetadata();
    const info: unknown = metadata.info;

    if (
      typeof info === 'object' &&
      info !== null &&
      'CreationDate' in info &&
      typeof info.CreationDate === 'string'
    ) {
      return parsePdfDate(info.CreationDate);
    }
    return undefined;
  }

  async renderPageToJpeg(pageNumber: number, maxDimension: number): Promise<Buffer> {
    const page = await this.pdf.getPage(pageNumber);

    try {
      const unscaled = page.getViewport({ scale: 1 });
      const scale = maxDimension / Math.max(unscaled.width, unscaled.height);
      const viewport = page.getViewport({ scale });

      const { createCanvas } = await getCanvas();
      const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
      const context = canvas.getContext('2d');

      // PDF.js types its render target as a DOM canvas; the napi canvas is API compatible
      const renderContext = {
        canvasContext: context,
        viewport,
      } as unknown as Parameters<typeof page.render>[0];

      await page.render(renderContext).promise;

      const image = await canvas.encode('jpeg', 90);

      logger.debug('Rendered PDF page', {
        pageNumber,
        width: canvas.width,
        height: canvas.height,
        bytes: image.length,
      });

      return image;
    } finally {
      page.cleanup();
    }
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}

/**
 * Open a PDF from bytes
 */
export async function openPdf(bytes: Buffer): Promise<PdfDocument> {
  const pdfjs = await getPdfjs();

  // pdfjs takes ownership of the array it is given, so hand it a copy
  const data = new Uint8Array(bytes);
  const pdf = await pdfjs.getDocument({ data, verbosity: 0 }).promise;

  logger.debug('Opened PDF', { totalPages: pdf.numPages, bytes: bytes.length });

  return new PdfjsDocument(pdf);
}
