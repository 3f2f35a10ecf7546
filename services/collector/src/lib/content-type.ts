/**
 * Content Classification
 *
 * Classifies a downloaded body by its leading bytes. A 200 response carrying
 * an HTML error page must not pass for the rate sheet.
 */

import type { DocumentKind } from '@ratekeeper/shared';

/** Leading bytes inspected */
export const SNIFF_LENGTH = 128;

const PDF_SIGNATURE = Buffer.from('%PDF-', 'latin1');

export function classifyContent(bytes: Buffer): DocumentKind {
  const head = bytes.subarray(0, SNIFF_LENGTH);
  if (head.length >= PDF_SIGNATURE.length && head.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE)) {
    return 'pdf';
  }
  return 'unknown';
}
