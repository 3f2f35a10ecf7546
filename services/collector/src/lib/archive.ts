/**
 * Document Archive
 *
 * Keeps each processed rate sheet as <root>/<year>/<month>/<yyyy-MM-dd>.pdf,
 * month not zero-padded. Series rows link to the same relative location.
 */

import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { logger } from '@ratekeeper/shared';

function relativeParts(timestamp: Date): string[] {
  return [
    String(timestamp.getFullYear()),
    String(timestamp.getMonth() + 1),
    `${format(timestamp, 'yyyy-MM-dd')}.pdf`,
  ];
}

export class DocumentArchive {
  constructor(
    private readonly directory: string,
    private readonly linkBase: string
  ) {}

  /**
   * Reference stored in the PDF FILE column for a sheet published at `timestamp`
   */
  linkFor(timestamp: Date): string {
    return [this.linkBase.replace(/\/+$/, ''), ...relativeParts(timestamp)].join('/');
  }

  /**
   * Write the sheet to the archive, replacing any copy for the same day
   */
  save(bytes: Buffer, timestamp: Date): string {
    const filePath = path.join(this.directory, ...relativeParts(timestamp));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, bytes);

    logger.info('Archived PDF', { filePath, bytes: bytes.length });
    return filePath;
  }
}
