/**
 * Document Acquisition
 *
 * Downloads the rate sheet: primary URL, then mirror, once each and direct;
 * then the primary URL again through a fresh proxy per attempt. A response
 * only counts when its bytes classify as PDF.
 */

import {
  logger,
  acquisitionAttemptsCounter,
  AcquisitionExhaustedError,
  type RawDocument,
} from '@ratekeeper/shared';
import { classifyContent } from './content-type';
import { isSuccessStatus, type HttpFetcher, type ProxyAddress } from './http';
import type { ProxyProvider } from './proxy';

export interface AcquisitionOptions {
  primaryUrl: string;
  mirrorUrl: string;
  proxyAttempts: number;
  timeoutMs: number;
  fetcher: HttpFetcher;
  proxyProvider: ProxyProvider;
}

type AttemptMode = 'direct' | 'proxy';

/**
 * One download; resolves to the document when valid, null otherwise
 */
async function attemptDownload(
  url: string,
  mode: AttemptMode,
  options: AcquisitionOptions,
  proxy?: ProxyAddress
): Promise<RawDocument | null> {
  try {
    const response = await options.fetcher(url, { timeoutMs: options.timeoutMs, proxy });

    if (!isSuccessStatus(response.status)) {
      logger.warn('Download returned non-success status', { url, mode, status: response.status });
      acquisitionAttemptsCounter.inc({ mode, outcome: 'http_error' });
      return null;
    }

    const kind = classifyContent(response.body);
    if (kind !== 'pdf') {
      logger.warn('Downloaded content is not a PDF', {
        url,
        mode,
        bytes: response.body.length,
      });
      acquisitionAttemptsCounter.inc({ mode, outcome: 'not_pdf' });
      return null;
    }

    acquisitionAttemptsCounter.inc({ mode, outcome: 'success' });
    return { bytes: response.body, kind, sourceUrl: url };
  } catch (error) {
    logger.error('Failed to download PDF', error, { url, mode, proxy });
    acquisitionAttemptsCounter.inc({ mode, outcome: 'network_error' });
    return null;
  }
}

/**
 * Acquire the latest rate sheet or fail with AcquisitionExhaustedError
 */
export async function acquireDocument(options: AcquisitionOptions): Promise<RawDocument> {
  let attempts = 0;

  for (const url of [options.primaryUrl, options.mirrorUrl]) {
    logger.info('Attempting to download PDF', { url });
    attempts++;

    const document = await attemptDownload(url, 'direct', options);
    if (document) {
      logger.info('Successfully downloaded PDF', { url, bytes: document.bytes.length });
      return document;
    }
  }

  for (let attempt = 1; attempt <= options.proxyAttempts; attempt++) {
    logger.info('Direct downloads failed, attempting with proxy', {
      attempt,
      maxAttempts: options.proxyAttempts,
    });

    let proxy: ProxyAddress;
    try {
      proxy = await options.proxyProvider.acquire();
    } catch (error) {
      logger.error('Failed to acquire proxy, skipping attempt', error, { attempt });
      acquisitionAttemptsCounter.inc({ mode: 'proxy', outcome: 'no_proxy' });
      continue;
    }

    logger.info('Using proxy', { attempt, host: proxy.host, port: proxy.port });
    attempts++;

    const document = await attemptDownload(options.primaryUrl, 'proxy', options, proxy);
    if (document) {
      logger.info('Successfully downloaded PDF using proxy', {
        attempt,
        bytes: document.bytes.length,
      });
      return document;
    }
  }

  throw new AcquisitionExhaustedError(attempts);
}
