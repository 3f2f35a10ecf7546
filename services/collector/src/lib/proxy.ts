/**
 * Proxy Acquisition
 *
 * Picks a random anonymous proxy from a published list (one "host:port"
 * per line). Every call fetches the list again so each retry gets a fresh
 * proxy.
 */

import { logger } from '@ratekeeper/shared';
import { isSuccessStatus, type HttpFetcher, type ProxyAddress } from './http';

export interface ProxyProvider {
  acquire(): Promise<ProxyAddress>;
}

/**
 * Parse "host:port" lines, skipping blanks, comments and malformed entries
 */
export function parseProxyList(text: string): ProxyAddress[] {
  const proxies: ProxyAddress[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/^https?:\/\//, '');
    if (!line || line.startsWith('#')) continue;

    const match = line.match(/^([A-Za-z0-9.-]+):(\d{1,5})$/);
    if (!match) continue;

    const port = Number(match[2]);
    if (port < 1 || port > 65535) continue;

    proxies.push({ host: match[1], port });
  }

  return proxies;
}

export class ProxyListProvider implements ProxyProvider {
  constructor(
    private readonly listUrl: string,
    private readonly timeoutMs: number,
    private readonly fetcher: HttpFetcher,
    private readonly random: () => number = Math.random
  ) {}

  async acquire(): Promise<ProxyAddress> {
    const response = await this.fetcher(this.listUrl, { timeoutMs: this.timeoutMs });
    if (!isSuccessStatus(response.status)) {
      throw new Error(`Proxy list request failed with status ${response.status}`);
    }

    const proxies = parseProxyList(response.body.toString('utf-8'));
    if (proxies.length === 0) {
      throw new Error('Proxy list is empty');
    }

    const proxy = proxies[Math.floor(this.random() * proxies.length)];
    logger.debug('Acquired proxy', { host: proxy.host, port: proxy.port, candidates: proxies.length });
    return proxy;
  }
}
