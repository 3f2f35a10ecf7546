/**
 * HTTP Fetching
 *
 * Binary GET with a bounded timeout and an optional HTTP proxy.
 */

import axios from 'axios';

export interface ProxyAddress {
  host: string;
  port: number;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export interface FetchOptions {
  timeoutMs: number;
  proxy?: ProxyAddress;
}

/**
 * GET a URL and return its status and raw body. Non-2xx statuses resolve;
 * network errors and timeouts reject. `timeoutMs` bounds the whole request,
 * including a proxy tunnel that accepts and then stalls.
 */
export type HttpFetcher = (url: string, options: FetchOptions) => Promise<HttpResponse>;

export const fetchBinary: HttpFetcher = async (url, options) => {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: options.timeoutMs,
    // axios' own timeout never fires once a proxy tunnel is open
    signal: AbortSignal.timeout(options.timeoutMs),
    proxy: options.proxy
      ? { protocol: 'http', host: options.proxy.host, port: options.proxy.port }
      : false,
    validateStatus: () => true,
  });

  return { status: response.status, body: Buffer.from(response.data) };
};

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
