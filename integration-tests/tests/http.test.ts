/**
 * HTTP Fetch Tests
 *
 * Origin and proxy are servers bound to 127.0.0.1 inside the test process.
 */

import * as http from 'http';
import * as net from 'net';
import type { AddressInfo } from 'net';
import { fetchBinary, isSuccessStatus } from '../../services/collector/src/lib/http';

const PDF_BODY = Buffer.from('%PDF-1.7\n%test document\n');

interface LocalServer {
  port: number;
  close: () => Promise<void>;
}

/**
 * Start a server and keep track of its sockets so it can always be closed
 */
async function listen(server: net.Server): Promise<LocalServer> {
  const sockets = new Set<net.Socket>();
  server.on('connection', (socket: net.Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }

  return {
    port: address.port,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

describe('fetchBinary', () => {
  let server: LocalServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('returns status and body without rejecting on non-2xx', async () => {
    server = await listen(
      http.createServer((req, res) => {
        if (req.url === '/FOREX_CARD_RATES.pdf') {
          res.writeHead(200, { 'Content-Type': 'application/pdf' });
          res.end(PDF_BODY);
        } else {
          res.writeHead(404);
          res.end('not here');
        }
      })
    );
    const base = `http://127.0.0.1:${server.port}`;

    const found = await fetchBinary(`${base}/FOREX_CARD_RATES.pdf`, { timeoutMs: 2000 });
    expect(found.status).toBe(200);
    expect(found.body.equals(PDF_BODY)).toBe(true);

    const missing = await fetchBinary(`${base}/other.pdf`, { timeoutMs: 2000 });
    expect(missing.status).toBe(404);
    expect(missing.body.toString()).toBe('not here');
  });

  it('sends the request through the given proxy', async () => {
    const seen: string[] = [];
    server = await listen(
      http.createServer((req, res) => {
        seen.push(`${req.method} ${req.url}`);
        res.writeHead(200);
        res.end(PDF_BODY);
      })
    );

    const response = await fetchBinary('http://rates.test/FOREX_CARD_RATES.pdf', {
      timeoutMs: 2000,
      proxy: { host: '127.0.0.1', port: server.port },
    });

    expect(response.status).toBe(200);
    expect(seen).toEqual(['GET http://rates.test/FOREX_CARD_RATES.pdf']);
  });

  const misbehavingProxies: Array<[string, (socket: net.Socket) => void]> = [
    ['never answers', () => undefined],
    [
      'drops the tunnel after the first bytes',
      (socket) => {
        socket.once('data', () => socket.destroy());
      },
    ],
  ];

  it.each(misbehavingProxies)('gives up within the timeout when the proxy %s', async (_case, onConnection) => {
    server = await listen(net.createServer(onConnection));
    const startedAt = Date.now();

    await expect(
      fetchBinary('https://rates.test/FOREX_CARD_RATES.pdf', {
        timeoutMs: 300,
        proxy: { host: '127.0.0.1', port: server.port },
      })
    ).rejects.toThrow();
    expect(Date.now() - startedAt).toBeLessThan(5000);
  }, 10000);
});

describe('isSuccessStatus', () => {
  it('accepts 2xx only', () => {
    expect([199, 200, 204, 299, 300, 404, 503].map(isSuccessStatus)).toEqual([
      false, true, true, true, false, false, false,
    ]);
  });
});
