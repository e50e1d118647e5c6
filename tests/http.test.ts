import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { HttpClient } from '../src/http.js';
import { HttpError, NetworkError } from '../src/errors.js';

let server: http.Server;
let base: string;
let hits = 0;

function listen(s: http.Server): Promise<number> {
  return new Promise((resolve, reject) =>
    s.listen(0, '127.0.0.1', () => {
      const addr = s.address();
      if (addr && typeof addr === 'object') resolve(addr.port);
      else reject(new Error(`unexpected address: ${String(addr)}`));
    })
  );
}

beforeAll(async () => {
  server = http.createServer((req, res) => {
    hits++;
    switch (req.url) {
      case '/ok.jpg':
        res.end('jpeg-bytes');
        break;
      case '/page':
        res.setHeader('content-type', 'text/html');
        res.end('<a href="/ok.jpg">ok</a>');
        break;
      case '/ua':
        res.end(req.headers['user-agent'] ?? '');
        break;
      case '/busy':
        res.statusCode = 503;
        res.end('busy');
        break;
      case '/slow':
        break; // never answers
      default:
        res.statusCode = 404;
        res.end('not found');
    }
  });
  base = `http://127.0.0.1:${await listen(server)}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('HttpClient', () => {
  it('returns text and buffers', async () => {
    const client = new HttpClient();
    await expect(client.getText(`${base}/page`)).resolves.toBe('<a href="/ok.jpg">ok</a>');
    const body = await client.getBuffer(`${base}/ok.jpg`);
    expect(Buffer.isBuffer(body)).toBe(true);
    expect(body.toString('utf-8')).toBe('jpeg-bytes');
  });

  it('sends the configured user agent', async () => {
    const client = new HttpClient({ userAgent: 'order-images-test/1.0' });
    await expect(client.getText(`${base}/ua`)).resolves.toBe('order-images-test/1.0');
  });

  it('maps status codes to HttpError without retrying', async () => {
    const client = new HttpClient();
    const before = hits;
    const err = await client.getBuffer(`${base}/busy`).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ statusCode: 503, url: `${base}/busy` });
    expect(hits - before).toBe(1);
    await expect(client.getText(`${base}/missing`)).rejects.toMatchObject({ statusCode: 404 });
  });

  it('maps timeouts to NetworkError', async () => {
    const client = new HttpClient({ timeoutMs: 100 });
    await expect(client.getBuffer(`${base}/slow`)).rejects.toBeInstanceOf(NetworkError);
  });

  it('maps refused connections to NetworkError', async () => {
    const closed = http.createServer();
    const port = await listen(closed);
    await new Promise<void>((resolve) => closed.close(() => resolve()));
    await expect(new HttpClient().getText(`http://127.0.0.1:${port}/`)).rejects.toMatchObject({
      name: 'NetworkError',
      code: 'ECONNREFUSED'
    });
  });
});
