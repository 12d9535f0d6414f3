import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

import { charsetFrom, decodeBody, type FetchLike } from '../src/crawler/network/fetchPage.js';
import { fetchPageWithRetry } from '../src/crawler/network/fetchPageWithRetry.js';
import { isLikelyDocument } from '../src/crawler/classify/isLikelyDocument.js';
import { encodeCp1251 } from './support/cp1251.js';

const cp1251Page = `<html><body><h1>Рецепт борща</h1><p>${'свекла капуста '.repeat(60)}</p></body></html>`;

const RETRY = { maxAttempts: 3, initialBackoffMs: 1_000, backoffFactor: 1.5 };

function recordingSleep(): { waits: number[]; sleep: (ms: number) => Promise<void> } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

describe('fetchPageWithRetry with a stubbed transport', () => {
  it('attempts exactly the retry ceiling against an always-failing endpoint', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const { waits, sleep } = recordingSleep();

    const result = await fetchPageWithRetry('https://recipes.test/r/1', {
      timeoutMs: 1_000,
      retry: RETRY,
      fetchImpl,
      sleep,
    });

    expect(result).toEqual({ status: null, body: null, raw: null });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([1_000, 1_500]);
  });

  it('grows every successive wait by the backoff factor', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const { waits, sleep } = recordingSleep();

    await fetchPageWithRetry('https://recipes.test/r/1', {
      timeoutMs: 1_000,
      retry: { ...RETRY, maxAttempts: 5 },
      fetchImpl,
      sleep,
    });

    expect(fetchImpl).toHaveBeenCalledTimes(5);
    expect(waits).toEqual([1_000, 1_500, 2_250, 3_375]);
    for (let index = 1; index < waits.length; index += 1) {
      expect(waits[index]).toBeGreaterThan(waits[index - 1]);
    }
  });

  it('returns rejected statuses with their body and does not retry them', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('missing', { status: 404 }));
    const { waits, sleep } = recordingSleep();

    const result = await fetchPageWithRetry('https://recipes.test/r/2', {
      timeoutMs: 1_000,
      retry: RETRY,
      fetchImpl,
      sleep,
    });

    expect(result).toEqual({ status: 404, body: 'missing', raw: Buffer.from('missing') });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });

  it('recovers when a later attempt succeeds', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }));
    const { waits, sleep } = recordingSleep();

    const result = await fetchPageWithRetry('https://recipes.test/r/3', {
      timeoutMs: 1_000,
      retry: RETRY,
      fetchImpl,
      sleep,
    });

    expect(result).toEqual({ status: 200, body: '<html>ok</html>', raw: Buffer.from('<html>ok</html>') });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(waits).toEqual([1_000]);
  });

  it('sends the configured user agent and follows redirects', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('ok', { status: 200 }));

    await fetchPageWithRetry('https://recipes.test/r/4', {
      timeoutMs: 1_000,
      retry: RETRY,
      userAgent: 'corpus-test/1.0',
      fetchImpl,
    });

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.redirect).toBe('follow');
    expect(init?.headers).toMatchObject({ 'user-agent': 'corpus-test/1.0' });
  });
});

describe('fetchPageWithRetry against a local server', () => {
  let server: Server;
  let baseUrl: string;
  let hangingRequests = 0;

  beforeAll(async () => {
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      if (req.url === '/old') {
        res.statusCode = 302;
        res.setHeader('Location', '/new');
        res.end();
        return;
      }

      if (req.url === '/new') {
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.end('<html><body>fresh</body></html>');
        return;
      }

      if (req.url === '/cp1251') {
        res.setHeader('Content-Type', 'text/html; charset=windows-1251');
        res.end(encodeCp1251(cp1251Page));
        return;
      }

      if (req.url === '/hang') {
        hangingRequests += 1;
        return;
      }

      res.statusCode = 500;
      res.end('server error');
    });

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', () => resolve());
    });

    const address = server.address();
    if (typeof address === 'object' && address && typeof address.port === 'number') {
      baseUrl = `http://127.0.0.1:${address.port}`;
    } else {
      throw new Error('Unable to determine server address for tests.');
    }
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  });

  it('follows redirects to the final page', async () => {
    const result = await fetchPageWithRetry(`${baseUrl}/old`, { timeoutMs: 2_000, retry: RETRY });
    expect(result).toEqual({
      status: 200,
      body: '<html><body>fresh</body></html>',
      raw: Buffer.from('<html><body>fresh</body></html>'),
    });
  });

  it('decodes the body with the declared charset and keeps the bytes as sent', async () => {
    const result = await fetchPageWithRetry(`${baseUrl}/cp1251`, { timeoutMs: 2_000, retry: RETRY });

    expect(result.status).toBe(200);
    expect(result.body).toBe(cp1251Page);
    expect(result.raw).toEqual(encodeCp1251(cp1251Page));
    expect(result.body !== null && isLikelyDocument(result.body)).toBe(true);
  });

  it('passes server errors through without retrying', async () => {
    const { waits, sleep } = recordingSleep();
    const result = await fetchPageWithRetry(`${baseUrl}/broken`, {
      timeoutMs: 2_000,
      retry: RETRY,
      sleep,
    });

    expect(result).toEqual({ status: 500, body: 'server error', raw: Buffer.from('server error') });
    expect(waits).toEqual([]);
  });

  it('treats timeouts as transport failures and retries them', async () => {
    const { waits, sleep } = recordingSleep();
    const result = await fetchPageWithRetry(`${baseUrl}/hang`, {
      timeoutMs: 50,
      retry: { maxAttempts: 2, initialBackoffMs: 10, backoffFactor: 2 },
      sleep,
    });

    expect(result).toEqual({ status: null, body: null, raw: null });
    expect(waits).toEqual([10]);
    expect(hangingRequests).toBe(2);
  });
});

describe('charset handling', () => {
  it('reads the charset parameter from a content type', () => {
    expect(charsetFrom('text/html; charset=windows-1251')).toBe('windows-1251');
    expect(charsetFrom('text/html;charset="UTF-8"')).toBe('utf-8');
    expect(charsetFrom('text/html')).toBeUndefined();
    expect(charsetFrom(null)).toBeUndefined();
  });

  it('decodes declared single-byte charsets', () => {
    expect(decodeBody(encodeCp1251('Ингредиенты'), 'text/html; charset=cp1251')).toEqual({
      charset: 'windows-1251',
      body: 'Ингредиенты',
    });
  });

  it('falls back to UTF-8 for missing or unknown labels', () => {
    const utf8 = Buffer.from('Приготовление');
    expect(decodeBody(utf8, 'text/html')).toEqual({ charset: 'utf-8', body: 'Приготовление' });
    expect(decodeBody(utf8, 'text/html; charset=x-no-such-charset')).toEqual({
      charset: 'utf-8',
      body: 'Приготовление',
    });
  });
});
