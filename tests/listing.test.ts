import { describe, expect, it } from 'vitest';
import { fetchListingPage, listingPageUrl } from '../src/listing.js';
import { retryPolicy } from '../src/retry.js';
import { HttpError, NetworkError } from '../src/errors.js';
import { FakeTransport } from './fake_transport.js';

const BASE = 'https://portal.example.com';
const URL_13011948 = 'https://portal.example.com/backend/general/photos/seller?orderid=13011948';
const policy = retryPolicy({ maxAttempts: 3, backoff: () => 0 });

describe('listingPageUrl', () => {
  it('joins base URL and order id', () => {
    expect(listingPageUrl(BASE, '13011948')).toBe(URL_13011948);
    expect(listingPageUrl(`${BASE}/`, '13011948')).toBe(URL_13011948);
  });

  it('encodes the order id', () => {
    expect(listingPageUrl(BASE, 'a b&c')).toBe(
      'https://portal.example.com/backend/general/photos/seller?orderid=a+b%26c'
    );
  });
});

describe('fetchListingPage', () => {
  it('returns the page body', async () => {
    const transport = new FakeTransport(() => '<html></html>');
    await expect(fetchListingPage('13011948', BASE, { transport, policy })).resolves.toEqual({
      url: URL_13011948,
      html: '<html></html>'
    });
    expect(transport.calls).toEqual([URL_13011948]);
  });

  it('retries server errors', async () => {
    const transport = new FakeTransport((url, call) => (call < 3 ? new HttpError(url, 502) : '<p>ok</p>'));
    const page = await fetchListingPage('13011948', BASE, { transport, policy });
    expect(page.html).toBe('<p>ok</p>');
    expect(transport.calls).toHaveLength(3);
  });

  it('fails at once on a 4xx', async () => {
    const transport = new FakeTransport((url) => new HttpError(url, 404));
    await expect(fetchListingPage('13011948', BASE, { transport, policy })).rejects.toMatchObject({ statusCode: 404 });
    expect(transport.calls).toHaveLength(1);
  });

  it('gives up after the retry budget', async () => {
    const transport = new FakeTransport((url) => new NetworkError(url, 'connect ECONNRESET', { code: 'ECONNRESET' }));
    await expect(fetchListingPage('13011948', BASE, { transport, policy })).rejects.toBeInstanceOf(NetworkError);
    expect(transport.calls).toHaveLength(3);
  });
});
