import { describeError } from './errors.js';
import { retryPolicy, withRetry, type RetryPolicy } from './retry.js';
import { silentLogger, type Logger } from './logger.js';
import type { Transport } from './http.js';
import type { OrderId } from './types.js';

export const LISTING_PATH = '/backend/general/photos/seller';

export type ListingPage = {
  url: string;
  html: string;
};

export type FetchListingDeps = {
  transport: Transport;
  policy?: RetryPolicy;
  logger?: Logger;
};

export function listingPageUrl(baseUrl: string, orderId: OrderId): string {
  const u = new URL(baseUrl.replace(/\/+$/, '') + LISTING_PATH);
  u.searchParams.set('orderid', orderId);
  return u.toString();
}

/**
 * Fetches the order's listing page. Transient failures are retried per the
 * policy; a 4xx or exhausted retries reject, and the run cannot continue.
 */
export async function fetchListingPage(orderId: OrderId, baseUrl: string, deps: FetchListingDeps): Promise<ListingPage> {
  const { transport } = deps;
  const policy = deps.policy ?? retryPolicy();
  const log = deps.logger ?? silentLogger;
  const url = listingPageUrl(baseUrl, orderId);

  log.info(`[fetch] listing: ${url}`);
  const html = await withRetry(() => transport.getText(url), policy, {
    onRetry: (err, attempt, delayMs) =>
      log.warn(`[fetch] attempt ${attempt}/${policy.maxAttempts} failed (${describeError(err)}), retrying in ${delayMs}ms`)
  });
  log.info(`[fetch] listing fetched (${html.length} chars)`);
  return { url, html };
}
