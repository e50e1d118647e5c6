import got, { HTTPError, RequestError, type Got, type Response } from 'got';
import { HttpError, NetworkError } from './errors.js';

export type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
};

// What the listing fetcher and the scheduler need from the network.
export interface Transport {
  getText(url: string): Promise<string>;
  getBuffer(url: string): Promise<Buffer>;
}

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * got-backed transport. got's own retry is disabled: retries are decided by
 * the caller's RetryPolicy, and every call gets a fresh timeout window.
 */
export class HttpClient implements Transport {
  private client: Got = got.extend({
    headers: {},
    followRedirect: true,
    retry: { limit: 0 },
    timeout: { request: DEFAULT_TIMEOUT_MS }
  });

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs } = opts;
    this.client = this.client.extend({
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      timeout: timeoutMs ? { request: timeoutMs } : undefined
    });
  }

  async getText(url: string): Promise<string> {
    try {
      const res: Response<string> = await this.client.get(url, { responseType: 'text' });
      return res.body;
    } catch (err) {
      throw toTransportError(url, err);
    }
  }

  async getBuffer(url: string): Promise<Buffer> {
    try {
      const res: Response<Buffer> = await this.client.get(url, { responseType: 'buffer' });
      return res.body;
    } catch (err) {
      throw toTransportError(url, err);
    }
  }
}

export function toTransportError(url: string, err: unknown): unknown {
  if (err instanceof HTTPError) {
    return new HttpError(url, err.response.statusCode, err.response.statusMessage);
  }
  if (err instanceof RequestError) {
    return new NetworkError(url, err.message, { code: err.code, cause: err });
  }
  return err;
}
