import type { Transport } from '../src/http.js';

export type Reply = string | Buffer | Error;
export type Handler = (url: string, call: number) => Reply;

/**
 * In-memory Transport. `call` counts requests per URL, starting at 1, so a
 * handler can fail the first attempts and succeed later.
 */
export class FakeTransport implements Transport {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private perUrl = new Map<string, number>();

  constructor(private handler: Handler, private delayMs = 0) {}

  async getText(url: string): Promise<string> {
    const reply = await this.respond(url);
    return typeof reply === 'string' ? reply : reply.toString('utf-8');
  }

  async getBuffer(url: string): Promise<Buffer> {
    const reply = await this.respond(url);
    return typeof reply === 'string' ? Buffer.from(reply, 'utf-8') : reply;
  }

  private async respond(url: string): Promise<string | Buffer> {
    this.calls.push(url);
    const call = (this.perUrl.get(url) ?? 0) + 1;
    this.perUrl.set(url, call);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs) await new Promise((r) => setTimeout(r, this.delayMs));
      const reply = this.handler(url, call);
      if (reply instanceof Error) throw reply;
      return reply;
    } finally {
      this.inFlight--;
    }
  }

  callsTo(url: string): number {
    return this.perUrl.get(url) ?? 0;
  }
}
