/**
 * @wirebound/core - Capture Transport
 */

import type { ITransport } from '../../application/ports/transport';
import { cloneRequest, response } from '../platform/types';
import type { HttpRequest, HttpResponse } from '../platform/types';

/**
 * Answers every request with the same response and keeps a copy of each
 * request.
 *
 * @example
 * ```typescript
 * const transport = new CaptureTransport(response().ok().json({ id: 1 }).build());
 * await client.send(GetItem, { id: '1' });
 * transport.lastRequest()?.headers['sdk-request']; // 'attempt=1; max=3'
 * ```
 */
export class CaptureTransport implements ITransport {
  private readonly captured: HttpRequest[] = [];

  constructor(private readonly reply: HttpResponse = response().ok().build()) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.captured.push(cloneRequest(request));
    return {
      status: this.reply.status,
      headers: { ...this.reply.headers },
      body: this.reply.body,
    };
  }

  requests(): HttpRequest[] {
    return [...this.captured];
  }

  lastRequest(): HttpRequest | undefined {
    return this.captured[this.captured.length - 1];
  }

  clear(): void {
    this.captured.length = 0;
  }
}
