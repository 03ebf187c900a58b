/**
 * @fileoverview EventTransport - Recorded Exchange Replay
 *
 * @packageDocumentation
 * @module @wirebound/core/infrastructure/transport
 *
 * Replays a fixed list of request/response events, in order, and records
 * every request it receives so a test can compare them with the expected
 * ones afterwards.
 *
 * @example
 * ```typescript
 * const transport = new EventTransport([
 *   { request: createRequest({ uri: 'https://svc.example.com/items' }), response: response().internalServerError().build() },
 *   { request: createRequest({ uri: 'https://svc.example.com/items' }), response: response().ok().build(), latencyMs: 50 },
 * ]);
 *
 * await client.send(ListItems, {});
 * transport.assertRequestsMatch(['authorization', 'x-amz-date']);
 * ```
 */

import { DispatchFailure } from '../../domain/exceptions/exceptions';
import type { ITransport, TransportOptions } from '../../application/ports/transport';
import type { IAsyncSleep } from '../../application/ports/runtime';
import { DefaultSleep } from '../resilience/sleep';
import { bodyBytes, bodyText, cloneRequest } from '../platform/types';
import type { HttpRequest, HttpResponse } from '../platform/types';

/**
 * One exchange: the request the test expects and what to answer.
 */
export interface ReplayEvent {
  request: HttpRequest;

  /** A response, or an error the transport rejects with */
  response: HttpResponse | Error;

  /** Delay before answering */
  latencyMs?: number;
}

function describeBody(request: HttpRequest): string | undefined {
  const bytes = bodyBytes(request.body);
  return bytes ? bodyText(bytes) : undefined;
}

export class EventTransport implements ITransport {
  private readonly events: ReplayEvent[];
  private readonly expected: HttpRequest[] = [];
  private readonly received: HttpRequest[] = [];

  constructor(
    events: readonly ReplayEvent[],
    private readonly sleep: IAsyncSleep = new DefaultSleep(),
  ) {
    this.events = [...events];
  }

  async send(request: HttpRequest, options: TransportOptions): Promise<HttpResponse> {
    this.received.push(cloneRequest(request));

    const event = this.events.shift();
    if (!event) {
      throw new DispatchFailure('No more data', 'other');
    }
    this.expected.push(event.request);

    if (event.latencyMs !== undefined && event.latencyMs > 0) {
      await this.sleep.sleep(event.latencyMs, options.signal);
    }

    if (event.response instanceof Error) {
      throw event.response;
    }
    return event.response;
  }

  /**
   * Requests received so far, in order.
   */
  requests(): HttpRequest[] {
    return [...this.received];
  }

  /**
   * Events not yet consumed.
   */
  get remaining(): number {
    return this.events.length;
  }

  /**
   * Compare received requests with the expected ones.
   *
   * @param ignoreHeaders - Header names left out of the comparison
   * @throws {Error} Describing the first mismatch
   */
  assertRequestsMatch(ignoreHeaders: readonly string[] = []): void {
    const ignored = new Set(ignoreHeaders.map((name) => name.toLowerCase()));

    if (this.received.length !== this.expected.length) {
      throw new Error(
        `Expected ${this.expected.length} requests but received ${this.received.length}`,
      );
    }

    this.received.forEach((actual, index) => {
      const expected = this.expected[index];
      const prefix = `Request #${index + 1}`;

      if (actual.method !== expected.method) {
        throw new Error(`${prefix}: method ${actual.method} does not match ${expected.method}`);
      }
      if (actual.uri !== expected.uri) {
        throw new Error(`${prefix}: uri ${actual.uri} does not match ${expected.uri}`);
      }

      const names = new Set([...Object.keys(actual.headers), ...Object.keys(expected.headers)]);
      for (const name of names) {
        if (ignored.has(name)) continue;
        if (actual.headers[name] !== expected.headers[name]) {
          throw new Error(
            `${prefix}: header ${name} is ${String(actual.headers[name])}, expected ${String(expected.headers[name])}`,
          );
        }
      }

      const actualBody = describeBody(actual);
      const expectedBody = describeBody(expected);
      if (actualBody !== undefined && expectedBody !== undefined && actualBody !== expectedBody) {
        throw new Error(`${prefix}: body does not match`);
      }
    });
  }
}
