/**
 * @file Timeout Integration Tests
 * @description Attempt and operation deadlines, run on real timers with
 * short durations.
 */

import {
  CaptureTransport,
  DefaultSleep,
  DispatchFailure,
  EventTransport,
  RetryConfig,
  RetryConfigKey,
  StandardRetryStrategy,
  TimeoutConfig,
  TimeoutConfigKey,
  TimeoutError,
  TokenBucket,
  createRequest,
  identity,
  orchestrateWithResult,
  staticToken,
} from '../../../src';
import type { ConfigLayerBuilder, IIdentityResolver, ITransport, Token } from '../../../src';
import { GetItem, TEST_ENDPOINT, errorResponse, itemResponse, testPlugins } from '../../helpers';

const identityResolvers = { httpBearerAuth: staticToken('test-token') };
const widget = itemResponse({ id: '42', name: 'widget' });

/**
 * Never answers; rejects once the dispatch signal aborts.
 */
function hangingTransport(): ITransport & { calls: number } {
  return {
    calls: 0,
    send(_request, { signal }) {
      this.calls += 1;
      return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new DispatchFailure('Connection aborted', 'user')), {
          once: true,
        });
      });
    },
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Token resolver whose first `slowCalls` resolutions take `ms`.
 */
function slowTokenResolver(ms: number, slowCalls = Infinity): IIdentityResolver<Token> {
  let calls = 0;
  return {
    cacheable: false,
    resolveIdentity: async () => {
      calls += 1;
      if (calls <= slowCalls) {
        await delay(ms);
      }
      return identity<Token>({ token: 'test-token' });
    },
  };
}

function withTimeouts(timeouts: TimeoutConfig, retry?: RetryConfig) {
  return (config: ConfigLayerBuilder): void => {
    config.put(TimeoutConfigKey, timeouts);
    if (retry) {
      config.put(RetryConfigKey, retry);
    }
  };
}

describe('Orchestrator Timeouts', () => {
  // ============================================================================
  // TEST GROUP 1: Attempt Timeout
  // ============================================================================

  describe('Attempt Timeout', () => {
    it('should abort a slow attempt and report the attempt timeout', async () => {
      const transport = hangingTransport();

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers },
          withTimeouts(TimeoutConfig.of({ attemptTimeoutMs: 30 }), RetryConfig.disabled()),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.attempts).toBe(1);
      expect(result.error).toBeErrorType(TimeoutError, 'Dispatch');
      expect(result.error.message).toBe('Attempt timed out after 30ms');
      expect(transport.calls).toBe(1);
    });

    it('should retry an attempt that timed out', async () => {
      const request = createRequest({ method: 'GET', uri: `${TEST_ENDPOINT}/items/42` });
      const transport = new EventTransport([
        { request, response: widget, latencyMs: 500 },
        { request, response: widget },
      ]);

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers },
          withTimeouts(TimeoutConfig.of({ attemptTimeoutMs: 30 })),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(2);
      expect(transport.remaining).toBe(0);
    });

    it('should never dispatch an attempt abandoned by its timeout', async () => {
      const transport = new CaptureTransport(widget);

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers: { httpBearerAuth: slowTokenResolver(60, 1) } },
          withTimeouts(
            TimeoutConfig.of({ attemptTimeoutMs: 30 }),
            RetryConfig.standard({ maxAttempts: 2, initialBackoffMs: 10, maxBackoffMs: 10 }),
          ),
        ),
        GetItem,
        { id: '42' },
      );
      await delay(100);

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(2);
      expect(transport.requests().map((request) => request.headers['sdk-request'])).toEqual(['attempt=2; max=2']);
    });

    it('should not interfere with attempts that finish in time', async () => {
      const transport = new CaptureTransport(widget);

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers },
          withTimeouts(TimeoutConfig.of({ attemptTimeoutMs: 1000, operationTimeoutMs: 2000 })),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(1);
    });
  });

  // ============================================================================
  // TEST GROUP 2: Operation Timeout
  // ============================================================================

  describe('Operation Timeout', () => {
    it('should abort the running attempt when the operation deadline expires', async () => {
      const transport = hangingTransport();

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers },
          withTimeouts(TimeoutConfig.of({ operationTimeoutMs: 40 })),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.attempts).toBe(1);
      expect(result.error).toBeErrorType(TimeoutError);
      expect(result.error.message).toBe('Operation timed out after 40ms');
    });

    it('should return the retry cost when the backoff would cross the deadline', async () => {
      const tokenBucket = new TokenBucket();
      const transport = new CaptureTransport(errorResponse(500, { code: 'InternalFailure', message: 'boom' }));

      const result = await orchestrateWithResult(
        testPlugins(
          {
            transport,
            sleep: new DefaultSleep(),
            identityResolvers,
            retryStrategy: new StandardRetryStrategy({ tokenBucket, random: () => 0.5 }),
          },
          withTimeouts(TimeoutConfig.of({ operationTimeoutMs: 40 })),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.error).toBeErrorType(TimeoutError);
      expect(result.error.message).toBe('Operation timed out after 40ms');
      expect(transport.requests()).toHaveLength(1);
      expect(tokenBucket.available).toBe(500);
    });

    it('should not dispatch once the deadline expired during identity resolution', async () => {
      const transport = new CaptureTransport(widget);

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers: { httpBearerAuth: slowTokenResolver(80) } },
          withTimeouts(TimeoutConfig.of({ operationTimeoutMs: 30 }), RetryConfig.disabled()),
        ),
        GetItem,
        { id: '42' },
      );
      await delay(150);

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.error).toBeErrorType(TimeoutError);
      expect(result.error.message).toBe('Operation timed out after 30ms');
      expect(transport.requests()).toHaveLength(0);
    });

    it('should stop retrying once the operation deadline expires', async () => {
      const transport = hangingTransport();

      const result = await orchestrateWithResult(
        testPlugins(
          { transport, sleep: new DefaultSleep(), identityResolvers },
          withTimeouts(
            TimeoutConfig.of({ attemptTimeoutMs: 30, operationTimeoutMs: 100 }),
            RetryConfig.standard({ maxAttempts: 10, initialBackoffMs: 100, maxBackoffMs: 1000 }),
          ),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.error).toBeErrorType(TimeoutError);
      if (!(result.error instanceof TimeoutError)) return;
      expect(result.error.scope).toBe('operation');
      expect(result.attempts).toBeLessThan(10);
      expect(result.duration).toBeLessThan(200);

      const dispatched = transport.calls;
      await delay(150);
      expect(transport.calls).toBe(dispatched);
    });
  });
});
