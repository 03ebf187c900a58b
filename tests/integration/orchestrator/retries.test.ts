/**
 * @file Retry Integration Tests
 * @description Replays recorded exchanges through the orchestrator and
 * checks attempts, backoff delays and the retry budget.
 *
 * With `random: () => 0.5` and a 100ms initial backoff the computed delays
 * are 50ms after the first attempt and 100ms after the second.
 */

import {
  DispatchFailure,
  EventTransport,
  CaptureTransport,
  RetryConfig,
  RetryConfigKey,
  ServiceError,
  StandardRetryStrategy,
  ThrottlingError,
  TokenBucket,
  createRequest,
  orchestrateWithResult,
  response,
  staticToken,
} from '../../../src';
import type { HttpResponse, OperationDefinition, ReplayEvent } from '../../../src';
import {
  GetItem,
  RecordingSleep,
  TEST_ENDPOINT,
  errorResponse,
  itemResponse,
  testPlugins,
} from '../../helpers';
import type { InventoryError, Item } from '../../helpers';

const identityResolvers = { httpBearerAuth: staticToken('test-token') };

const expectedRequest = createRequest({
  method: 'GET',
  uri: `${TEST_ENDPOINT}/items/42`,
  headers: { authorization: 'Bearer test-token', 'content-length': '0' },
});

function replay(...responses: Array<HttpResponse | Error>): EventTransport {
  const events: ReplayEvent[] = responses.map((reply) => ({ request: expectedRequest, response: reply }));
  return new EventTransport(events);
}

const widget = itemResponse({ id: '42', name: 'widget' });
const internalFailure = errorResponse(500, { code: 'InternalFailure', message: 'boom' });

describe('Orchestrator Retries', () => {
  // ============================================================================
  // TEST GROUP 1: Retryable Failures
  // ============================================================================

  describe('Retryable Failures', () => {
    it('should retry server errors with exponential backoff', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(internalFailure, internalFailure, widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(3);
      expect(sleep.delays).toEqual([50, 100]);
      expect(transport.remaining).toBe(0);
      expect(() => transport.assertRequestsMatch(['sdk-invocation-id', 'sdk-request'])).not.toThrow();
    });

    it('should stamp each attempt with its number', async () => {
      const transport = replay(internalFailure, internalFailure, widget);

      await orchestrateWithResult(testPlugins({ transport, identityResolvers }), GetItem, { id: '42' });

      expect(transport.requests().map((request) => request.headers['sdk-request'])).toEqual([
        'attempt=1; max=3',
        'attempt=2; max=3',
        'attempt=3; max=3',
      ]);
    });

    it('should keep the invocation id across attempts', async () => {
      const transport = replay(internalFailure, widget);

      const result = await orchestrateWithResult(testPlugins({ transport, identityResolvers }), GetItem, {
        id: '42',
      });

      const ids = transport.requests().map((request) => request.headers['sdk-invocation-id']);
      expect(ids).toEqual([result.invocationId, result.invocationId]);
    });

    it('should return the last failure once attempts run out', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(internalFailure, internalFailure, internalFailure);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.attempts).toBe(3);
      expect(result.error).toBeErrorType(ServiceError);
      expect(result.error.message).toBe('InternalFailure: boom');
      expect(sleep.delays).toEqual([50, 100]);
    });

    it('should retry connection failures', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(new Error('socket hang up'), widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(2);
      expect(sleep.delays).toEqual([50]);
    });

    it('should report a connection failure that never recovers', async () => {
      const transport = replay(new Error('socket hang up'), new Error('socket hang up'), new Error('socket hang up'));

      const result = await orchestrateWithResult(testPlugins({ transport, identityResolvers }), GetItem, {
        id: '42',
      });

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.error).toBeErrorType(DispatchFailure, 'Dispatch');
      expect(result.error.message).toBe('Dispatch failed: socket hang up');
    });
  });

  // ============================================================================
  // TEST GROUP 2: Throttling
  // ============================================================================

  describe('Throttling', () => {
    it('should treat a throttling code as retryable on any status', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(errorResponse(200, { code: 'SlowDown' }), widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(2);
      expect(sleep.delays).toEqual([50]);
    });

    it('should wait as long as retry-after asks', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(errorResponse(429, {}, { 'retry-after': '0.2' }), widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(sleep.delays).toEqual([200]);
    });

    it('should surface the throttling error when retries run out', async () => {
      const slowDown = errorResponse(503, { code: 'SlowDown', message: 'Please reduce your request rate' });
      const transport = replay(slowDown, slowDown, slowDown);

      const result = await orchestrateWithResult(testPlugins({ transport, identityResolvers }), GetItem, {
        id: '42',
      });

      expect(result.isSuccess).toBe(false);
      if (result.isSuccess) return;
      expect(result.error).toBeErrorType(ThrottlingError, 'Deserialize');
      expect(result.error.message).toBe('Please reduce your request rate');
      if (!(result.error instanceof ThrottlingError)) return;
      expect(result.error.serviceError).toEqual({ code: 'SlowDown', message: 'Please reduce your request rate' });
    });
  });

  // ============================================================================
  // TEST GROUP 3: Stopping Early
  // ============================================================================

  describe('Stopping Early', () => {
    it('should not retry client errors', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(errorResponse(400, { code: 'ValidationError', message: 'bad id' }), widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      expect(result.attempts).toBe(1);
      expect(sleep.delays).toEqual([]);
      expect(transport.remaining).toBe(1);
    });

    it('should make one attempt when retries are disabled', async () => {
      const transport = replay(internalFailure, widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, identityResolvers }, (config) => config.put(RetryConfigKey, RetryConfig.disabled())),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      expect(result.attempts).toBe(1);
      expect(transport.requests()[0]?.headers['sdk-request']).toBe('attempt=1; max=1');
    });

    it('should honor a larger attempt limit', async () => {
      const sleep = new RecordingSleep();
      const transport = replay(internalFailure, internalFailure, internalFailure, widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }, (config) =>
          config.put(RetryConfigKey, RetryConfig.standard({ maxAttempts: 4, initialBackoffMs: 100, maxBackoffMs: 1000 })),
        ),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(true);
      expect(result.attempts).toBe(4);
      expect(sleep.delays).toEqual([50, 100, 200]);
    });

    it('should stop once the retry budget is spent', async () => {
      const sleep = new RecordingSleep();
      const retryStrategy = new StandardRetryStrategy({
        tokenBucket: new TokenBucket({ capacity: 5 }),
        random: () => 0.5,
      });
      const transport = replay(internalFailure, internalFailure, widget);

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, retryStrategy, identityResolvers }),
        GetItem,
        { id: '42' },
      );

      expect(result.isSuccess).toBe(false);
      expect(result.attempts).toBe(2);
      expect(sleep.delays).toEqual([50]);
    });

    it('should not replay a streaming request body', async () => {
      async function* chunks(): AsyncIterable<Uint8Array> {
        yield new TextEncoder().encode('part-1');
      }
      const Upload: OperationDefinition<{ id: string }, Item, InventoryError> = {
        name: 'Upload',
        serviceName: 'Inventory',
        authSchemes: ['httpBearerAuth'],
        streamingInput: true,
        serialize: (input) => createRequest({ method: 'PUT', uri: `/uploads/${input.id}`, body: chunks() }),
        deserialize: GetItem.deserialize,
      };
      const sleep = new RecordingSleep();
      const transport = new CaptureTransport(response().internalServerError().build());

      const result = await orchestrateWithResult(
        testPlugins({ transport, sleep, identityResolvers }),
        Upload,
        { id: '9' },
      );

      expect(result.isSuccess).toBe(false);
      expect(result.attempts).toBe(1);
      expect(sleep.delays).toEqual([]);
      expect(transport.lastRequest()?.headers['content-length']).toBeUndefined();
    });
  });
});
