/**
 * @fileoverview Unit tests for the built-in interceptors
 */

import {
  ConfigBag,
  ConfigLayer,
  INVOCATION_ID_HEADER,
  InterceptorContext,
  InvocationIdInterceptor,
  LoggingInterceptor,
  Phase,
  REDACTED,
  REQUEST_ATTEMPT_HEADER,
  RequestAttemptsInterceptor,
  RetryConfig,
  RetryConfigKey,
  createRequest,
  response,
  silentLogger,
} from '../../../src';
import type { ILogger, InterceptorRuntime } from '../../../src';

const uri = 'https://inventory.test.example.com/items/42';

function attemptContext(attempt = 1, sensitiveOutput = false): InterceptorContext {
  return new InterceptorContext({
    invocationId: 'test-invocation',
    serviceName: 'Inventory',
    operationName: 'GetItem',
    input: { id: '42' },
    sensitiveOutput,
  }).forAttempt(attempt, createRequest({ method: 'GET', uri }));
}

function recordingLogger(): ILogger & { debug: jest.Mock } {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('InvocationIdInterceptor', () => {
  it('should stamp the invocation id while serializing', () => {
    const context = attemptContext();
    context.enterPhase(Phase.Serialize);

    new InvocationIdInterceptor().beforePhase(Phase.Serialize, context);

    expect(context.request()?.headers[INVOCATION_ID_HEADER]).toBe('test-invocation');
  });

  it('should leave other phases alone', () => {
    const context = attemptContext();
    context.enterPhase(Phase.Sign);

    new InvocationIdInterceptor().beforePhase(Phase.Sign, context);

    expect(context.request()?.headers).toEqual({});
  });
});

describe('RequestAttemptsInterceptor', () => {
  it('should report the attempt and the configured maximum', () => {
    const config = ConfigBag.of(
      ConfigLayer.builder('retry').put(RetryConfigKey, RetryConfig.standard({ maxAttempts: 5 })).build(),
    );
    const context = attemptContext(2);
    context.enterPhase(Phase.Serialize);

    new RequestAttemptsInterceptor().beforePhase(Phase.Serialize, context, { config, logger: silentLogger });

    expect(context.request()?.headers[REQUEST_ATTEMPT_HEADER]).toBe('attempt=2; max=5');
  });

  it('should assume a single attempt without retry configuration', () => {
    const context = attemptContext();
    context.enterPhase(Phase.Serialize);

    new RequestAttemptsInterceptor().beforePhase(Phase.Serialize, context, {
      config: ConfigBag.empty(),
      logger: silentLogger,
    });

    expect(context.request()?.headers[REQUEST_ATTEMPT_HEADER]).toBe('attempt=1; max=1');
  });
});

describe('LoggingInterceptor', () => {
  function exchange(interceptor: LoggingInterceptor, sensitiveOutput = false): jest.Mock {
    const logger = recordingLogger();
    const runtime: InterceptorRuntime = { config: ConfigBag.empty(), logger };
    const context = attemptContext(1, sensitiveOutput);

    context.enterPhase(Phase.Dispatch);
    interceptor.beforePhase(Phase.Dispatch, context, runtime);
    context.attach({ response: response().ok().json({ id: '42', secret: 'test-secret' }).build() });
    context.enterPhase(Phase.ParseResponse);
    interceptor.beforePhase(Phase.ParseResponse, context, runtime);

    return logger.debug;
  }

  it('should log the request and the response status', () => {
    const debug = exchange(new LoggingInterceptor({ logDuration: false }));

    expect(debug.mock.calls).toEqual([[`→ GET ${uri} (attempt 1)`], ['← 200']]);
  });

  it('should log response bodies when asked', () => {
    const debug = exchange(new LoggingInterceptor({ logDuration: false, logBody: true }));

    expect(debug).toHaveBeenLastCalledWith('  body: {"id":"42","secret":"test-secret"}');
  });

  it('should redact bodies of sensitive operations', () => {
    const debug = exchange(new LoggingInterceptor({ logDuration: false, logBody: true }), true);

    expect(debug).toHaveBeenLastCalledWith(`  body: ${REDACTED}`);
  });

  it('should stay quiet when request and response logging are off', () => {
    const debug = exchange(new LoggingInterceptor({ logRequest: false, logResponse: false }));

    expect(debug).not.toHaveBeenCalled();
  });
});
