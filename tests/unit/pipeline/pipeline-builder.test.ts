/**
 * @fileoverview Unit tests for interceptor chain composition and the
 * phase-gated interceptor context
 */

import {
  ConfigBag,
  InterceptorContext,
  Phase,
  compose,
  createInterceptor,
  createPipeline,
  createRequest,
  response,
  silentLogger,
} from '../../../src';
import type { InterceptorRuntime } from '../../../src';
import { recordingInterceptor } from '../../helpers';

const runtime: InterceptorRuntime = { config: ConfigBag.empty(), logger: silentLogger };

function newContext(): InterceptorContext<{ id: string }, string> {
  return new InterceptorContext<{ id: string }, string>({
    invocationId: 'test-invocation',
    serviceName: 'Inventory',
    operationName: 'GetItem',
    input: { id: '42' },
    sensitiveOutput: false,
  });
}

describe('PipelineBuilder', () => {
  // ============================================================================
  // TEST GROUP 1: Composition
  // ============================================================================

  describe('Composition', () => {
    it('should run before hooks in order and after hooks in reverse', async () => {
      const log: string[] = [];
      const chain = createPipeline()
        .use(recordingInterceptor('a', log))
        .use(recordingInterceptor('b', log))
        .compose();

      await chain(Phase.Sign, newContext(), runtime, () => {
        log.push('body');
      });

      expect(log).toEqual(['a:before:Sign', 'b:before:Sign', 'body', 'b:after:Sign', 'a:after:Sign']);
    });

    it('should run the body alone when there are no interceptors', async () => {
      const body = jest.fn();

      await createPipeline().compose()(Phase.Init, newContext(), runtime, body);

      expect(body).toHaveBeenCalledTimes(1);
    });

    it('should await asynchronous hooks', async () => {
      const log: string[] = [];
      const slow = createInterceptor('slow', {
        beforePhase: async () => {
          await Promise.resolve();
          log.push('slow');
        },
      });

      await compose(slow)(Phase.Dispatch, newContext(), runtime, () => {
        log.push('body');
      });

      expect(log).toEqual(['slow', 'body']);
    });

    it('should stop at the first failing hook', async () => {
      const log: string[] = [];
      const failing = createInterceptor('failing', {
        beforePhase: () => {
          throw new Error('rejected');
        },
      });
      const chain = compose(recordingInterceptor('outer', log), failing, recordingInterceptor('inner', log));

      await expect(
        chain(Phase.Serialize, newContext(), runtime, () => {
          log.push('body');
        }),
      ).rejects.toThrow('rejected');
      expect(log).toEqual(['outer:before:Serialize']);
    });

    it('should support prepend and conditional use', () => {
      const builder = createPipeline()
        .use(createInterceptor('second', {}))
        .prepend(createInterceptor('first', {}))
        .useIf(false, createInterceptor('skipped', {}))
        .useIf(() => true, createInterceptor('third', {}));

      expect(builder.build().map((interceptor) => interceptor.name)).toEqual(['first', 'second', 'third']);
      expect(builder.clear().length).toBe(0);
    });

    it('should not change a composed chain when the builder changes', async () => {
      const log: string[] = [];
      const builder = createPipeline().use(recordingInterceptor('a', log));
      const chain = builder.compose();
      builder.use(recordingInterceptor('late', log));

      await chain(Phase.Init, newContext(), runtime, () => undefined);

      expect(log).toEqual(['a:before:Init', 'a:after:Init']);
    });
  });
});

describe('InterceptorContext', () => {
  it('should expose the request only during request phases', () => {
    const context = newContext().forAttempt(1, createRequest({ uri: '/items/42' }));

    context.enterPhase(Phase.Sign);
    expect(context.request()?.uri).toBe('/items/42');

    context.enterPhase(Phase.ParseResponse);
    expect(context.request()).toBeUndefined();
    expect(() => context.setRequest(createRequest({ uri: '/other' }))).toThrow(
      'The request cannot be replaced during ParseResponse',
    );
  });

  it('should let interceptors replace the response only while it is parsed', () => {
    const context = newContext().forAttempt(1, createRequest({ uri: '/items/42' }));
    context.attach({ response: response().internalServerError().build() });

    context.enterPhase(Phase.Dispatch);
    expect(context.response()).toBeUndefined();
    expect(() => context.setResponse(response().ok().build())).toThrow(
      'The response cannot be replaced during Dispatch',
    );

    context.enterPhase(Phase.ParseResponse);
    context.setResponse(response().ok().build());
    context.enterPhase(Phase.Deserialize);
    expect(context.response()?.status).toBe(200);
  });

  it('should expose output only once deserialized', () => {
    const context = newContext().forAttempt(1, createRequest({ uri: '/items/42' }));
    context.attach({ output: 'item-42' });

    context.enterPhase(Phase.ParseResponse);
    expect(context.output()).toBeUndefined();

    context.enterPhase(Phase.Done);
    expect(context.output()).toBe('item-42');
  });

  it('should start each attempt with fresh items', () => {
    const first = newContext().forAttempt(1, createRequest({ uri: '/items/42' }));
    first.items.set('start', 1);

    const second = first.forAttempt(2, createRequest({ uri: '/items/42' }));

    expect(second.attempt).toBe(2);
    expect(second.items.size).toBe(0);
    expect(second.invocationId).toBe('test-invocation');
    expect(second.input).toEqual({ id: '42' });
  });
});
