/**
 * @file Invocation Context Integration Tests
 * @description Validates that the ambient invocation context follows an
 * orchestration across async boundaries and stays isolated between
 * concurrent orchestrations.
 *
 * GUARANTEES:
 * - context available in promise chains, timers and nested async calls
 * - concurrent scopes never see each other's values
 * - identity resolvers and loggers see the invocation that called them
 */

import {
  CaptureTransport,
  InvocationContext,
  consoleLogger,
  getCurrentContext,
  identity,
  orchestrateWithResult,
  tryGetCurrentContext,
} from '../../../src';
import type { IIdentityResolver, InvocationContextData, Token } from '../../../src';
import { GetItem, itemResponse, testPlugins } from '../../helpers';

function data(invocationId: string): InvocationContextData {
  return { invocationId, serviceName: 'Inventory', operationName: 'GetItem' };
}

describe('InvocationContext', () => {
  // ============================================================================
  // TEST GROUP 1: Async Propagation
  // ============================================================================

  describe('Async Propagation', () => {
    it('should propagate through promise chains', async () => {
      const captured: Array<string | undefined> = [];

      await InvocationContext.run(data('inv-chain'), async () => {
        await Promise.resolve()
          .then(() => {
            captured.push(InvocationContext.current()?.invocationId);
          })
          .then(() => {
            captured.push(InvocationContext.current()?.get('operationName'));
          });
      });

      expect(captured).toEqual(['inv-chain', 'GetItem']);
    });

    it('should propagate through timers and nested async functions', async () => {
      const captured: Array<string | undefined> = [];

      async function nested(): Promise<void> {
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
        captured.push(InvocationContext.current()?.invocationId);
      }

      await InvocationContext.run(data('inv-timer'), async () => {
        await nested();
        await new Promise<void>((resolve) =>
          setImmediate(() => {
            captured.push(InvocationContext.current()?.invocationId);
            resolve();
          }),
        );
      });

      expect(captured).toEqual(['inv-timer', 'inv-timer']);
    });

    it('should share values set later in the same scope', async () => {
      await InvocationContext.run(data('inv-set'), async () => {
        InvocationContext.current()?.set('attempt', 2);
        await Promise.resolve();

        expect(getCurrentContext().get('attempt')).toBe(2);
        expect(getCurrentContext().getAll()).toEqual({ ...data('inv-set'), attempt: 2 });
      });
    });
  });

  // ============================================================================
  // TEST GROUP 2: Isolation
  // ============================================================================

  describe('Isolation', () => {
    it('should keep concurrent scopes apart', async () => {
      const run = (invocationId: string, delayMs: number) =>
        InvocationContext.run(data(invocationId), async () => {
          InvocationContext.current()?.set('attempt', delayMs);
          await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
          return [InvocationContext.current()?.invocationId, InvocationContext.current()?.get('attempt')];
        });

      const results = await Promise.all([run('inv-a', 20), run('inv-b', 5), run('inv-c', 10)]);

      expect(results).toEqual([
        ['inv-a', 20],
        ['inv-b', 5],
        ['inv-c', 10],
      ]);
    });

    it('should be empty outside any scope', () => {
      expect(InvocationContext.hasContext()).toBe(false);
      expect(InvocationContext.current()).toBeUndefined();
      expect(tryGetCurrentContext()).toBeNull();
      expect(() => getCurrentContext()).toThrow(
        'No invocation context available. Call from within an orchestration.',
      );
    });
  });

  // ============================================================================
  // TEST GROUP 3: Orchestration Scope
  // ============================================================================

  describe('Orchestration Scope', () => {
    it('should give identity resolvers their own invocation', async () => {
      const seen: Array<string | undefined> = [];
      const resolver: IIdentityResolver<Token> = {
        cacheable: false,
        resolveIdentity: async () => {
          seen.push(InvocationContext.current()?.invocationId);
          return identity<Token>({ token: 'test-token' });
        },
      };
      const plugins = testPlugins({
        transport: new CaptureTransport(itemResponse({ id: '42', name: 'widget' })),
        identityResolvers: { httpBearerAuth: resolver },
      });

      const [first, second] = await Promise.all([
        orchestrateWithResult(plugins, GetItem, { id: '1' }),
        orchestrateWithResult(plugins, GetItem, { id: '2' }),
      ]);

      expect(first.invocationId).not.toBe(second.invocationId);
      expect([...seen].sort()).toEqual([first.invocationId, second.invocationId].sort());
    });

    it('should prefix console log lines with the invocation id', async () => {
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      try {
        await InvocationContext.run(data('inv-log'), async () => {
          consoleLogger.debug('resolving identity');
        });
        consoleLogger.debug('outside');

        expect(debug).toHaveBeenNthCalledWith(1, '[DEBUG] [inv-log] resolving identity');
        expect(debug).toHaveBeenNthCalledWith(2, '[DEBUG] outside');
      } finally {
        debug.mockRestore();
      }
    });
  });
});
