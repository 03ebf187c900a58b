/**
 * @fileoverview InvocationContext - AsyncLocalStorage-based Context Implementation
 *
 * @packageDocumentation
 * @module @wirebound/core/domain/context
 *
 * One {@link AsyncLocalStorage} instance backs every orchestration. Calling
 * {@link InvocationContext.run} opens a scope; the scope follows the
 * orchestration through promise chains, timers and nested async calls.
 *
 * ```
 * orchestrate(A) → run({ invocationId: 'a' }) → ... identity → dispatch → ...
 * orchestrate(B) → run({ invocationId: 'b' }) → ... identity → dispatch → ...
 *                  each scope only ever sees its own values
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';
import { IContext, InvocationContextData } from './IContext';

/**
 * Internal store; a plain object so values can be updated within a scope.
 *
 * @internal
 */
interface ContextStore {
  data: Partial<InvocationContextData>;
}

/**
 * Ambient context for one orchestration.
 *
 * @example
 * ```typescript
 * await InvocationContext.run(
 *   { invocationId: 'a1b2', serviceName: 'Inventory', operationName: 'GetItem' },
 *   async () => {
 *     await resolveIdentity();
 *     InvocationContext.current()?.get('invocationId'); // 'a1b2'
 *   },
 * );
 * ```
 */
export class InvocationContext implements IContext<InvocationContextData> {
  private static als = new AsyncLocalStorage<ContextStore>();

  private constructor(private readonly store: ContextStore) {}

  /**
   * Run a callback inside a fresh context scope.
   */
  static run<R>(initialData: InvocationContextData, callback: () => R): R {
    const store: ContextStore = { data: { ...initialData } };
    return InvocationContext.als.run(store, callback);
  }

  /**
   * Context of the current scope, if any.
   */
  static current(): InvocationContext | undefined {
    const store = InvocationContext.als.getStore();
    if (!store) {
      return undefined;
    }
    return new InvocationContext(store);
  }

  static hasContext(): boolean {
    return InvocationContext.als.getStore() !== undefined;
  }

  get<K extends keyof InvocationContextData>(key: K): InvocationContextData[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof InvocationContextData>(key: K, value: InvocationContextData[K]): void {
    this.store.data[key] = value;
  }

  getAll(): Readonly<Partial<InvocationContextData>> {
    return { ...this.store.data };
  }

  get invocationId(): string | undefined {
    return this.store.data.invocationId;
  }
}

/**
 * Get the current context or throw.
 *
 * @throws {Error} When called outside an orchestration
 */
export function getCurrentContext(): InvocationContext {
  const context = InvocationContext.current();
  if (!context) {
    throw new Error('No invocation context available. Call from within an orchestration.');
  }
  return context;
}

/**
 * Get the current context, or `null` outside an orchestration.
 */
export function tryGetCurrentContext(): InvocationContext | null {
  return InvocationContext.current() ?? null;
}
