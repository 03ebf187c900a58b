/**
 * @fileoverview Interceptor Pipeline Builder
 *
 * @packageDocumentation
 * @module @wirebound/core/infrastructure/pipeline
 *
 * Builds the chain that brackets every orchestration phase with interceptor
 * hooks.
 *
 * ## How `compose()` works
 *
 * Each interceptor becomes one layer of an onion. A recursive `dispatch`
 * function walks the layers; the phase body sits in the middle:
 *
 * ```
 * dispatch() [index=0]
 *   ↓
 * I1.beforePhase
 *   dispatch() [index=1]
 *   ↓
 *   I2.beforePhase
 *     dispatch() [index=2, >= length]
 *     ↓
 *     phase body
 *   I2.afterPhase
 * I1.afterPhase
 * ```
 *
 * `beforePhase` hooks therefore run in registration order and `afterPhase`
 * hooks in reverse order. A throwing hook or body stops the walk; the
 * error propagates to the orchestrator, which classifies it by phase.
 *
 * @example
 * ```typescript
 * const chain = createPipeline()
 *   .use(new InvocationIdInterceptor())
 *   .use(new LoggingInterceptor())
 *   .compose();
 *
 * await chain(Phase.Sign, ctx, runtime, async () => {
 *   ctx.attach({ request: signer.sign(...) });
 * });
 * ```
 */

import type { Phase } from '../../domain/orchestration/phase';
import type {
  IInterceptor,
  InterceptorRuntime,
} from '../../application/orchestrator/IInterceptor';
import type { InterceptorContext } from '../../application/orchestrator/InterceptorContext';

/**
 * Phase body run in the middle of the chain.
 */
export type PhaseBody = () => void | Promise<void>;

/**
 * A composed chain: runs one phase bracketed by every interceptor.
 */
export type ComposedChain = (
  phase: Phase,
  context: InterceptorContext,
  runtime: InterceptorRuntime,
  body: PhaseBody,
) => Promise<void>;

/**
 * PipelineBuilder - fluent builder for interceptor chains
 */
export class PipelineBuilder {
  private interceptors: IInterceptor[] = [];

  /**
   * Add an interceptor at the end of the chain
   */
  use(interceptor: IInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Add several interceptors, keeping their order
   */
  useMany(interceptors: readonly IInterceptor[]): this {
    for (const interceptor of interceptors) {
      this.use(interceptor);
    }
    return this;
  }

  /**
   * Add an interceptor conditionally
   */
  useIf(condition: boolean | (() => boolean), interceptor: IInterceptor): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(interceptor);
    }
    return this;
  }

  /**
   * Add an interceptor at the start of the chain
   */
  prepend(interceptor: IInterceptor): this {
    this.interceptors.unshift(interceptor);
    return this;
  }

  /**
   * Copy of the interceptors, in order
   */
  build(): IInterceptor[] {
    return [...this.interceptors];
  }

  /**
   * Compose the interceptors into a single chain. Later changes to the
   * builder do not affect a chain already composed.
   */
  compose(): ComposedChain {
    const interceptors = this.build();

    return async (phase, context, runtime, body) => {
      let index = 0;

      const dispatch = async (): Promise<void> => {
        if (index < interceptors.length) {
          const interceptor = interceptors[index++];
          if (interceptor.beforePhase) {
            await interceptor.beforePhase(phase, context, runtime);
          }
          await dispatch();
          if (interceptor.afterPhase) {
            await interceptor.afterPhase(phase, context, runtime);
          }
        } else {
          await body();
        }
      };

      await dispatch();
    };
  }

  get length(): number {
    return this.interceptors.length;
  }

  clear(): this {
    this.interceptors = [];
    return this;
  }
}

/**
 * Create a new pipeline builder
 */
export function createPipeline(): PipelineBuilder {
  return new PipelineBuilder();
}

/**
 * Compose interceptors directly
 */
export function compose(...interceptors: IInterceptor[]): ComposedChain {
  return createPipeline().useMany(interceptors).compose();
}
