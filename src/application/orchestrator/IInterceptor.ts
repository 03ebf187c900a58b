/**
 * @wirebound/core - Interceptor Interface
 *
 * Interceptors observe and modify an orchestration at phase boundaries.
 */

import type { Phase } from '../../domain/orchestration/phase';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import type { ILogger } from '../client/logger';
import type { InterceptorContext } from './InterceptorContext';

/**
 * Read-only runtime handed to hooks.
 */
export interface InterceptorRuntime {
  readonly config: ConfigBag;
  readonly logger: ILogger;
}

export type InterceptorHook = (
  phase: Phase,
  context: InterceptorContext,
  runtime: InterceptorRuntime,
) => void | Promise<void>;

/**
 * IInterceptor - phase hooks
 *
 * `beforePhase` hooks run in registration order, `afterPhase` hooks in
 * reverse order, around the phase itself. A hook that throws fails the
 * attempt with an error matching the phase.
 *
 * @example
 * ```typescript
 * const timing: IInterceptor = {
 *   name: 'Timing',
 *   beforePhase(phase, ctx) {
 *     if (phase === Phase.Dispatch) ctx.items.set('start', Date.now());
 *   },
 *   afterPhase(phase, ctx, { logger }) {
 *     if (phase === Phase.Dispatch) {
 *       logger.info(`Dispatch took ${Date.now() - Number(ctx.items.get('start'))}ms`);
 *     }
 *   },
 * };
 * ```
 */
export interface IInterceptor {
  readonly name: string;

  beforePhase?: InterceptorHook;

  afterPhase?: InterceptorHook;
}

/**
 * Build an interceptor from hook functions
 */
export function createInterceptor(
  name: string,
  hooks: { beforePhase?: InterceptorHook; afterPhase?: InterceptorHook },
): IInterceptor {
  return { name, ...hooks };
}

