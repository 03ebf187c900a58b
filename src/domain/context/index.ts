/**
 * @wirebound/core - Context Module
 *
 * Ambient per-orchestration context propagation
 */

export type { IContext, InvocationContextData } from './IContext';
export {
  InvocationContext,
  getCurrentContext,
  tryGetCurrentContext,
} from './InvocationContext';
