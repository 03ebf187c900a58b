/**
 * @wirebound/core - Orchestrator Module
 */

export { InterceptorContext } from './InterceptorContext';
export type { InvocationInfo } from './InterceptorContext';

export { createInterceptor } from './IInterceptor';
export type { IInterceptor, InterceptorHook, InterceptorRuntime } from './IInterceptor';

export { Orchestrator } from './Orchestrator';
export type { OrchestrationResult } from './Orchestrator';

export { orchestrate, orchestrateWithResult, resolveOperationRuntime } from './orchestrate';
