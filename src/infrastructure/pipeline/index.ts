/**
 * @wirebound/core - Pipeline Module
 */

export { PipelineBuilder, createPipeline, compose } from './builder';
export type { PhaseBody, ComposedChain } from './builder';
