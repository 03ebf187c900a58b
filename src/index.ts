/**
 * @fileoverview @wirebound/core - Client Request Orchestration Runtime
 * @description
 * Runs generated service operations: configuration layering, auth scheme
 * selection, identity resolution and signing, retries and timeouts, all
 * through a phase-by-phase interceptor pipeline.
 *
 * ## Architecture Layers
 *
 * - **domain**: configuration bag, auth and identity contracts, error
 *   taxonomy, operation definition, invocation context
 * - **application**: ports, runtime components and plugins, auth scheme
 *   resolution, the orchestrator and the service client
 * - **infrastructure**: signers, identity resolvers and cache, retry
 *   classifiers and strategy, endpoint resolution, test transports
 *
 * @packageDocumentation
 * @module @wirebound/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS (Contracts & Configuration)
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Orchestration & Client)
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Signers, Policies, Transports)
// ============================================================================

export * from './infrastructure';

// ==================== Default Export ====================
export { ServiceClient as default } from './application/client';

// ==================== Version ====================
export const VERSION = '1.0.0';
