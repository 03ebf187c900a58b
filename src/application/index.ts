/**
 * @module @wirebound/core/application
 * @description Application layer exports
 */

// ============================================================================
// Ports
// ============================================================================

export * from './ports';

// ============================================================================
// Runtime Components & Plugins
// ============================================================================

export * from './components';
export * from './plugins';

// ============================================================================
// Auth Scheme Resolution
// ============================================================================

export * from './auth';

// ============================================================================
// Orchestrator
// ============================================================================

export * from './orchestrator';

// ============================================================================
// Client
// ============================================================================

export * from './client';
