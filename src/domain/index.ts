/**
 * @module @wirebound/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Authentication Contracts
// ============================================================================

export * from './auth';

// ============================================================================
// Invocation Context
// ============================================================================

export * from './context';

// ============================================================================
// Error Taxonomy
// ============================================================================

export * from './exceptions';

// ============================================================================
// Operations & Phases
// ============================================================================

export * from './orchestration';
