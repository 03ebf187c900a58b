/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations behind the application ports:
 *
 * - **Auth**: sigv4, bearer, API key and anonymous schemes; identity resolvers
 * - **Cache**: LRU+TTL cache and the single-flight identity cache
 * - **Resilience**: retry classifiers, standard retry strategy, sleep and clocks
 * - **Transport**: replaying and capturing test transports
 *
 * @packageDocumentation
 * @module @wirebound/core/infrastructure
 */

// Request signing and identity resolution
export * from './auth';

// Identity and general-purpose caching
export * from './cache';

// Profile file and auth scheme preference
export * from './config';

// Endpoint resolution
export * from './endpoint';

// Interceptor chain composition
export * from './pipeline';

// Request/response shapes and built-in interceptors
export * from './platform';

// Retry and timeout support
export * from './resilience';

// In-process transports
export * from './transport';
