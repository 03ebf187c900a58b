/**
 * @fileoverview IContext - Ambient Invocation Context Contract
 *
 * @packageDocumentation
 * @module @wirebound/core/domain/context
 *
 * Every orchestration runs inside its own context scope. Code running on
 * behalf of that orchestration (loggers, interceptors, identity resolvers,
 * transports) can read the invocation id without it being passed through
 * every signature, and concurrent orchestrations never observe each
 * other's values.
 */

/**
 * Values carried by an invocation context.
 */
export interface InvocationContextData {
  /** Unique id of the orchestration (uuid v4) */
  invocationId: string;

  /** Service the operation belongs to */
  serviceName: string;

  /** Operation being executed */
  operationName: string;

  /** Current attempt number (1-indexed), once attempts have started */
  attempt?: number;
}

/**
 * Read/write access to the ambient invocation context.
 *
 * @template T - Context data type
 */
export interface IContext<T extends object = InvocationContextData> {
  /**
   * Get a context value.
   */
  get<K extends keyof T>(key: K): T[K] | undefined;

  /**
   * Set a context value. Visible to everything later in the same scope.
   */
  set<K extends keyof T>(key: K, value: T[K]): void;

  /**
   * Snapshot of all values.
   */
  getAll(): Readonly<Partial<T>>;
}
