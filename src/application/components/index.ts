/**
 * @wirebound/core - Components Module
 */

export { RuntimeComponents } from './RuntimeComponents';
export type { RuntimeComponentsInit, ResolvedComponents } from './RuntimeComponents';
