/**
 * @wirebound/core - Auth Resolution Module
 */

export { AuthSchemeResolver, resolveAuthSchemeOrder } from './AuthSchemeResolver';
export type { SelectedAuthScheme } from './AuthSchemeResolver';
