/**
 * @wirebound/core - Endpoint Module
 */

export { StaticEndpointResolver, applyEndpoint } from './StaticEndpointResolver';
