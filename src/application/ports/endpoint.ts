/**
 * @wirebound/core - Endpoint Port
 */

import type { ConfigBag } from '../../domain/config/ConfigBag';

/**
 * A resolved endpoint.
 */
export interface Endpoint {
  /** Base URL; the request path is appended to it */
  url: string;

  /** Headers the endpoint requires */
  headers?: Record<string, string>;
}

/**
 * Inputs to endpoint resolution.
 */
export interface EndpointParams {
  serviceName: string;
  operationName: string;
  region?: string;
  endpointUrl?: string;
  config: ConfigBag;
}

export interface IEndpointResolver {
  resolveEndpoint(params: EndpointParams): Promise<Endpoint>;
}
