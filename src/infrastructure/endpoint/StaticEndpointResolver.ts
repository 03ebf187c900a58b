/**
 * @wirebound/core - Static Endpoint Resolver
 */

import { ConstructionFailure } from '../../domain/exceptions/exceptions';
import { Phase } from '../../domain/orchestration/phase';
import type { Endpoint, EndpointParams, IEndpointResolver } from '../../application/ports/endpoint';
import type { HttpRequest } from '../platform/types';

/**
 * Resolves a fixed URL template. `{region}` and `{service}` are replaced
 * with the configured region and the service name. A configured
 * `endpointUrl` always wins.
 *
 * @example
 * ```typescript
 * const resolver = new StaticEndpointResolver('https://{service}.{region}.example.com');
 * ```
 */
export class StaticEndpointResolver implements IEndpointResolver {
  constructor(
    private readonly template?: string,
    private readonly headers?: Record<string, string>,
  ) {}

  async resolveEndpoint(params: EndpointParams): Promise<Endpoint> {
    const template = params.endpointUrl ?? this.template;
    if (!template) {
      throw new ConstructionFailure('No endpoint URL is configured', { phase: Phase.ResolveEndpoint });
    }

    const url = template.replace(/\{(region|service)\}/g, (_match, name: string) => {
      const value = name === 'region' ? params.region : params.serviceName.toLowerCase();
      if (!value) {
        throw new ConstructionFailure(`Endpoint template requires a ${name}`, {
          phase: Phase.ResolveEndpoint,
        });
      }
      return value;
    });

    return this.headers ? { url, headers: { ...this.headers } } : { url };
  }
}

/**
 * Apply an endpoint to a request whose `uri` is a path.
 */
export function applyEndpoint(request: HttpRequest, endpoint: Endpoint): HttpRequest {
  const isAbsolute = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(request.uri);
  const base = endpoint.url.replace(/\/+$/, '');
  const path = request.uri.startsWith('/') || request.uri === '' ? request.uri : `/${request.uri}`;

  const headers = { ...request.headers };
  for (const [name, value] of Object.entries(endpoint.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  return {
    method: request.method,
    uri: isAbsolute ? request.uri : `${base}${path}`,
    headers,
    body: request.body,
  };
}
