/**
 * @wirebound/core - Transport Port
 *
 * The network connector sits behind this interface. The runtime never
 * opens sockets itself.
 */

import type { HttpRequest, HttpResponse } from '../../infrastructure/platform/types';

/**
 * Per-dispatch options.
 */
export interface TransportOptions {
  /**
   * Aborted when the attempt or operation deadline expires. Transports
   * should stop work and reject promptly.
   */
  signal: AbortSignal;
}

/**
 * Sends one request and buffers the response.
 *
 * @example
 * ```typescript
 * const transport: ITransport = {
 *   async send(request, { signal }) {
 *     const res = await fetch(request.uri, { method: request.method, signal });
 *     return {
 *       status: res.status,
 *       headers: Object.fromEntries(res.headers),
 *       body: new Uint8Array(await res.arrayBuffer()),
 *     };
 *   },
 * };
 * ```
 */
export interface ITransport {
  /**
   * @throws {DispatchFailure} On connection, protocol or cancellation failures.
   * Other rejections are wrapped as dispatch failures by the orchestrator.
   */
  send(request: HttpRequest, options: TransportOptions): Promise<HttpResponse>;
}
