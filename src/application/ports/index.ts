/**
 * @wirebound/core - Port Module
 *
 * Boundaries the runtime consumes
 */

export type { ITransport, TransportOptions } from './transport';
export type { Endpoint, EndpointParams, IEndpointResolver } from './endpoint';
export type { IAsyncSleep, ITimeSource } from './runtime';
