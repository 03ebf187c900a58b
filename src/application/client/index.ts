/**
 * @wirebound/core - Client Module
 */

export { ServiceClient, ClientBuilder, createClientBuilder } from './client';
export type { ClientOptions, SendOptions } from './options';
export { defaultPlugin, clientOptionsPlugin } from './defaultPlugins';
export { consoleLogger, silentLogger } from './logger';
export type { ILogger } from './logger';
