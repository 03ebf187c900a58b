/**
 * @wirebound/core - Plugin Module
 */

export { PluginOrder, StaticRuntimePlugin } from './IRuntimePlugin';
export type { IRuntimePlugin } from './IRuntimePlugin';

export { RuntimePlugins } from './RuntimePlugins';
export type { RuntimeState, ResolvedRuntime } from './RuntimePlugins';

export { operationPlugin, operationSigningOptions, payloadSigningOf } from './operationPlugin';
