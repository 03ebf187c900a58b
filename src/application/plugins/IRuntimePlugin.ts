/**
 * @wirebound/core - Runtime Plugin Interface
 */

import type { ConfigLayer } from '../../domain/config/ConfigBag';
import type { RuntimeComponents, RuntimeComponentsInit } from '../components/RuntimeComponents';

/**
 * Plugin ordering. Plugins are stable-sorted by order, so plugins with the
 * same order keep their registration order.
 */
export const PluginOrder = {
  /** Runtime defaults; everything else overrides them */
  Defaults: 0,

  /** User-supplied configuration and components */
  Overrides: 100,

  /** Plugins that wrap components contributed by earlier plugins */
  NestedComponents: 200,
} as const;

/**
 * IRuntimePlugin - contributes configuration and components
 *
 * @example
 * ```typescript
 * const countingRetries: IRuntimePlugin = {
 *   name: 'counting-retries',
 *   order: PluginOrder.NestedComponents,
 *   runtimeComponents(current) {
 *     const inner = current.retryStrategy;
 *     if (!inner) return undefined;
 *     return {
 *       retryStrategy: {
 *         name: 'Counting',
 *         decide: (attempt, classified, config) => {
 *           retries++;
 *           return inner.decide(attempt, classified, config);
 *         },
 *       },
 *     };
 *   },
 * };
 * ```
 */
export interface IRuntimePlugin {
  readonly name: string;

  /** @defaultValue PluginOrder.Overrides */
  readonly order?: number;

  /**
   * Configuration layer; layers of later plugins win.
   */
  config?(): ConfigLayer | undefined;

  /**
   * Components to merge, given the components merged from earlier
   * plugins only.
   */
  runtimeComponents?(current: RuntimeComponents): RuntimeComponentsInit | undefined;
}

/**
 * Plugin with a fixed layer and component set.
 *
 * @example
 * ```typescript
 * const plugin = new StaticRuntimePlugin('test-transport')
 *   .withConfig(ConfigLayer.builder('test').put(RegionKey, 'eu-west-1').build())
 *   .withComponents({ transport: new CaptureTransport() });
 * ```
 */
export class StaticRuntimePlugin implements IRuntimePlugin {
  private layer: ConfigLayer | undefined;
  private components: RuntimeComponentsInit | undefined;

  constructor(
    readonly name: string,
    readonly order: number = PluginOrder.Overrides,
  ) {}

  withConfig(layer: ConfigLayer): this {
    this.layer = layer;
    return this;
  }

  withComponents(components: RuntimeComponentsInit): this {
    this.components = components;
    return this;
  }

  config(): ConfigLayer | undefined {
    return this.layer;
  }

  runtimeComponents(): RuntimeComponentsInit | undefined {
    return this.components;
  }
}
