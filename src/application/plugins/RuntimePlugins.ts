/**
 * @fileoverview RuntimePlugins - Ordered Plugin Composition
 *
 * @packageDocumentation
 * @module @wirebound/core/application/plugins
 *
 * ```
 * client plugins (stable-sorted by order)  ─┐
 *                                           ├─► for each plugin:
 * operation plugins (stable-sorted)        ─┘     config  ← config.withLayer(plugin.config())
 *                                                 current ← current.merge(plugin.runtimeComponents(current))
 * ```
 *
 * Operation plugins always come after every client plugin, so per-operation
 * overrides win regardless of their order value.
 */

import { ConfigBag } from '../../domain/config/ConfigBag';
import { ConfigurationError, SdkError } from '../../domain/exceptions/exceptions';
import { RuntimeComponents } from '../components/RuntimeComponents';
import type { ResolvedComponents } from '../components/RuntimeComponents';
import { PluginOrder } from './IRuntimePlugin';
import type { IRuntimePlugin } from './IRuntimePlugin';

/**
 * Config and components after applying plugins.
 */
export interface RuntimeState {
  readonly config: ConfigBag;
  readonly components: RuntimeComponents;
}

/**
 * Runtime state that passed validation.
 */
export interface ResolvedRuntime extends RuntimeState {
  readonly resolved: ResolvedComponents;
}

function orderOf(plugin: IRuntimePlugin): number {
  return plugin.order ?? PluginOrder.Overrides;
}

function sortPlugins(plugins: readonly IRuntimePlugin[]): IRuntimePlugin[] {
  return plugins
    .map((plugin, index) => ({ plugin, index }))
    .sort((a, b) => orderOf(a.plugin) - orderOf(b.plugin) || a.index - b.index)
    .map(({ plugin }) => plugin);
}

function pluginFailure(plugin: IRuntimePlugin, error: unknown): SdkError {
  if (error instanceof SdkError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigurationError(`Runtime plugin ${plugin.name} failed: ${message}`, [], { cause: error });
}

export class RuntimePlugins {
  private readonly clientPlugins: IRuntimePlugin[] = [];
  private readonly operationPlugins: IRuntimePlugin[] = [];

  static create(): RuntimePlugins {
    return new RuntimePlugins();
  }

  withClientPlugin(plugin: IRuntimePlugin): this {
    this.clientPlugins.push(plugin);
    return this;
  }

  withClientPlugins(plugins: readonly IRuntimePlugin[]): this {
    for (const plugin of plugins) {
      this.withClientPlugin(plugin);
    }
    return this;
  }

  withOperationPlugin(plugin: IRuntimePlugin): this {
    this.operationPlugins.push(plugin);
    return this;
  }

  withOperationPlugins(plugins: readonly IRuntimePlugin[]): this {
    for (const plugin of plugins) {
      this.withOperationPlugin(plugin);
    }
    return this;
  }

  /**
   * Copy with the same plugins.
   */
  clone(): RuntimePlugins {
    return RuntimePlugins.create()
      .withClientPlugins(this.clientPlugins)
      .withOperationPlugins(this.operationPlugins);
  }

  /**
   * Copy with `plugin` ahead of every other operation plugin.
   */
  forOperation(plugin: IRuntimePlugin): RuntimePlugins {
    return RuntimePlugins.create()
      .withClientPlugins(this.clientPlugins)
      .withOperationPlugin(plugin)
      .withOperationPlugins(this.operationPlugins);
  }

  /**
   * Plugins in application order.
   */
  ordered(): IRuntimePlugin[] {
    return [...sortPlugins(this.clientPlugins), ...sortPlugins(this.operationPlugins)];
  }

  /**
   * Apply every plugin on top of `base`, without validating the result.
   */
  apply(base?: RuntimeState): RuntimeState {
    let config = base?.config ?? ConfigBag.empty();
    let components = base?.components ?? RuntimeComponents.empty();

    for (const plugin of this.ordered()) {
      try {
        const layer = plugin.config?.();
        if (layer) {
          config = config.withLayer(layer);
        }
        const contributed = plugin.runtimeComponents?.(components);
        if (contributed) {
          components = components.merge(contributed);
        }
      } catch (error) {
        throw pluginFailure(plugin, error);
      }
    }

    return { config, components };
  }

  /**
   * Apply every plugin and validate the merged components.
   *
   * @throws {ConfigurationError} When a mandatory component is missing
   */
  build(base?: RuntimeState): ResolvedRuntime {
    const { config, components } = this.apply(base);
    return { config, components, resolved: components.validate(config) };
  }
}
