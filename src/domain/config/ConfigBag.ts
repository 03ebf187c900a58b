/**
 * @fileoverview ConfigBag - Layered, Typed Configuration Store
 *
 * @packageDocumentation
 * @module @wirebound/core/domain/config
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Configuration is expressed as an ordered list of immutable layers rather
 * than one mutable object. Every runtime plugin contributes at most one
 * layer, and the layers are folded into a {@link ConfigBag}:
 *
 * ```
 * [defaults] → [service config] → [client config] → [operation override]
 *      ↓              ↓                  ↓                   ↓
 *   load(key) returns the value stored by the LAST layer that has the key
 * ```
 *
 * Keys are objects, not strings. Two keys with the same name are distinct,
 * and every key carries the type of its value:
 *
 * ```typescript
 * const Region = new ConfigKey<string>('region');
 *
 * const layer = ConfigLayer.builder('client')
 *   .put(Region, 'eu-west-1')
 *   .build();
 *
 * const region: string | undefined = ConfigBag.of(layer).load(Region);
 * ```
 *
 * @version 1.0.0
 */

/**
 * Type-tagged configuration key.
 *
 * @template T - Type of the value stored under this key
 *
 * @remarks
 * Identity is the key object itself; `name` is only used for diagnostics.
 * Each key keeps the values stored under it, per layer, so reading a layer
 * needs no cast.
 */
export class ConfigKey<T> {
  // Boxed so that a stored `undefined` is still a stored value.
  private readonly values = new WeakMap<ConfigLayer, { value: T }>();

  constructor(readonly name: string) {}

  /** @internal */
  store(layer: ConfigLayer, value: T): void {
    this.values.set(layer, { value });
  }

  /** @internal */
  storedIn(layer: ConfigLayer): boolean {
    return this.values.has(layer);
  }

  /** @internal */
  valueIn(layer: ConfigLayer): T | undefined {
    return this.values.get(layer)?.value;
  }

  /**
   * Copy this key's value from one layer to another, if it stores one.
   *
   * @internal
   */
  copy(from: ConfigLayer, to: ConfigLayer): void {
    const stored = this.values.get(from);
    if (stored) {
      this.values.set(to, stored);
    }
  }

  toString(): string {
    return `ConfigKey(${this.name})`;
  }
}

/**
 * Writes one value into a layer being built.
 */
type LayerWriter = (layer: ConfigLayer) => void;

/**
 * Immutable, named set of configuration values.
 *
 * @example
 * ```typescript
 * const layer = ConfigLayer.builder('defaults')
 *   .put(RetryConfigKey, RetryConfig.standard())
 *   .build();
 *
 * layer.get(RetryConfigKey)?.maxAttempts; // 3
 * ```
 */
export class ConfigLayer {
  private readonly storedKeys: readonly ConfigKey<unknown>[];

  private constructor(
    readonly name: string,
    keys: readonly ConfigKey<unknown>[],
  ) {
    this.storedKeys = Object.freeze([...keys]);
    Object.freeze(this);
  }

  /**
   * Start building a new layer.
   */
  static builder(name: string): ConfigLayerBuilder {
    return new ConfigLayerBuilder(name);
  }

  /**
   * An empty layer, useful as a neutral element.
   */
  static empty(name: string = 'empty'): ConfigLayer {
    return new ConfigLayer(name, []);
  }

  /** @internal */
  static fromWriters(name: string, writers: ReadonlyMap<ConfigKey<unknown>, LayerWriter>): ConfigLayer {
    const layer = new ConfigLayer(name, [...writers.keys()]);
    for (const write of writers.values()) {
      write(layer);
    }
    return layer;
  }

  has<T>(key: ConfigKey<T>): boolean {
    return key.storedIn(this);
  }

  get<T>(key: ConfigKey<T>): T | undefined {
    return key.valueIn(this);
  }

  /**
   * Keys stored in this layer, in insertion order.
   */
  keys(): readonly ConfigKey<unknown>[] {
    return this.storedKeys;
  }

  /**
   * Names of the keys stored in this layer, in insertion order.
   */
  keyNames(): string[] {
    return this.storedKeys.map((key) => key.name);
  }

  get size(): number {
    return this.storedKeys.length;
  }
}

/**
 * Fluent builder for {@link ConfigLayer}.
 */
export class ConfigLayerBuilder {
  private readonly writers = new Map<ConfigKey<unknown>, LayerWriter>();

  constructor(private readonly name: string) {}

  put<T>(key: ConfigKey<T>, value: T): this {
    this.writers.set(key, (layer) => key.store(layer, value));
    return this;
  }

  /**
   * Store the value only when it is defined.
   */
  putIfDefined<T>(key: ConfigKey<T>, value: T | undefined): this {
    if (value !== undefined) {
      this.put(key, value);
    }
    return this;
  }

  /**
   * Copy every entry of another layer.
   */
  putAll(source: ConfigLayer): this {
    for (const key of source.keys()) {
      this.writers.set(key, (layer) => key.copy(source, layer));
    }
    return this;
  }

  build(): ConfigLayer {
    return ConfigLayer.fromWriters(this.name, this.writers);
  }
}

/**
 * Ordered, append-only stack of {@link ConfigLayer}s.
 *
 * @remarks
 * A bag is never mutated: {@link ConfigBag.withLayer} returns a new bag that
 * shares the existing layers. Folding the same layers twice always yields
 * the same view.
 */
export class ConfigBag {
  private readonly layers: readonly ConfigLayer[];

  private constructor(layers: readonly ConfigLayer[]) {
    this.layers = Object.freeze([...layers]);
    Object.freeze(this);
  }

  static of(...layers: ConfigLayer[]): ConfigBag {
    return new ConfigBag(layers);
  }

  static empty(): ConfigBag {
    return new ConfigBag([]);
  }

  withLayer(layer: ConfigLayer): ConfigBag {
    return new ConfigBag([...this.layers, layer]);
  }

  /**
   * Resolve a key; the last layer storing it wins.
   */
  load<T>(key: ConfigKey<T>): T | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      if (layer.has(key)) {
        return layer.get(key);
      }
    }
    return undefined;
  }

  /**
   * Resolve a key that must be present.
   *
   * @throws {Error} When no layer stores a value for the key
   */
  require<T>(key: ConfigKey<T>): T {
    const value = this.load(key);
    if (value !== undefined) {
      return value;
    }
    throw new Error(`Missing required configuration value: ${key.name}`);
  }

  /**
   * Every value stored under the key, in layer order (earliest first).
   */
  loadAll<T>(key: ConfigKey<T>): T[] {
    const values: T[] = [];
    for (const layer of this.layers) {
      const value = layer.get(key);
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  /**
   * Names of the layers, in merge order.
   */
  layerNames(): string[] {
    return this.layers.map((layer) => layer.name);
  }

  get size(): number {
    return this.layers.length;
  }
}
