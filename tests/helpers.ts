/**
 * @fileoverview Shared fixtures for runtime tests
 *
 * A small "Inventory" service with JSON operations, a sleep that records
 * delays without waiting, and a recording interceptor.
 */

import {
  ConfigLayer,
  PluginOrder,
  RegionKey,
  EndpointUrlKey,
  RetryConfig,
  RetryConfigKey,
  RuntimePlugins,
  SigningNameKey,
  StandardRetryStrategy,
  StaticRuntimePlugin,
  StaticTimeSource,
  bodyText,
  createRequest,
  defaultPlugin,
  extractErrorMetadata,
  silentLogger,
} from '../src';
import type {
  ConfigLayerBuilder,
  HttpResponse,
  IAsyncSleep,
  IInterceptor,
  OperationDefinition,
  Phase,
  RuntimeComponentsInit,
} from '../src';

// ==================== Operations ====================

export interface Item {
  id: string;
  name: string;
}

export interface InventoryError {
  code?: string;
  message?: string;
}

export const TEST_ENDPOINT = 'https://inventory.test.example.com';
export const SIGNING_TIME = new Date('2024-01-15T12:00:00Z');

function readJson(response: HttpResponse): unknown {
  const text = bodyText(response.body);
  return text.length > 0 ? JSON.parse(text) : {};
}

function toItem(body: unknown): Item {
  if (typeof body === 'object' && body !== null) {
    const id: unknown = Reflect.get(body, 'id');
    const name: unknown = Reflect.get(body, 'name');
    if (typeof id === 'string' && typeof name === 'string') {
      return { id, name };
    }
  }
  throw new Error('Response body is not an item');
}

/**
 * Reads `{ id, name }`, or a modeled error when the body carries a `code`
 * or the status is not 2xx.
 */
function deserializeItem(response: HttpResponse) {
  const body = readJson(response);
  const { code, message } = extractErrorMetadata(body);
  if (response.status >= 300 || code !== undefined) {
    return { ok: false as const, error: { code, message } };
  }
  return { ok: true as const, output: toItem(body) };
}

export const GetItem: OperationDefinition<{ id: string }, Item, InventoryError> = {
  name: 'GetItem',
  serviceName: 'Inventory',
  authSchemes: ['sigv4', 'httpBearerAuth'],
  config: ConfigLayer.builder('GetItem').put(SigningNameKey, 'inventory').build(),
  serialize: (input) => createRequest({ method: 'GET', uri: `/items/${encodeURIComponent(input.id)}` }),
  deserialize: deserializeItem,
};

export const PutItem: OperationDefinition<Item, Item, InventoryError> = {
  name: 'PutItem',
  serviceName: 'Inventory',
  authSchemes: ['httpBearerAuth'],
  contentType: 'application/json',
  serialize: (input) =>
    createRequest({ method: 'PUT', uri: `/items/${encodeURIComponent(input.id)}`, body: JSON.stringify(input) }),
  deserialize: deserializeItem,
};

export function itemResponse(item: Item, status = 200): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: new TextEncoder().encode(JSON.stringify(item)),
  };
}

export function errorResponse(status: number, error: InventoryError, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: new TextEncoder().encode(JSON.stringify(error)),
  };
}

// ==================== Runtime ====================

/**
 * Resolves at once and records every requested delay.
 */
export class RecordingSleep implements IAsyncSleep {
  readonly delays: number[] = [];

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.delays.push(ms);
    if (signal?.aborted) {
      throw signal.reason instanceof Error ? signal.reason : new Error('Aborted');
    }
  }
}

/**
 * Records `before:Phase` and `after:Phase` entries.
 */
export function recordingInterceptor(name: string, log: string[]): IInterceptor {
  return {
    name,
    beforePhase: (phase: Phase) => {
      log.push(`${name}:before:${phase}`);
    },
    afterPhase: (phase: Phase) => {
      log.push(`${name}:after:${phase}`);
    },
  };
}

/**
 * Defaults plus deterministic test components: silent logger, fixed
 * signing time, mid-range jitter and a recording sleep.
 */
export function testPlugins(
  components: RuntimeComponentsInit,
  configure: (builder: ConfigLayerBuilder) => void = () => undefined,
): RuntimePlugins {
  const builder = ConfigLayer.builder('test')
    .put(RegionKey, 'eu-west-1')
    .put(EndpointUrlKey, TEST_ENDPOINT)
    .put(RetryConfigKey, RetryConfig.standard({ initialBackoffMs: 100, maxBackoffMs: 1000 }));
  configure(builder);

  return RuntimePlugins.create()
    .withClientPlugin(defaultPlugin())
    .withClientPlugin(
      new StaticRuntimePlugin('test', PluginOrder.Overrides).withConfig(builder.build()).withComponents({
        logger: silentLogger,
        sleep: new RecordingSleep(),
        timeSource: new StaticTimeSource(SIGNING_TIME),
        retryStrategy: new StandardRetryStrategy({ random: () => 0.5 }),
        ...components,
      }),
    );
}
