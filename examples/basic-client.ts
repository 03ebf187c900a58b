/**
 * @wirebound/core v1.0.0 - Basic Example
 *
 * Demonstrates the core runtime concepts:
 * - A generated operation definition
 * - ServiceClient with auth scheme preference
 * - Retries against a replayed exchange
 * - A custom interceptor and a per-call plugin
 *
 * Note: This example replays canned responses through EventTransport, so
 * it runs without network access.
 */

import {
  AuthSchemePreferenceKey,
  ConfigLayer,
  EventTransport,
  Phase,
  RetryConfig,
  SigningNameKey,
  StaticRuntimePlugin,
  bodyText,
  createClientBuilder,
  createInterceptor,
  createRequest,
  response,
  staticCredentials,
  staticToken,
} from '../src/index';
import type { OperationDefinition } from '../src/index';

// ==================== Operation ====================

interface GetItemInput {
  id: string;
}

interface GetItemOutput {
  id: string;
  name: string;
}

interface InventoryError {
  code?: string;
  message?: string;
}

function field(text: string, name: string): string | undefined {
  const parsed: unknown = text.length > 0 ? JSON.parse(text) : {};
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  const value: unknown = Reflect.get(parsed, name);
  return typeof value === 'string' ? value : undefined;
}

const GetItem: OperationDefinition<GetItemInput, GetItemOutput, InventoryError> = {
  name: 'GetItem',
  serviceName: 'Inventory',
  authSchemes: ['sigv4', 'httpBearerAuth'],
  config: ConfigLayer.builder('GetItem').put(SigningNameKey, 'inventory').build(),
  serialize: (input) => createRequest({ method: 'GET', uri: `/items/${encodeURIComponent(input.id)}` }),
  deserialize: (res) => {
    const text = bodyText(res.body);
    if (res.status !== 200) {
      return { ok: false, error: { code: field(text, 'code'), message: field(text, 'message') } };
    }
    return { ok: true, output: { id: field(text, 'id') ?? '', name: field(text, 'name') ?? '' } };
  },
};

// ==================== Client ====================

const endpoint = 'https://inventory.eu-west-1.example.com/items/42';

const transport = new EventTransport([
  {
    request: createRequest({ method: 'GET', uri: endpoint }),
    response: response().status(503).json({ code: 'Unavailable' }).build(),
  },
  {
    request: createRequest({ method: 'GET', uri: endpoint }),
    response: response().ok().json({ id: '42', name: 'widget' }).build(),
    latencyMs: 20,
  },
  {
    request: createRequest({ method: 'GET', uri: endpoint }),
    response: response().ok().json({ id: '42', name: 'widget' }).build(),
  },
]);

const timing = createInterceptor('Timing', {
  beforePhase: (phase, ctx) => {
    if (phase === Phase.Dispatch) ctx.items.set('start', Date.now());
  },
  afterPhase: (phase, ctx, { logger }) => {
    if (phase === Phase.Dispatch) {
      logger.info(`Attempt ${ctx.attempt} took ${Date.now() - Number(ctx.items.get('start'))}ms`);
    }
  },
});

const client = createClientBuilder()
  .withName('inventory')
  .withRegion('eu-west-1')
  .withEndpoint('https://{service}.{region}.example.com')
  .withRetry(RetryConfig.standard({ maxAttempts: 3, initialBackoffMs: 50 }))
  .withIdentityResolver('sigv4', staticCredentials({ accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'example-secret' }))
  .withIdentityResolver('httpBearerAuth', staticToken('example-token'))
  .withTransport(transport)
  .use(timing)
  .build();

// ==================== Run ====================

async function main(): Promise<void> {
  // First call: 503, then success after one backoff
  const result = await client.sendWithResult(GetItem, { id: '42' });
  if (result.isSuccess) {
    console.log(`Got ${result.value.name} after ${result.attempts} attempts`);
  } else {
    console.error(`Failed: ${result.error.message}`);
  }

  // Second call prefers bearer auth for this call only
  const preferBearer = new StaticRuntimePlugin('prefer-bearer').withConfig(
    ConfigLayer.builder('prefer-bearer').put(AuthSchemePreferenceKey, ['httpBearerAuth']).build(),
  );
  const item = await client.send(GetItem, { id: '42' }, { plugins: [preferBearer] });
  console.log(`Got ${item.name} with bearer auth`);

  transport.assertRequestsMatch(['authorization', 'host', 'x-amz-date', 'sdk-invocation-id', 'sdk-request', 'content-length']);
  console.log('All requests matched the recorded exchange');
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
