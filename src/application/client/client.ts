/**
 * @wirebound/core - Service Client
 *
 * Entry point for callers. A client applies its plugins once, validates the
 * result, and runs every operation on top of that state.
 */

import { v4 as uuidv4 } from 'uuid';
import { Phase } from '../../domain/orchestration/phase';
import { toSdkError } from '../../domain/exceptions/exceptions';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import type { RetryConfig, TimeoutConfig } from '../../domain/config/policies';
import type { IIdentityResolver } from '../../domain/auth/IIdentity';
import type { OperationDefinition } from '../../domain/orchestration/IOperation';
import type { ITransport } from '../ports/transport';
import type { IEndpointResolver } from '../ports/endpoint';
import type { RuntimeComponents } from '../components/RuntimeComponents';
import { RuntimePlugins } from '../plugins/RuntimePlugins';
import type { RuntimeState } from '../plugins/RuntimePlugins';
import type { IRuntimePlugin } from '../plugins/IRuntimePlugin';
import type { IInterceptor } from '../orchestrator/IInterceptor';
import { Orchestrator } from '../orchestrator/Orchestrator';
import type { OrchestrationResult } from '../orchestrator/Orchestrator';
import { resolveOperationRuntime } from '../orchestrator/orchestrate';
import { clientOptionsPlugin, defaultPlugin } from './defaultPlugins';
import type { ClientOptions, SendOptions } from './options';
import type { ILogger } from './logger';

/**
 * ServiceClient - runs generated operations
 *
 * @example
 * ```typescript
 * const client = ServiceClient.create({
 *   region: 'eu-west-1',
 *   endpoint: 'https://{service}.{region}.example.com',
 *   identityResolvers: { httpBearerAuth: staticToken('test-token') },
 *   transport,
 * });
 *
 * const item = await client.send(GetItem, { id: '42' });
 * ```
 */
export class ServiceClient {
  private readonly state: RuntimeState;
  private readonly logger: ILogger;

  /**
   * @throws {ConfigurationError} When a mandatory component is missing
   */
  private constructor(private readonly options: ClientOptions) {
    const plugins = RuntimePlugins.create()
      .withClientPlugin(defaultPlugin())
      .withClientPlugin(clientOptionsPlugin(options))
      .withClientPlugins(options.plugins ?? []);

    const runtime = plugins.build();
    this.state = { config: runtime.config, components: runtime.components };
    this.logger = runtime.resolved.logger;
    this.logger.debug(
      `Client ${options.name ?? 'client'} ready (auth schemes: ${runtime.components.authSchemeIds().join(', ')})`,
    );
  }

  /**
   * Create a new client
   *
   * @throws {ConfigurationError} When a mandatory component is missing
   */
  static create(options: ClientOptions = {}): ServiceClient {
    return new ServiceClient(options);
  }

  /**
   * Run an operation.
   *
   * @throws {SdkError}
   */
  async send<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    input: I,
    options: SendOptions = {},
  ): Promise<O> {
    return this.orchestrator(operation, options).invoke(operation, input);
  }

  /**
   * Run an operation. Never rejects.
   */
  async sendWithResult<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    input: I,
    options: SendOptions = {},
  ): Promise<OrchestrationResult<O>> {
    let orchestrator: Orchestrator;
    try {
      orchestrator = this.orchestrator(operation, options);
    } catch (error) {
      return {
        isSuccess: false,
        error: toSdkError(error, Phase.Init),
        attempts: 0,
        duration: 0,
        invocationId: uuidv4(),
      };
    }
    return orchestrator.invokeWithResult(operation, input);
  }

  /**
   * Client-level configuration
   */
  get config(): ConfigBag {
    return this.state.config;
  }

  /**
   * Client-level components
   */
  get components(): RuntimeComponents {
    return this.state.components;
  }

  get name(): string {
    return this.options.name ?? 'client';
  }

  private orchestrator<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    options: SendOptions,
  ): Orchestrator {
    const plugins = RuntimePlugins.create().withOperationPlugins(options.plugins ?? []);
    return new Orchestrator(resolveOperationRuntime(operation, plugins, this.state));
  }
}

// ==================== Builder Pattern ====================

/**
 * ClientBuilder - Fluent builder for ServiceClient
 */
export class ClientBuilder {
  private options: ClientOptions = {};
  private identityResolvers: Record<string, IIdentityResolver> = {};
  private interceptors: IInterceptor[] = [];
  private plugins: IRuntimePlugin[] = [];

  /**
   * Set client name
   */
  withName(name: string): this {
    this.options.name = name;
    return this;
  }

  withRegion(region: string): this {
    this.options.region = region;
    return this;
  }

  /**
   * Set endpoint URL or template
   */
  withEndpoint(endpoint: string): this {
    this.options.endpoint = endpoint;
    return this;
  }

  withEndpointResolver(resolver: IEndpointResolver): this {
    this.options.endpointResolver = resolver;
    return this;
  }

  withRetry(retry: RetryConfig): this {
    this.options.retry = retry;
    return this;
  }

  withTimeout(timeout: TimeoutConfig): this {
    this.options.timeout = timeout;
    return this;
  }

  /**
   * Set preferred auth scheme ids, in order
   */
  withAuthSchemePreference(preference: readonly string[]): this {
    this.options.authSchemePreference = preference;
    return this;
  }

  /**
   * Set the environment used for preference and profile lookup
   */
  withEnv(env: NodeJS.ProcessEnv): this {
    this.options.env = env;
    return this;
  }

  /**
   * Register the identity resolver for a scheme
   */
  withIdentityResolver(schemeId: string, resolver: IIdentityResolver): this {
    this.identityResolvers[schemeId] = resolver;
    return this;
  }

  withTransport(transport: ITransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Set logger
   */
  withLogger(logger: ILogger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Add interceptor
   */
  use(interceptor: IInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Add client plugin
   */
  withPlugin(plugin: IRuntimePlugin): this {
    this.plugins.push(plugin);
    return this;
  }

  /**
   * Build the client
   *
   * @throws {ConfigurationError} When a mandatory component is missing
   */
  build(): ServiceClient {
    return ServiceClient.create({
      ...this.options,
      identityResolvers: { ...this.identityResolvers },
      interceptors: [...this.interceptors],
      plugins: [...this.plugins],
    });
  }
}

/**
 * Create a new client builder
 */
export function createClientBuilder(): ClientBuilder {
  return new ClientBuilder();
}
