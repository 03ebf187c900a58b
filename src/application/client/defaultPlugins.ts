/**
 * @wirebound/core - Default Plugins
 *
 * `defaultPlugin()` registers everything a client needs except a transport
 * and identity resolvers; `clientOptionsPlugin()` turns {@link ClientOptions}
 * into a config layer and components.
 */

import { ConfigLayer } from '../../domain/config/ConfigBag';
import {
  AuthSchemePreferenceKey,
  EndpointUrlKey,
  RegionKey,
  RetryConfigKey,
  SigningNameKey,
  TimeoutConfigKey,
} from '../../domain/config/keys';
import { RetryConfig, TimeoutConfig } from '../../domain/config/policies';
import {
  ApiKeyAuthScheme,
  BearerAuthScheme,
  NoAuthScheme,
  SigV4AuthScheme,
} from '../../infrastructure/auth/schemes';
import { IdentityCache } from '../../infrastructure/cache/IdentityCache';
import { loadAuthSchemePreference } from '../../infrastructure/config/authSchemePreference';
import { StaticEndpointResolver } from '../../infrastructure/endpoint/StaticEndpointResolver';
import {
  InvocationIdInterceptor,
  LoggingInterceptor,
  RequestAttemptsInterceptor,
} from '../../infrastructure/platform/interceptors';
import { defaultRetryClassifiers } from '../../infrastructure/resilience/classifiers';
import { StandardRetryStrategy } from '../../infrastructure/resilience/RetryStrategy';
import { DefaultSleep, SystemTimeSource } from '../../infrastructure/resilience/sleep';
import type { RuntimeComponentsInit } from '../components/RuntimeComponents';
import { PluginOrder, StaticRuntimePlugin } from '../plugins/IRuntimePlugin';
import type { IRuntimePlugin } from '../plugins/IRuntimePlugin';
import { consoleLogger } from './logger';
import type { ClientOptions } from './options';

/**
 * Defaults shared by every client. Each call creates fresh stateful
 * components (retry budget, identity cache).
 */
export function defaultPlugin(): IRuntimePlugin {
  return new StaticRuntimePlugin('defaults', PluginOrder.Defaults)
    .withConfig(
      ConfigLayer.builder('defaults')
        .put(RetryConfigKey, RetryConfig.standard())
        .put(TimeoutConfigKey, TimeoutConfig.none())
        .build(),
    )
    .withComponents({
      endpointResolver: new StaticEndpointResolver(),
      authSchemes: [
        new SigV4AuthScheme(),
        new BearerAuthScheme(),
        new ApiKeyAuthScheme(),
        new NoAuthScheme(),
      ],
      interceptors: [
        new InvocationIdInterceptor(),
        new RequestAttemptsInterceptor(),
        new LoggingInterceptor(),
      ],
      retryStrategy: new StandardRetryStrategy(),
      retryClassifiers: defaultRetryClassifiers(),
      identityCache: new IdentityCache(),
      sleep: new DefaultSleep(),
      timeSource: new SystemTimeSource(),
      logger: consoleLogger,
    });
}

/**
 * Plugin carrying client options.
 */
export function clientOptionsPlugin(options: ClientOptions): IRuntimePlugin {
  const layer = ConfigLayer.builder(options.name ?? 'client')
    .putIfDefined(RegionKey, options.region)
    .putIfDefined(EndpointUrlKey, options.endpoint)
    .putIfDefined(RetryConfigKey, options.retry)
    .putIfDefined(TimeoutConfigKey, options.timeout)
    .putIfDefined(SigningNameKey, options.signingName)
    .putIfDefined(
      AuthSchemePreferenceKey,
      loadAuthSchemePreference({
        explicit: options.authSchemePreference,
        env: options.env,
        configFile: options.configFile,
        profile: options.profile,
      }),
    )
    .build();

  const components: RuntimeComponentsInit = {
    endpointResolver: options.endpointResolver,
    identityResolvers: options.identityResolvers,
    transport: options.transport,
    logger: options.logger,
    interceptors: options.interceptors,
  };

  return new StaticRuntimePlugin('client-options', PluginOrder.Defaults)
    .withConfig(layer)
    .withComponents(components);
}
