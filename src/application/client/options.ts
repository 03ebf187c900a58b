/**
 * @wirebound/core - Client Options
 */

import type { RetryConfig, TimeoutConfig } from '../../domain/config/policies';
import type { IIdentityResolver } from '../../domain/auth/IIdentity';
import type { IEndpointResolver } from '../ports/endpoint';
import type { ITransport } from '../ports/transport';
import type { IInterceptor } from '../orchestrator/IInterceptor';
import type { IRuntimePlugin } from '../plugins/IRuntimePlugin';
import type { ILogger } from './logger';

/**
 * Client construction options
 */
export interface ClientOptions {
  /** Client name used in logs */
  name?: string;

  region?: string;

  /**
   * Endpoint URL or template (`{region}` and `{service}` are substituted)
   */
  endpoint?: string;

  /** Replaces the static endpoint resolver */
  endpointResolver?: IEndpointResolver;

  /** @defaultValue RetryConfig.standard() */
  retry?: RetryConfig;

  /** @defaultValue TimeoutConfig.none() */
  timeout?: TimeoutConfig;

  /**
   * Preferred auth scheme ids. When omitted, `AUTH_SCHEME_PREFERENCE` and
   * then the profile file are consulted.
   */
  authSchemePreference?: readonly string[];

  /** Environment read for the preference and profile file; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;

  /** Profile file path; defaults to `WIREBOUND_CONFIG_FILE` or `~/.wirebound/config` */
  configFile?: string;

  /** Profile name; defaults to `WIREBOUND_PROFILE` or `default` */
  profile?: string;

  /** Signing name used by sigv4 when the operation does not set one */
  signingName?: string;

  /** Identity resolvers keyed by auth scheme id */
  identityResolvers?: Record<string, IIdentityResolver>;

  transport?: ITransport;

  logger?: ILogger;

  /** Interceptors added after the built-in ones */
  interceptors?: IInterceptor[];

  /** Client plugins, applied after the defaults and these options */
  plugins?: IRuntimePlugin[];
}

/**
 * Per-call options
 */
export interface SendOptions {
  /** Operation plugins, applied after the operation's own configuration */
  plugins?: IRuntimePlugin[];
}
