/**
 * @fileoverview RuntimeComponents - Merged Set of Pluggable Services
 *
 * @packageDocumentation
 * @module @wirebound/core/application/components
 *
 * Every runtime plugin may contribute a partial set of components. Merging
 * them yields one frozen snapshot that all orchestrations of a client
 * share read-only:
 *
 * ```
 * defaults plugin      { transport?, retryStrategy, authSchemes: [sigv4, noAuth], ... }
 *        ↓ merge
 * client plugin        { transport, identityResolvers: { sigv4 } }
 *        ↓ merge
 * operation override   { interceptors: [audit] }
 *        ↓
 * RuntimeComponents    (frozen) ──validate()──► ResolvedComponents
 * ```
 *
 * Merge rules:
 * - single-valued components: the later value replaces the earlier one
 * - auth schemes and identity resolvers: keyed by scheme id; a later entry
 *   replaces the earlier one in place, new ids are appended
 * - interceptors and retry classifiers: appended in order
 */

import { ConfigurationError } from '../../domain/exceptions/exceptions';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import { RetryConfigKey, TimeoutConfigKey } from '../../domain/config/keys';
import type { IAuthScheme, IdentityResolverLookup } from '../../domain/auth/IAuthScheme';
import type { IIdentityResolver } from '../../domain/auth/IIdentity';
import type { IEndpointResolver } from '../ports/endpoint';
import type { ITransport } from '../ports/transport';
import type { IAsyncSleep, ITimeSource } from '../ports/runtime';
import type { IInterceptor } from '../orchestrator/IInterceptor';
import type { ILogger } from '../client/logger';
import { consoleLogger } from '../client/logger';
import type { IRetryClassifier, IRetryStrategy } from '../../infrastructure/resilience/IRetryStrategy';
import type { IIdentityCache } from '../../infrastructure/cache/IdentityCache';

/**
 * Partial component set contributed by one plugin.
 */
export interface RuntimeComponentsInit {
  endpointResolver?: IEndpointResolver;
  authSchemes?: readonly IAuthScheme[];
  identityResolvers?: Readonly<Record<string, IIdentityResolver>>;
  interceptors?: readonly IInterceptor[];
  retryStrategy?: IRetryStrategy;
  retryClassifiers?: readonly IRetryClassifier[];
  identityCache?: IIdentityCache;
  transport?: ITransport;
  sleep?: IAsyncSleep;
  timeSource?: ITimeSource;
  logger?: ILogger;
}

/**
 * Components after validation. Only `sleep` may be absent, and only when
 * neither retries nor timeouts are enabled.
 */
export interface ResolvedComponents extends IdentityResolverLookup {
  readonly endpointResolver: IEndpointResolver;
  readonly authSchemes: readonly IAuthScheme[];
  readonly interceptors: readonly IInterceptor[];
  readonly retryStrategy: IRetryStrategy;
  readonly retryClassifiers: readonly IRetryClassifier[];
  readonly identityCache: IIdentityCache;
  readonly transport: ITransport;
  readonly sleep: IAsyncSleep | undefined;
  readonly timeSource: ITimeSource;
  readonly logger: ILogger;
  authScheme(schemeId: string): IAuthScheme | undefined;
}

interface ComponentFields {
  endpointResolver?: IEndpointResolver;
  authSchemes: readonly IAuthScheme[];
  identityResolvers: ReadonlyMap<string, IIdentityResolver>;
  interceptors: readonly IInterceptor[];
  retryStrategy?: IRetryStrategy;
  retryClassifiers: readonly IRetryClassifier[];
  identityCache?: IIdentityCache;
  transport?: ITransport;
  sleep?: IAsyncSleep;
  timeSource?: ITimeSource;
  logger?: ILogger;
}

function mergeSchemes(
  current: readonly IAuthScheme[],
  added: readonly IAuthScheme[] | undefined,
): readonly IAuthScheme[] {
  if (!added || added.length === 0) {
    return current;
  }
  const merged = [...current];
  for (const scheme of added) {
    const index = merged.findIndex((existing) => existing.schemeId === scheme.schemeId);
    if (index === -1) {
      merged.push(scheme);
    } else {
      merged[index] = scheme;
    }
  }
  return Object.freeze(merged);
}

/**
 * Frozen snapshot of runtime components.
 */
export class RuntimeComponents implements IdentityResolverLookup {
  readonly endpointResolver: IEndpointResolver | undefined;
  readonly authSchemes: readonly IAuthScheme[];
  readonly interceptors: readonly IInterceptor[];
  readonly retryStrategy: IRetryStrategy | undefined;
  readonly retryClassifiers: readonly IRetryClassifier[];
  readonly identityCache: IIdentityCache | undefined;
  readonly transport: ITransport | undefined;
  readonly sleep: IAsyncSleep | undefined;
  readonly timeSource: ITimeSource | undefined;
  readonly logger: ILogger | undefined;
  private readonly identityResolvers: ReadonlyMap<string, IIdentityResolver>;

  private constructor(fields: ComponentFields) {
    this.endpointResolver = fields.endpointResolver;
    this.authSchemes = fields.authSchemes;
    this.identityResolvers = fields.identityResolvers;
    this.interceptors = fields.interceptors;
    this.retryStrategy = fields.retryStrategy;
    this.retryClassifiers = fields.retryClassifiers;
    this.identityCache = fields.identityCache;
    this.transport = fields.transport;
    this.sleep = fields.sleep;
    this.timeSource = fields.timeSource;
    this.logger = fields.logger;
    Object.freeze(this);
  }

  static empty(): RuntimeComponents {
    return new RuntimeComponents({
      authSchemes: [],
      identityResolvers: new Map(),
      interceptors: [],
      retryClassifiers: [],
    });
  }

  /**
   * New snapshot with `init` merged on top of this one. This snapshot is
   * left unchanged.
   */
  merge(init: RuntimeComponentsInit): RuntimeComponents {
    const identityResolvers = new Map(this.identityResolvers);
    for (const [schemeId, resolver] of Object.entries(init.identityResolvers ?? {})) {
      identityResolvers.set(schemeId, resolver);
    }

    return new RuntimeComponents({
      endpointResolver: init.endpointResolver ?? this.endpointResolver,
      authSchemes: mergeSchemes(this.authSchemes, init.authSchemes),
      identityResolvers,
      interceptors: Object.freeze([...this.interceptors, ...(init.interceptors ?? [])]),
      retryStrategy: init.retryStrategy ?? this.retryStrategy,
      retryClassifiers: Object.freeze([...this.retryClassifiers, ...(init.retryClassifiers ?? [])]),
      identityCache: init.identityCache ?? this.identityCache,
      transport: init.transport ?? this.transport,
      sleep: init.sleep ?? this.sleep,
      timeSource: init.timeSource ?? this.timeSource,
      logger: init.logger ?? this.logger,
    });
  }

  authScheme(schemeId: string): IAuthScheme | undefined {
    return this.authSchemes.find((scheme) => scheme.schemeId === schemeId);
  }

  identityResolver(schemeId: string): IIdentityResolver | undefined {
    return this.identityResolvers.get(schemeId);
  }

  /**
   * Ids of the registered auth schemes, in registration order.
   */
  authSchemeIds(): string[] {
    return this.authSchemes.map((scheme) => scheme.schemeId);
  }

  /**
   * Check that every mandatory component is present.
   *
   * @throws {ConfigurationError} Listing every missing component
   */
  validate(config: ConfigBag): ResolvedComponents {
    const missing: string[] = [];
    const { endpointResolver, transport, retryStrategy, identityCache, timeSource } = this;

    if (!endpointResolver) missing.push('endpointResolver');
    if (!transport) missing.push('transport');
    if (!retryStrategy) missing.push('retryStrategy');
    if (!identityCache) missing.push('identityCache');
    if (!timeSource) missing.push('timeSource');
    if (!this.authSchemes.some((scheme) => scheme.identityResolver(this) !== undefined)) {
      missing.push('authScheme with an identity resolver');
    }

    const retryEnabled = config.load(RetryConfigKey)?.hasRetry() ?? false;
    const timeoutsEnabled = config.load(TimeoutConfigKey)?.hasTimeouts() ?? false;
    if (!this.sleep && (retryEnabled || timeoutsEnabled)) {
      missing.push('sleep');
    }

    if (
      missing.length > 0 ||
      !endpointResolver ||
      !transport ||
      !retryStrategy ||
      !identityCache ||
      !timeSource
    ) {
      throw new ConfigurationError(
        `Invalid runtime configuration, missing: ${missing.join(', ')}`,
        missing,
      );
    }

    return Object.freeze({
      endpointResolver,
      transport,
      retryStrategy,
      identityCache,
      timeSource,
      authSchemes: this.authSchemes,
      interceptors: this.interceptors,
      retryClassifiers: this.retryClassifiers,
      sleep: this.sleep,
      logger: this.logger ?? consoleLogger,
      authScheme: (schemeId: string) => this.authScheme(schemeId),
      identityResolver: (schemeId: string) => this.identityResolver(schemeId),
    });
  }
}
