/**
 * @wirebound/core - Built-in Auth Schemes
 */

import { SigningError } from '../../domain/exceptions/exceptions';
import { isApiKey, isToken } from '../../domain/auth/IIdentity';
import type { Identity, IIdentityResolver } from '../../domain/auth/IIdentity';
import { AuthSchemeId, defaultSigningOptions, withPayloadSigning } from '../../domain/auth/IAuthScheme';
import type {
  ApiKeyPlacement,
  AuthSchemeOption,
  IAuthScheme,
  IdentityResolverLookup,
  ISigner,
} from '../../domain/auth/IAuthScheme';
import { ConfigLayer } from '../../domain/config/ConfigBag';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import {
  ApiKeyPlacementKey,
  PayloadSigningKey,
  RegionKey,
  SigningNameKey,
  SigningOptionsKey,
  SigningRegionKey,
} from '../../domain/config/keys';
import type { HttpRequest } from '../platform/types';
import { AnonymousIdentityResolver } from './resolvers';
import { SigV4Signer } from './sigv4';

function withHeader(request: HttpRequest, name: string, value: string): HttpRequest {
  return { ...request, headers: { ...request.headers, [name.toLowerCase()]: value } };
}

function withQueryParam(request: HttpRequest, name: string, value: string): HttpRequest {
  const hashIndex = request.uri.indexOf('#');
  const base = hashIndex === -1 ? request.uri : request.uri.slice(0, hashIndex);
  const separator = base.includes('?') ? '&' : '?';
  return { ...request, uri: `${base}${separator}${encodeURIComponent(name)}=${encodeURIComponent(value)}` };
}

// ==================== SigV4 ====================

export class SigV4AuthScheme implements IAuthScheme {
  readonly schemeId = AuthSchemeId.SigV4;
  readonly signer: ISigner = new SigV4Signer();

  identityResolver(lookup: IdentityResolverLookup): IIdentityResolver | undefined {
    return lookup.identityResolver(this.schemeId);
  }

  optionProperties(config: ConfigBag): ConfigLayer {
    return ConfigLayer.builder(`${this.schemeId}-option`)
      .putIfDefined(SigningNameKey, config.load(SigningNameKey))
      .putIfDefined(SigningRegionKey, config.load(SigningRegionKey) ?? config.load(RegionKey))
      .put(
        SigningOptionsKey,
        withPayloadSigning(config.load(SigningOptionsKey) ?? defaultSigningOptions(), config.load(PayloadSigningKey)),
      )
      .build();
  }
}

// ==================== Bearer ====================

export class BearerSigner implements ISigner {
  sign(request: HttpRequest, identity: Identity): HttpRequest {
    if (!isToken(identity.data)) {
      throw new SigningError('Bearer auth requires a token identity');
    }
    return withHeader(request, 'authorization', `Bearer ${identity.data.token}`);
  }
}

export class BearerAuthScheme implements IAuthScheme {
  readonly schemeId = AuthSchemeId.HttpBearer;
  readonly signer: ISigner = new BearerSigner();

  identityResolver(lookup: IdentityResolverLookup): IIdentityResolver | undefined {
    return lookup.identityResolver(this.schemeId);
  }
}

// ==================== API key ====================

export const DEFAULT_API_KEY_PLACEMENT: Readonly<ApiKeyPlacement> = {
  location: 'header',
  name: 'x-api-key',
};

export class ApiKeySigner implements ISigner {
  sign(request: HttpRequest, identity: Identity, option: AuthSchemeOption): HttpRequest {
    if (!isApiKey(identity.data)) {
      throw new SigningError('API key auth requires an API key identity');
    }

    const placement = option.properties.get(ApiKeyPlacementKey) ?? DEFAULT_API_KEY_PLACEMENT;
    const key = identity.data.key;
    if (placement.location === 'query') {
      return withQueryParam(request, placement.name, key);
    }
    return withHeader(request, placement.name, placement.scheme ? `${placement.scheme} ${key}` : key);
  }
}

export class ApiKeyAuthScheme implements IAuthScheme {
  readonly schemeId = AuthSchemeId.HttpApiKey;
  readonly signer: ISigner = new ApiKeySigner();

  identityResolver(lookup: IdentityResolverLookup): IIdentityResolver | undefined {
    return lookup.identityResolver(this.schemeId);
  }

  optionProperties(config: ConfigBag): ConfigLayer {
    return ConfigLayer.builder(`${this.schemeId}-option`)
      .putIfDefined(ApiKeyPlacementKey, config.load(ApiKeyPlacementKey))
      .build();
  }
}

// ==================== No auth ====================

export class NoAuthSigner implements ISigner {
  sign(request: HttpRequest): HttpRequest {
    return request;
  }
}

/**
 * Anonymous access. Falls back to its own resolver when none is registered.
 */
export class NoAuthScheme implements IAuthScheme {
  readonly schemeId = AuthSchemeId.NoAuth;
  readonly signer: ISigner = new NoAuthSigner();
  private readonly anonymous = new AnonymousIdentityResolver();

  identityResolver(lookup: IdentityResolverLookup): IIdentityResolver {
    return lookup.identityResolver(this.schemeId) ?? this.anonymous;
  }
}
