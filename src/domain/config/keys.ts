/**
 * @wirebound/core - Well-known Configuration Keys
 */

import { ConfigKey } from './ConfigBag';
import type { RetryConfig, TimeoutConfig } from './policies';
import type { ApiKeyPlacement, PayloadSigning, SigningOptions } from '../auth/IAuthScheme';

// ==================== Client ====================

export const RegionKey = new ConfigKey<string>('region');

export const EndpointUrlKey = new ConfigKey<string>('endpointUrl');

/** Ordered scheme ids the caller prefers */
export const AuthSchemePreferenceKey = new ConfigKey<readonly string[]>('authSchemePreference');

export const RetryConfigKey = new ConfigKey<RetryConfig>('retryConfig');

export const TimeoutConfigKey = new ConfigKey<TimeoutConfig>('timeoutConfig');

// ==================== Signing ====================

export const SigningNameKey = new ConfigKey<string>('signingName');

/** Falls back to {@link RegionKey} when unset */
export const SigningRegionKey = new ConfigKey<string>('signingRegion');

export const SigningOptionsKey = new ConfigKey<SigningOptions>('signingOptions');

/** Set per operation; applied on top of {@link SigningOptionsKey} when signing */
export const PayloadSigningKey = new ConfigKey<PayloadSigning>('payloadSigning');

export const ApiKeyPlacementKey = new ConfigKey<ApiKeyPlacement>('apiKeyPlacement');
