/**
 * @wirebound/core - Config Module
 *
 * Layered configuration and policy values
 */

export { ConfigKey, ConfigLayer, ConfigLayerBuilder, ConfigBag } from './ConfigBag';

export { RetryConfig, TimeoutConfig } from './policies';
export type { RetryMode, RetryConfigOptions, TimeoutConfigOptions } from './policies';

export {
  RegionKey,
  EndpointUrlKey,
  AuthSchemePreferenceKey,
  RetryConfigKey,
  TimeoutConfigKey,
  SigningNameKey,
  SigningRegionKey,
  SigningOptionsKey,
  PayloadSigningKey,
  ApiKeyPlacementKey,
} from './keys';
