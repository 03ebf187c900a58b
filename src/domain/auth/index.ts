/**
 * @wirebound/core - Auth Module
 *
 * Identity and auth scheme contracts
 */

export type {
  Identity,
  Credentials,
  Token,
  ApiKey,
  Anonymous,
  IIdentityResolver,
} from './IIdentity';

export {
  identity,
  isExpired,
  isCredentials,
  isToken,
  isApiKey,
} from './IIdentity';

export type {
  PayloadOverride,
  SigningOptions,
  ApiKeyPlacement,
  AuthSchemeOption,
  SigningContext,
  ISigner,
  IdentityResolverLookup,
  IAuthScheme,
  PayloadSigning,
} from './IAuthScheme';

export { AuthSchemeId, defaultSigningOptions, withPayloadSigning } from './IAuthScheme';
