/**
 * @wirebound/core - Auth Module
 *
 * Built-in schemes, signers and identity resolvers
 */

export {
  SigV4Signer,
  ALGORITHM,
  UNSIGNED_PAYLOAD,
  EMPTY_SHA256,
  sha256Hex,
  uriEncode,
  formatAmzDate,
  canonicalUri,
  canonicalQuery,
  createCanonicalRequest,
  payloadHash,
  deriveSigningKey,
} from './sigv4';
export type { CanonicalRequest } from './sigv4';

export {
  SigV4AuthScheme,
  BearerAuthScheme,
  BearerSigner,
  ApiKeyAuthScheme,
  ApiKeySigner,
  NoAuthScheme,
  NoAuthSigner,
  DEFAULT_API_KEY_PLACEMENT,
} from './schemes';

export {
  StaticIdentityResolver,
  AnonymousIdentityResolver,
  staticCredentials,
  staticToken,
  staticApiKey,
} from './resolvers';

export {
  CredentialProcessResolver,
  parseCredentialProcessOutput,
  shellCommandRunner,
} from './credentialProcess';
export type {
  CommandResult,
  CommandRunner,
  CredentialProcessOptions,
} from './credentialProcess';
