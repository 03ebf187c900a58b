/**
 * @wirebound/core - Config Loading Module
 */

export {
  parseProfileFile,
  loadProfileFile,
  profileFilePath,
  CONFIG_FILE_ENV,
  PROFILE_ENV,
  DEFAULT_PROFILE,
} from './profileFile';
export type { ProfileSet } from './profileFile';

export {
  loadAuthSchemePreference,
  parseSchemeList,
  AUTH_SCHEME_PREFERENCE_ENV,
  AUTH_SCHEME_PREFERENCE_PROFILE_KEY,
} from './authSchemePreference';
export type { AuthSchemePreferenceSources } from './authSchemePreference';
