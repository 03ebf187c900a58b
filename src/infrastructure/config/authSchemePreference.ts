/**
 * @wirebound/core - Auth Scheme Preference Loader
 *
 * Precedence, highest first:
 *
 * 1. explicit client configuration
 * 2. `AUTH_SCHEME_PREFERENCE` environment variable
 * 3. `auth_scheme_preference` in the selected profile of the profile file
 */

import {
  DEFAULT_PROFILE,
  PROFILE_ENV,
  loadProfileFile,
  parseProfileFile,
  profileFilePath,
} from './profileFile';
import type { ProfileSet } from './profileFile';

export const AUTH_SCHEME_PREFERENCE_ENV = 'AUTH_SCHEME_PREFERENCE';
export const AUTH_SCHEME_PREFERENCE_PROFILE_KEY = 'auth_scheme_preference';

export interface AuthSchemePreferenceSources {
  /** Preference set on the client */
  explicit?: readonly string[];

  /** @defaultValue process.env */
  env?: NodeJS.ProcessEnv;

  /** Profile file path; defaults to `WIREBOUND_CONFIG_FILE` or `~/.wirebound/config` */
  configFile?: string;

  /** Profile file contents; takes the place of reading `configFile` */
  configFileContents?: string;

  /** Profile name; defaults to `WIREBOUND_PROFILE` or `default` */
  profile?: string;
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export function parseSchemeList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Resolve the preference. `undefined` when no source sets one.
 *
 * @example
 * ```typescript
 * // AUTH_SCHEME_PREFERENCE="sigv4, httpBearerAuth"
 * loadAuthSchemePreference();                            // ['sigv4', 'httpBearerAuth']
 * loadAuthSchemePreference({ explicit: ['noAuth'] });    // ['noAuth']
 * ```
 */
export function loadAuthSchemePreference(
  sources: AuthSchemePreferenceSources = {},
): string[] | undefined {
  if (sources.explicit !== undefined) {
    return [...sources.explicit];
  }

  const env = sources.env ?? process.env;
  const fromEnv = env[AUTH_SCHEME_PREFERENCE_ENV];
  if (fromEnv !== undefined) {
    const list = parseSchemeList(fromEnv);
    if (list.length > 0) {
      return list;
    }
  }

  const profiles: ProfileSet =
    sources.configFileContents !== undefined
      ? parseProfileFile(sources.configFileContents)
      : loadProfileFile(sources.configFile ?? profileFilePath(env));
  const profile = sources.profile ?? env[PROFILE_ENV] ?? DEFAULT_PROFILE;
  const fromFile = profiles[profile]?.[AUTH_SCHEME_PREFERENCE_PROFILE_KEY];
  if (fromFile !== undefined) {
    const list = parseSchemeList(fromFile);
    if (list.length > 0) {
      return list;
    }
  }

  return undefined;
}
