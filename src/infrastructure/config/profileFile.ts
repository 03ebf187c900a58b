/**
 * @wirebound/core - Profile File Parser
 *
 * INI-style shared configuration file:
 *
 * ```ini
 * # comment
 * [default]
 * region = eu-west-1
 *
 * [profile dev]
 * auth_scheme_preference = sigv4, httpBearerAuth ; inline comment
 * ```
 */

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

export const CONFIG_FILE_ENV = 'WIREBOUND_CONFIG_FILE';
export const PROFILE_ENV = 'WIREBOUND_PROFILE';
export const DEFAULT_PROFILE = 'default';

/**
 * Profiles by name; each profile maps keys to raw values.
 */
export type ProfileSet = Record<string, Record<string, string>>;

function stripInlineComment(value: string): string {
  const match = /\s[#;]/.exec(value);
  return match ? value.slice(0, match.index) : value;
}

function profileName(header: string): string {
  const name = header.trim();
  return name.startsWith('profile ') ? name.slice('profile '.length).trim() : name;
}

/**
 * Parse the contents of a profile file. Malformed lines are ignored.
 */
export function parseProfileFile(contents: string): ProfileSet {
  const profiles: ProfileSet = {};
  let current: Record<string, string> | undefined;

  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const section = /^\[([^\]]+)\]/.exec(line);
    if (section) {
      const name = profileName(section[1]);
      current = profiles[name] ?? (profiles[name] = {});
      continue;
    }

    const separator = line.indexOf('=');
    if (current && separator > 0) {
      const key = line.slice(0, separator).trim();
      current[key] = stripInlineComment(line.slice(separator + 1)).trim();
    }
  }

  return profiles;
}

/**
 * Location of the profile file.
 */
export function profileFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_FILE_ENV] ?? join(homedir(), '.wirebound', 'config');
}

/**
 * Read and parse a profile file. A missing file yields no profiles.
 */
export function loadProfileFile(path: string): ProfileSet {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      return {};
    }
    throw error;
  }
  return parseProfileFile(contents);
}
