/**
 * @fileoverview Credential Process Resolver
 *
 * @packageDocumentation
 * @module @wirebound/core/infrastructure/auth
 *
 * Runs an external command and reads credentials from its standard output:
 *
 * ```json
 * {
 *   "Version": 1,
 *   "AccessKeyId": "AKID",
 *   "SecretAccessKey": "test-secret",
 *   "SessionToken": "optional",
 *   "Expiration": "2024-01-01T00:00:00Z",
 *   "AccountId": "optional"
 * }
 * ```
 *
 * Key names are matched case-insensitively. The output is never logged.
 */

import { exec } from 'child_process';
import { z } from 'zod';
import { IdentityResolutionError } from '../../domain/exceptions/exceptions';
import { AuthSchemeId } from '../../domain/auth/IAuthScheme';
import { identity } from '../../domain/auth/IIdentity';
import type { Credentials, Identity, IIdentityResolver } from '../../domain/auth/IIdentity';

/**
 * Output of a finished command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a shell command to completion.
 */
export type CommandRunner = (command: string) => Promise<CommandResult>;

/**
 * Run a command through the platform shell.
 */
export const shellCommandRunner: CommandRunner = (command) =>
  new Promise((resolve, reject) => {
    exec(command, { windowsHide: true }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        reject(error);
        return;
      }
      resolve({ stdout, stderr, exitCode: error?.code ?? 0 });
    });
  });

const credentialProcessOutput = z.object({
  version: z.number({ required_error: 'Version is required' }),
  accesskeyid: z.string({ required_error: 'AccessKeyId is required' }).min(1),
  secretaccesskey: z.string({ required_error: 'SecretAccessKey is required' }).min(1),
  sessiontoken: z.string().optional(),
  expiration: z.string().datetime({ offset: true, message: 'Expiration must be an RFC 3339 timestamp' }).optional(),
  accountid: z.string().optional(),
});

function lowerCaseKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).map(([key, field]) => [key.toLowerCase(), field]));
}

/**
 * Parse the JSON a credential process printed.
 *
 * @param fallbackAccountId - Account id used when the output has none
 * @throws {IdentityResolutionError} When the output is not valid
 */
export function parseCredentialProcessOutput(
  output: string,
  fallbackAccountId?: string,
): Identity<Credentials> {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (error) {
    throw new IdentityResolutionError('Credential process output is not valid JSON', AuthSchemeId.SigV4, {
      cause: error,
    });
  }

  const parsed = credentialProcessOutput.safeParse(lowerCaseKeys(json));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new IdentityResolutionError(`Invalid credential process output: ${details}`, AuthSchemeId.SigV4);
  }

  const data = parsed.data;
  if (data.version !== 1) {
    throw new IdentityResolutionError(
      `Unsupported credential process output version ${data.version}; expected 1`,
      AuthSchemeId.SigV4,
    );
  }

  const accountId = data.accountid ?? fallbackAccountId;
  const credentials: Credentials = {
    accessKeyId: data.accesskeyid,
    secretAccessKey: data.secretaccesskey,
    ...(data.sessiontoken !== undefined ? { sessionToken: data.sessiontoken } : {}),
    ...(accountId !== undefined ? { accountId } : {}),
  };

  return identity(credentials, data.expiration ? new Date(data.expiration) : undefined);
}

export interface CredentialProcessOptions {
  /** Account id from the profile, used when the process prints none */
  accountId?: string;

  /** @defaultValue {@link shellCommandRunner} */
  runner?: CommandRunner;
}

/**
 * Resolves credentials by running a command.
 *
 * @example
 * ```typescript
 * const resolver = new CredentialProcessResolver('/usr/local/bin/fetch-creds --profile dev');
 * ```
 */
export class CredentialProcessResolver implements IIdentityResolver<Credentials> {
  private readonly runner: CommandRunner;

  constructor(
    private readonly command: string,
    private readonly options: CredentialProcessOptions = {},
  ) {
    this.runner = options.runner ?? shellCommandRunner;
  }

  async resolveIdentity(): Promise<Identity<Credentials>> {
    let result: CommandResult;
    try {
      result = await this.runner(this.command);
    } catch (error) {
      throw new IdentityResolutionError(
        `Could not start credential process: ${error instanceof Error ? error.message : String(error)}`,
        AuthSchemeId.SigV4,
        { cause: error },
      );
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new IdentityResolutionError(
        `Credential process exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        AuthSchemeId.SigV4,
      );
    }

    return parseCredentialProcessOutput(result.stdout, this.options.accountId);
  }
}
