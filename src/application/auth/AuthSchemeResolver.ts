/**
 * @fileoverview AuthSchemeResolver - Scheme Ordering and Selection
 *
 * @packageDocumentation
 * @module @wirebound/core/application/auth
 *
 * ```
 * candidates (operation)   [sigv4, httpBearerAuth]
 * supported  (client)      [sigv4, httpBearerAuth, noAuth]
 * preference (config)      [scheme1, httpBearerAuth]
 *                                 ↓ resolveAuthSchemeOrder
 * ordered                  [httpBearerAuth, sigv4]
 *                                 ↓ select: first whose identity resolves
 * selected                 httpBearerAuth + token identity
 * ```
 */

import {
  AuthSchemeResolutionError,
  IdentityResolutionError,
} from '../../domain/exceptions/exceptions';
import type { AuthSchemeAttempt } from '../../domain/exceptions/exceptions';
import { ConfigLayer } from '../../domain/config/ConfigBag';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import { AuthSchemePreferenceKey } from '../../domain/config/keys';
import type { AuthSchemeOption, IAuthScheme } from '../../domain/auth/IAuthScheme';
import type { Identity } from '../../domain/auth/IIdentity';
import type { ResolvedComponents } from '../components/RuntimeComponents';

/**
 * Order candidate scheme ids.
 *
 * Eligible ids are the candidates that are also supported, in candidate
 * order. Preferred eligible ids then move to the front, in preference
 * order. Preferred ids that are not eligible are ignored.
 *
 * @example
 * ```typescript
 * resolveAuthSchemeOrder(['sigv4', 'httpBearerAuth'], ['scheme1', 'httpBearerAuth'], ['sigv4', 'httpBearerAuth']);
 * // ['httpBearerAuth', 'sigv4']
 * ```
 */
export function resolveAuthSchemeOrder(
  candidates: readonly string[],
  preference: readonly string[] | undefined,
  supported: readonly string[],
): string[] {
  const supportedIds = new Set(supported);
  const eligible = [...new Set(candidates)].filter((id) => supportedIds.has(id));

  if (!preference || preference.length === 0) {
    return eligible;
  }

  const preferred = [...new Set(preference)].filter((id) => eligible.includes(id));
  const rest = eligible.filter((id) => !preferred.includes(id));
  return [...preferred, ...rest];
}

/**
 * Scheme chosen for an attempt.
 */
export interface SelectedAuthScheme {
  option: AuthSchemeOption;
  scheme: IAuthScheme;
  identity: Identity;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds ordered options and selects the first usable one.
 */
export class AuthSchemeResolver {
  constructor(
    private readonly components: ResolvedComponents,
    private readonly config: ConfigBag,
  ) {}

  /**
   * Ordered options for an operation's candidate scheme ids.
   *
   * @throws {AuthSchemeResolutionError} When no candidate is supported
   */
  resolveOptions(candidates: readonly string[]): AuthSchemeOption[] {
    const supported = this.components.authSchemes.map((scheme) => scheme.schemeId);
    const ordered = resolveAuthSchemeOrder(
      candidates,
      this.config.load(AuthSchemePreferenceKey),
      supported,
    );

    if (ordered.length === 0) {
      throw new AuthSchemeResolutionError(
        `None of the operation's auth schemes (${candidates.join(', ')}) is supported by this client`,
        candidates,
      );
    }

    return ordered.map((schemeId) => {
      const scheme = this.components.authScheme(schemeId);
      return {
        schemeId,
        properties: scheme?.optionProperties?.(this.config) ?? ConfigLayer.empty(`${schemeId}-option`),
      };
    });
  }

  /**
   * Try options in order; the first whose identity resolves wins.
   *
   * @throws {AuthSchemeResolutionError} Carrying every per-option failure
   */
  async select(options: readonly AuthSchemeOption[]): Promise<SelectedAuthScheme> {
    const attempts: AuthSchemeAttempt[] = [];

    for (const option of options) {
      const scheme = this.components.authScheme(option.schemeId);
      const resolver = scheme?.identityResolver(this.components);
      if (!scheme || !resolver) {
        attempts.push({
          schemeId: option.schemeId,
          reason: new IdentityResolutionError(
            `No identity resolver is registered for ${option.schemeId}`,
            option.schemeId,
          ),
        });
        continue;
      }

      try {
        const identity = await this.components.identityCache.resolveIdentity(resolver, this.config);
        return { option, scheme, identity };
      } catch (error) {
        const reason =
          error instanceof IdentityResolutionError
            ? error
            : new IdentityResolutionError(
                `Identity resolution for ${option.schemeId} failed: ${describe(error)}`,
                option.schemeId,
                { cause: error },
              );
        this.components.logger.debug(`Skipping auth scheme ${option.schemeId}: ${reason.message}`);
        attempts.push({ schemeId: option.schemeId, reason });
      }
    }

    const tried = options.map((option) => option.schemeId);
    throw new AuthSchemeResolutionError(
      `No auth scheme could resolve an identity (tried: ${tried.join(', ')})`,
      tried,
      attempts,
    );
  }
}
