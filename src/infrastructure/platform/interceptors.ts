/**
 * @wirebound/core - Built-in Interceptors
 *
 * Interceptors registered by the default plugin: invocation id and attempt
 * headers, and per-attempt request/response logging.
 */

import { Phase } from '../../domain/orchestration/phase';
import { RetryConfigKey } from '../../domain/config/keys';
import type {
  IInterceptor,
  InterceptorRuntime,
} from '../../application/orchestrator/IInterceptor';
import type { InterceptorContext } from '../../application/orchestrator/InterceptorContext';
import { bodyText } from './types';

export const INVOCATION_ID_HEADER = 'sdk-invocation-id';
export const REQUEST_ATTEMPT_HEADER = 'sdk-request';
export const REDACTED = '** REDACTED **';

/**
 * Abstract base class for interceptors with common utilities
 */
export abstract class InterceptorBase implements IInterceptor {
  abstract readonly name: string;

  /**
   * Add a header to the outgoing request. No-op outside request phases.
   */
  protected setHeader(ctx: InterceptorContext, name: string, value: string): void {
    const request = ctx.request();
    if (request) {
      ctx.setRequest({ ...request, headers: { ...request.headers, [name.toLowerCase()]: value } });
    }
  }
}

// ==================== Built-in Interceptors ====================

/**
 * Adds `sdk-invocation-id`. The id is the same for every attempt.
 */
export class InvocationIdInterceptor extends InterceptorBase {
  readonly name = 'InvocationId';

  beforePhase(phase: Phase, ctx: InterceptorContext): void {
    if (phase === Phase.Serialize) {
      this.setHeader(ctx, INVOCATION_ID_HEADER, ctx.invocationId);
    }
  }
}

/**
 * Adds `sdk-request: attempt=N; max=M`.
 */
export class RequestAttemptsInterceptor extends InterceptorBase {
  readonly name = 'RequestAttempts';

  beforePhase(phase: Phase, ctx: InterceptorContext, runtime: InterceptorRuntime): void {
    if (phase === Phase.Serialize) {
      const max = runtime.config.load(RetryConfigKey)?.maxAttempts ?? 1;
      this.setHeader(ctx, REQUEST_ATTEMPT_HEADER, `attempt=${ctx.attempt}; max=${max}`);
    }
  }
}

/**
 * Logging interceptor options.
 */
export interface LoggingInterceptorOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  logDuration?: boolean;

  /** Log response bodies; redacted for operations with sensitive output */
  logBody?: boolean;
}

const DISPATCH_STARTED = 'logging.dispatchStarted';

/**
 * Logs each attempt's request and response at debug level.
 */
export class LoggingInterceptor extends InterceptorBase {
  readonly name = 'Logging';
  private readonly options: Required<LoggingInterceptorOptions>;

  constructor(options: LoggingInterceptorOptions = {}) {
    super();
    this.options = {
      logRequest: true,
      logResponse: true,
      logDuration: true,
      logBody: false,
      ...options,
    };
  }

  beforePhase(phase: Phase, ctx: InterceptorContext, { logger }: InterceptorRuntime): void {
    if (phase === Phase.Dispatch) {
      ctx.items.set(DISPATCH_STARTED, Date.now());
      const request = ctx.request();
      if (this.options.logRequest && request) {
        logger.debug(`→ ${request.method} ${request.uri} (attempt ${ctx.attempt})`);
      }
      return;
    }

    if (phase === Phase.ParseResponse && this.options.logResponse) {
      const response = ctx.response();
      if (!response) {
        return;
      }
      const started = ctx.items.get(DISPATCH_STARTED);
      const duration =
        this.options.logDuration && typeof started === 'number' ? ` (${Date.now() - started}ms)` : '';
      logger.debug(`← ${response.status}${duration}`);

      if (this.options.logBody) {
        const body = ctx.invocation.sensitiveOutput ? REDACTED : bodyText(response.body);
        logger.debug(`  body: ${body}`);
      }
    }
  }
}
