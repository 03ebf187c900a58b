/**
 * @fileoverview Orchestrator - Request Lifecycle State Machine
 *
 * @packageDocumentation
 * @module @wirebound/core/application/orchestrator
 *
 * ```
 * Init → BuildInput ──► attempt 1..N ──────────────────────────────────────► Done
 *                         ResolveEndpoint → ResolveAuthScheme →               │
 *                         ResolveIdentity → Sign → Serialize →                │
 *                         Dispatch → ParseResponse → Deserialize              │
 *                              │ failure                                      │
 *                              ▼                                              │
 *                         classify → decide ── retry: backoff, next attempt   │
 *                                          └── stop ──────────────────────► Err
 * ```
 *
 * Every phase runs inside the composed interceptor chain. The attempt
 * deadline aborts one attempt; the operation deadline aborts the current
 * attempt, any backoff, and stops retries.
 */

import { v4 as uuidv4 } from 'uuid';
import { Phase } from '../../domain/orchestration/phase';
import type { DeserializeResult, OperationDefinition } from '../../domain/orchestration/IOperation';
import {
  ConfigurationError,
  ConstructionFailure,
  DispatchFailure,
  ResponseError,
  SdkError,
  ServiceError,
  SigningError,
  ThrottlingError,
  TimeoutError,
  extractErrorMetadata,
  toSdkError,
} from '../../domain/exceptions/exceptions';
import { EndpointUrlKey, RegionKey, RetryConfigKey, TimeoutConfigKey } from '../../domain/config/keys';
import { RetryConfig, TimeoutConfig } from '../../domain/config/policies';
import type { ConfigBag } from '../../domain/config/ConfigBag';
import { InvocationContext } from '../../domain/context/InvocationContext';
import type { AuthSchemeOption } from '../../domain/auth/IAuthScheme';
import {
  HttpStatus,
  bodyBytes,
  cloneRequest,
  isStreamingBody,
} from '../../infrastructure/platform/types';
import type { HttpRequest, HttpResponse } from '../../infrastructure/platform/types';
import { createPipeline } from '../../infrastructure/pipeline/builder';
import type { ComposedChain } from '../../infrastructure/pipeline/builder';
import { applyEndpoint } from '../../infrastructure/endpoint/StaticEndpointResolver';
import { classifyRetry } from '../../infrastructure/resilience/IRetryStrategy';
import { THROTTLING_ERROR_CODES, parseRetryAfter } from '../../infrastructure/resilience/classifiers';
import type { IAsyncSleep } from '../ports/runtime';
import type { ILogger } from '../client/logger';
import type { ResolvedRuntime } from '../plugins/RuntimePlugins';
import { AuthSchemeResolver } from '../auth/AuthSchemeResolver';
import type { SelectedAuthScheme } from '../auth/AuthSchemeResolver';
import { InterceptorContext } from './InterceptorContext';
import type { InvocationInfo } from './InterceptorContext';
import type { InterceptorRuntime } from './IInterceptor';

// ==================== Result ====================

interface OrchestrationMeta {
  /** Number of attempts started */
  attempts: number;

  /** Wall time of the whole orchestration in milliseconds */
  duration: number;

  invocationId: string;
}

/**
 * Outcome of {@link Orchestrator.invokeWithResult}.
 *
 * @template O - Operation output
 */
export type OrchestrationResult<O> =
  | ({ isSuccess: true; value: O } & OrchestrationMeta)
  | ({ isSuccess: false; error: SdkError } & OrchestrationMeta);

// ==================== Helpers ====================

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function abortError(signal: AbortSignal): SdkError {
  if (signal.reason instanceof SdkError) {
    return signal.reason;
  }
  return new DispatchFailure('Request was cancelled', 'user', { cause: signal.reason });
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts. A failure of
 * `work` arriving after the abort is logged.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal, logger: ILogger): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          logger.debug(`Ignoring failure after cancellation: ${describe(error)}`);
        }
        reject(error);
      },
    );
  });
}

/**
 * Abort `controller` with `reason()` after `ms`. Returns a cancel function.
 */
function armTimer(
  sleep: IAsyncSleep,
  ms: number,
  controller: AbortController,
  reason: () => SdkError,
  logger: ILogger,
): () => void {
  const cancel = new AbortController();
  void sleep.sleep(ms, cancel.signal).then(
    () => controller.abort(reason()),
    (error: unknown) => {
      if (!cancel.signal.aborted) {
        logger.warn(`Timer failed: ${describe(error)}`);
      }
    },
  );
  return () => cancel.abort();
}

function modeledError<E>(
  result: Extract<DeserializeResult<unknown, E>, { ok: false }>,
  response: HttpResponse,
): ResponseError {
  const metadata = extractErrorMetadata(result.error);
  const code = result.code ?? metadata.code;
  const options = { phase: Phase.Deserialize, rawResponse: response, code };

  if (response.status === HttpStatus.TOO_MANY_REQUESTS || (code !== undefined && THROTTLING_ERROR_CODES.has(code))) {
    return new ThrottlingError(metadata.message ?? `Request was throttled (${code ?? response.status})`, {
      ...options,
      retryAfterMs: parseRetryAfter(response.headers['retry-after']),
      serviceError: result.error,
    });
  }
  return new ServiceError<E>(result.error, options);
}

/**
 * Mutable state of one orchestration, shared between the attempt loop and
 * the terminal phases.
 */
interface RunState<I, O> {
  context: InterceptorContext<I, O>;
  attempts: number;
  deadline: number | undefined;
}

/**
 * Per-attempt values the phases hand to each other.
 */
interface AttemptState<O> {
  options: AuthSchemeOption[];
  selected?: SelectedAuthScheme;
  result?: { output: O };
}

// ==================== Orchestrator ====================

/**
 * Runs operations against one resolved runtime.
 *
 * @example
 * ```typescript
 * const runtime = RuntimePlugins.create().withClientPlugin(defaultPlugin()).build();
 * const orchestrator = new Orchestrator(runtime);
 * const item = await orchestrator.invoke(GetItem, { id: '42' });
 * ```
 */
export class Orchestrator {
  private readonly chain: ComposedChain;
  private readonly runtime: InterceptorRuntime;
  private readonly retryConfig: RetryConfig;
  private readonly timeoutConfig: TimeoutConfig;

  constructor(private readonly state: ResolvedRuntime) {
    this.chain = createPipeline().useMany(state.resolved.interceptors).compose();
    this.runtime = { config: state.config, logger: state.resolved.logger };
    this.retryConfig = state.config.load(RetryConfigKey) ?? RetryConfig.disabled();
    this.timeoutConfig = state.config.load(TimeoutConfigKey) ?? TimeoutConfig.none();
  }

  /**
   * Run an operation.
   *
   * @throws {SdkError} The failure of the last attempt, or a timeout
   */
  async invoke<I, O, E>(operation: OperationDefinition<I, O, E>, input: I): Promise<O> {
    const result = await this.invokeWithResult(operation, input);
    if (result.isSuccess) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Run an operation. Never rejects.
   */
  invokeWithResult<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    input: I,
  ): Promise<OrchestrationResult<O>> {
    const invocationId = uuidv4();
    return InvocationContext.run(
      { invocationId, serviceName: operation.serviceName, operationName: operation.name },
      () => this.run(operation, input, invocationId),
    );
  }

  private get logger(): ILogger {
    return this.state.resolved.logger;
  }

  private requireSleep(): IAsyncSleep {
    const { sleep } = this.state.resolved;
    if (!sleep) {
      throw new ConfigurationError('An async sleep implementation is required for retries and timeouts', [
        'sleep',
      ]);
    }
    return sleep;
  }

  private async run<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    input: I,
    invocationId: string,
  ): Promise<OrchestrationResult<O>> {
    const started = Date.now();
    const invocation: InvocationInfo<I> = {
      invocationId,
      serviceName: operation.serviceName,
      operationName: operation.name,
      input,
      sensitiveOutput: operation.sensitiveOutput ?? false,
    };
    const { operationTimeoutMs } = this.timeoutConfig;
    const run: RunState<I, O> = {
      context: new InterceptorContext<I, O>(invocation),
      attempts: 0,
      deadline: operationTimeoutMs === undefined ? undefined : started + operationTimeoutMs,
    };
    const meta = (): OrchestrationMeta => ({
      attempts: run.attempts,
      duration: Date.now() - started,
      invocationId,
    });

    const operationController = new AbortController();
    let cancelTimer: (() => void) | undefined;

    try {
      if (operationTimeoutMs !== undefined) {
        cancelTimer = armTimer(
          this.requireSleep(),
          operationTimeoutMs,
          operationController,
          () => new TimeoutError('operation', operationTimeoutMs),
          this.logger,
        );
      }

      const output = await raceAbort(
        this.execute(operation, run, operationController.signal),
        operationController.signal,
        this.logger,
      );
      await this.runPhase(Phase.Done, run.context, () => undefined);
      return { isSuccess: true, value: output, ...meta() };
    } catch (error) {
      const failure = toSdkError(error, run.context.phase, run.context.rawResponse());
      await this.runErr(run.context, failure);
      return { isSuccess: false, error: failure, ...meta() };
    } finally {
      cancelTimer?.();
    }
  }

  /**
   * Run one phase through the interceptor chain. With a `signal`, an
   * aborted attempt stops at the next phase boundary and before the phase
   * body, so an abandoned attempt never reaches the transport.
   */
  private async runPhase<I, O>(
    phase: Phase,
    context: InterceptorContext<I, O>,
    body: () => void | Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    if (signal?.aborted) {
      throw abortError(signal);
    }
    context.enterPhase(phase);
    const guarded = signal
      ? async (): Promise<void> => {
          if (signal.aborted) {
            throw abortError(signal);
          }
          await body();
        }
      : body;
    try {
      await this.chain(phase, context, this.runtime, guarded);
    } catch (error) {
      throw toSdkError(error, phase, context.rawResponse());
    }
  }

  private async runErr<I, O>(context: InterceptorContext<I, O>, failure: SdkError): Promise<void> {
    context.attach({ error: failure });
    context.enterPhase(Phase.Err);
    try {
      await this.chain(Phase.Err, context, this.runtime, () => undefined);
    } catch (error) {
      this.logger.error(`Interceptor failed during ${Phase.Err}: ${describe(error)}`);
    }
  }

  /**
   * Init, BuildInput and the attempt loop.
   */
  private async execute<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    run: RunState<I, O>,
    operationSignal: AbortSignal,
  ): Promise<O> {
    const root = run.context;
    await this.runPhase(Phase.Init, root, () => undefined);
    await this.runPhase(Phase.BuildInput, root, () => {
      root.attach({ request: operation.serialize(root.input) });
    });

    const template = root.rawRequest();
    if (!template) {
      throw new ConstructionFailure(`Operation ${operation.name} produced no request`, {
        phase: Phase.BuildInput,
      });
    }
    const replayable = !isStreamingBody(template.body);
    const { retryStrategy, retryClassifiers } = this.state.resolved;
    let retryCost = 0;

    for (let attempt = 1; ; attempt++) {
      if (operationSignal.aborted) {
        throw abortError(operationSignal);
      }
      const context = root.forAttempt(attempt, cloneRequest(template));
      run.context = context;
      run.attempts = attempt;
      InvocationContext.current()?.set('attempt', attempt);

      try {
        const output = await this.attempt(operation, context, operationSignal);
        retryStrategy.recordSuccess?.(retryCost);
        return output;
      } catch (error) {
        const failure = toSdkError(error, context.phase, context.rawResponse());
        context.attach({ error: failure });
        if (operationSignal.aborted) {
          throw failure;
        }

        const decision = replayable
          ? retryStrategy.decide(
              attempt,
              { error: failure, classification: classifyRetry(failure, retryClassifiers) },
              this.retryConfig,
            )
          : { retry: false as const, reason: 'Streaming request body cannot be replayed' };

        if (!decision.retry) {
          this.logger.debug(`Attempt ${attempt} of ${operation.name} failed, not retrying: ${decision.reason}`);
          throw failure;
        }

        const { operationTimeoutMs } = this.timeoutConfig;
        if (
          run.deadline !== undefined &&
          operationTimeoutMs !== undefined &&
          Date.now() + decision.delayMs >= run.deadline
        ) {
          retryStrategy.releaseRetry?.(decision.retryCost);
          throw new TimeoutError('operation', operationTimeoutMs, { cause: failure });
        }

        this.logger.debug(
          `Attempt ${attempt} of ${operation.name} failed (${failure.message}), retrying in ${decision.delayMs}ms`,
        );
        try {
          await this.requireSleep().sleep(decision.delayMs, operationSignal);
        } catch (error) {
          retryStrategy.releaseRetry?.(decision.retryCost);
          throw error;
        }
        retryCost = decision.retryCost;
      }
    }
  }

  /**
   * One attempt, bounded by the attempt timeout and the operation signal.
   */
  private async attempt<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    context: InterceptorContext<I, O>,
    operationSignal: AbortSignal,
  ): Promise<O> {
    const controller = new AbortController();
    const forward = (): void => controller.abort(operationSignal.reason);
    if (operationSignal.aborted) {
      forward();
    } else {
      operationSignal.addEventListener('abort', forward, { once: true });
    }

    const { attemptTimeoutMs } = this.timeoutConfig;
    const cancelTimer =
      attemptTimeoutMs === undefined
        ? undefined
        : armTimer(
            this.requireSleep(),
            attemptTimeoutMs,
            controller,
            () => new TimeoutError('attempt', attemptTimeoutMs, { phase: context.phase }),
            this.logger,
          );

    try {
      return await raceAbort(
        this.attemptPhases(operation, context, controller.signal),
        controller.signal,
        this.logger,
      );
    } finally {
      cancelTimer?.();
      operationSignal.removeEventListener('abort', forward);
    }
  }

  private async attemptPhases<I, O, E>(
    operation: OperationDefinition<I, O, E>,
    context: InterceptorContext<I, O>,
    signal: AbortSignal,
  ): Promise<O> {
    const { resolved, config } = this.state;
    const auth = new AuthSchemeResolver(resolved, config);
    const state: AttemptState<O> = { options: [] };
    const step = (phase: Phase, body: () => void | Promise<void>): Promise<void> =>
      this.runPhase(phase, context, body, signal);

    await step(Phase.ResolveEndpoint, async () => {
      const endpoint = await resolved.endpointResolver.resolveEndpoint({
        serviceName: operation.serviceName,
        operationName: operation.name,
        region: config.load(RegionKey),
        endpointUrl: config.load(EndpointUrlKey),
        config,
      });
      context.endpoint = endpoint;
      context.attach({ request: applyEndpoint(requestOf(context), endpoint) });
    });

    await step(Phase.ResolveAuthScheme, () => {
      state.options = auth.resolveOptions(operation.authSchemes);
    });

    await step(Phase.ResolveIdentity, async () => {
      const selected = await auth.select(state.options);
      state.selected = selected;
      context.authSchemeOption = selected.option;
      context.identity = selected.identity;
    });

    await step(Phase.Sign, () => {
      const { selected } = state;
      if (!selected) {
        throw new SigningError('No auth scheme was selected');
      }
      context.attach({ request: sign(selected, requestOf(context), resolved.timeSource.now(), config) });
    });

    await step(Phase.Serialize, () => {
      context.attach({ request: finalizeRequest(requestOf(context), operation.contentType) });
    });

    await step(Phase.Dispatch, async () => {
      try {
        const response = await resolved.transport.send(requestOf(context), { signal });
        context.attach({ response });
      } catch (error) {
        if (signal.aborted) {
          throw abortError(signal);
        }
        throw error instanceof SdkError
          ? error
          : new DispatchFailure(`Dispatch failed: ${describe(error)}`, 'io', { cause: error });
      }
    });

    await step(Phase.ParseResponse, () => undefined);

    await step(Phase.Deserialize, () => {
      const response = context.rawResponse();
      if (!response) {
        throw new ResponseError('No response was received', { phase: Phase.Deserialize });
      }
      const result = operation.deserialize(response);
      if (!result.ok) {
        throw modeledError(result, response);
      }
      state.result = { output: result.output };
      context.attach({ output: result.output });
    });

    if (!state.result) {
      throw new ResponseError('The response produced no output', { phase: Phase.Deserialize });
    }
    return state.result.output;
  }
}

function requestOf<I, O>(context: InterceptorContext<I, O>): HttpRequest {
  const request = context.rawRequest();
  if (!request) {
    throw new ConstructionFailure('No request is available', { phase: context.phase });
  }
  return request;
}

function sign(
  selected: SelectedAuthScheme,
  request: HttpRequest,
  signingTime: Date,
  config: ConfigBag,
): HttpRequest {
  try {
    return selected.scheme.signer.sign(request, selected.identity, selected.option, { signingTime, config });
  } catch (error) {
    if (error instanceof SdkError) {
      throw error;
    }
    throw new SigningError(`Signing with ${selected.option.schemeId} failed: ${describe(error)}`, {
      cause: error,
    });
  }
}

/**
 * Add `content-type` and `content-length` where the request lacks them.
 */
function finalizeRequest(request: HttpRequest, contentType: string | undefined): HttpRequest {
  const headers = { ...request.headers };
  if (contentType && headers['content-type'] === undefined) {
    headers['content-type'] = contentType;
  }
  const bytes = bodyBytes(request.body);
  if (bytes && headers['content-length'] === undefined) {
    headers['content-length'] = String(bytes.length);
  }
  return { ...request, headers };
}
