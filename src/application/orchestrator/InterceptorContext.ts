/**
 * @wirebound/core - Interceptor Context
 *
 * Phase-tagged view of one attempt. What an interceptor may read or replace
 * depends on the phase it is called for:
 *
 * | Phase                              | request | response | output / error |
 * |------------------------------------|---------|----------|----------------|
 * | Init                               |         |          |                |
 * | BuildInput … Serialize, Dispatch   |   rw    |          |                |
 * | ParseResponse                      |         |    rw    |                |
 * | Deserialize                        |         |    r     |       r        |
 * | Done / Err                         |         |          |       r        |
 */

import { Phase, exposesRequest, exposesResponse } from '../../domain/orchestration/phase';
import type { SdkError } from '../../domain/exceptions/exceptions';
import type { AuthSchemeOption } from '../../domain/auth/IAuthScheme';
import type { Identity } from '../../domain/auth/IIdentity';
import type { Endpoint } from '../ports/endpoint';
import type { HttpRequest, HttpResponse } from '../../infrastructure/platform/types';

/**
 * Values fixed for the whole orchestration.
 */
export interface InvocationInfo<I> {
  readonly invocationId: string;
  readonly serviceName: string;
  readonly operationName: string;
  readonly input: I;
  readonly sensitiveOutput: boolean;
}

function exposesResult(phase: Phase): boolean {
  return phase === Phase.Deserialize || phase === Phase.Done || phase === Phase.Err;
}

/**
 * Handle passed to interceptor hooks.
 *
 * @template I - Operation input
 * @template O - Operation output
 */
export class InterceptorContext<I = unknown, O = unknown> {
  /** Free-form values shared by interceptors within this attempt */
  readonly items: Map<string, unknown> = new Map();

  private currentPhase: Phase = Phase.Init;
  private currentRequest: HttpRequest | undefined;
  private currentResponse: HttpResponse | undefined;
  private currentOutput: O | undefined;
  private currentError: SdkError | undefined;

  /** @internal */
  endpoint: Endpoint | undefined;
  /** @internal */
  authSchemeOption: AuthSchemeOption | undefined;
  /** @internal */
  identity: Identity | undefined;

  constructor(
    readonly invocation: InvocationInfo<I>,
    /** Attempt number (1-indexed), 0 outside attempts */
    readonly attempt: number = 0,
  ) {}

  /**
   * Fresh context for the next attempt, starting from a request template.
   *
   * @internal
   */
  forAttempt(attempt: number, request: HttpRequest): InterceptorContext<I, O> {
    const next = new InterceptorContext<I, O>(this.invocation, attempt);
    next.currentRequest = request;
    return next;
  }

  get phase(): Phase {
    return this.currentPhase;
  }

  get input(): I {
    return this.invocation.input;
  }

  get invocationId(): string {
    return this.invocation.invocationId;
  }

  get operationName(): string {
    return this.invocation.operationName;
  }

  /**
   * Outgoing request, while request phases run.
   */
  request(): HttpRequest | undefined {
    return exposesRequest(this.currentPhase) ? this.currentRequest : undefined;
  }

  /**
   * @throws {Error} Outside request phases
   */
  setRequest(request: HttpRequest): void {
    if (!exposesRequest(this.currentPhase)) {
      throw new Error(`The request cannot be replaced during ${this.currentPhase}`);
    }
    this.currentRequest = request;
  }

  /**
   * Raw response, while response phases run.
   */
  response(): HttpResponse | undefined {
    return exposesResponse(this.currentPhase) ? this.currentResponse : undefined;
  }

  /**
   * @throws {Error} Outside `ParseResponse`
   */
  setResponse(response: HttpResponse): void {
    if (this.currentPhase !== Phase.ParseResponse) {
      throw new Error(`The response cannot be replaced during ${this.currentPhase}`);
    }
    this.currentResponse = response;
  }

  /**
   * Deserialized output, once available.
   */
  output(): O | undefined {
    return exposesResult(this.currentPhase) ? this.currentOutput : undefined;
  }

  /**
   * Failure of the attempt or orchestration, once available.
   */
  error(): SdkError | undefined {
    return exposesResult(this.currentPhase) ? this.currentError : undefined;
  }

  // ==================== Orchestrator access ====================

  /** @internal */
  enterPhase(phase: Phase): void {
    this.currentPhase = phase;
  }

  /** @internal */
  attach(values: {
    request?: HttpRequest;
    response?: HttpResponse;
    output?: O;
    error?: SdkError;
  }): void {
    if (values.request !== undefined) this.currentRequest = values.request;
    if (values.response !== undefined) this.currentResponse = values.response;
    if (values.output !== undefined) this.currentOutput = values.output;
    if (values.error !== undefined) this.currentError = values.error;
  }

  /**
   * Request regardless of phase.
   *
   * @internal
   */
  rawRequest(): HttpRequest | undefined {
    return this.currentRequest;
  }

  /**
   * Response regardless of phase.
   *
   * @internal
   */
  rawResponse(): HttpResponse | undefined {
    return this.currentResponse;
  }
}
