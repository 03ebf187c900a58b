/**
 * @wirebound/core - Operation Definition
 *
 * Static metadata and wire functions of one service operation, as emitted
 * by a code generator. The runtime only consumes this interface.
 */

import type { ConfigLayer } from '../config/ConfigBag';
import type { HttpRequest, HttpResponse } from '../../infrastructure/platform/types';

/**
 * Outcome of deserializing a response.
 *
 * @template O - Output type
 * @template E - Modeled error type
 */
export type DeserializeResult<O, E> =
  | { ok: true; output: O }
  | {
      ok: false;
      error: E;

      /** Error code, when the deserializer knows it */
      code?: string;
    };

/**
 * A generated operation.
 *
 * @template I - Input type
 * @template O - Output type
 * @template E - Modeled error type
 *
 * @example
 * ```typescript
 * const GetItem: OperationDefinition<GetItemInput, GetItemOutput, InventoryError> = {
 *   name: 'GetItem',
 *   serviceName: 'Inventory',
 *   authSchemes: ['sigv4', 'httpBearerAuth'],
 *   serialize: (input) => createRequest({
 *     uri: '/items/' + encodeURIComponent(input.id),
 *     method: 'GET',
 *   }),
 *   deserialize: (response) => response.status === 200
 *     ? { ok: true, output: JSON.parse(bodyText(response.body)) }
 *     : { ok: false, error: JSON.parse(bodyText(response.body)) },
 * };
 * ```
 */
export interface OperationDefinition<I, O, E = unknown> {
  readonly name: string;

  readonly serviceName: string;

  /** Candidate auth scheme ids, in the order the service model lists them */
  readonly authSchemes: readonly string[];

  readonly contentType?: string;

  /** Input is sent as an event stream or other one-shot body */
  readonly streamingInput?: boolean;

  /** Payload is signed as `UNSIGNED-PAYLOAD` */
  readonly unsignedPayload?: boolean;

  /** Output must never be logged */
  readonly sensitiveOutput?: boolean;

  /**
   * Operation-level configuration (signing name, signing options).
   * Applied after client configuration and before per-call overrides.
   */
  readonly config?: ConfigLayer;

  /**
   * Build the request template. Runs once per orchestration.
   */
  serialize(input: I): HttpRequest;

  /**
   * Read a response. A modeled error may arrive with any status code.
   */
  deserialize(response: HttpResponse): DeserializeResult<O, E>;
}
