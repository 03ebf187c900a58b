/**
 * @wirebound/core - Operation Plugin
 *
 * Turns an operation's static metadata into the first operation-level
 * configuration layer.
 */

import { ConfigLayer } from '../../domain/config/ConfigBag';
import { PayloadSigningKey } from '../../domain/config/keys';
import { defaultSigningOptions, withPayloadSigning } from '../../domain/auth/IAuthScheme';
import type { PayloadSigning, SigningOptions } from '../../domain/auth/IAuthScheme';
import type { OperationDefinition } from '../../domain/orchestration/IOperation';
import { PluginOrder, StaticRuntimePlugin } from './IRuntimePlugin';
import type { IRuntimePlugin } from './IRuntimePlugin';

type OperationMetadata = Pick<
  OperationDefinition<unknown, unknown>,
  'unsignedPayload' | 'streamingInput'
>;

/**
 * Payload requirement declared by operation metadata. An unsigned payload
 * takes precedence over streaming input.
 */
export function payloadSigningOf(operation: OperationMetadata): PayloadSigning | undefined {
  if (operation.unsignedPayload) {
    return 'unsigned';
  }
  return operation.streamingInput ? 'streaming' : undefined;
}

/**
 * Signing options implied by operation metadata, on top of `base`.
 */
export function operationSigningOptions(
  operation: OperationMetadata,
  base: SigningOptions = defaultSigningOptions(),
): SigningOptions {
  return withPayloadSigning(base, payloadSigningOf(operation));
}

/**
 * Plugin carrying the operation's configuration layer. The payload
 * requirement is recorded on its own key so that signing options set by
 * client plugins still apply.
 */
export function operationPlugin<I, O, E>(operation: OperationDefinition<I, O, E>): IRuntimePlugin {
  const builder = ConfigLayer.builder(`operation:${operation.name}`);

  if (operation.config) {
    builder.putAll(operation.config);
  }
  builder.putIfDefined(PayloadSigningKey, payloadSigningOf(operation));

  return new StaticRuntimePlugin(`operation:${operation.name}`, PluginOrder.Defaults).withConfig(builder.build());
}
