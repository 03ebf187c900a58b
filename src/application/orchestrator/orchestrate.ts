/**
 * @wirebound/core - Orchestration Entry Points
 *
 * `orchestrate` throws, `orchestrateWithResult` never does. Both build the
 * runtime for the operation first, so a missing component fails before any
 * network activity.
 */

import { v4 as uuidv4 } from 'uuid';
import { Phase } from '../../domain/orchestration/phase';
import { toSdkError } from '../../domain/exceptions/exceptions';
import type { OperationDefinition } from '../../domain/orchestration/IOperation';
import { RuntimePlugins } from '../plugins/RuntimePlugins';
import type { ResolvedRuntime, RuntimeState } from '../plugins/RuntimePlugins';
import { operationPlugin } from '../plugins/operationPlugin';
import { Orchestrator } from './Orchestrator';
import type { OrchestrationResult } from './Orchestrator';

/**
 * Runtime for one operation: client plugins, then the operation's own
 * layer, then per-call operation plugins.
 *
 * @throws {ConfigurationError} When a mandatory component is missing
 */
export function resolveOperationRuntime<I, O, E>(
  operation: OperationDefinition<I, O, E>,
  plugins: RuntimePlugins = RuntimePlugins.create(),
  base?: RuntimeState,
): ResolvedRuntime {
  return plugins.forOperation(operationPlugin(operation)).build(base);
}

/**
 * Run an operation with the given plugins.
 *
 * @throws {SdkError}
 *
 * @example
 * ```typescript
 * const plugins = RuntimePlugins.create()
 *   .withClientPlugin(defaultPlugin())
 *   .withClientPlugin(new StaticRuntimePlugin('transport').withComponents({ transport }));
 *
 * const item = await orchestrate(plugins, GetItem, { id: '42' });
 * ```
 */
export async function orchestrate<I, O, E>(
  plugins: RuntimePlugins,
  operation: OperationDefinition<I, O, E>,
  input: I,
): Promise<O> {
  return new Orchestrator(resolveOperationRuntime(operation, plugins)).invoke(operation, input);
}

/**
 * Run an operation with the given plugins. Never rejects.
 */
export async function orchestrateWithResult<I, O, E>(
  plugins: RuntimePlugins,
  operation: OperationDefinition<I, O, E>,
  input: I,
): Promise<OrchestrationResult<O>> {
  let runtime: ResolvedRuntime;
  try {
    runtime = resolveOperationRuntime(operation, plugins);
  } catch (error) {
    return {
      isSuccess: false,
      error: toSdkError(error, Phase.Init),
      attempts: 0,
      duration: 0,
      invocationId: uuidv4(),
    };
  }
  return new Orchestrator(runtime).invokeWithResult(operation, input);
}
