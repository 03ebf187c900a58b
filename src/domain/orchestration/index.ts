/**
 * @wirebound/core - Orchestration Module
 *
 * Phase definitions and the operation contract shared by the orchestrator,
 * interceptors and errors
 */

export {
  Phase,
  ATTEMPT_PHASES,
  phaseStage,
  exposesRequest,
  exposesResponse,
} from './phase';
export type { PhaseStage } from './phase';

export type { OperationDefinition, DeserializeResult } from './IOperation';
