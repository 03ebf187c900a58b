/**
 * @wirebound/core - Orchestration Phases
 *
 * The orchestrator is a linear state machine. `Init` and `BuildInput` run once
 * per orchestration; every attempt runs `ResolveEndpoint` through
 * `Deserialize`; `Done` and `Err` are terminal.
 */

export enum Phase {
  Init = 'Init',
  BuildInput = 'BuildInput',
  ResolveEndpoint = 'ResolveEndpoint',
  ResolveAuthScheme = 'ResolveAuthScheme',
  ResolveIdentity = 'ResolveIdentity',
  Sign = 'Sign',
  Serialize = 'Serialize',
  Dispatch = 'Dispatch',
  ParseResponse = 'ParseResponse',
  Deserialize = 'Deserialize',
  Done = 'Done',
  Err = 'Err',
}

/**
 * Phases executed for every attempt, in order.
 */
export const ATTEMPT_PHASES: readonly Phase[] = Object.freeze([
  Phase.ResolveEndpoint,
  Phase.ResolveAuthScheme,
  Phase.ResolveIdentity,
  Phase.Sign,
  Phase.Serialize,
  Phase.Dispatch,
  Phase.ParseResponse,
  Phase.Deserialize,
]);

/**
 * Where a phase sits relative to the network exchange.
 */
export type PhaseStage = 'beforeTransmit' | 'transmit' | 'afterTransmit' | 'terminal';

export function phaseStage(phase: Phase): PhaseStage {
  switch (phase) {
    case Phase.Init:
    case Phase.BuildInput:
    case Phase.ResolveEndpoint:
    case Phase.ResolveAuthScheme:
    case Phase.ResolveIdentity:
    case Phase.Sign:
    case Phase.Serialize:
      return 'beforeTransmit';
    case Phase.Dispatch:
      return 'transmit';
    case Phase.ParseResponse:
    case Phase.Deserialize:
      return 'afterTransmit';
    case Phase.Done:
    case Phase.Err:
      return 'terminal';
  }
}

/**
 * Phases during which the outgoing request is visible to interceptors.
 */
export function exposesRequest(phase: Phase): boolean {
  const stage = phaseStage(phase);
  return stage === 'beforeTransmit' || stage === 'transmit';
}

/**
 * Phases during which the raw response is visible to interceptors.
 */
export function exposesResponse(phase: Phase): boolean {
  return phase === Phase.ParseResponse || phase === Phase.Deserialize;
}
