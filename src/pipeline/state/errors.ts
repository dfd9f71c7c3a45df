import { PipelineError } from '../../errors/types.js';
import type { StageState } from './states.js';

export class IllegalStateTransitionError extends PipelineError {
  constructor(
    public readonly from: StageState,
    public readonly to: StageState,
    public readonly reason: string
  ) {
    super(`Illegal state transition: ${from} → ${to}: ${reason}`, { from, to, reason });
    this.name = 'IllegalStateTransitionError';
  }
}

export class TerminalStateViolationError extends PipelineError {
  constructor(
    public readonly state: StageState,
    public readonly attemptedTransition: StageState
  ) {
    super(`Cannot transition from terminal state ${state} to ${attemptedTransition}`, {
      state,
      attemptedTransition,
    });
    this.name = 'TerminalStateViolationError';
  }
}

export class StateSkipError extends PipelineError {
  constructor(
    public readonly expectedStates: StageState[],
    public readonly actualState: StageState
  ) {
    super(`State skipped. Expected one of: ${expectedStates.join(', ')}, but in state: ${actualState}`, {
      expectedStates,
      actualState,
    });
    this.name = 'StateSkipError';
  }
}
