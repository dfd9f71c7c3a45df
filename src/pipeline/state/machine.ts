import { getStateMetadata, isTerminalState } from './states.js';
import type { StageState } from './states.js';
import { describeTransition, recordTransition, validateTransition } from './transitions.js';
import type { StateTransition } from './transitions.js';
import { IllegalStateTransitionError, StateSkipError, TerminalStateViolationError } from './errors.js';
import type { StageName } from '../../contracts/agent-graph.js';
import { logger } from '../../observability/logger.js';

/** Tracks one stage's progress on one story. */
export class StageStateMachine {
  private currentState: StageState;
  private transitions: StateTransition[] = [];

  constructor(
    private readonly stage: StageName,
    private readonly storyId: string,
    initialState: StageState = 'RECEIVED'
  ) {
    this.currentState = initialState;
  }

  getCurrentState(): StageState {
    return this.currentState;
  }

  getTransitionHistory(): StateTransition[] {
    return [...this.transitions];
  }

  canTransitionTo(targetState: StageState): boolean {
    return validateTransition(this.currentState, targetState).allowed;
  }

  transition(targetState: StageState, reason?: string): void {
    const result = validateTransition(this.currentState, targetState);

    if (!result.allowed) {
      const error = isTerminalState(this.currentState)
        ? new TerminalStateViolationError(this.currentState, targetState)
        : new IllegalStateTransitionError(this.currentState, targetState, result.reason);

      logger.error('illegal_state_transition', 'Illegal state transition attempted', {
        stage: this.stage,
        storyId: this.storyId,
        from: this.currentState,
        to: targetState,
        reason: result.reason,
        transitionHistory: this.getStateHistorySummary(),
      });

      throw error;
    }

    this.transitions.push(recordTransition(this.stage, this.currentState, targetState, reason));

    const previousState = this.currentState;
    this.currentState = targetState;

    logger.info('state_transition', 'Stage state changed', {
      stage: this.stage,
      storyId: this.storyId,
      from: previousState,
      to: targetState,
      reason,
      isTerminal: isTerminalState(targetState),
    });
  }

  /** Moves to FAILED unless already terminal; never throws. */
  fail(reason: string): boolean {
    if (this.isTerminal()) {
      logger.warn('state_transition_failed', 'Stage already terminal, failure not recorded as a transition', {
        stage: this.stage,
        storyId: this.storyId,
        state: this.currentState,
        reason,
      });
      return false;
    }

    this.transition('FAILED', reason);
    return true;
  }

  requireState(expectedStates: StageState[]): void {
    if (!expectedStates.includes(this.currentState)) {
      const metadata = getStateMetadata(this.currentState);
      logger.error('state_requirement_violation', 'Stage not in required state', {
        stage: this.stage,
        storyId: this.storyId,
        currentState: this.currentState,
        expectedStates,
        currentStateDescription: metadata.description,
      });
      throw new StateSkipError(expectedStates, this.currentState);
    }
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  getFinalState(): StageState | null {
    return this.isTerminal() ? this.currentState : null;
  }

  getStateHistorySummary(): string[] {
    return this.transitions.map(describeTransition);
  }
}
