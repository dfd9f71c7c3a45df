import { canTransition, getStateMetadata, isTerminalState } from './states.js';
import type { StageState } from './states.js';
import type { StageName } from '../../contracts/agent-graph.js';

/** One recorded move of a stage's state machine. */
export interface StateTransition {
  stage: StageName;
  from: StageState;
  to: StageState;
  at: string;
  reason?: string;
}

export type TransitionCheck = { allowed: true } | { allowed: false; reason: string };

export function validateTransition(from: StageState, to: StageState): TransitionCheck {
  if (isTerminalState(from)) {
    return { allowed: false, reason: `Cannot transition from terminal state ${from}` };
  }

  if (from === to) {
    return { allowed: false, reason: `Already in ${from}` };
  }

  if (!canTransition(from, to)) {
    const next = getStateMetadata(from).canTransitionTo.join(' or ');
    return { allowed: false, reason: `Invalid transition from ${from} to ${to} (expected ${next})` };
  }

  return { allowed: true };
}

export function recordTransition(stage: StageName, from: StageState, to: StageState, reason?: string): StateTransition {
  return { stage, from, to, at: new Date().toISOString(), reason };
}

/** RECEIVED→TOOLS_RUN */
export function describeTransition({ from, to }: Pick<StateTransition, 'from' | 'to'>): string {
  return `${from}→${to}`;
}
