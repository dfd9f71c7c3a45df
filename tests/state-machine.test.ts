import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { STORY_ID } from './fixtures.js';
import { StageStateMachine } from '../src/pipeline/state/machine.js';
import { getTerminalStates } from '../src/pipeline/state/states.js';
import { validateTransition } from '../src/pipeline/state/transitions.js';
import {
  IllegalStateTransitionError,
  StateSkipError,
  TerminalStateViolationError,
} from '../src/pipeline/state/errors.js';

function handedOff(): StageStateMachine {
  const machine = new StageStateMachine('developer', STORY_ID);
  machine.transition('TOOLS_RUN');
  machine.transition('QUALITY_GATES_CHECKED');
  machine.transition('CONTRACT_BUILT');
  machine.transition('HANDED_OFF', '→ test_engineer');
  return machine;
}

describe('StageStateMachine', () => {
  it('starts in RECEIVED', () => {
    const machine = new StageStateMachine('project_manager', STORY_ID);

    assert.equal(machine.getCurrentState(), 'RECEIVED');
    assert.equal(machine.isTerminal(), false);
    assert.equal(machine.getFinalState(), null);
  });

  it('walks the happy path to HANDED_OFF', () => {
    const machine = handedOff();

    assert.equal(machine.getFinalState(), 'HANDED_OFF');
    assert.deepEqual(machine.getStateHistorySummary(), [
      'RECEIVED→TOOLS_RUN',
      'TOOLS_RUN→QUALITY_GATES_CHECKED',
      'QUALITY_GATES_CHECKED→CONTRACT_BUILT',
      'CONTRACT_BUILT→HANDED_OFF',
    ]);
    assert.equal(machine.getTransitionHistory()[3]?.reason, '→ test_engineer');
    assert.equal(machine.getTransitionHistory()[3]?.stage, 'developer');
  });

  it('rejects skipped states', () => {
    const machine = new StageStateMachine('qa_tester', STORY_ID);

    assert.equal(machine.canTransitionTo('CONTRACT_BUILT'), false);
    assert.throws(() => machine.transition('CONTRACT_BUILT'), IllegalStateTransitionError);
    assert.equal(machine.getCurrentState(), 'RECEIVED');
  });

  it('refuses to leave a terminal state', () => {
    const machine = handedOff();

    assert.throws(
      () => machine.transition('FAILED'),
      (error: unknown) =>
        error instanceof TerminalStateViolationError &&
        error.message === 'Cannot transition from terminal state HANDED_OFF to FAILED'
    );
  });

  it('records failure from any non-terminal state', () => {
    const machine = new StageStateMachine('game_designer', STORY_ID);
    machine.transition('TOOLS_RUN');

    assert.equal(machine.fail('gate failed'), true);
    assert.equal(machine.getCurrentState(), 'FAILED');
    assert.equal(machine.fail('again'), false);
    assert.deepEqual(machine.getStateHistorySummary(), ['RECEIVED→TOOLS_RUN', 'TOOLS_RUN→FAILED']);
  });

  it('allows REJECTED only after the contract is built', () => {
    const machine = new StageStateMachine('quality_reviewer', STORY_ID, 'CONTRACT_BUILT');

    machine.transition('REJECTED');
    assert.equal(machine.getFinalState(), 'REJECTED');
  });

  it('enforces required states', () => {
    const machine = new StageStateMachine('test_engineer', STORY_ID);

    assert.doesNotThrow(() => machine.requireState(['RECEIVED']));
    assert.throws(
      () => machine.requireState(['TOOLS_RUN', 'QUALITY_GATES_CHECKED']),
      (error: unknown) =>
        error instanceof StateSkipError &&
        error.message === 'State skipped. Expected one of: TOOLS_RUN, QUALITY_GATES_CHECKED, but in state: RECEIVED'
    );
  });
});

describe('state definitions', () => {
  it('has three terminal states', () => {
    assert.deepEqual(getTerminalStates(), ['HANDED_OFF', 'REJECTED', 'FAILED']);
  });

  it('explains why a transition is refused', () => {
    assert.deepEqual(validateTransition('RECEIVED', 'HANDED_OFF'), {
      allowed: false,
      reason: 'Invalid transition from RECEIVED to HANDED_OFF (expected TOOLS_RUN or FAILED)',
    });
    assert.deepEqual(validateTransition('TOOLS_RUN', 'TOOLS_RUN'), { allowed: false, reason: 'Already in TOOLS_RUN' });
    assert.deepEqual(validateTransition('FAILED', 'RECEIVED'), {
      allowed: false,
      reason: 'Cannot transition from terminal state FAILED',
    });
    assert.deepEqual(validateTransition('RECEIVED', 'TOOLS_RUN'), { allowed: true });
  });
});
