import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  AGENT_NAMES,
  PIPELINE_STAGES,
  getForwardTarget,
  getValidNextAgents,
  isAgentName,
  isStageName,
  isValidHandoff,
} from '../src/contracts/agent-graph.js';

describe('agent graph', () => {
  it('lists the eight agents in pipeline order', () => {
    assert.deepEqual([...AGENT_NAMES], [
      'github',
      'project_manager',
      'game_designer',
      'developer',
      'test_engineer',
      'qa_tester',
      'quality_reviewer',
      'deployment',
    ]);
  });

  it('runs six processing stages', () => {
    assert.equal(PIPELINE_STAGES.length, 6);
    assert.equal(PIPELINE_STAGES[0], 'project_manager');
    assert.equal(PIPELINE_STAGES[5], 'quality_reviewer');
  });

  it('allows only the forward handoff for linear stages', () => {
    assert.ok(isValidHandoff('github', 'project_manager'));
    assert.ok(isValidHandoff('developer', 'test_engineer'));
    assert.ok(!isValidHandoff('project_manager', 'developer'));
    assert.ok(!isValidHandoff('github', 'deployment'));
  });

  it('branches the quality reviewer to deployment or back to development', () => {
    assert.deepEqual([...getValidNextAgents('quality_reviewer')], ['deployment', 'developer']);
    assert.equal(getForwardTarget('quality_reviewer'), 'deployment');
  });

  it('gives deployment no successors', () => {
    assert.deepEqual([...getValidNextAgents('deployment')], []);
    assert.ok(!isValidHandoff('deployment', 'github'));
  });

  it('distinguishes agents from stages', () => {
    assert.ok(isAgentName('github'));
    assert.ok(!isAgentName('reviewer'));
    assert.ok(isStageName('qa_tester'));
    assert.ok(!isStageName('github'));
    assert.ok(!isStageName('deployment'));
  });

  it('maps each stage to its forward target', () => {
    assert.equal(getForwardTarget('project_manager'), 'game_designer');
    assert.equal(getForwardTarget('test_engineer'), 'qa_tester');
  });
});
