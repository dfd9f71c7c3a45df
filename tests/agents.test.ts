import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { STORY_ID, featureContract, runStagesThrough, withPayload } from './fixtures.js';
import { createAgents } from '../src/agents/factory.js';
import { DeveloperAgent } from '../src/agents/developer.js';
import { ProjectManagerAgent } from '../src/agents/project-manager.js';
import { BusinessLogicError, ContractValidationError, QualityGateError } from '../src/errors/types.js';

describe('stage agents', () => {
  it('hand each contract to the next stage', async () => {
    const contracts = await runStagesThrough('quality_reviewer');

    assert.deepEqual(
      contracts.map(c => `${c.source_agent}→${c.target_agent}`),
      [
        'project_manager→game_designer',
        'game_designer→developer',
        'developer→test_engineer',
        'test_engineer→qa_tester',
        'qa_tester→quality_reviewer',
        'quality_reviewer→deployment',
      ]
    );
    assert.ok(contracts.every(c => c.story_id === STORY_ID));
  });

  it('accumulate quality gates along the chain', async () => {
    const contracts = await runStagesThrough('quality_reviewer');

    assert.deepEqual(
      contracts.map(c => c.quality_gates.length),
      [5, 10, 17, 22, 28, 32]
    );
  });

  it('leave each state machine in HANDED_OFF', async () => {
    const agents = createAgents();
    const first = await agents.project_manager.processContract(featureContract());
    await agents.game_designer.processContract(first);

    assert.equal(agents.project_manager.getStateMachine(STORY_ID)?.getCurrentState(), 'HANDED_OFF');
    assert.equal(agents.game_designer.getStateMachine(STORY_ID)?.getCurrentState(), 'HANDED_OFF');
    assert.equal(agents.developer.getStateMachine(STORY_ID), undefined);
  });
});

describe('BaseAgent.processContract', () => {
  it('rejects a contract addressed to another stage', async () => {
    const agent = new DeveloperAgent();

    await assert.rejects(agent.processContract(featureContract()), (error: unknown) => {
      assert.ok(error instanceof ContractValidationError);
      assert.equal(error.message, 'Contract addressed to project_manager, not developer');
      assert.deepEqual(error.errors, ['Unexpected target agent: project_manager']);
      return true;
    });
    assert.equal(agent.getStateMachine(STORY_ID)?.getCurrentState(), 'FAILED');
  });

  it('rejects input that is not a contract', async () => {
    const agent = new ProjectManagerAgent();

    await assert.rejects(agent.processContract('not a contract'), {
      message: 'Input contract validation failed: Contract must be a JSON object',
    });
  });

  it('reports the first missing payload field', async () => {
    const agent = new ProjectManagerAgent();
    const contract = withPayload(featureContract(), { payload_type: 'feature_request' });

    await assert.rejects(agent.processContract(contract), (error: unknown) => {
      assert.ok(error instanceof BusinessLogicError);
      assert.equal(error.message, 'Missing required field: feature_description');
      assert.equal(error.businessRule, 'payload_required_fields');
      return true;
    });
  });

  it('stops a feature request that breaks the design principles', async () => {
    const agent = new ProjectManagerAgent();
    const contract = featureContract({
      feature_description:
        'Monolithic admin screen with a direct database connection, complex and sophisticated advanced reports.',
      learning_objectives: [],
      acceptance_criteria: [],
      user_persona: 'Bob',
      time_constraint_minutes: 30,
    });

    await assert.rejects(agent.processContract(contract), (error: unknown) => {
      assert.ok(error instanceof QualityGateError);
      assert.equal(error.gateName, 'dna_compliance_verified');
      assert.equal(error.stage, 'project_manager');
      return true;
    });
    assert.equal(agent.getStateMachine(STORY_ID)?.getCurrentState(), 'FAILED');
  });
});
