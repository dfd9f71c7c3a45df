import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { STORY_ID, featureContract, withPayload } from './fixtures.js';
import { runPipeline } from '../src/pipeline/runner.js';
import type { PipelineDeps } from '../src/pipeline/runner.js';
import { createAgents } from '../src/agents/factory.js';
import type { AgentRoster, StageAgent } from '../src/agents/factory.js';
import { QualityReviewerAgent } from '../src/agents/quality-reviewer.js';
import { enforceContract } from '../src/contracts/validator.js';
import { QaResultsPayloadSchema } from '../src/contracts/schemas.js';
import type { QualityReviewPayload } from '../src/contracts/schemas.js';
import { EventBus } from '../src/events/bus.js';
import type { PipelineEvent } from '../src/events/bus.js';
import { Metrics } from '../src/metrics/metrics.js';
import { createRunHistory } from '../src/runs/history.js';
import { QualityGateError } from '../src/errors/types.js';

function harness(overrides: Partial<PipelineDeps> = {}) {
  const bus = new EventBus();
  const events: PipelineEvent[] = [];
  bus.subscribe('*', event => events.push(event));

  const deps: PipelineDeps = {
    history: createRunHistory(false),
    bus,
    metrics: new Metrics(),
    runId: 'run-test-1',
    ...overrides,
  };

  return { deps, events };
}

function failingDeveloper(): StageAgent {
  return {
    stage: 'developer',
    processContract: async () => {
      throw new QualityGateError(
        'Quality gate failed: unit_tests_100_percent_coverage',
        'unit_tests_100_percent_coverage',
        'developer'
      );
    },
    getStateMachine: () => undefined,
  };
}

/** A reviewer that sees a Lighthouse score of 70 whatever QA measured. */
function slowPageReviewer(): StageAgent {
  const reviewer = new QualityReviewerAgent();
  return {
    stage: 'quality_reviewer',
    processContract: async input => {
      const contract = enforceContract(input);
      const qa = QaResultsPayloadSchema.parse(contract.input_requirements.required_data);
      return reviewer.processContract(
        withPayload(contract, { ...qa, performance_metrics: { ...qa.performance_metrics, lighthouse_score: 70 } })
      );
    },
    getStateMachine: storyId => reviewer.getStateMachine(storyId),
  };
}

describe('runPipeline', () => {
  it('runs an approved story end to end', async () => {
    const published: QualityReviewPayload[] = [];
    const { deps, events } = harness({
      publish: async review => {
        published.push(review);
      },
    });

    const { record, contracts } = await runPipeline(featureContract(), deps);

    assert.equal(record.runId, 'run-test-1');
    assert.equal(record.storyId, STORY_ID);
    assert.equal(record.status, 'approved');
    assert.equal(record.finalTarget, 'deployment');
    assert.equal(record.qualityScore, 100);
    assert.equal(record.published, true);
    assert.equal(record.error, undefined);
    assert.equal(contracts.length, 7);
    assert.equal(record.fingerprints.length, 7);
    assert.ok(record.fingerprints.every(f => /^[0-9a-f]{16}$/.test(f)));
    assert.deepEqual(
      record.stages.map(s => s.finalState),
      ['HANDED_OFF', 'HANDED_OFF', 'HANDED_OFF', 'HANDED_OFF', 'HANDED_OFF', 'HANDED_OFF']
    );
    assert.equal(published.length, 1);
    assert.deepEqual(published[0]?.client_communication.labels, ['approved', 'score-100']);

    assert.equal(events.length, 14);
    assert.equal(events[0]?.type, 'pipeline.started');
    assert.equal(events[13]?.type, 'pipeline.completed');
    assert.deepEqual(events[13]?.data, { status: 'approved', finalTarget: 'deployment' });

    const snapshot = await deps.metrics.snapshot(deps.history);
    assert.deepEqual(snapshot.runs, {
      started: 1,
      completed: 1,
      failed: 0,
      approved: 1,
      reworkRequired: 0,
      approvalRate: 1,
      averageDurationMs: snapshot.runs.averageDurationMs,
    });
    assert.deepEqual(snapshot.contracts, { validated: 6, validationFailures: 0 });
    assert.deepEqual(snapshot.publishing, { published: 1, failed: 0 });
    assert.deepEqual(await deps.history.getRecent(), [record]);
  });

  it('stops at the failing stage and records the gate failure', async () => {
    const agents: AgentRoster = { ...createAgents(), developer: failingDeveloper() };
    const { deps, events } = harness({ agents });

    const { record, contracts } = await runPipeline(featureContract(), deps);

    assert.equal(record.status, 'failed');
    assert.equal(record.finalTarget, null);
    assert.deepEqual(record.error, {
      name: 'QualityGateError',
      message: 'Quality gate failed: unit_tests_100_percent_coverage',
      stage: 'developer',
    });
    assert.equal(contracts.length, 3);
    assert.deepEqual(
      record.stages.map(s => [s.stage, s.finalState]),
      [
        ['project_manager', 'HANDED_OFF'],
        ['game_designer', 'HANDED_OFF'],
        ['developer', null],
      ]
    );
    assert.equal(record.stages[2]?.contractFingerprint, null);
    assert.deepEqual(
      events.map(e => e.type),
      [
        'pipeline.started',
        'stage.started',
        'stage.completed',
        'stage.started',
        'stage.completed',
        'stage.started',
        'stage.failed',
        'pipeline.failed',
      ]
    );

    const snapshot = await deps.metrics.snapshot(deps.history);
    assert.equal(snapshot.gates.failuresByStage.developer, 1);
    assert.equal(snapshot.gates.totalFailures, 1);
    assert.equal(snapshot.runs.failed, 1);
    assert.equal(snapshot.history.count, 1);
  });

  it('ends the run when the reviewer asks for rework', async () => {
    const agents: AgentRoster = { ...createAgents(), quality_reviewer: slowPageReviewer() };
    const { deps } = harness({ agents });

    const { record } = await runPipeline(featureContract(), deps);

    assert.equal(record.status, 'rework_required');
    assert.equal(record.finalTarget, 'developer');
    assert.equal(record.qualityScore, 97);
    assert.equal(record.published, false);
    assert.equal(record.stages[5]?.finalState, 'REJECTED');

    const snapshot = await deps.metrics.snapshot();
    assert.equal(snapshot.runs.reworkRequired, 1);
    assert.equal(snapshot.runs.approvalRate, 0);
  });

  it('keeps the decision when publishing fails', async () => {
    const { deps } = harness({
      publish: async () => {
        throw new Error('github unavailable');
      },
    });

    const { record } = await runPipeline(featureContract(), deps);

    assert.equal(record.status, 'approved');
    assert.equal(record.published, false);
    const snapshot = await deps.metrics.snapshot();
    assert.deepEqual(snapshot.publishing, { published: 0, failed: 1 });
  });
});
