import type { StageName } from '../contracts/agent-graph.js';
import type {
  GateCheckResult,
  GateErrorPolicy,
  GateInput,
  GateOutcome,
  GateTable,
  QualityGateID,
} from './types.js';
import { GATE_REGISTRY } from './registry.js';
import { logger } from '../observability/logger.js';
import { QualityGateError } from '../errors/types.js';
import { summarizeFailures } from './violations.js';

function evaluateTable<D, G extends QualityGateID>(
  stage: StageName,
  table: GateTable<D, G>,
  deliverables: D,
  policy: GateErrorPolicy
): GateOutcome[] {
  const outcomes: GateOutcome[] = [];

  for (const gateId of Object.keys(table) as G[]) {
    const definition = table[gateId];

    try {
      const passed = definition.evaluate(deliverables);
      outcomes.push({ gateId, stage, description: definition.description, passed });

      if (!passed) {
        logger.warn('gate_failed', `Quality gate failed: ${gateId}`, {
          gateId,
          stage,
          description: definition.description,
        });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';

      if (policy === 'fail_fast') {
        logger.error('gate_evaluation_error', 'Gate evaluator threw, propagating', {
          gateId,
          stage,
          error: message,
        });
        throw error;
      }

      logger.error('gate_evaluation_error', 'Gate evaluator threw, counting as failed', {
        gateId,
        stage,
        error: message,
      });
      outcomes.push({ gateId, stage, description: definition.description, passed: false, error: message });
    }
  }

  return outcomes;
}

function evaluateStage(input: GateInput, policy: GateErrorPolicy): GateOutcome[] {
  switch (input.stage) {
    case 'project_manager':
      return evaluateTable(input.stage, GATE_REGISTRY.project_manager, input.deliverables, policy);
    case 'game_designer':
      return evaluateTable(input.stage, GATE_REGISTRY.game_designer, input.deliverables, policy);
    case 'developer':
      return evaluateTable(input.stage, GATE_REGISTRY.developer, input.deliverables, policy);
    case 'test_engineer':
      return evaluateTable(input.stage, GATE_REGISTRY.test_engineer, input.deliverables, policy);
    case 'qa_tester':
      return evaluateTable(input.stage, GATE_REGISTRY.qa_tester, input.deliverables, policy);
    case 'quality_reviewer':
      return evaluateTable(input.stage, GATE_REGISTRY.quality_reviewer, input.deliverables, policy);
  }
}

export function checkQualityGates(input: GateInput, policy: GateErrorPolicy = 'fail_soft'): GateCheckResult {
  const outcomes = evaluateStage(input, policy);
  const failures = outcomes.filter(o => !o.passed);

  return {
    stage: input.stage,
    passed: failures.length === 0,
    outcomes,
    failures,
  };
}

/** Throws QualityGateError naming the first failed gate. */
export function enforceQualityGates(input: GateInput, policy: GateErrorPolicy = 'fail_soft'): GateCheckResult {
  const result = checkQualityGates(input, policy);

  if (!result.passed) {
    const summary = summarizeFailures(result.failures);
    const first = result.failures[0];

    logger.error('gate_enforcement', 'Quality gates failed', {
      stage: input.stage,
      summary,
      failed: result.failures.map(f => f.gateId),
    });

    throw new QualityGateError(
      `Quality gate failed: ${first.gateId}`,
      first.gateId,
      input.stage,
      { failedGates: result.failures.map(f => f.gateId), summary }
    );
  }

  return result;
}
