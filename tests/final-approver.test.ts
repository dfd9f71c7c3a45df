import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { qaResults } from './fixtures.js';
import type { DecisionFactor, QaResultsPayload } from '../src/contracts/schemas.js';
import { analyzeQuality } from '../src/tools/quality-reviewer/quality-scorer.js';
import { validateDeploymentReadiness } from '../src/tools/quality-reviewer/deployment-validator.js';
import {
  calculateDecisionScore,
  collectDecisionFactors,
  confidenceLevel,
  determineApproval,
  makeApprovalDecision,
} from '../src/tools/quality-reviewer/final-approver.js';

function decide(qa: QaResultsPayload) {
  return makeApprovalDecision(analyzeQuality(qa).analysis, validateDeploymentReadiness(qa));
}

function met(value: number, threshold: number, meets = true): DecisionFactor {
  return { value, threshold, meets_threshold: meets, impact: 'high' };
}

describe('makeApprovalDecision', () => {
  it('approves a feature that meets every threshold', async () => {
    const decision = decide(await qaResults());

    assert.equal(decision.approved, true);
    assert.equal(decision.decision_score, 100);
    assert.equal(decision.confidence_level, 'high');
    assert.deepEqual(decision.approval_conditions, []);
    assert.deepEqual(decision.blocking_issues, []);
    assert.equal(decision.next_actions[0], 'Initiate production deployment pipeline');
    assert.deepEqual(decision.recommendations, [
      'Deploy to production with monitoring',
      'Set up production health checks and alerting',
      'Monitor user feedback and performance metrics post-deployment',
    ]);
    assert.ok(decision.reasoning.startsWith('APPROVED for production deployment (Decision Score: 100/100)'));
  });

  it('rejects on a blocking readiness issue despite a high score', async () => {
    const qa = await qaResults();
    const decision = decide({
      ...qa,
      performance_metrics: { ...qa.performance_metrics, lighthouse_score: 70 },
    });

    assert.equal(decision.approved, false);
    assert.equal(decision.decision_score, 93.8);
    assert.equal(decision.confidence_level, 'low');
    assert.deepEqual(decision.blocking_issues, ['performance: Lighthouse score too low: 70 < 90']);
    assert.deepEqual(decision.approval_conditions, [
      'Improve deployment readiness from 83.3 to at least 90',
      'Improve performance from 80 to at least 85',
    ]);
    assert.deepEqual(decision.recommendations, [
      'Address all blocking issues before resubmission',
      'Optimize performance: reduce API response times and improve Lighthouse scores',
      'Run comprehensive quality checks before resubmission',
      'Consider additional testing and validation',
    ]);
    assert.equal(decision.next_actions[decision.next_actions.length - 1], 'Focus on performance optimization and testing');
  });
});

describe('collectDecisionFactors', () => {
  it('bands each impact by the factor value', async () => {
    const qa = await qaResults();
    const slow = { ...qa, performance_metrics: { ...qa.performance_metrics, lighthouse_score: 70 } };
    const factors = collectDecisionFactors(analyzeQuality(slow).analysis, validateDeploymentReadiness(slow));

    assert.deepEqual(
      Object.fromEntries(Object.entries(factors).map(([name, f]) => [name, [f.value, f.impact]])),
      {
        quality_score: [97, 'high'],
        deployment_readiness: [83.3, 'low'],
        critical_issues: [0, 'high'],
        dna_compliance: [100, 'high'],
        performance: [80, 'medium'],
        test_quality: [100, 'high'],
      }
    );
  });

  it('marks any critical issue as low impact', () => {
    const factors = collectDecisionFactors(
      {
        overall_score: 85,
        meets_threshold: false,
        dimension_scores: { dna_compliance: 80, performance: 94, test_coverage: 90 },
        quality_issues: [{ type: 'critical', category: 'overall', message: 'Below threshold', impact: 'high', blocking: true }],
        recommendations: [],
      },
      { deployment_ready: true, readiness_score: 95, readiness_checks: {}, blocking_issues: [] }
    );

    assert.equal(factors.critical_issues.impact, 'low');
    assert.equal(factors.quality_score.impact, 'medium');
    assert.equal(factors.deployment_readiness.impact, 'high');
    assert.equal(factors.dna_compliance.impact, 'medium');
    assert.equal(factors.performance.impact, 'high');
    assert.equal(factors.test_quality.impact, 'medium');
  });
});

describe('decision scoring', () => {
  it('weights quality, readiness, critical issues and DNA', () => {
    const score = calculateDecisionScore({
      quality_score: met(90, 90),
      deployment_readiness: met(100, 90),
      critical_issues: met(2, 0, false),
      dna_compliance: met(80, 80),
    });

    // 36 + 30 + 10 + 8
    assert.equal(score, 84);
  });

  it('needs the minimum decision score even without hard misses', () => {
    const factors = { quality_score: met(80, 90, false), deployment_readiness: met(100, 90) };

    assert.equal(determineApproval(factors, 84.9, []), false);
    assert.equal(determineApproval(factors, 85, []), true);
  });

  it('rejects any hard miss', () => {
    const factors = { deployment_readiness: met(50, 90, false) };
    assert.equal(determineApproval(factors, 99, []), false);
  });

  it('rates confidence by the share of met factors', () => {
    assert.equal(confidenceLevel({ a: met(1, 1), b: met(1, 1) }), 'high');
    assert.equal(
      confidenceLevel({ a: met(1, 1), b: met(1, 1), c: met(1, 1), d: met(0, 1, false) }),
      'medium'
    );
    assert.equal(confidenceLevel({}), 'low');
  });
});
