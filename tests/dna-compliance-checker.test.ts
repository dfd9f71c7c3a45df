import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { featureRequest } from './fixtures.js';
import { ARCHITECTURE_PRINCIPLES, DESIGN_PRINCIPLES } from '../src/contracts/schemas.js';
import type { ArchitecturePrinciple, DesignPrinciple } from '../src/contracts/schemas.js';
import type { ScoreResult } from '../src/scoring/types.js';
import {
  MINIMUM_COMPLIANCE_SCORE,
  analyzeFeatureCompliance,
  calculateComplianceScore,
} from '../src/tools/project-manager/dna-compliance-checker.js';

const WEAK_FEATURE = featureRequest({
  feature_description:
    'Monolithic admin screen with a direct database connection, complex and sophisticated advanced reports.',
  learning_objectives: [],
  acceptance_criteria: [],
  user_persona: 'Bob',
  time_constraint_minutes: 30,
});

describe('analyzeFeatureCompliance', () => {
  it('scores a focused learning feature as compliant', () => {
    const analysis = analyzeFeatureCompliance(featureRequest());

    assert.equal(analysis.compliant, true);
    assert.equal(analysis.compliance_score, 95.4);
    assert.deepEqual(analysis.violations, []);
    assert.deepEqual(analysis.recommendations, ['Feature meets all DNA compliance requirements']);
  });

  it('scores each principle from keyword evidence', () => {
    const analysis = analyzeFeatureCompliance(featureRequest());
    const design = analysis.design_principles_analysis;
    const architecture = analysis.architecture_principles_analysis;

    assert.equal(design.pedagogical_value.score, 100);
    assert.equal(design.policy_to_practice.score, 100);
    assert.equal(design.time_respect.score, 100);
    assert.equal(design.holistic_thinking.score, 95);
    assert.equal(design.professional_tone.score, 100);
    assert.equal(architecture.api_first.score, 100);
    assert.equal(architecture.stateless_backend.score, 80);
    assert.equal(architecture.separation_of_concerns.score, 80);
    assert.equal(architecture.simplicity_first.score, 100);
  });

  it('fails time respect for a long exercise despite efficient wording', () => {
    const { time_respect } = analyzeFeatureCompliance(featureRequest({ time_constraint_minutes: 25 }))
      .design_principles_analysis;

    // 10 for the length, 30 for efficiency terms, 20 for time awareness
    assert.equal(time_respect.score, 60);
    assert.equal(time_respect.compliant, false);
    assert.deepEqual(time_respect.issues, ['Time constraint too long (25 minutes), exceeds recommended 10 minutes']);
  });

  it('caps a keyword-saturated principle at 100', () => {
    const { holistic_thinking } = analyzeFeatureCompliance(
      featureRequest({
        feature_description:
          'An integrated system with a holistic perspective for every stakeholder; ' +
          'the impact and effect on the organization and its workplace.',
        acceptance_criteria: ['Each user sees the system overview'],
      })
    ).design_principles_analysis;

    // 30 systems + 25 perspective + 25 impact + 20 organization + 10 criteria
    assert.equal(holistic_thinking.score, 100);
    assert.equal(holistic_thinking.compliant, true);
    assert.equal(holistic_thinking.evidence.length, 5);
  });

  it('keeps every principle score within 0 to 100', () => {
    for (const feature of [featureRequest(), WEAK_FEATURE]) {
      const analysis = analyzeFeatureCompliance(feature);
      const scores = [
        ...Object.values(analysis.design_principles_analysis),
        ...Object.values(analysis.architecture_principles_analysis),
      ].map(r => r.score);

      for (const score of scores) {
        assert.ok(score >= 0 && score <= 100, `score ${score} out of range`);
      }
    }
  });

  it('returns the same analysis for the same input', () => {
    const { analyzed_at: _first, ...first } = analyzeFeatureCompliance(featureRequest());
    const { analyzed_at: _second, ...second } = analyzeFeatureCompliance(featureRequest());

    assert.deepEqual(second, first);
  });

  it('records the evidence behind a score', () => {
    const { design_principles_analysis: design } = analyzeFeatureCompliance(featureRequest());

    assert.ok(design.time_respect.evidence.includes('Respects 10-minute constraint (8 minutes)'));
    assert.ok(design.pedagogical_value.evidence.includes('Includes 2 explicit learning objectives'));
  });

  it('lists violations and targeted recommendations for a weak feature', () => {
    const analysis = analyzeFeatureCompliance(WEAK_FEATURE);

    assert.equal(analysis.compliant, false);
    assert.equal(analysis.compliance_score, 33.4);
    assert.deepEqual(analysis.violations, [
      'Design principle violation: pedagogical_value',
      'Design principle violation: policy_to_practice',
      'Design principle violation: time_respect',
      'Design principle violation: holistic_thinking',
      'Design principle violation: professional_tone',
      'Architecture principle violation: api_first',
      'Architecture principle violation: separation_of_concerns',
    ]);
    assert.deepEqual(analysis.recommendations, [
      'Add explicit learning objectives and educational outcomes',
      'Strengthen connection between theory and practical application',
      'Reduce scope or improve efficiency to meet 10-minute constraint',
      'Consider broader organizational and systemic impacts',
      'Adjust language for professional public sector audience',
      'Ensure all data access goes through API endpoints',
      'Clearly separate frontend and backend responsibilities',
    ]);
  });

  it('penalizes red flags on architecture principles', () => {
    const { architecture_principles_analysis: architecture, architecture_compliance: flags } =
      analyzeFeatureCompliance(WEAK_FEATURE);

    assert.equal(architecture.api_first.score, 50);
    assert.deepEqual(architecture.api_first.issues, ['Feature may bypass API layer']);
    assert.equal(architecture.separation_of_concerns.score, 60);
    assert.equal(architecture.simplicity_first.score, 60);
    assert.deepEqual(flags, {
      api_first: false,
      stateless_backend: true,
      separation_of_concerns: false,
      simplicity_first: true,
    });
  });

  it('flags long time constraints', () => {
    const { design_principles_analysis: design } = analyzeFeatureCompliance(WEAK_FEATURE);

    assert.equal(design.time_respect.score, 25);
    assert.equal(design.time_respect.compliant, false);
    assert.equal(
      design.time_respect.recommendation,
      'Reduce scope significantly - 30 minutes exceeds 10-minute target'
    );
  });

  it('requires the minimum score of 70 for compliance', () => {
    assert.equal(MINIMUM_COMPLIANCE_SCORE, 70);
  });
});

function at(principle: string, score: number): ScoreResult {
  return { principle, score, compliant: true, evidence: [], issues: [], recommendation: '' };
}

describe('calculateComplianceScore', () => {
  const design: Record<DesignPrinciple, ScoreResult> = {
    pedagogical_value: at('pedagogical_value', 60),
    policy_to_practice: at('policy_to_practice', 60),
    time_respect: at('time_respect', 60),
    holistic_thinking: at('holistic_thinking', 60),
    professional_tone: at('professional_tone', 60),
  };
  const architecture: Record<ArchitecturePrinciple, ScoreResult> = {
    api_first: at('api_first', 70),
    stateless_backend: at('stateless_backend', 70),
    separation_of_concerns: at('separation_of_concerns', 70),
    simplicity_first: at('simplicity_first', 70),
  };

  it('weights design 60% and architecture 40%', () => {
    assert.equal(calculateComplianceScore(design, architecture), 64);
  });

  it('never drops when one dimension rises', () => {
    const base = calculateComplianceScore(design, architecture);

    for (const principle of DESIGN_PRINCIPLES) {
      const raised = { ...design, [principle]: { ...design[principle], score: 95 } };
      assert.ok(calculateComplianceScore(raised, architecture) >= base, principle);
    }
    for (const principle of ARCHITECTURE_PRINCIPLES) {
      const raised = { ...architecture, [principle]: { ...architecture[principle], score: 95 } };
      assert.ok(calculateComplianceScore(design, raised) >= base, principle);
    }
  });
});
