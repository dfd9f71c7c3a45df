import type {
  ApprovalDecision,
  DecisionFactor,
  DeploymentReadiness,
  QualityAnalysis,
} from '../../contracts/schemas.js';
import { errorMessage } from '../../errors/types.js';
import { logger } from '../../observability/logger.js';
import { round1 } from '../../scoring/keywords.js';
import { QUALITY_THRESHOLD } from './quality-scorer.js';

export const DECISION_WEIGHTS = {
  quality_score: 0.4,
  deployment_readiness: 0.3,
  critical_issues: 0.2,
  dna_compliance: 0.1,
} as const;

type WeightedFactor = keyof typeof DECISION_WEIGHTS;

export const APPROVAL_THRESHOLDS = {
  minimumDecisionScore: 85,
  minimumReadinessScore: 90,
  maximumCriticalIssues: 0,
  minimumDnaScore: 80,
  minimumPerformanceScore: 85,
  minimumTestScore: 90,
} as const;

/** Factors whose miss rejects on its own, whatever the score. */
const HARD_FACTORS: ReadonlySet<string> = new Set(['critical_issues', 'deployment_readiness']);

const APPROVED_ACTIONS = [
  'Initiate production deployment pipeline',
  'Notify stakeholders of deployment approval',
  'Prepare production monitoring and rollback procedures',
  'Document deployment decision and quality metrics',
];

const REJECTED_ACTIONS = [
  'Return to development team with feedback',
  'Address all blocking issues identified',
  'Re-run quality assurance testing',
  'Resubmit for quality review when ready',
];

const BLOCKER_ACTIONS: ReadonlyArray<[string, string]> = [
  ['performance', 'Focus on performance optimization and testing'],
  ['security', 'Conduct security review and implement fixes'],
  ['accessibility', 'Perform accessibility audit and remediation'],
];

const FAILED_CHECK_RECOMMENDATIONS: Readonly<Record<string, string>> = {
  performance: 'Optimize performance: reduce API response times and improve Lighthouse scores',
  test_coverage: 'Improve test coverage and fix failing tests',
  accessibility: 'Fix accessibility violations and ensure WCAG compliance',
  dna_compliance: 'Review implementation against the design and architecture principles',
  security: 'Resolve security findings and re-run the security scan',
};

/** Impact from the value's own band: `high` at or above the first cut, `medium` above the second. */
function impactBand(value: number, high: number, medium: number): DecisionFactor['impact'] {
  if (value >= high) return 'high';
  if (value >= medium) return 'medium';
  return 'low';
}

function factor(value: number, threshold: number, meets: boolean, impact: DecisionFactor['impact']): DecisionFactor {
  return { value, threshold, meets_threshold: meets, impact };
}

export function collectDecisionFactors(
  quality: QualityAnalysis,
  readiness: DeploymentReadiness
): Record<string, DecisionFactor> {
  const critical = quality.quality_issues.filter(i => i.type === 'critical' || i.blocking).length;
  const dna = quality.dimension_scores.dna_compliance ?? 0;
  const performance = quality.dimension_scores.performance ?? 0;
  const tests = quality.dimension_scores.test_coverage ?? 0;
  const overall = quality.overall_score;
  const readinessScore = readiness.readiness_score;
  const t = APPROVAL_THRESHOLDS;

  return {
    quality_score: factor(overall, QUALITY_THRESHOLD, overall >= QUALITY_THRESHOLD, impactBand(overall, 90, 80)),
    deployment_readiness: factor(
      readinessScore,
      t.minimumReadinessScore,
      readinessScore >= t.minimumReadinessScore,
      impactBand(readinessScore, 95, 85)
    ),
    critical_issues: factor(
      critical,
      t.maximumCriticalIssues,
      critical <= t.maximumCriticalIssues,
      critical === 0 ? 'high' : 'low'
    ),
    dna_compliance: factor(dna, t.minimumDnaScore, dna >= t.minimumDnaScore, impactBand(dna, 90, 80)),
    performance: factor(
      performance,
      t.minimumPerformanceScore,
      performance >= t.minimumPerformanceScore,
      impactBand(performance, 90, 80)
    ),
    test_quality: factor(tests, t.minimumTestScore, tests >= t.minimumTestScore, impactBand(tests, 95, 85)),
  };
}

function normalized(name: WeightedFactor, value: number): number {
  if (name === 'critical_issues') {
    return Math.max(0, 100 - value * 25);
  }
  return Math.min(100, Math.max(0, value));
}

export function calculateDecisionScore(factors: Record<string, DecisionFactor>): number {
  let total = 0;
  for (const name of Object.keys(DECISION_WEIGHTS) as WeightedFactor[]) {
    total += normalized(name, factors[name]?.value ?? 0) * DECISION_WEIGHTS[name];
  }
  return round1(total);
}

export function determineApproval(
  factors: Record<string, DecisionFactor>,
  score: number,
  blockingIssues: string[]
): boolean {
  if (blockingIssues.length > 0) return false;

  const hardMisses = Object.entries(factors).filter(([name, f]) => HARD_FACTORS.has(name) && !f.meets_threshold);
  if (hardMisses.length > 0) return false;

  return score >= APPROVAL_THRESHOLDS.minimumDecisionScore;
}

function titleCase(name: string): string {
  return name
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function buildReasoning(approved: boolean, score: number, factors: Record<string, DecisionFactor>): string {
  const lines: string[] = [];

  if (approved) {
    lines.push(`APPROVED for production deployment (Decision Score: ${score}/100)`, '', '**Approval Criteria Met:**');
    for (const [name, f] of Object.entries(factors)) {
      if (f.meets_threshold) lines.push(`  - ${titleCase(name)}: ${f.value} meets threshold of ${f.threshold}`);
    }
  } else {
    lines.push(`REJECTED for production deployment (Decision Score: ${score}/100)`, '', '**Blocking Issues:**');
    for (const [name, f] of Object.entries(factors)) {
      if (!f.meets_threshold) lines.push(`  - ${titleCase(name)}: ${f.value} below threshold of ${f.threshold}`);
    }
  }

  return lines.join('\n');
}

function recommendations(approved: boolean, quality: QualityAnalysis, readiness: DeploymentReadiness): string[] {
  if (approved) {
    const list = [
      'Deploy to production with monitoring',
      'Set up production health checks and alerting',
      'Monitor user feedback and performance metrics post-deployment',
    ];
    if (quality.overall_score < 95) {
      list.push('Consider further optimization for even higher quality in future releases');
    }
    return list;
  }

  const list = ['Address all blocking issues before resubmission'];
  for (const [name, check] of Object.entries(readiness.readiness_checks)) {
    const recommendation = FAILED_CHECK_RECOMMENDATIONS[name];
    if (!check.passed && recommendation) list.push(recommendation);
  }
  list.push('Run comprehensive quality checks before resubmission', 'Consider additional testing and validation');
  return [...new Set(list)];
}

export function confidenceLevel(factors: Record<string, DecisionFactor>): ApprovalDecision['confidence_level'] {
  const all = Object.values(factors);
  const ratio = all.length > 0 ? all.filter(f => f.meets_threshold).length / all.length : 0;
  if (ratio >= 0.9) return 'high';
  if (ratio >= 0.7) return 'medium';
  return 'low';
}

function approvalConditions(approved: boolean, factors: Record<string, DecisionFactor>): string[] {
  if (approved) return [];
  return Object.entries(factors)
    .filter(([, f]) => !f.meets_threshold)
    .map(([name, f]) =>
      name === 'critical_issues'
        ? `Resolve all ${f.value} critical issues`
        : `Improve ${name.replace(/_/g, ' ')} from ${f.value} to at least ${f.threshold}`
    );
}

function nextActions(approved: boolean, readiness: DeploymentReadiness): string[] {
  if (approved) return [...APPROVED_ACTIONS];

  const actions = [...REJECTED_ACTIONS];
  for (const [keyword, action] of BLOCKER_ACTIONS) {
    if (readiness.blocking_issues.some(issue => issue.toLowerCase().includes(keyword))) {
      actions.push(action);
    }
  }
  return actions;
}

/**
 * Weighs quality, readiness, critical issues and DNA into a decision. Any
 * blocking issue rejects regardless of score.
 */
export function makeApprovalDecision(quality: QualityAnalysis, readiness: DeploymentReadiness): ApprovalDecision {
  const decidedAt = new Date().toISOString();

  try {
    const factors = collectDecisionFactors(quality, readiness);
    const score = calculateDecisionScore(factors);
    const approved = determineApproval(factors, score, readiness.blocking_issues);

    logger.info('approval_decision', `Approval decision: ${approved ? 'APPROVED' : 'REJECTED'}`, {
      decisionScore: score,
      blockingIssues: readiness.blocking_issues.length,
    });

    return {
      approved,
      decision_score: score,
      decision_factors: factors,
      reasoning: buildReasoning(approved, score, factors),
      recommendations: recommendations(approved, quality, readiness),
      confidence_level: confidenceLevel(factors),
      approval_conditions: approvalConditions(approved, factors),
      next_actions: nextActions(approved, readiness),
      blocking_issues: approved ? [] : [...readiness.blocking_issues],
      decided_at: decidedAt,
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('approval_decision', 'Approval decision failed', { error: message });

    return {
      approved: false,
      decision_score: 0,
      decision_factors: {},
      reasoning: `Approval decision failed due to error: ${message}`,
      recommendations: ['Fix approval decision process before retrying'],
      confidence_level: 'low',
      approval_conditions: [],
      next_actions: [...REJECTED_ACTIONS],
      blocking_issues: [`Decision process error: ${message}`],
      decided_at: decidedAt,
    };
  }
}
