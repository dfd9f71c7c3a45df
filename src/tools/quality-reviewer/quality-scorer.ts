import type { QaResultsPayload, QualityAnalysis, QualityIssue } from '../../contracts/schemas.js';
import { mean, round1 } from '../../scoring/keywords.js';
import { logger } from '../../observability/logger.js';

export const QUALITY_DIMENSIONS = [
  'test_coverage',
  'performance',
  'accessibility',
  'user_experience',
  'code_quality',
  'dna_compliance',
] as const;

export type QualityDimension = (typeof QUALITY_DIMENSIONS)[number];

export const QUALITY_WEIGHTS: Readonly<Record<QualityDimension, number>> = {
  test_coverage: 0.2,
  performance: 0.15,
  accessibility: 0.15,
  user_experience: 0.2,
  code_quality: 0.1,
  dna_compliance: 0.2,
};

export const QUALITY_THRESHOLD = 90;

export interface DimensionResult {
  score: number;
  issues: string[];
  recommendations: string[];
}

export interface QualityAssessment {
  analysis: QualityAnalysis;
  dimensions: Record<QualityDimension, DimensionResult>;
}

/** [minimum, points, issue when this tier is the one reached] */
type Tier = readonly [number, number, string | null];

/** First tier whose minimum the value reaches; the last tier is the floor. */
function tiered(value: number, tiers: readonly Tier[], issues: string[]): number {
  for (const [minimum, points, issue] of tiers) {
    if (value >= minimum) {
      if (issue) issues.push(issue);
      return points;
    }
  }
  return 0;
}

/** Same as tiered, for metrics where lower is better. */
function tieredAtMost(value: number, tiers: readonly Tier[], issues: string[]): number {
  for (const [maximum, points, issue] of tiers) {
    if (value <= maximum) {
      if (issue) issues.push(issue);
      return points;
    }
  }
  return 0;
}

// ─── Recommendations ─────────────────────────────────────

const RECOMMENDATION_RULES: Readonly<Record<QualityDimension, ReadonlyArray<[string, string[]]>>> = {
  test_coverage: [
    ['coverage', ['Increase test coverage by adding unit tests for uncovered code', 'Add integration tests for critical user flows']],
    ['failing', ['Fix failing tests before deployment', 'Review test stability and remove flaky tests']],
    ['missing', ['Implement comprehensive test suite with unit and integration tests']],
  ],
  performance: [
    ['lighthouse', ['Optimize images and assets for better Lighthouse score', 'Implement code splitting and lazy loading']],
    ['api', ['Optimize API queries and reduce database calls', 'Implement API response caching']],
    ['page load', ['Optimize bundle size and remove unused dependencies', 'Implement progressive loading strategies']],
  ],
  accessibility: [
    ['wcag', ['Review and fix WCAG compliance violations', 'Add proper ARIA labels and semantic HTML']],
    ['keyboard', ['Implement proper keyboard navigation support', 'Add focus indicators for interactive elements']],
    ['violations', ['Use accessibility testing tools to identify and fix violations']],
  ],
  user_experience: [
    ['completion', ['Simplify user flows and reduce cognitive load', 'Add clearer instructions and guidance']],
    ['satisfaction', ['Improve visual design and user feedback', 'Conduct user research to identify pain points']],
    ['time', ['Streamline workflows to reduce task completion time', 'Remove unnecessary steps from user flows']],
  ],
  code_quality: [
    ['linting', ['Fix TypeScript and ESLint violations', 'Set up pre-commit hooks to prevent linting issues']],
    ['complexity', ['Refactor complex functions into smaller, focused functions', 'Extract reusable components and utilities']],
    ['documentation', ['Add comprehensive code documentation and comments', 'Create usage examples and API documentation']],
  ],
  dna_compliance: [
    ['design principles', ['Review implementation against the product design principles', 'Enhance pedagogical value and policy-to-practice alignment']],
    ['architecture', ['Ensure API-first design and stateless backend compliance', 'Review separation of concerns and simplicity principles']],
  ],
};

export function recommendationsFor(dimension: QualityDimension, issues: string[]): string[] {
  const lowered = issues.map(i => i.toLowerCase());
  return RECOMMENDATION_RULES[dimension]
    .filter(([keyword]) => lowered.some(issue => issue.includes(keyword)))
    .flatMap(([, recommendations]) => recommendations);
}

// ─── Dimensions ──────────────────────────────────────────

export function passRate(passed: number, total: number): number {
  return total > 0 ? (passed / total) * 100 : 0;
}

function scoreTestCoverage(qa: QaResultsPayload, issues: string[]): number {
  const { coverage_percent: coverage, tests_passed, total_tests, unit_tests, integration_tests } = qa.test_results;
  const rate = passRate(tests_passed, total_tests);

  let score = tiered(
    coverage,
    [
      [95, 40, null],
      [90, 30, `Test coverage below 95% (${coverage}%)`],
      [80, 20, `Test coverage below 90% (${coverage}%)`],
      [-Infinity, 10, `Test coverage critically low (${coverage}%)`],
    ],
    issues
  );

  score += tiered(
    rate,
    [
      [100, 40, null],
      [95, 30, `Some tests failing (${rate.toFixed(1)}% pass rate)`],
      [-Infinity, 10, `Significant test failures (${rate.toFixed(1)}% pass rate)`],
    ],
    issues
  );

  if (unit_tests && integration_tests) {
    score += 20;
  } else if (unit_tests || integration_tests) {
    score += 10;
    issues.push('Missing either unit or integration tests');
  } else {
    issues.push('No comprehensive test suite');
  }

  return score;
}

function scorePerformance(qa: QaResultsPayload, issues: string[]): number {
  const { lighthouse_score: lighthouse, api_response_time_ms: api, page_load_time_ms: page } = qa.performance_metrics;

  return (
    tiered(
      lighthouse,
      [
        [90, 40, null],
        [80, 30, `Lighthouse score below 90 (${lighthouse})`],
        [70, 20, `Lighthouse score below 80 (${lighthouse})`],
        [-Infinity, 10, `Poor Lighthouse score (${lighthouse})`],
      ],
      issues
    ) +
    tieredAtMost(
      api,
      [
        [200, 30, null],
        [500, 20, `API response time above 200ms (${api}ms)`],
        [Infinity, 10, `Slow API response time (${api}ms)`],
      ],
      issues
    ) +
    tieredAtMost(
      page,
      [
        [2000, 30, null],
        [3000, 20, `Page load time above 2s (${page}ms)`],
        [Infinity, 10, `Slow page load time (${page}ms)`],
      ],
      issues
    )
  );
}

function scoreAccessibility(qa: QaResultsPayload, issues: string[]): number {
  const { wcag_compliance_percent: wcag, violations, keyboard_accessible } = qa.accessibility_audit;
  const count = violations.length;

  let score =
    tiered(
      wcag,
      [
        [95, 50, null],
        [90, 40, `WCAG compliance below 95% (${wcag}%)`],
        [80, 30, `WCAG compliance below 90% (${wcag}%)`],
        [-Infinity, 15, `Poor WCAG compliance (${wcag}%)`],
      ],
      issues
    ) +
    tieredAtMost(
      count,
      [
        [0, 30, null],
        [3, 20, `${count} accessibility violations found`],
        [10, 10, `${count} accessibility violations found`],
        [Infinity, 0, `Many accessibility violations (${count})`],
      ],
      issues
    );

  if (keyboard_accessible) {
    score += 20;
  } else {
    issues.push('Keyboard navigation issues');
  }

  return score;
}

function scoreUserExperience(qa: QaResultsPayload, issues: string[]): number {
  const flow = qa.user_flow_validation;
  const rate = flow.flow_completion_rate;
  const satisfaction = flow.user_satisfaction_score;
  const average = flow.average_task_completion_minutes;
  const target = flow.target_completion_minutes;

  return (
    tiered(
      rate,
      [
        [95, 40, null],
        [90, 30, `Flow completion rate below 95% (${rate}%)`],
        [80, 20, `Flow completion rate below 90% (${rate}%)`],
        [-Infinity, 10, `Poor flow completion rate (${rate}%)`],
      ],
      issues
    ) +
    tiered(
      satisfaction,
      [
        [4.5, 30, null],
        [4.0, 25, `User satisfaction below 4.5 (${satisfaction})`],
        [3.5, 15, `User satisfaction below 4.0 (${satisfaction})`],
        [-Infinity, 5, `Poor user satisfaction (${satisfaction})`],
      ],
      issues
    ) +
    tieredAtMost(
      average,
      [
        [target, 30, null],
        [target * 1.2, 20, `Task completion time slightly above target (${average}min vs ${target}min)`],
        [Infinity, 10, `Task completion time too high (${average}min vs ${target}min)`],
      ],
      issues
    )
  );
}

function scoreCodeQuality(qa: QaResultsPayload, issues: string[]): number {
  const metrics = qa.code_quality_metrics;
  const lint = metrics.typescript_errors + metrics.eslint_violations;

  return (
    tieredAtMost(
      lint,
      [
        [0, 40, null],
        [5, 30, `${lint} linting issues found`],
        [15, 20, `${lint} linting issues found`],
        [Infinity, 10, `Many linting issues (${lint})`],
      ],
      issues
    ) +
    tieredAtMost(
      metrics.complexity_score,
      [
        [3, 30, null],
        [5, 20, `Code complexity above ideal (${metrics.complexity_score})`],
        [Infinity, 10, `High code complexity (${metrics.complexity_score})`],
      ],
      issues
    ) +
    tiered(
      metrics.documentation_coverage_percent,
      [
        [80, 30, null],
        [60, 20, `Documentation coverage below 80% (${metrics.documentation_coverage_percent}%)`],
        [-Infinity, 10, `Poor documentation coverage (${metrics.documentation_coverage_percent}%)`],
      ],
      issues
    )
  );
}

export function designPrincipleScores(qa: QaResultsPayload): Record<string, number> {
  const dna = qa.dna_metrics;
  return {
    pedagogical_value: dna.pedagogical_effectiveness_score,
    policy_to_practice: dna.policy_practice_alignment_score,
    time_respect: dna.time_efficiency_score,
    holistic_thinking: dna.holistic_design_score,
    professional_tone: dna.professional_tone_score,
  };
}

function scoreDnaCompliance(qa: QaResultsPayload, issues: string[]): number {
  const design = mean(Object.values(designPrincipleScores(qa)));
  const architecture = qa.dna_metrics.architecture_compliance_percent;

  return (
    tiered(
      design,
      [
        [4.0, 50, null],
        [3.5, 40, `Design principles score below 4.0 (${design.toFixed(1)})`],
        [3.0, 30, `Design principles score below 3.5 (${design.toFixed(1)})`],
        [-Infinity, 15, `Poor design principles compliance (${design.toFixed(1)})`],
      ],
      issues
    ) +
    tiered(
      architecture,
      [
        [95, 50, null],
        [90, 40, `Architecture compliance below 95% (${architecture}%)`],
        [80, 30, `Architecture compliance below 90% (${architecture}%)`],
        [-Infinity, 15, `Poor architecture compliance (${architecture}%)`],
      ],
      issues
    )
  );
}

const DIMENSION_SCORERS: Readonly<Record<QualityDimension, (qa: QaResultsPayload, issues: string[]) => number>> = {
  test_coverage: scoreTestCoverage,
  performance: scorePerformance,
  accessibility: scoreAccessibility,
  user_experience: scoreUserExperience,
  code_quality: scoreCodeQuality,
  dna_compliance: scoreDnaCompliance,
};

export function scoreDimension(dimension: QualityDimension, qa: QaResultsPayload): DimensionResult {
  const issues: string[] = [];
  const score = Math.min(100, DIMENSION_SCORERS[dimension](qa, issues));
  return { score, issues, recommendations: recommendationsFor(dimension, issues) };
}

export function weightedOverallScore(scores: Readonly<Record<QualityDimension, number>>): number {
  return round1(QUALITY_DIMENSIONS.reduce((sum, d) => sum + scores[d] * QUALITY_WEIGHTS[d], 0));
}

/**
 * Scores the six quality dimensions and lists issues: a critical blocking
 * issue when the overall score misses the threshold, plus one warning per
 * dimension finding.
 */
export function analyzeQuality(qa: QaResultsPayload): QualityAssessment {
  const dimensions = {
    test_coverage: scoreDimension('test_coverage', qa),
    performance: scoreDimension('performance', qa),
    accessibility: scoreDimension('accessibility', qa),
    user_experience: scoreDimension('user_experience', qa),
    code_quality: scoreDimension('code_quality', qa),
    dna_compliance: scoreDimension('dna_compliance', qa),
  };

  const scores = {
    test_coverage: dimensions.test_coverage.score,
    performance: dimensions.performance.score,
    accessibility: dimensions.accessibility.score,
    user_experience: dimensions.user_experience.score,
    code_quality: dimensions.code_quality.score,
    dna_compliance: dimensions.dna_compliance.score,
  };

  const overall = weightedOverallScore(scores);
  const issues: QualityIssue[] = [];

  if (overall < QUALITY_THRESHOLD) {
    issues.push({
      type: 'critical',
      category: 'overall_quality',
      message: `Overall quality score below threshold (${overall} < ${QUALITY_THRESHOLD})`,
      impact: 'high',
      blocking: true,
    });
  }

  for (const dimension of QUALITY_DIMENSIONS) {
    for (const message of dimensions[dimension].issues) {
      issues.push({ type: 'warning', category: dimension, message, impact: 'medium', blocking: false });
    }
  }

  const recommendations = [...new Set(QUALITY_DIMENSIONS.flatMap(d => dimensions[d].recommendations))];

  logger.info('quality_analysis', `Overall quality score ${overall}`, { scores, issues: issues.length });

  return {
    analysis: {
      overall_score: overall,
      dimension_scores: scores,
      quality_issues: issues,
      recommendations,
      meets_threshold: overall >= QUALITY_THRESHOLD,
    },
    dimensions,
  };
}
