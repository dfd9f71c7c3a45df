import type {
  ApiImplementation,
  ComponentImplementation,
  TestResultsPayload,
  UiComponentSpec,
} from '../../contracts/schemas.js';
import { clamp, countKeywordMatches, getKeywordCatalog, round1 } from '../../scoring/keywords.js';

export type TestOptimization = TestResultsPayload['test_optimization'];
export type PredictedFailure = TestOptimization['predicted_failures'][number];
export type RiskLevel = 'critical' | 'high' | 'medium' | 'low' | 'minimal';

interface FailurePattern {
  pattern: string;
  probability: number;
  matches: (source: string) => boolean;
}

const FAILURE_PATTERNS: readonly FailurePattern[] = [
  {
    pattern: 'useEffect with empty dependency array',
    probability: 0.7,
    matches: source => /useEffect\(/.test(source) && /,\s*\[\]\s*\)/.test(source),
  },
  {
    pattern: 'async function without await',
    probability: 0.6,
    matches: source => /\basync\b/.test(source) && !/\bawait\b/.test(source),
  },
  {
    pattern: 'personal data handled without consent check',
    probability: 0.9,
    matches: source => /personal/i.test(source) && !/consent/i.test(source),
  },
  {
    pattern: 'input without aria attributes',
    probability: 0.8,
    matches: source => source.includes('<input') && !source.includes('aria-'),
  },
];

const RISK_BANDS: ReadonlyArray<[number, RiskLevel]> = [
  [80, 'critical'],
  [65, 'high'],
  [45, 'medium'],
  [25, 'low'],
];

const PURPOSE_IMPACT: Readonly<Record<string, number>> = {
  user_input: 0.9,
  form_submission: 0.9,
  assessment: 0.8,
  primary_action: 0.7,
  feedback: 0.6,
};

export function predictFailures(name: string, source: string): PredictedFailure[] {
  return FAILURE_PATTERNS.filter(p => p.matches(source)).map(p => ({
    component: name,
    pattern: p.pattern,
    probability: p.probability,
  }));
}

export function riskLevel(priorityScore: number): RiskLevel {
  for (const [threshold, level] of RISK_BANDS) {
    if (priorityScore >= threshold) return level;
  }
  return 'minimal';
}

function technicalRisk(component: ComponentImplementation, predicted: number): number {
  const indicators = countKeywordMatches(
    component.source_code,
    getKeywordCatalog().test_optimizer.complexity_indicators
  );
  const defects = component.typescript_errors + component.eslint_violations;

  return clamp(
    0.2 + indicators * 0.05 + defects * 0.1 + (predicted > 0 ? 0.3 : 0) + (component.integration_test_passed ? 0 : 0.2),
    0,
    1
  );
}

function businessImpact(component: ComponentImplementation, spec: UiComponentSpec | undefined): number {
  const keywordHits = countKeywordMatches(
    `${component.name} ${spec?.purpose ?? ''}`,
    getKeywordCatalog().test_optimizer.business_impact
  );
  const base = spec ? (PURPOSE_IMPACT[spec.purpose] ?? 0.5) : 0.5;
  return clamp(base + keywordHits * 0.1, 0, 1);
}

function relevance(spec: UiComponentSpec | undefined): number {
  if (!spec) return 0.5;
  return spec.library_source === 'kenney_ui' ? 0.8 : 0.6;
}

export function priorityScore(technical: number, impact: number, relevanceScore: number): number {
  return round1(technical * 40 + impact * 35 + relevanceScore * 25);
}

export function estimateExecutionMinutes(components: number, apis: number): number {
  return round1(components * 0.5 + apis * 0.3 + 2);
}

/**
 * Ranks components by risk-weighted priority and predicts likely failures
 * from source patterns.
 */
export function optimizeTestPlan(
  components: ComponentImplementation[],
  apis: ApiImplementation[],
  specs: UiComponentSpec[]
): TestOptimization {
  const specByName = new Map(specs.map(s => [s.name, s]));

  const predicted = [
    ...components.flatMap(c => predictFailures(c.name, c.source_code)),
    ...apis.flatMap(a => predictFailures(a.name, a.source_code)),
  ];

  const prioritized = components
    .map(component => {
      const spec = specByName.get(component.name);
      const ownFailures = predicted.filter(p => p.component === component.name).length;
      const score = priorityScore(
        technicalRisk(component, ownFailures),
        businessImpact(component, spec),
        relevance(spec)
      );
      return { name: component.name, priority_score: score, risk_level: riskLevel(score) };
    })
    .sort((a, b) => b.priority_score - a.priority_score);

  return {
    prioritized_components: prioritized,
    predicted_failures: predicted,
    estimated_execution_minutes: estimateExecutionMinutes(components.length, apis.length),
  };
}
