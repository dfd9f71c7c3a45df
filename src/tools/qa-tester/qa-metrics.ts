import type {
  ApiImplementation,
  ComponentImplementation,
  Compatibility,
  ContentQuality,
  DesignPrinciplesValidation,
  DnaCompliance,
  DnaMetrics,
  SecurityAudit,
  SecurityScan,
  UiComponentSpec,
  UserFlowValidation,
} from '../../contracts/schemas.js';
import { ARCHITECTURE_PRINCIPLES } from '../../contracts/schemas.js';
import { clamp, countKeywordMatches, getKeywordCatalog, mean, round1 } from '../../scoring/keywords.js';

export const SUPPORTED_BROWSERS = ['Chrome', 'Firefox', 'Safari', 'Edge'];
const DEVICES_TESTED = 3;

const GUARDED_ROUTE = /router\.\w+\([^)]*requireAuth/;
const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export interface CodeQualityMetrics {
  typescript_errors: number;
  eslint_violations: number;
  complexity_score: number;
  documentation_coverage_percent: number;
}

export function measureCodeQuality(
  components: ComponentImplementation[],
  apis: ApiImplementation[]
): CodeQualityMetrics {
  const sources = [...components, ...apis].map(item => item.source_code);
  const indicators = getKeywordCatalog().test_optimizer.complexity_indicators;
  const documented = sources.filter(s => s.trimStart().startsWith('/**')).length;

  return {
    typescript_errors: components.reduce((sum, c) => sum + c.typescript_errors, 0),
    eslint_violations: components.reduce((sum, c) => sum + c.eslint_violations, 0),
    complexity_score: round1(mean(sources.map(s => countKeywordMatches(s, indicators)))),
    documentation_coverage_percent: sources.length > 0 ? round1((documented / sources.length) * 100) : 0,
  };
}

function timeEfficiency(completionMinutes: number, targetMinutes: number): number {
  const ratio = targetMinutes > 0 ? completionMinutes / targetMinutes : 1;
  return round1(clamp(5 - Math.max(0, ratio - 0.5) * 2, 1, 5));
}

/**
 * Five design scores on a 1-5 scale plus the share of architecture flags the
 * incoming contract carried.
 */
export function measureDnaMetrics(
  content: ContentQuality,
  flows: UserFlowValidation,
  completionMinutes: number,
  components: UiComponentSpec[],
  dna: DnaCompliance
): DnaMetrics {
  const design: DesignPrinciplesValidation = dna.design_principles_validation;
  const architectureMet = ARCHITECTURE_PRINCIPLES.filter(p => dna.architecture_compliance[p]).length;

  const holistic =
    3 +
    (design.holistic_thinking ? 1 : 0) +
    (flows.flow_completion_rate === 100 ? 0.5 : 0) +
    (components.length > 0 && components.every(c => c.responsive_design) ? 0.5 : 0);

  return {
    pedagogical_effectiveness_score: content.pedagogical_score,
    policy_practice_alignment_score: round1(
      clamp(content.policy_relevance_score + (design.policy_to_practice ? 1 : 0), 1, 5)
    ),
    time_efficiency_score: timeEfficiency(completionMinutes, flows.target_completion_minutes),
    holistic_design_score: round1(clamp(holistic, 1, 5)),
    professional_tone_score: content.professional_tone_score,
    architecture_compliance_percent: round1((architectureMet / ARCHITECTURE_PRINCIPLES.length) * 100),
  };
}

export function auditSecurity(scan: SecurityScan, apis: ApiImplementation[]): SecurityAudit {
  const guarded = apis.filter(a => a.authentication_required).every(a => GUARDED_ROUTE.test(a.source_code));
  const mutating = apis.filter(a => MUTATING_METHODS.has(a.method));
  const validated = mutating.filter(a => a.source_code.includes('validate(req.')).length;

  return {
    critical_vulnerabilities: scan.critical_vulnerabilities,
    high_vulnerabilities: scan.high_vulnerabilities,
    medium_vulnerabilities: scan.medium_vulnerabilities,
    authentication_implemented: guarded,
    input_validation_score: mutating.length > 0 ? round1((validated / mutating.length) * 100) : 100,
    secure_headers_implemented: apis.length > 0 && apis.every(a => a.source_code.includes('setSecureHeaders(res)')),
  };
}

export function checkCompatibility(components: UiComponentSpec[]): Compatibility {
  return {
    browser_compatibility: { supported_browsers: [...SUPPORTED_BROWSERS] },
    mobile_compatibility: {
      responsive_design: components.length > 0 && components.every(c => c.responsive_design && c.breakpoints.length > 0),
      devices_tested: DEVICES_TESTED,
    },
  };
}
