import type { DeploymentReadiness, QaResultsPayload, ReadinessCheck } from '../../contracts/schemas.js';
import { mean, round1 } from '../../scoring/keywords.js';
import { logger } from '../../observability/logger.js';
import { designPrincipleScores, passRate } from './quality-scorer.js';

export const PRODUCTION_REQUIREMENTS = {
  lighthouseMin: 90,
  apiResponseMaxMs: 200,
  pageLoadMaxMs: 3000,
  testCoverageMinPercent: 95,
  wcagMinPercent: 90,
  architectureMinPercent: 85,
  inputValidationMin: 95,
  maxMediumVulnerabilities: 5,
  designPrinciplesMin: 4.0,
  principleMin: 3.5,
  minDevicesTested: 3,
} as const;

export const REQUIRED_BROWSERS = ['Chrome', 'Firefox', 'Safari', 'Edge'] as const;

export const READINESS_CHECKS = [
  'performance',
  'security',
  'accessibility',
  'dna_compliance',
  'test_coverage',
  'compatibility',
] as const;

export type ReadinessCheckName = (typeof READINESS_CHECKS)[number];

function check(requirement: string, issues: string[], metrics: Record<string, unknown>): ReadinessCheck {
  return {
    passed: issues.length === 0,
    requirement,
    issues,
    metrics,
    issue: issues.length > 0 ? issues.join('; ') : null,
  };
}

function validatePerformance(qa: QaResultsPayload): ReadinessCheck {
  const { lighthouse_score, api_response_time_ms, page_load_time_ms } = qa.performance_metrics;
  const req = PRODUCTION_REQUIREMENTS;
  const issues: string[] = [];

  if (lighthouse_score < req.lighthouseMin) {
    issues.push(`Lighthouse score too low: ${lighthouse_score} < ${req.lighthouseMin}`);
  }
  if (api_response_time_ms > req.apiResponseMaxMs) {
    issues.push(`API response time too slow: ${api_response_time_ms}ms > ${req.apiResponseMaxMs}ms`);
  }
  if (page_load_time_ms > req.pageLoadMaxMs) {
    issues.push(`Page load time too slow: ${page_load_time_ms}ms > ${req.pageLoadMaxMs}ms`);
  }

  return check(`Lighthouse ≥ ${req.lighthouseMin}, API ≤ ${req.apiResponseMaxMs}ms, page load ≤ ${req.pageLoadMaxMs}ms`, issues, {
    lighthouse_score,
    api_response_time_ms,
    page_load_time_ms,
  });
}

function validateSecurity(qa: QaResultsPayload): ReadinessCheck {
  const audit = qa.security_audit;
  const req = PRODUCTION_REQUIREMENTS;
  const issues: string[] = [];

  if (audit.critical_vulnerabilities > 0) {
    issues.push(`${audit.critical_vulnerabilities} critical security vulnerabilities found`);
  }
  if (audit.high_vulnerabilities > 0) {
    issues.push(`${audit.high_vulnerabilities} high-severity security vulnerabilities found`);
  }
  if (audit.medium_vulnerabilities > req.maxMediumVulnerabilities) {
    issues.push(
      `${audit.medium_vulnerabilities} medium-severity vulnerabilities (max ${req.maxMediumVulnerabilities} allowed)`
    );
  }
  if (!audit.authentication_implemented) {
    issues.push('Authentication not properly implemented');
  }
  if (audit.input_validation_score < req.inputValidationMin) {
    issues.push(`Input validation score too low: ${audit.input_validation_score} < ${req.inputValidationMin}`);
  }
  if (!audit.secure_headers_implemented) {
    issues.push('Security headers not properly configured');
  }

  return check('No critical or high vulnerabilities, authentication, input validation and secure headers', issues, {
    ...audit,
  });
}

function validateAccessibility(qa: QaResultsPayload): ReadinessCheck {
  const audit = qa.accessibility_audit;
  const req = PRODUCTION_REQUIREMENTS;
  const issues: string[] = [];

  if (audit.wcag_compliance_percent < req.wcagMinPercent) {
    issues.push(`WCAG compliance too low: ${audit.wcag_compliance_percent}% < ${req.wcagMinPercent}%`);
  }
  if (audit.violations.length > 0) {
    issues.push(`${audit.violations.length} accessibility violations must be fixed`);
  }
  if (!audit.keyboard_accessible) {
    issues.push('Keyboard navigation not fully accessible');
  }

  return check(`WCAG AA ≥ ${req.wcagMinPercent}%, no violations, keyboard accessible`, issues, {
    wcag_compliance_percent: audit.wcag_compliance_percent,
    violations_count: audit.violations.length,
    keyboard_accessible: audit.keyboard_accessible,
  });
}

function validateDna(qa: QaResultsPayload): ReadinessCheck {
  const req = PRODUCTION_REQUIREMENTS;
  const principles = designPrincipleScores(qa);
  const average = round1(mean(Object.values(principles)));
  const architecture = qa.dna_metrics.architecture_compliance_percent;
  const issues: string[] = [];

  if (average < req.designPrinciplesMin) {
    issues.push(`Design principles score too low: ${average} < ${req.designPrinciplesMin.toFixed(1)}`);
  }
  if (architecture < req.architectureMinPercent) {
    issues.push(`Architecture compliance too low: ${architecture}% < ${req.architectureMinPercent}%`);
  }
  for (const [principle, score] of Object.entries(principles)) {
    if (score < req.principleMin) {
      issues.push(`DNA principle '${principle}' score too low: ${score} < ${req.principleMin}`);
    }
  }

  return check(
    `Design principles average ≥ ${req.designPrinciplesMin.toFixed(1)}, each ≥ ${req.principleMin}, architecture ≥ ${req.architectureMinPercent}%`,
    issues,
    { design_principles_avg: average, architecture_compliance_percent: architecture, principles }
  );
}

function validateTestCoverage(qa: QaResultsPayload): ReadinessCheck {
  const req = PRODUCTION_REQUIREMENTS;
  const coverage = qa.test_results.coverage_percent;
  const rate = round1(passRate(qa.test_results.tests_passed, qa.test_results.total_tests));
  const issues: string[] = [];

  if (coverage < req.testCoverageMinPercent) {
    issues.push(`Test coverage too low: ${coverage}% < ${req.testCoverageMinPercent}%`);
  }
  if (rate < 100) {
    issues.push(`Not all tests passing: ${rate}% pass rate`);
  }

  return check(`Coverage ≥ ${req.testCoverageMinPercent}% with every test passing`, issues, {
    coverage_percent: coverage,
    pass_rate: rate,
  });
}

function validateCompatibility(qa: QaResultsPayload): ReadinessCheck {
  const { browser_compatibility, mobile_compatibility } = qa.compatibility;
  const issues: string[] = [];

  for (const browser of REQUIRED_BROWSERS) {
    if (!browser_compatibility.supported_browsers.includes(browser)) {
      issues.push(`Browser ${browser} not fully supported`);
    }
  }
  if (!mobile_compatibility.responsive_design) {
    issues.push('Responsive design not properly implemented');
  }
  if (mobile_compatibility.devices_tested < PRODUCTION_REQUIREMENTS.minDevicesTested) {
    issues.push(
      `Insufficient device testing: ${mobile_compatibility.devices_tested} devices (minimum ${PRODUCTION_REQUIREMENTS.minDevicesTested})`
    );
  }

  return check(`${REQUIRED_BROWSERS.join(', ')} supported, responsive, ${PRODUCTION_REQUIREMENTS.minDevicesTested}+ devices`, issues, {
    supported_browsers: browser_compatibility.supported_browsers,
    devices_tested: mobile_compatibility.devices_tested,
  });
}

const READINESS_VALIDATORS: Readonly<Record<ReadinessCheckName, (qa: QaResultsPayload) => ReadinessCheck>> = {
  performance: validatePerformance,
  security: validateSecurity,
  accessibility: validateAccessibility,
  dna_compliance: validateDna,
  test_coverage: validateTestCoverage,
  compatibility: validateCompatibility,
};

export function validateDeploymentReadiness(qa: QaResultsPayload): DeploymentReadiness {
  const checks: Record<string, ReadinessCheck> = {};
  const blocking: string[] = [];

  for (const name of READINESS_CHECKS) {
    const result = READINESS_VALIDATORS[name](qa);
    checks[name] = result;
    if (result.issue !== null) {
      blocking.push(`${name}: ${result.issue}`);
    }
  }

  const passed = READINESS_CHECKS.filter(name => checks[name].passed).length;
  const score = round1((passed / READINESS_CHECKS.length) * 100);

  if (blocking.length > 0) {
    logger.warn('deployment_readiness', `${blocking.length} readiness checks failed`, { blocking });
  }

  return {
    deployment_ready: blocking.length === 0,
    readiness_score: score,
    readiness_checks: checks,
    blocking_issues: blocking,
  };
}
