import type {
  ImplementationPayload,
  PerformanceResults,
  SecurityScan,
  SuiteResult,
  TestResultsPayload,
} from '../../contracts/schemas.js';
import { QualityGateError } from '../../errors/types.js';
import { mean, round1 } from '../../scoring/keywords.js';
import { MAX_API_RESPONSE_MS } from '../developer/implementation-builder.js';

export const AUTOMATION_STAGES = ['lint', 'unit', 'integration', 'e2e', 'performance'] as const;

const LOAD_TEST_USERS = 100;
const BASE_PAGE_LOAD_MS = 800;
const MS_PER_BUNDLE_KB = 20;

export const TEST_THRESHOLDS = {
  integrationCoverage: 95,
  e2eCoverage: 90,
  apiResponseMs: 200,
  lighthouse: 90,
  overallCoverage: 95,
} as const;

export type AutomationConfig = TestResultsPayload['automation_config'];

export interface TestRunResults {
  unit_test_results: SuiteResult;
  integration_test_results: SuiteResult;
  e2e_test_results: SuiteResult;
  performance_results: PerformanceResults;
  automation_config: AutomationConfig;
  overall_coverage_percent: number;
}

function suite(total: number, passed: number, coverage: number): SuiteResult {
  return { total, passed, failed: total - passed, coverage_percent: round1(coverage) };
}

function percent(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function runUnitSuite(impl: ImplementationPayload): SuiteResult {
  const clean = new Set([
    ...impl.component_implementations
      .filter(c => c.typescript_errors === 0 && c.eslint_violations === 0)
      .map(c => c.name),
    ...impl.api_implementations.filter(a => a.functional_test_passed).map(a => a.name),
  ]);

  const tests = impl.test_suite.unit_tests;
  return suite(tests.length, tests.filter(t => clean.has(t.target)).length, impl.test_suite.coverage_percent);
}

function runIntegrationSuite(impl: ImplementationPayload): SuiteResult {
  const total = impl.component_implementations.length + impl.api_implementations.length;
  const passed =
    impl.component_implementations.filter(c => c.integration_test_passed).length +
    impl.api_implementations.filter(a => a.functional_test_passed).length;

  return suite(total, passed, percent(passed, total));
}

/** A flow passes end to end only when every integration point it crosses passes. */
function runE2eSuite(impl: ImplementationPayload, integration: SuiteResult): SuiteResult {
  const total = impl.interaction_flows.length;
  const passed = integration.failed === 0 ? total : 0;
  return suite(total, passed, percent(passed, total));
}

function measurePerformance(impl: ImplementationPayload): PerformanceResults {
  const times = impl.api_implementations.map(a => a.estimated_response_time_ms);
  const slow = impl.api_implementations.filter(a => !a.performance_test_passed).length;

  return {
    average_api_response_ms: round1(mean(times)),
    max_api_response_ms: times.length > 0 ? Math.max(...times) : 0,
    lighthouse_score: impl.performance_metrics.estimated_lighthouse_score,
    page_load_ms: Math.round(BASE_PAGE_LOAD_MS + impl.performance_metrics.bundle_size_kb * MS_PER_BUNDLE_KB),
    load_test: {
      concurrent_users: LOAD_TEST_USERS,
      error_rate_percent: round1(percent(slow, impl.api_implementations.length)),
      completed: impl.api_implementations.length > 0,
    },
  };
}

export function buildAutomationConfig(storyId: string): AutomationConfig {
  return {
    stages: [...AUTOMATION_STAGES],
    test_commands: {
      lint: 'npm run lint',
      unit: `npm run test:unit -- ${storyId}`,
      integration: `npm run test:integration -- ${storyId}`,
      e2e: `npm run test:e2e -- ${storyId}`,
      performance: `npm run test:performance -- ${storyId}`,
    },
    reporting: {
      format: 'junit',
      coverage: 'lcov',
      output: `reports/${storyId}`,
    },
  };
}

export function runTestSuites(impl: ImplementationPayload, storyId: string): TestRunResults {
  const unit = runUnitSuite(impl);
  const integration = runIntegrationSuite(impl);
  const e2e = runE2eSuite(impl, integration);

  return {
    unit_test_results: unit,
    integration_test_results: integration,
    e2e_test_results: e2e,
    performance_results: measurePerformance(impl),
    automation_config: buildAutomationConfig(storyId),
    overall_coverage_percent: round1(
      mean([unit.coverage_percent, integration.coverage_percent, e2e.coverage_percent])
    ),
  };
}

// ─── Fatal thresholds ────────────────────────────────────

export function findThresholdFailures(results: TestRunResults, security: SecurityScan): string[] {
  const failures: string[] = [];

  if (results.integration_test_results.coverage_percent < TEST_THRESHOLDS.integrationCoverage) {
    failures.push(
      `Integration coverage ${results.integration_test_results.coverage_percent}% below ${TEST_THRESHOLDS.integrationCoverage}%`
    );
  }
  if (results.e2e_test_results.coverage_percent < TEST_THRESHOLDS.e2eCoverage) {
    failures.push(`E2E coverage ${results.e2e_test_results.coverage_percent}% below ${TEST_THRESHOLDS.e2eCoverage}%`);
  }
  if (results.performance_results.average_api_response_ms > TEST_THRESHOLDS.apiResponseMs) {
    failures.push(
      `Average API response ${results.performance_results.average_api_response_ms}ms exceeds ${TEST_THRESHOLDS.apiResponseMs}ms`
    );
  }
  if (results.performance_results.lighthouse_score < TEST_THRESHOLDS.lighthouse) {
    failures.push(
      `Lighthouse score ${results.performance_results.lighthouse_score} below ${TEST_THRESHOLDS.lighthouse}`
    );
  }
  if (security.critical_vulnerabilities > 0 || security.high_vulnerabilities > 0) {
    failures.push(
      `${security.critical_vulnerabilities} critical and ${security.high_vulnerabilities} high vulnerabilities found`
    );
  }
  if (results.overall_coverage_percent < TEST_THRESHOLDS.overallCoverage) {
    failures.push(`Overall coverage ${results.overall_coverage_percent}% below ${TEST_THRESHOLDS.overallCoverage}%`);
  }

  return failures;
}

export function enforceTestThresholds(results: TestRunResults, security: SecurityScan): void {
  const failures = findThresholdFailures(results, security);
  if (failures.length > 0) {
    throw new QualityGateError(
      `Test quality gates failed: ${failures.join('; ')}`,
      'test_quality_thresholds',
      'test_engineer',
      { failures }
    );
  }
}

export function findTestabilityIssues(impl: ImplementationPayload): string[] {
  const issues: string[] = [];

  for (const c of impl.component_implementations) {
    if (c.typescript_errors > 0) issues.push(`${c.name} has ${c.typescript_errors} TypeScript errors`);
    if (c.eslint_violations > 0) issues.push(`${c.name} has ${c.eslint_violations} ESLint violations`);
    if (!c.integration_test_passed) issues.push(`${c.name} fails integration`);
  }

  for (const a of impl.api_implementations) {
    if (!a.functional_test_passed) issues.push(`${a.method} ${a.path} fails its functional test`);
    if (!a.performance_test_passed || a.estimated_response_time_ms > MAX_API_RESPONSE_MS) {
      issues.push(`${a.method} ${a.path} responds in ${a.estimated_response_time_ms}ms`);
    }
  }

  return issues;
}

export function enforceTestability(impl: ImplementationPayload): void {
  const issues = findTestabilityIssues(impl);
  if (issues.length > 0) {
    throw new QualityGateError(
      `Implementation testability validation failed: ${issues.join('; ')}`,
      'implementation_testability',
      'test_engineer',
      { issues }
    );
  }
}
