import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { STORY_ID, lastContractOf } from './fixtures.js';
import { ImplementationPayloadSchema } from '../src/contracts/schemas.js';
import { scanImplementation } from '../src/tools/test-engineer/security-scanner.js';
import {
  estimateExecutionMinutes,
  optimizeTestPlan,
  predictFailures,
  priorityScore,
  riskLevel,
} from '../src/tools/test-engineer/test-optimizer.js';
import {
  buildAutomationConfig,
  enforceTestThresholds,
  enforceTestability,
  findTestabilityIssues,
  findThresholdFailures,
  runTestSuites,
} from '../src/tools/test-engineer/test-runner.js';
import { QualityGateError } from '../src/errors/types.js';

async function implementation() {
  const contract = await lastContractOf('developer');
  return ImplementationPayloadSchema.parse(contract.input_requirements.required_data);
}

describe('runTestSuites', () => {
  it('passes every suite for a clean implementation', async () => {
    const results = runTestSuites(await implementation(), STORY_ID);

    assert.deepEqual(results.unit_test_results, { total: 9, passed: 9, failed: 0, coverage_percent: 100 });
    assert.deepEqual(results.integration_test_results, { total: 9, passed: 9, failed: 0, coverage_percent: 100 });
    assert.deepEqual(results.e2e_test_results, { total: 1, passed: 1, failed: 0, coverage_percent: 100 });
    assert.equal(results.overall_coverage_percent, 100);
  });

  it('measures API response times', async () => {
    const { performance_results: performance } = runTestSuites(await implementation(), STORY_ID);

    assert.equal(performance.average_api_response_ms, 120);
    assert.equal(performance.max_api_response_ms, 160);
    assert.equal(performance.lighthouse_score, 97);
    assert.deepEqual(performance.load_test, { concurrent_users: 100, error_rate_percent: 0, completed: true });
  });

  it('fails every flow end to end when an integration point fails', async () => {
    const impl = await implementation();
    const results = runTestSuites(
      {
        ...impl,
        component_implementations: impl.component_implementations.map((c, i) =>
          i === 0 ? { ...c, integration_test_passed: false } : c
        ),
      },
      STORY_ID
    );

    assert.equal(results.integration_test_results.passed, 8);
    assert.equal(results.e2e_test_results.passed, 0);
    assert.equal(results.e2e_test_results.coverage_percent, 0);
  });

  it('scopes automation commands to the story', () => {
    const config = buildAutomationConfig(STORY_ID);

    assert.deepEqual(config.stages, ['lint', 'unit', 'integration', 'e2e', 'performance']);
    assert.equal(config.test_commands.unit, `npm run test:unit -- ${STORY_ID}`);
    assert.equal(config.reporting.output, `reports/${STORY_ID}`);
  });
});

describe('test thresholds', () => {
  it('finds nothing for a clean run', async () => {
    const impl = await implementation();
    const results = runTestSuites(impl, STORY_ID);
    const security = scanImplementation(impl.component_implementations, impl.api_implementations);

    assert.deepEqual(findThresholdFailures(results, security), []);
    assert.doesNotThrow(() => enforceTestThresholds(results, security));
  });

  it('throws a quality gate error listing each failure', async () => {
    const impl = await implementation();
    const results = runTestSuites(impl, STORY_ID);
    const security = scanImplementation(impl.component_implementations, impl.api_implementations);
    const degraded = {
      ...results,
      performance_results: { ...results.performance_results, lighthouse_score: 85 },
    };

    assert.deepEqual(findThresholdFailures(degraded, security), ['Lighthouse score 85 below 90']);
    assert.throws(
      () => enforceTestThresholds(degraded, security),
      (error: unknown) =>
        error instanceof QualityGateError &&
        error.gateName === 'test_quality_thresholds' &&
        error.stage === 'test_engineer'
    );
  });

  it('rejects implementations with static errors or slow endpoints', async () => {
    const impl = await implementation();
    const [component] = impl.component_implementations;
    const [api] = impl.api_implementations;
    assert.ok(component && api);

    const broken = {
      ...impl,
      component_implementations: [{ ...component, typescript_errors: 2 }],
      api_implementations: [{ ...api, estimated_response_time_ms: 450, performance_test_passed: false }],
    };

    assert.deepEqual(findTestabilityIssues(broken), [
      `${component.name} has 2 TypeScript errors`,
      `${api.method} ${api.path} responds in 450ms`,
    ]);
    assert.throws(() => enforceTestability(broken), QualityGateError);
  });
});

describe('scanImplementation', () => {
  it('reports no findings for generated code', async () => {
    const impl = await implementation();
    const scan = scanImplementation(impl.component_implementations, impl.api_implementations);

    assert.deepEqual(scan.vulnerabilities, []);
    assert.equal(scan.security_compliance_met, true);
  });

  it('flags injection patterns and unguarded routes', async () => {
    const impl = await implementation();
    const [component] = impl.component_implementations;
    const [api] = impl.api_implementations;
    assert.ok(component && api);

    const scan = scanImplementation(
      [{ ...component, source_code: 'const value = eval(input);' }],
      [{ ...api, source_code: "router.get('/api/open', async (req, res) => res.json({}));" }]
    );

    assert.deepEqual(
      scan.vulnerabilities.map(v => `${v.severity} ${v.category}`),
      ['critical A03:2021-Injection', 'high A01:2021-Broken Access Control']
    );
    assert.equal(scan.critical_vulnerabilities, 1);
    assert.equal(scan.high_vulnerabilities, 1);
    assert.equal(scan.security_compliance_met, false);
  });

  it('flags hard-coded credentials', () => {
    const scan = scanImplementation(
      [
        {
          name: 'LoginForm',
          file_path: `frontend/src/components/${STORY_ID}/LoginForm.tsx`,
          source_code: "const password = 'test-secret';",
          typescript_errors: 0,
          eslint_violations: 0,
          unit_test_coverage: 100,
          integration_test_passed: true,
          estimated_bundle_kb: 2,
        },
      ],
      []
    );

    assert.equal(scan.vulnerabilities[0]?.description, 'Hard-coded credential in source');
  });
});

describe('test optimizer', () => {
  it('predicts failures from source patterns', () => {
    assert.deepEqual(predictFailures('Loader', 'const load = async () => fetch(url);'), [
      { component: 'Loader', pattern: 'async function without await', probability: 0.6 },
    ]);
    assert.deepEqual(predictFailures('Clean', 'export const x = 1;'), []);
  });

  it('bands priority scores into risk levels', () => {
    assert.equal(riskLevel(80), 'critical');
    assert.equal(riskLevel(65), 'high');
    assert.equal(riskLevel(50), 'medium');
    assert.equal(riskLevel(30), 'low');
    assert.equal(riskLevel(10), 'minimal');
    assert.equal(priorityScore(1, 1, 1), 100);
  });

  it('orders components by descending priority', async () => {
    const impl = await implementation();
    const plan = optimizeTestPlan(impl.component_implementations, impl.api_implementations, impl.ui_components);
    const scores = plan.prioritized_components.map(c => c.priority_score);

    assert.equal(plan.prioritized_components.length, 5);
    assert.deepEqual(scores, [...scores].sort((a, b) => b - a));
    assert.equal(plan.estimated_execution_minutes, estimateExecutionMinutes(5, 4));
    assert.equal(estimateExecutionMinutes(5, 4), 5.7);
  });
});
