import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { STORY_ID, featureContract, runStagesThrough, withPayload } from './fixtures.js';
import {
  STORY_ID_PATTERN,
  enforceContract,
  validateContract,
  validateContractChain,
} from '../src/contracts/validator.js';
import { ContractValidationError } from '../src/errors/types.js';

describe('validateContract', () => {
  it('accepts a fresh feature request and warns about missing gates', () => {
    const result = validateContract(featureContract());

    assert.equal(result.isValid, true);
    assert.deepEqual(result.errors, []);
    assert.deepEqual(result.warnings, ['No quality gates defined - consider adding automated checks']);
  });

  it('rejects values that are not objects', () => {
    for (const value of [null, 'contract', 42, []]) {
      const result = validateContract(value);
      assert.equal(result.isValid, false);
      assert.deepEqual(result.errors, ['Contract must be a JSON object']);
    }
  });

  it('reports a missing envelope field by name', () => {
    const { story_id: _dropped, ...rest } = featureContract();
    const result = validateContract(rest);

    assert.equal(result.isValid, false);
    assert.ok(result.errors.includes("Missing required field 'story_id' at root level"));
  });

  it('rejects a handoff that skips a stage', () => {
    const result = validateContract({ ...featureContract(), target_agent: 'developer' });

    assert.deepEqual(result.errors, ['Invalid agent sequence: github → developer']);
  });

  it('rejects malformed story ids and untraceable file paths', () => {
    const result = validateContract({ ...featureContract(), story_id: 'STORY-1' });

    assert.deepEqual(result.errors, [
      'Invalid story ID format: STORY-1',
      'File paths must contain story_id for traceability',
    ]);
  });

  it('requires every design principle to be present', () => {
    const contract = featureContract();
    const { time_respect: _dropped, ...partial } = contract.dna_compliance.design_principles_validation;
    const result = validateContract({
      ...contract,
      dna_compliance: { ...contract.dna_compliance, design_principles_validation: partial },
    });

    assert.deepEqual(result.errors, ['Missing design principle validation: time_respect']);
  });

  it('requires every architecture principle to be present', () => {
    const contract = featureContract();
    const { api_first: _dropped, ...partial } = contract.dna_compliance.architecture_compliance;
    const result = validateContract({
      ...contract,
      dna_compliance: { ...contract.dna_compliance, architecture_compliance: partial },
    });

    assert.deepEqual(result.errors, ['Missing architecture principle: api_first']);
  });

  it('rejects unknown and non-boolean principle keys', () => {
    const contract = featureContract();
    const result = validateContract({
      ...contract,
      dna_compliance: {
        ...contract.dna_compliance,
        design_principles_validation: {
          ...contract.dna_compliance.design_principles_validation,
          time_respect: 'yes',
          extra: true,
        },
      },
    });

    assert.deepEqual(result.errors, [
      "DNA principle 'time_respect' in design_principles_validation must be boolean",
      "Unknown key 'extra' in design_principles_validation",
    ]);
  });

  it('rejects a payload that does not belong to the source agent', () => {
    const contract = featureContract();
    const result = validateContract(
      withPayload(contract, { ...contract.input_requirements.required_data, payload_type: 'story_breakdown' })
    );

    assert.deepEqual(result.errors, [
      "Unexpected payload type 'story_breakdown' for source agent github (expected feature_request)",
    ]);
  });

  it('rejects unknown quality gates', () => {
    const result = validateContract({ ...featureContract(), quality_gates: ['not_a_gate'] });

    assert.deepEqual(result.errors, ['Unknown quality gate: not_a_gate']);
    assert.deepEqual(result.warnings, []);
  });

  it('accepts every contract the stages produce', async () => {
    const contracts = await runStagesThrough('quality_reviewer');

    for (const contract of contracts) {
      const result = validateContract(contract);
      assert.equal(result.isValid, true, `${contract.source_agent}: ${result.errors.join('; ')}`);
    }
  });
});

describe('STORY_ID_PATTERN', () => {
  it('matches prefixed, numbered story ids', () => {
    assert.ok(STORY_ID_PATTERN.test(STORY_ID));
    assert.ok(STORY_ID_PATTERN.test('STORY-GH-42'));
    assert.ok(!STORY_ID_PATTERN.test('STORY-42'));
    assert.ok(!STORY_ID_PATTERN.test('story-gh-42'));
  });
});

describe('enforceContract', () => {
  it('returns the typed contract when valid', () => {
    const contract = enforceContract(featureContract());
    assert.equal(contract.story_id, STORY_ID);
    assert.equal(contract.target_agent, 'project_manager');
  });

  it('throws ContractValidationError with the collected errors', () => {
    assert.throws(
      () => enforceContract({ ...featureContract(), target_agent: 'developer' }, 'Input contract'),
      (error: unknown) => {
        assert.ok(error instanceof ContractValidationError);
        assert.equal(error.message, 'Input contract validation failed: Invalid agent sequence: github → developer');
        assert.deepEqual(error.errors, ['Invalid agent sequence: github → developer']);
        return true;
      }
    );
  });
});

describe('validateContractChain', () => {
  it('accepts the chain produced by a full run', async () => {
    const chain = [featureContract(), ...(await runStagesThrough('quality_reviewer'))];
    const result = validateContractChain(chain);

    assert.deepEqual(result.errors, []);
    assert.equal(result.isValid, true);
  });

  it('detects dropped gates and criteria', async () => {
    const [pm, gd] = await runStagesThrough('game_designer');
    assert.ok(pm && gd);
    const firstGate = pm.quality_gates[0];
    assert.ok(firstGate);

    const result = validateContractChain([
      pm,
      {
        ...gd,
        quality_gates: gd.quality_gates.filter(gate => gate !== firstGate),
        handoff_criteria: gd.handoff_criteria.filter(c => c !== 'feature_request_received'),
      },
    ]);

    assert.deepEqual(result.errors, [
      `Quality gate dropped at project_manager → game_designer: ${firstGate}`,
      'Handoff criterion dropped at project_manager → game_designer: feature_request_received',
    ]);
  });

  it('detects a story id change and a broken handoff', () => {
    const first = featureContract();
    const second = { ...featureContract({}, 'STORY-TEST-002'), source_agent: 'game_designer' as const };
    const result = validateContractChain([first, second]);

    assert.deepEqual(result.errors, [
      'Story ID changed across github → game_designer: STORY-TEST-001 → STORY-TEST-002',
      'Broken handoff at github → game_designer: contract was addressed to project_manager',
    ]);
  });
});
