import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { featureContract } from './fixtures.js';
import { canonicalStringify, contractFingerprint } from '../src/contracts/fingerprint.js';
import type { Contract } from '../src/contracts/schemas.js';

describe('canonicalStringify', () => {
  it('sorts keys recursively and keeps array order', () => {
    assert.equal(
      canonicalStringify({ b: 1, a: [2, { d: undefined, c: 'x' }] }),
      '{"a":[2,{"c":"x"}],"b":1}'
    );
  });

  it('writes null for absent values', () => {
    assert.equal(canonicalStringify(null), 'null');
    assert.equal(canonicalStringify(undefined), 'null');
    assert.equal(canonicalStringify([undefined, true]), '[null,true]');
  });
});

describe('contractFingerprint', () => {
  it('is sixteen hex characters', () => {
    assert.match(contractFingerprint(featureContract()), /^[0-9a-f]{16}$/);
  });

  it('ignores key order', () => {
    const contract = featureContract();
    const { story_id, ...rest } = contract;
    const reordered: Contract = { ...rest, story_id };

    assert.equal(contractFingerprint(reordered), contractFingerprint(contract));
    assert.equal(contractFingerprint(featureContract()), contractFingerprint(contract));
  });

  it('changes with any field', () => {
    const contract = featureContract();
    assert.notEqual(
      contractFingerprint({ ...contract, quality_gates: ['dna_compliance_verified'] }),
      contractFingerprint(contract)
    );
    assert.notEqual(contractFingerprint(featureContract({ user_persona: 'Bob' })), contractFingerprint(contract));
  });
});
