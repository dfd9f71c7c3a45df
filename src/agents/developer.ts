import { BaseAgent } from './base-agent.js';
import { buildContract } from '../contracts/builder.js';
import { DesignSpecificationPayloadSchema } from '../contracts/schemas.js';
import type { Contract, DesignSpecificationPayload } from '../contracts/schemas.js';
import type { GateInput, StageDeliverables } from '../gates/types.js';
import { validateArchitecture } from '../tools/developer/architecture-validator.js';
import { buildImplementation } from '../tools/developer/implementation-builder.js';
import { DNAComplianceError } from '../errors/types.js';

type DeveloperDeliverables = StageDeliverables['developer'];

/** Generates components, API routes and unit tests from an architecture-checked design. */
export class DeveloperAgent extends BaseAgent<DesignSpecificationPayload, DeveloperDeliverables> {
  readonly stage = 'developer' as const;

  protected extractPayload(contract: Contract): DesignSpecificationPayload {
    return this.parsePayload(contract, DesignSpecificationPayloadSchema);
  }

  protected runTools(design: DesignSpecificationPayload, contract: Contract): DeveloperDeliverables {
    const architecture = validateArchitecture(design);

    if (!architecture.compliant) {
      throw new DNAComplianceError(
        `Architecture validation failed: ${architecture.violations.join('; ')}`,
        this.stage,
        architecture.violations
      );
    }

    return {
      payload: buildImplementation(design, contract.story_id, architecture.architecture_compliance),
    };
  }

  protected gateInput(deliverables: DeveloperDeliverables): GateInput {
    return { stage: this.stage, deliverables };
  }

  protected buildOutputContract(input: Contract, { payload }: DeveloperDeliverables): Contract {
    const components = payload.component_implementations;

    return buildContract({
      storyId: input.story_id,
      source: this.stage,
      target: 'test_engineer',
      previous: input,
      payload,
      producedFiles: [...components.map(c => c.file_path), ...payload.api_implementations.map(a => a.file_path)],
      dna: {
        design: input.dna_compliance.design_principles_validation,
        architecture: payload.implementation_docs.architecture_compliance,
        evidence: {
          typescript_errors: components.reduce((sum, c) => sum + c.typescript_errors, 0),
          eslint_violations: components.reduce((sum, c) => sum + c.eslint_violations, 0),
          unit_test_coverage_percent: payload.test_suite.coverage_percent,
          git_commit_hash: payload.git_commit_hash,
        },
      },
      requiredValidations: [
        'typescript_compilation_successful',
        'eslint_compliance_verified',
        'unit_tests_100_percent_coverage',
        'architecture_principles_followed',
      ],
      validationCriteria: {
        test_quality: { integration_test_coverage: { min: 95 }, e2e_test_coverage: { min: 90 } },
        security: { vulnerability_scan_clean: true, api_security_validated: true },
      },
      deliverableData: {
        integration_test_suite: 'object',
        e2e_test_suite: 'object',
        performance_test_results: 'object',
        security_scan_results: 'object',
      },
    });
  }
}
