import { BaseAgent } from './base-agent.js';
import { buildContract } from '../contracts/builder.js';
import { StoryBreakdownPayloadSchema } from '../contracts/schemas.js';
import type { Contract, StoryBreakdownPayload } from '../contracts/schemas.js';
import type { GateInput, StageDeliverables } from '../gates/types.js';
import { buildDesignSpecification } from '../tools/game-designer/design-builder.js';
import { validateUxDesign } from '../tools/game-designer/ux-validator.js';
import { DNAComplianceError } from '../errors/types.js';

type GameDesignerDeliverables = StageDeliverables['game_designer'];

/** Designs mechanics, components and flows for a story, then checks the UX against the DNA. */
export class GameDesignerAgent extends BaseAgent<StoryBreakdownPayload, GameDesignerDeliverables> {
  readonly stage = 'game_designer' as const;

  protected extractPayload(contract: Contract): StoryBreakdownPayload {
    return this.parsePayload(contract, StoryBreakdownPayloadSchema);
  }

  protected runTools(breakdown: StoryBreakdownPayload): GameDesignerDeliverables {
    const design = buildDesignSpecification(breakdown);
    const uxValidation = validateUxDesign({
      context: design.story_context,
      gameMechanics: design.game_mechanics,
      uiComponents: design.ui_components,
      interactionFlows: design.interaction_flows,
    });

    if (!uxValidation.overall_dna_compliant) {
      throw new DNAComplianceError(
        `UX design failed DNA validation: ${uxValidation.issues.join('; ') || 'principle scores below 4'}`,
        this.stage,
        uxValidation.issues
      );
    }

    return { payload: { ...design, ux_validation: uxValidation } };
  }

  protected gateInput(deliverables: GameDesignerDeliverables): GateInput {
    return { stage: this.stage, deliverables };
  }

  protected buildOutputContract(input: Contract, { payload }: GameDesignerDeliverables): Contract {
    const inherited = input.dna_compliance.design_principles_validation;
    const ux = payload.ux_validation;

    return buildContract({
      storyId: input.story_id,
      source: this.stage,
      target: 'developer',
      previous: input,
      payload,
      dna: {
        design: {
          ...inherited,
          pedagogical_value: inherited.pedagogical_value && ux.pedagogical_value_compliant,
          time_respect: inherited.time_respect && ux.time_respect_compliant,
          professional_tone: inherited.professional_tone && ux.professional_tone_compliant,
        },
        architecture: input.dna_compliance.architecture_compliance,
        evidence: {
          dna_compliance_score: ux.dna_compliance_score,
          ui_complexity_level: ux.ui_complexity_level,
          estimated_interaction_minutes: ux.estimated_interaction_minutes,
        },
      },
      requiredValidations: ['component_library_compliance', 'pedagogical_effectiveness_validated'],
      validationCriteria: {
        code_quality: { typescript_errors: 0, eslint_violations: 0, unit_test_coverage_percent: 100 },
        performance: { lighthouse_min: 90, api_response_max_ms: 200 },
      },
      deliverableData: {
        component_implementations: 'object[]',
        api_implementations: 'object[]',
        test_suite: 'object',
      },
    });
  }
}
