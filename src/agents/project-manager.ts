import { BaseAgent } from './base-agent.js';
import { buildContract } from '../contracts/builder.js';
import { FeatureRequestPayloadSchema } from '../contracts/schemas.js';
import type { Contract, DnaAnalysisSummary, FeatureRequestPayload, StoryBreakdownPayload } from '../contracts/schemas.js';
import type { GateInput, StageDeliverables } from '../gates/types.js';
import { analyzeFeatureCompliance } from '../tools/project-manager/dna-compliance-checker.js';
import type { DnaAnalysis } from '../tools/project-manager/dna-compliance-checker.js';
import { assessComplexity, createStoryBreakdown } from '../tools/project-manager/story-analyzer.js';

type ProjectManagerDeliverables = StageDeliverables['project_manager'];

function summarizeAnalysis(dna: DnaAnalysis): DnaAnalysisSummary {
  const scores: Record<string, number> = {};
  for (const result of [
    ...Object.values(dna.design_principles_analysis),
    ...Object.values(dna.architecture_principles_analysis),
  ]) {
    scores[result.principle] = result.score;
  }

  return {
    compliant: dna.compliant,
    compliance_score: dna.compliance_score,
    violations: dna.violations,
    recommendations: dna.recommendations,
    principle_scores: scores,
  };
}

/** Turns a feature request into a DNA-checked story breakdown for the game designer. */
export class ProjectManagerAgent extends BaseAgent<FeatureRequestPayload, ProjectManagerDeliverables> {
  readonly stage = 'project_manager' as const;

  protected extractPayload(contract: Contract): FeatureRequestPayload {
    return this.parsePayload(contract, FeatureRequestPayloadSchema);
  }

  protected runTools(feature: FeatureRequestPayload): ProjectManagerDeliverables {
    const dnaAnalysis = analyzeFeatureCompliance(feature);
    const breakdown = createStoryBreakdown(feature, dnaAnalysis);
    const complexity = assessComplexity(breakdown);

    const payload: StoryBreakdownPayload = {
      payload_type: 'story_breakdown',
      story_context: {
        feature_description: feature.feature_description,
        acceptance_criteria: breakdown.acceptance_criteria,
        user_persona: feature.user_persona,
        learning_objectives: feature.learning_objectives,
        time_constraint_minutes: feature.time_constraint_minutes,
        priority_level: feature.priority_level,
      },
      story_breakdown: breakdown,
      complexity_assessment: complexity,
      dna_analysis: summarizeAnalysis(dnaAnalysis),
    };

    return { dnaAnalysis, payload };
  }

  protected gateInput(deliverables: ProjectManagerDeliverables): GateInput {
    return { stage: this.stage, deliverables };
  }

  protected buildOutputContract(input: Contract, { dnaAnalysis, payload }: ProjectManagerDeliverables): Contract {
    return buildContract({
      storyId: input.story_id,
      source: this.stage,
      target: 'game_designer',
      previous: input,
      payload,
      dna: {
        design: dnaAnalysis.design_principles_validation,
        architecture: dnaAnalysis.architecture_compliance,
        evidence: {
          compliance_score: dnaAnalysis.compliance_score,
          violations: dnaAnalysis.violations,
          analyzed_at: dnaAnalysis.analyzed_at,
        },
      },
      requiredValidations: ['dna_compliance_verified', 'acceptance_criteria_defined'],
      validationCriteria: {
        game_mechanics: { pedagogical_effectiveness_min: 4 },
        ui_components: { library_usage_percent: 100, responsive: true },
      },
      deliverableData: {
        game_mechanics: 'object',
        ui_components: 'object[]',
        interaction_flows: 'object[]',
      },
    });
  }
}
