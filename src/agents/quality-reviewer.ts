import { BaseAgent } from './base-agent.js';
import { buildContract } from '../contracts/builder.js';
import { QaResultsPayloadSchema } from '../contracts/schemas.js';
import type {
  ApprovalDecision,
  Contract,
  DesignPrinciplesValidation,
  DnaMetrics,
  QaResultsPayload,
} from '../contracts/schemas.js';
import type { GateInput, StageDeliverables } from '../gates/types.js';
import { analyzeQuality } from '../tools/quality-reviewer/quality-scorer.js';
import { validateDeploymentReadiness } from '../tools/quality-reviewer/deployment-validator.js';
import { makeApprovalDecision } from '../tools/quality-reviewer/final-approver.js';
import { buildClientCommunication } from '../output/formatter.js';

export type ReviewTarget = 'deployment' | 'developer';

type QualityReviewerDeliverables = StageDeliverables['quality_reviewer'];

/** Gate deliverables plus the QA metrics the final DNA flags are read from. */
export interface ReviewOutcome extends QualityReviewerDeliverables {
  metrics: DnaMetrics;
}

const PRINCIPLE_MINIMUM = 3.5;

export function resolveReviewTarget(decision: Pick<ApprovalDecision, 'approved'>): ReviewTarget {
  return decision.approved ? 'deployment' : 'developer';
}

function principlesFromMetrics(metrics: DnaMetrics): DesignPrinciplesValidation {
  return {
    pedagogical_value: metrics.pedagogical_effectiveness_score >= PRINCIPLE_MINIMUM,
    policy_to_practice: metrics.policy_practice_alignment_score >= PRINCIPLE_MINIMUM,
    time_respect: metrics.time_efficiency_score >= PRINCIPLE_MINIMUM,
    holistic_thinking: metrics.holistic_design_score >= PRINCIPLE_MINIMUM,
    professional_tone: metrics.professional_tone_score >= PRINCIPLE_MINIMUM,
  };
}

/**
 * Final contract for a reviewed story: a release package for deployment,
 * or a feedback package sent back to development.
 */
export function createReviewContract(input: Contract, { payload: review, metrics }: ReviewOutcome): Contract {
  const decision = review.approval_decision;
  const target = resolveReviewTarget(decision);

  return buildContract({
    storyId: input.story_id,
    source: 'quality_reviewer',
    target,
    previous: input,
    payload: review,
    dna: {
      design: principlesFromMetrics(metrics),
      architecture: input.dna_compliance.architecture_compliance,
      evidence: {
        overall_score: review.quality_analysis.overall_score,
        decision_score: decision.decision_score,
        approved: decision.approved,
      },
    },
    requiredValidations: ['quality_score_validated', 'deployment_readiness_confirmed', 'dna_compliance_verified'],
    validationCriteria: {
      approval_decision_documented: true,
      quality_metrics_complete: true,
      recommendations_provided: decision.recommendations.length > 0,
    },
    deliverableData: decision.approved
      ? { final_quality_score: review.quality_analysis.overall_score, deployment_approval: true }
      : { blocking_issues: decision.blocking_issues, next_actions: decision.next_actions },
  });
}

/** Scores QA results, checks production readiness and decides between release and rework. */
export class QualityReviewerAgent extends BaseAgent<QaResultsPayload, ReviewOutcome> {
  readonly stage = 'quality_reviewer' as const;

  protected extractPayload(contract: Contract): QaResultsPayload {
    return this.parsePayload(contract, QaResultsPayloadSchema);
  }

  protected runTools(qa: QaResultsPayload, contract: Contract): ReviewOutcome {
    const { analysis } = analyzeQuality(qa);
    const readiness = validateDeploymentReadiness(qa);
    const decision = makeApprovalDecision(analysis, readiness);

    return {
      metrics: qa.dna_metrics,
      payload: {
        payload_type: 'quality_review',
        story_context: qa.story_context,
        quality_analysis: analysis,
        deployment_readiness: readiness,
        approval_decision: decision,
        client_communication: buildClientCommunication(contract.story_id, analysis, readiness, decision),
      },
    };
  }

  protected gateInput({ payload }: ReviewOutcome): GateInput {
    return { stage: this.stage, deliverables: { payload } };
  }

  protected buildOutputContract(input: Contract, outcome: ReviewOutcome): Contract {
    return createReviewContract(input, outcome);
  }
}
