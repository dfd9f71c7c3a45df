import type { AgentName, StageName } from './agent-graph.js';
import { CONTRACT_VERSION } from './version.js';
import type {
  ArchitectureCompliance,
  Contract,
  DesignPrinciplesValidation,
  FeatureRequestPayload,
  StagePayload,
} from './schemas.js';
import { getStageGateIds } from '../gates/registry.js';

const STORY_ID_TEMPLATE = '{story_id}';

/** Where each stage's DNA evidence is attached inside `dna_compliance`. */
export const DNA_STAGE_KEYS: Readonly<Record<StageName, string>> = {
  project_manager: 'pm_analysis',
  game_designer: 'ux_validation',
  developer: 'code_validation',
  test_engineer: 'test_validation',
  qa_tester: 'qa_validation',
  quality_reviewer: 'final_validation',
};

/** Artifacts a stage produces; the next stage lists them as required files. */
export const STAGE_FILE_TEMPLATES: Readonly<Record<AgentName, readonly string[]>> = {
  github: ['docs/stories/{story_id}/feature-request.md'],
  project_manager: ['docs/stories/{story_id}/story-breakdown.md', 'docs/stories/{story_id}/acceptance-criteria.md'],
  game_designer: ['docs/specs/{story_id}/game-design.md', 'docs/wireframes/{story_id}/'],
  developer: ['frontend/components/{story_id}/', 'backend/endpoints/{story_id}/', 'tests/unit/{story_id}/'],
  test_engineer: ['tests/integration/{story_id}/', 'tests/e2e/{story_id}/', 'docs/test_reports/{story_id}_coverage.html'],
  qa_tester: ['docs/qa/{story_id}/qa-report.md', 'docs/qa/{story_id}/accessibility-audit.json'],
  quality_reviewer: ['docs/quality_reports/{story_id}_final_quality_report.json'],
  deployment: ['releases/{story_id}_production_ready.zip'],
};

/** Rework contracts hand the developer a feedback package instead of a release. */
export const REWORK_FILE_TEMPLATES: readonly string[] = [
  'docs/feedback/{story_id}_quality_feedback.md',
  'docs/improvements/{story_id}_improvement_plan.json',
];

export const STAGE_HANDOFF_CRITERIA: Readonly<Record<StageName, readonly string[]>> = {
  project_manager: ['story_breakdown_documented', 'acceptance_criteria_defined', 'dna_analysis_recorded'],
  game_designer: ['game_mechanics_specified', 'ui_components_mapped', 'interaction_flows_defined'],
  developer: ['components_implemented', 'api_endpoints_implemented', 'unit_tests_written'],
  test_engineer: ['comprehensive_test_coverage_achieved', 'performance_requirements_validated', 'security_validation_completed'],
  qa_tester: ['persona_testing_completed', 'accessibility_audit_completed', 'user_flows_validated'],
  quality_reviewer: ['quality_analysis_complete', 'approval_decision_documented', 'next_steps_defined'],
};

export interface StageDnaCompliance {
  design: DesignPrinciplesValidation;
  architecture: ArchitectureCompliance;
  evidence: Record<string, unknown>;
}

export interface ContractDraft {
  storyId: string;
  source: StageName;
  target: AgentName;
  previous: Pick<Contract, 'quality_gates' | 'handoff_criteria'>;
  payload: StagePayload;
  dna: StageDnaCompliance;
  requiredValidations: string[];
  validationCriteria: Record<string, unknown>;
  deliverableData?: Record<string, unknown>;
  /** Concrete paths produced by the stage, listed before the templated ones. */
  producedFiles?: string[];
}

export function fillStoryId(template: string, storyId: string): string {
  return template.split(STORY_ID_TEMPLATE).join(storyId);
}

/** Union in first-seen order, so predecessor entries keep their position. */
export function mergeOrdered(...lists: ReadonlyArray<readonly string[]>): string[] {
  const merged: string[] = [];
  for (const list of lists) {
    for (const item of list) {
      if (!merged.includes(item)) merged.push(item);
    }
  }
  return merged;
}

export function isReworkHandoff(source: AgentName, target: AgentName): boolean {
  return source === 'quality_reviewer' && target === 'developer';
}

export function buildContract(draft: ContractDraft): Contract {
  const rework = isReworkHandoff(draft.source, draft.target);
  const deliverables = rework ? REWORK_FILE_TEMPLATES : STAGE_FILE_TEMPLATES[draft.target];

  return {
    contract_version: CONTRACT_VERSION,
    story_id: draft.storyId,
    source_agent: draft.source,
    target_agent: draft.target,
    dna_compliance: {
      design_principles_validation: draft.dna.design,
      architecture_compliance: draft.dna.architecture,
      [DNA_STAGE_KEYS[draft.source]]: draft.dna.evidence,
    },
    input_requirements: {
      required_files: mergeOrdered(
        draft.producedFiles ?? [],
        STAGE_FILE_TEMPLATES[draft.source].map(t => fillStoryId(t, draft.storyId))
      ),
      required_data: { ...draft.payload },
      required_validations: draft.requiredValidations,
    },
    output_specifications: {
      deliverable_files: deliverables.map(t => fillStoryId(t, draft.storyId)),
      deliverable_data: draft.deliverableData ?? {},
      validation_criteria: draft.validationCriteria,
    },
    quality_gates: mergeOrdered(draft.previous.quality_gates, getStageGateIds(draft.source)),
    handoff_criteria: mergeOrdered(draft.previous.handoff_criteria, STAGE_HANDOFF_CRITERIA[draft.source]),
  };
}

/**
 * The contract a GitHub issue (or a direct API call) starts a run with.
 * Nothing has been scored yet, so every principle is asserted and the
 * project manager's analysis is what can reject the request.
 */
export function createFeatureRequestContract(storyId: string, payload: FeatureRequestPayload): Contract {
  return {
    contract_version: CONTRACT_VERSION,
    story_id: storyId,
    source_agent: 'github',
    target_agent: 'project_manager',
    dna_compliance: {
      design_principles_validation: {
        pedagogical_value: true,
        policy_to_practice: true,
        time_respect: true,
        holistic_thinking: true,
        professional_tone: true,
      },
      architecture_compliance: {
        api_first: true,
        stateless_backend: true,
        separation_of_concerns: true,
        simplicity_first: true,
      },
    },
    input_requirements: {
      required_files: STAGE_FILE_TEMPLATES.github.map(t => fillStoryId(t, storyId)),
      required_data: { ...payload },
      required_validations: ['feature_request_parsed'],
    },
    output_specifications: {
      deliverable_files: STAGE_FILE_TEMPLATES.project_manager.map(t => fillStoryId(t, storyId)),
      deliverable_data: { story_breakdown: 'object', acceptance_criteria: 'string[]' },
      validation_criteria: { dna_compliance_score: { min: 70 } },
    },
    quality_gates: [],
    handoff_criteria: ['feature_request_received'],
  };
}
