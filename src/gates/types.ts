import type { StageName } from '../contracts/agent-graph.js';
import type {
  DesignSpecificationPayload,
  ImplementationPayload,
  QaResultsPayload,
  QualityReviewPayload,
  StoryBreakdownPayload,
  TestResultsPayload,
} from '../contracts/schemas.js';
import type { DnaAnalysis } from '../tools/project-manager/dna-compliance-checker.js';

export type ProjectManagerGateID =
  | 'dna_compliance_verified'
  | 'story_breakdown_complete'
  | 'acceptance_criteria_clear'
  | 'game_designer_handoff_ready'
  | 'technical_feasibility_confirmed';

export type GameDesignerGateID =
  | 'component_library_usage_100_percent'
  | 'game_mechanics_pedagogical_effectiveness_validated'
  | 'ui_components_responsive_design_verified'
  | 'interaction_flows_user_tested'
  | 'performance_benchmarks_met';

export type DeveloperGateID =
  | 'typescript_compilation_success_zero_errors'
  | 'eslint_standards_compliance_verified'
  | 'unit_tests_100_percent_coverage_achieved'
  | 'api_endpoints_respond_correctly'
  | 'component_integration_working'
  | 'architecture_principles_compliance'
  | 'performance_standards_met';

export type TestEngineerGateID =
  | 'all_integration_tests_passing'
  | 'performance_benchmarks_within_targets'
  | 'security_vulnerability_scan_clean'
  | 'automated_test_suite_configured'
  | 'load_testing_completed';

export type QaTesterGateID =
  | 'anna_persona_satisfaction_score_minimum_met'
  | 'wcag_aa_compliance_100_percent_verified'
  | 'task_completion_time_under_10_minutes'
  | 'professional_tone_maintained_throughout'
  | 'pedagogical_value_clearly_demonstrated'
  | 'all_user_flows_validated_successfully';

export type QualityReviewerGateID =
  | 'overall_quality_score_calculated'
  | 'deployment_readiness_validated'
  | 'approval_decision_recorded'
  | 'client_communication_prepared';

export interface StageGateIDs {
  project_manager: ProjectManagerGateID;
  game_designer: GameDesignerGateID;
  developer: DeveloperGateID;
  test_engineer: TestEngineerGateID;
  qa_tester: QaTesterGateID;
  quality_reviewer: QualityReviewerGateID;
}

export type QualityGateID = StageGateIDs[StageName];

export interface StageDeliverables {
  project_manager: { dnaAnalysis: DnaAnalysis; payload: StoryBreakdownPayload };
  game_designer: { payload: DesignSpecificationPayload };
  developer: { payload: ImplementationPayload };
  test_engineer: { payload: TestResultsPayload };
  qa_tester: { payload: QaResultsPayload };
  quality_reviewer: { payload: QualityReviewPayload };
}

/** One stage's request to have its gates evaluated. */
export type GateInput = {
  [S in StageName]: { stage: S; deliverables: StageDeliverables[S] };
}[StageName];

/**
 * fail_soft: an evaluator that throws counts as a failed gate.
 * fail_fast: the evaluator's exception propagates to the caller.
 */
export type GateErrorPolicy = 'fail_soft' | 'fail_fast';

export interface QualityGateDefinition<D> {
  description: string;
  evaluate: (deliverables: D) => boolean;
}

export type GateTable<D, G extends string> = Record<G, QualityGateDefinition<D>>;

export interface GateOutcome {
  gateId: QualityGateID;
  stage: StageName;
  description: string;
  passed: boolean;
  error?: string;
}

export interface GateCheckResult {
  stage: StageName;
  passed: boolean;
  outcomes: GateOutcome[];
  failures: GateOutcome[];
}
