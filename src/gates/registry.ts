import type { StageName } from '../contracts/agent-graph.js';
import type {
  DeveloperGateID,
  GameDesignerGateID,
  GateTable,
  ProjectManagerGateID,
  QaTesterGateID,
  QualityGateID,
  QualityReviewerGateID,
  StageDeliverables,
  StageGateIDs,
  TestEngineerGateID,
} from './types.js';
import { DESIGN_PRINCIPLES } from '../contracts/schemas.js';

const PROJECT_MANAGER_GATES: GateTable<StageDeliverables['project_manager'], ProjectManagerGateID> = {
  dna_compliance_verified: {
    description: 'All five design principles are satisfied by the feature request',
    evaluate: ({ dnaAnalysis }) =>
      DESIGN_PRINCIPLES.every(principle => dnaAnalysis.design_principles_validation[principle]),
  },

  story_breakdown_complete: {
    description: 'Breakdown carries summary, user stories, technical and design requirements and criteria',
    evaluate: ({ payload }) => {
      const breakdown = payload.story_breakdown;
      return (
        breakdown.feature_summary.title.length > 0 &&
        breakdown.user_stories.length > 0 &&
        breakdown.technical_requirements.frontend.required_components.length > 0 &&
        breakdown.design_requirements.ui_components.length > 0 &&
        breakdown.acceptance_criteria.length > 0
      );
    },
  },

  acceptance_criteria_clear: {
    description: 'At least three acceptance criteria, each more than ten characters',
    evaluate: ({ payload }) => {
      const criteria = payload.story_context.acceptance_criteria;
      return criteria.length >= 3 && criteria.every(c => c.trim().length > 10);
    },
  },

  game_designer_handoff_ready: {
    description: 'Everything the game designer consumes is present',
    evaluate: ({ payload }) =>
      payload.story_context.feature_description.trim().length > 0 &&
      payload.story_context.acceptance_criteria.length > 0 &&
      payload.story_context.user_persona.trim().length > 0 &&
      payload.story_breakdown.user_stories.length > 0 &&
      payload.dna_analysis.compliance_score > 0,
  },

  technical_feasibility_confirmed: {
    description: 'Complexity assessment produced an effort and duration estimate',
    evaluate: ({ payload }) =>
      payload.complexity_assessment.effort_points > 0 &&
      payload.complexity_assessment.estimated_duration_hours > 0,
  },
};

const GAME_DESIGNER_GATES: GateTable<StageDeliverables['game_designer'], GameDesignerGateID> = {
  component_library_usage_100_percent: {
    description: 'Every UI component comes from shadcn/ui or Kenney UI',
    evaluate: ({ payload }) =>
      payload.ui_components.length > 0 &&
      payload.ui_components.every(
        c => (c.library_source === 'shadcn_ui' || c.library_source === 'kenney_ui') && c.library_compliant
      ),
  },

  game_mechanics_pedagogical_effectiveness_validated: {
    description: 'Mechanics address learning objectives with effectiveness of at least 4 of 5',
    evaluate: ({ payload }) =>
      payload.game_mechanics.learning_objectives_addressed.length > 0 &&
      payload.game_mechanics.pedagogical_effectiveness_score >= 4,
  },

  ui_components_responsive_design_verified: {
    description: 'Every UI component is responsive and declares breakpoints',
    evaluate: ({ payload }) =>
      payload.ui_components.every(c => c.responsive_design && c.breakpoints.length > 0),
  },

  interaction_flows_user_tested: {
    description: 'Every interaction flow has start, end, actions and responses',
    evaluate: ({ payload }) =>
      payload.interaction_flows.length > 0 &&
      payload.interaction_flows.every(
        f =>
          f.start_state.length > 0 &&
          f.end_state.length > 0 &&
          f.user_actions.length > 0 &&
          f.system_responses.length > 0
      ),
  },

  performance_benchmarks_met: {
    description: 'Performance targets are within Lighthouse, load time and API budgets',
    evaluate: ({ payload }) =>
      payload.performance_considerations.lighthouse_target >= 90 &&
      payload.performance_considerations.load_time_target <= 2000 &&
      payload.performance_considerations.api_response_target <= 200,
  },
};

const DEVELOPER_GATES: GateTable<StageDeliverables['developer'], DeveloperGateID> = {
  typescript_compilation_success_zero_errors: {
    description: 'No TypeScript errors in any component',
    evaluate: ({ payload }) => payload.component_implementations.every(c => c.typescript_errors === 0),
  },

  eslint_standards_compliance_verified: {
    description: 'No ESLint violations in any component',
    evaluate: ({ payload }) => payload.component_implementations.every(c => c.eslint_violations === 0),
  },

  unit_tests_100_percent_coverage_achieved: {
    description: 'Unit test coverage is 100%',
    evaluate: ({ payload }) => payload.test_suite.coverage_percent >= 100,
  },

  api_endpoints_respond_correctly: {
    description: 'Every API implementation passes its functional test',
    evaluate: ({ payload }) => payload.api_implementations.every(a => a.functional_test_passed),
  },

  component_integration_working: {
    description: 'Every component passes integration',
    evaluate: ({ payload }) => payload.component_implementations.every(c => c.integration_test_passed),
  },

  architecture_principles_compliance: {
    description: 'API-first, stateless backend and separation of concerns hold',
    evaluate: ({ payload }) => {
      const arch = payload.implementation_docs.architecture_compliance;
      return arch.api_first && arch.stateless_backend && arch.separation_of_concerns;
    },
  },

  performance_standards_met: {
    description: 'Estimated Lighthouse score at least 90 and bundle growth at most 50 KB',
    evaluate: ({ payload }) =>
      payload.performance_metrics.estimated_lighthouse_score >= 90 &&
      payload.performance_metrics.bundle_size_increase_kb <= 50,
  },
};

const TEST_ENGINEER_GATES: GateTable<StageDeliverables['test_engineer'], TestEngineerGateID> = {
  all_integration_tests_passing: {
    description: 'No failing integration or end-to-end tests',
    evaluate: ({ payload }) =>
      payload.integration_test_results.failed === 0 && payload.e2e_test_results.failed === 0,
  },

  performance_benchmarks_within_targets: {
    description: 'API average within 200ms, Lighthouse at least 90, page load within 2s',
    evaluate: ({ payload }) =>
      payload.performance_results.average_api_response_ms <= 200 &&
      payload.performance_results.lighthouse_score >= 90 &&
      payload.performance_results.page_load_ms <= 2000,
  },

  security_vulnerability_scan_clean: {
    description: 'No critical or high severity findings',
    evaluate: ({ payload }) => payload.security_scan.security_compliance_met,
  },

  automated_test_suite_configured: {
    description: 'Automation covers all five test stages',
    evaluate: ({ payload }) =>
      payload.automation_config.stages.length === 5 &&
      Object.keys(payload.automation_config.test_commands).length > 0,
  },

  load_testing_completed: {
    description: 'Load test completed with an error rate below 1%',
    evaluate: ({ payload }) =>
      payload.performance_results.load_test.completed &&
      payload.performance_results.load_test.error_rate_percent < 1,
  },
};

const QA_TESTER_GATES: GateTable<StageDeliverables['qa_tester'], QaTesterGateID> = {
  anna_persona_satisfaction_score_minimum_met: {
    description: 'Persona satisfaction at least 4 of 5',
    evaluate: ({ payload }) => payload.persona_results.satisfaction_score >= 4,
  },

  wcag_aa_compliance_100_percent_verified: {
    description: 'WCAG AA compliance is 100% with no violations',
    evaluate: ({ payload }) =>
      payload.accessibility_audit.wcag_compliance_percent >= 100 &&
      payload.accessibility_audit.violations.length === 0,
  },

  task_completion_time_under_10_minutes: {
    description: 'Persona completes the task within 10 minutes',
    evaluate: ({ payload }) => payload.persona_results.completion_minutes <= 10,
  },

  professional_tone_maintained_throughout: {
    description: 'Content tone at least 4 of 5',
    evaluate: ({ payload }) => payload.content_quality.professional_tone_score >= 4,
  },

  pedagogical_value_clearly_demonstrated: {
    description: 'Content pedagogical value at least 4 of 5',
    evaluate: ({ payload }) => payload.content_quality.pedagogical_score >= 4,
  },

  all_user_flows_validated_successfully: {
    description: 'Every interaction flow completes',
    evaluate: ({ payload }) =>
      payload.user_flow_validation.flows.length > 0 &&
      payload.user_flow_validation.flows.every(f => f.completed),
  },
};

const QUALITY_REVIEWER_GATES: GateTable<StageDeliverables['quality_reviewer'], QualityReviewerGateID> = {
  overall_quality_score_calculated: {
    description: 'Overall score is within 0-100 and all six dimensions are scored',
    evaluate: ({ payload }) =>
      payload.quality_analysis.overall_score >= 0 &&
      payload.quality_analysis.overall_score <= 100 &&
      Object.keys(payload.quality_analysis.dimension_scores).length === 6,
  },

  deployment_readiness_validated: {
    description: 'All six readiness checks ran',
    evaluate: ({ payload }) => Object.keys(payload.deployment_readiness.readiness_checks).length === 6,
  },

  approval_decision_recorded: {
    description: 'Approval decision carries its reasoning',
    evaluate: ({ payload }) => payload.approval_decision.reasoning.length > 0,
  },

  client_communication_prepared: {
    description: 'Client-facing message is ready',
    evaluate: ({ payload }) =>
      payload.client_communication.title.length > 0 && payload.client_communication.body.length > 0,
  },
};

export const GATE_REGISTRY: { [S in StageName]: GateTable<StageDeliverables[S], StageGateIDs[S]> } = {
  project_manager: PROJECT_MANAGER_GATES,
  game_designer: GAME_DESIGNER_GATES,
  developer: DEVELOPER_GATES,
  test_engineer: TEST_ENGINEER_GATES,
  qa_tester: QA_TESTER_GATES,
  quality_reviewer: QUALITY_REVIEWER_GATES,
};

export function getStageGateIds<S extends StageName>(stage: S): StageGateIDs[S][] {
  return Object.keys(GATE_REGISTRY[stage]) as StageGateIDs[S][];
}

const ALL_GATE_IDS: ReadonlySet<string> = new Set(
  Object.values(GATE_REGISTRY).flatMap(table => Object.keys(table))
);

export function isQualityGateID(name: string): name is QualityGateID {
  return ALL_GATE_IDS.has(name);
}

export function getAllGateIds(): QualityGateID[] {
  return [...ALL_GATE_IDS].filter(isQualityGateID);
}
