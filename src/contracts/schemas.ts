import { z } from 'zod';
import { AGENT_NAMES } from './agent-graph.js';
import type { AgentName } from './agent-graph.js';
import { CONTRACT_VERSION } from './version.js';

// ─── DNA ─────────────────────────────────────────────────

export const DESIGN_PRINCIPLES = [
  'pedagogical_value',
  'policy_to_practice',
  'time_respect',
  'holistic_thinking',
  'professional_tone',
] as const;

export const ARCHITECTURE_PRINCIPLES = [
  'api_first',
  'stateless_backend',
  'separation_of_concerns',
  'simplicity_first',
] as const;

export type DesignPrinciple = (typeof DESIGN_PRINCIPLES)[number];
export type ArchitecturePrinciple = (typeof ARCHITECTURE_PRINCIPLES)[number];

export const DesignPrinciplesValidationSchema = z
  .object({
    pedagogical_value: z.boolean(),
    policy_to_practice: z.boolean(),
    time_respect: z.boolean(),
    holistic_thinking: z.boolean(),
    professional_tone: z.boolean(),
  })
  .strict();
export type DesignPrinciplesValidation = z.infer<typeof DesignPrinciplesValidationSchema>;

export const ArchitectureComplianceSchema = z
  .object({
    api_first: z.boolean(),
    stateless_backend: z.boolean(),
    separation_of_concerns: z.boolean(),
    simplicity_first: z.boolean(),
  })
  .strict();
export type ArchitectureCompliance = z.infer<typeof ArchitectureComplianceSchema>;

/** Stage sub-objects (pm_analysis, ux_validation, ...) ride alongside the two principle maps. */
export const DnaComplianceSchema = z
  .object({
    design_principles_validation: DesignPrinciplesValidationSchema,
    architecture_compliance: ArchitectureComplianceSchema,
  })
  .catchall(z.unknown());
export type DnaCompliance = z.infer<typeof DnaComplianceSchema>;

// ─── Contract ────────────────────────────────────────────

export const AgentNameSchema = z.enum(AGENT_NAMES);

export const InputRequirementsSchema = z.object({
  required_files: z.array(z.string()),
  required_data: z.record(z.unknown()),
  required_validations: z.array(z.string()),
});

export const OutputSpecificationsSchema = z.object({
  deliverable_files: z.array(z.string()),
  deliverable_data: z.record(z.unknown()),
  validation_criteria: z.record(z.unknown()),
});

const ContractFields = {
  contract_version: z.literal(CONTRACT_VERSION),
  story_id: z.string().min(1),
  source_agent: AgentNameSchema,
  target_agent: AgentNameSchema,
  input_requirements: InputRequirementsSchema,
  output_specifications: OutputSpecificationsSchema,
  quality_gates: z.array(z.string()),
  handoff_criteria: z.array(z.string()),
};

/** Envelope check; the DNA maps are inspected separately so each gap gets its own message. */
export const ContractEnvelopeSchema = z.object({
  ...ContractFields,
  dna_compliance: z.record(z.unknown()),
});

export const ContractSchema = z.object({
  ...ContractFields,
  dna_compliance: DnaComplianceSchema,
});
export type Contract = z.infer<typeof ContractSchema>;

// ─── Shared payload pieces ───────────────────────────────

export const StoryContextSchema = z.object({
  feature_description: z.string(),
  acceptance_criteria: z.array(z.string()),
  user_persona: z.string(),
  learning_objectives: z.array(z.string()),
  time_constraint_minutes: z.number(),
  priority_level: z.string(),
});
export type StoryContext = z.infer<typeof StoryContextSchema>;

export const InteractionFlowSchema = z.object({
  name: z.string(),
  start_state: z.string(),
  end_state: z.string(),
  user_actions: z.array(z.string()),
  system_responses: z.array(z.string()),
  estimated_seconds: z.number(),
});
export type InteractionFlow = z.infer<typeof InteractionFlowSchema>;

export const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']);
export type HttpMethod = z.infer<typeof HttpMethodSchema>;

// ─── github → project_manager ────────────────────────────

export const FeatureRequestPayloadSchema = z.object({
  payload_type: z.literal('feature_request'),
  feature_description: z.string(),
  acceptance_criteria: z.array(z.string()),
  user_persona: z.string(),
  priority_level: z.string(),
  time_constraint_minutes: z.number().positive().default(10),
  learning_objectives: z.array(z.string()).default([]),
  requested_by: z.string().default('unknown'),
  github_issue: z
    .object({
      owner: z.string(),
      repo: z.string(),
      number: z.number().int(),
      title: z.string(),
      url: z.string(),
    })
    .optional(),
});
export type FeatureRequestPayload = z.infer<typeof FeatureRequestPayloadSchema>;
export type FeatureRequestInput = z.input<typeof FeatureRequestPayloadSchema>;

// ─── project_manager → game_designer ─────────────────────

export const UserStorySchema = z.object({
  story_id: z.string(),
  role: z.string(),
  action: z.string(),
  benefit: z.string(),
  story: z.string(),
  priority: z.enum(['high', 'medium']),
  estimation: z.number(),
  acceptance_criteria: z.array(z.string()),
});
export type UserStory = z.infer<typeof UserStorySchema>;

export const ImplementationTaskSchema = z.object({
  task_id: z.string(),
  name: z.string(),
  category: z.string(),
  effort: z.number(),
});
export type ImplementationTask = z.infer<typeof ImplementationTaskSchema>;

export const TechnicalRequirementsSchema = z.object({
  frontend: z.object({
    required_components: z.array(z.string()),
    animations: z.array(z.string()),
    responsive_design: z.boolean(),
  }),
  backend: z.object({
    api_endpoints: z.array(z.string()),
    business_logic: z.array(z.string()),
    data_models: z.array(z.string()),
  }),
  integrations: z.object({
    external_apis: z.array(z.string()),
  }),
  performance_requirements: z.object({
    response_time_ms: z.number(),
    concurrent_users: z.number(),
  }),
});
export type TechnicalRequirements = z.infer<typeof TechnicalRequirementsSchema>;

export const DesignRequirementsSchema = z.object({
  ui_components: z.array(z.string()),
  user_flows: z.array(z.string()),
  wireframe_requirements: z.array(z.string()),
  accessibility: z.object({ wcag_compliance: z.literal('AA'), screen_reader: z.boolean() }),
  responsive: z.object({ mobile_first: z.boolean(), breakpoints: z.array(z.string()) }),
});
export type DesignRequirements = z.infer<typeof DesignRequirementsSchema>;

export const StoryBreakdownSchema = z.object({
  feature_summary: z.object({
    title: z.string(),
    description: z.string(),
    user_persona: z.string(),
    priority: z.string(),
    time_constraint_minutes: z.number(),
    learning_objectives: z.array(z.string()),
    business_value: z.string(),
    success_metrics: z.array(z.string()),
  }),
  user_stories: z.array(UserStorySchema),
  technical_requirements: TechnicalRequirementsSchema,
  design_requirements: DesignRequirementsSchema,
  implementation_tasks: z.array(ImplementationTaskSchema),
  acceptance_criteria: z.array(z.string()),
  risks: z.array(z.object({ risk: z.string(), mitigation: z.string(), severity: z.string() })),
});
export type StoryBreakdown = z.infer<typeof StoryBreakdownSchema>;

export const ComplexityLevelSchema = z.enum(['Low', 'Medium', 'High', 'Very High']);
export type ComplexityLevel = z.infer<typeof ComplexityLevelSchema>;

export const ComplexityAssessmentSchema = z.object({
  overall_complexity: z.enum(['Simple', 'Medium', 'Complex', 'Very Complex']),
  effort_points: z.number(),
  technical_complexity: ComplexityLevelSchema,
  design_complexity: ComplexityLevelSchema,
  integration_complexity: ComplexityLevelSchema,
  testing_complexity: ComplexityLevelSchema,
  estimated_duration_hours: z.number(),
  estimated_duration_days: z.number(),
  risk_factors: z.array(z.string()),
  confidence_level: z.number(),
  implementation_notes: z.string(),
  complexity_breakdown: z.object({
    technical_score: z.number(),
    design_score: z.number(),
  }),
});
export type ComplexityAssessment = z.infer<typeof ComplexityAssessmentSchema>;

export const DnaAnalysisSummarySchema = z.object({
  compliant: z.boolean(),
  compliance_score: z.number(),
  violations: z.array(z.string()),
  recommendations: z.array(z.string()),
  principle_scores: z.record(z.number()),
});
export type DnaAnalysisSummary = z.infer<typeof DnaAnalysisSummarySchema>;

export const StoryBreakdownPayloadSchema = z.object({
  payload_type: z.literal('story_breakdown'),
  story_context: StoryContextSchema,
  story_breakdown: StoryBreakdownSchema,
  complexity_assessment: ComplexityAssessmentSchema,
  dna_analysis: DnaAnalysisSummarySchema,
});
export type StoryBreakdownPayload = z.infer<typeof StoryBreakdownPayloadSchema>;

// ─── game_designer → developer ───────────────────────────

export const GameMechanicSchema = z.object({
  name: z.string(),
  type: z.enum(['knowledge_exploration', 'practical_simulation', 'skill_building', 'interactive_learning']),
  objective: z.string(),
  pedagogical_approach: z.string(),
  interaction_patterns: z.array(z.string()),
});
export type GameMechanic = z.infer<typeof GameMechanicSchema>;

export const GameMechanicsSchema = z.object({
  mechanics: z.array(GameMechanicSchema),
  learning_objectives_addressed: z.array(z.string()),
  pedagogical_effectiveness_score: z.number(),
  estimated_engagement_minutes: z.number(),
});
export type GameMechanics = z.infer<typeof GameMechanicsSchema>;

export const LibrarySourceSchema = z.enum(['shadcn_ui', 'kenney_ui', 'custom']);
export type LibrarySource = z.infer<typeof LibrarySourceSchema>;

export const UiComponentSpecSchema = z.object({
  name: z.string(),
  library_source: LibrarySourceSchema,
  library_compliant: z.boolean(),
  purpose: z.string(),
  label: z.string(),
  responsive_design: z.boolean(),
  breakpoints: z.array(z.string()),
  props: z.array(z.string()),
  accessibility: z.object({
    aria_label: z.string(),
    keyboard_navigable: z.boolean(),
  }),
});
export type UiComponentSpec = z.infer<typeof UiComponentSpecSchema>;

export const ApiEndpointSpecSchema = z.object({
  name: z.string(),
  method: HttpMethodSchema,
  path: z.string(),
  description: z.string(),
  validation_rules: z.array(z.string()),
  authentication_required: z.boolean(),
  stateless: z.boolean(),
});
export type ApiEndpointSpec = z.infer<typeof ApiEndpointSpecSchema>;

export const UxValidationSchema = z.object({
  overall_dna_compliant: z.boolean(),
  dna_compliance_score: z.number(),
  time_respect_compliant: z.boolean(),
  pedagogical_value_compliant: z.boolean(),
  professional_tone_compliant: z.boolean(),
  ui_complexity_level: z.enum(['simple', 'moderate', 'complex']),
  estimated_interaction_minutes: z.number(),
  issues: z.array(z.string()),
});
export type UxValidation = z.infer<typeof UxValidationSchema>;

export const DesignSpecificationPayloadSchema = z.object({
  payload_type: z.literal('design_specification'),
  story_context: StoryContextSchema,
  game_mechanics: GameMechanicsSchema,
  ui_components: z.array(UiComponentSpecSchema),
  interaction_flows: z.array(InteractionFlowSchema),
  wireframes: z.array(z.object({ name: z.string(), layout: z.string(), components: z.array(z.string()) })),
  api_endpoints: z.array(ApiEndpointSpecSchema),
  state_management: z.object({
    approach: z.string(),
    client_state: z.array(z.string()),
    api_synced: z.array(z.string()),
  }),
  asset_requirements: z.array(z.object({ type: z.string(), source: LibrarySourceSchema, reference: z.string() })),
  ux_validation: UxValidationSchema,
  performance_considerations: z.object({
    lighthouse_target: z.number(),
    load_time_target: z.number(),
    api_response_target: z.number(),
  }),
});
export type DesignSpecificationPayload = z.infer<typeof DesignSpecificationPayloadSchema>;

// ─── developer → test_engineer ───────────────────────────

export const ComponentImplementationSchema = z.object({
  name: z.string(),
  file_path: z.string(),
  source_code: z.string(),
  typescript_errors: z.number(),
  eslint_violations: z.number(),
  unit_test_coverage: z.number(),
  integration_test_passed: z.boolean(),
  estimated_bundle_kb: z.number(),
});
export type ComponentImplementation = z.infer<typeof ComponentImplementationSchema>;

export const ApiImplementationSchema = z.object({
  name: z.string(),
  method: HttpMethodSchema,
  path: z.string(),
  file_path: z.string(),
  source_code: z.string(),
  estimated_response_time_ms: z.number(),
  functional_test_passed: z.boolean(),
  performance_test_passed: z.boolean(),
  authentication_required: z.boolean(),
});
export type ApiImplementation = z.infer<typeof ApiImplementationSchema>;

export const TestSuiteSchema = z.object({
  framework: z.string(),
  unit_tests: z.array(z.object({ name: z.string(), target: z.string(), file_path: z.string() })),
  coverage_percent: z.number(),
});
export type TestSuite = z.infer<typeof TestSuiteSchema>;

export const ImplementationPayloadSchema = z.object({
  payload_type: z.literal('implementation'),
  story_context: StoryContextSchema,
  interaction_flows: z.array(InteractionFlowSchema),
  ui_components: z.array(UiComponentSpecSchema),
  component_implementations: z.array(ComponentImplementationSchema),
  api_implementations: z.array(ApiImplementationSchema),
  test_suite: TestSuiteSchema,
  implementation_docs: z.object({
    summary: z.string(),
    architecture_compliance: ArchitectureComplianceSchema,
  }),
  performance_metrics: z.object({
    estimated_lighthouse_score: z.number(),
    bundle_size_kb: z.number(),
    bundle_size_increase_kb: z.number(),
  }),
  git_commit_hash: z.string(),
});
export type ImplementationPayload = z.infer<typeof ImplementationPayloadSchema>;

// ─── test_engineer → qa_tester ───────────────────────────

export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);
export type Severity = z.infer<typeof SeveritySchema>;

export const SecurityFindingSchema = z.object({
  category: z.string(),
  severity: SeveritySchema,
  file_path: z.string(),
  pattern: z.string(),
  description: z.string(),
});
export type SecurityFinding = z.infer<typeof SecurityFindingSchema>;

export const SecurityScanSchema = z.object({
  vulnerabilities: z.array(SecurityFindingSchema),
  critical_vulnerabilities: z.number(),
  high_vulnerabilities: z.number(),
  medium_vulnerabilities: z.number(),
  security_compliance_met: z.boolean(),
});
export type SecurityScan = z.infer<typeof SecurityScanSchema>;

export const SuiteResultSchema = z.object({
  total: z.number(),
  passed: z.number(),
  failed: z.number(),
  coverage_percent: z.number(),
});
export type SuiteResult = z.infer<typeof SuiteResultSchema>;

export const PerformanceResultsSchema = z.object({
  average_api_response_ms: z.number(),
  max_api_response_ms: z.number(),
  lighthouse_score: z.number(),
  page_load_ms: z.number(),
  load_test: z.object({
    concurrent_users: z.number(),
    error_rate_percent: z.number(),
    completed: z.boolean(),
  }),
});
export type PerformanceResults = z.infer<typeof PerformanceResultsSchema>;

export const TestResultsPayloadSchema = z.object({
  payload_type: z.literal('test_results'),
  story_context: StoryContextSchema,
  interaction_flows: z.array(InteractionFlowSchema),
  ui_components: z.array(UiComponentSpecSchema),
  component_implementations: z.array(ComponentImplementationSchema),
  api_implementations: z.array(ApiImplementationSchema),
  unit_test_results: SuiteResultSchema,
  integration_test_results: SuiteResultSchema,
  e2e_test_results: SuiteResultSchema,
  performance_results: PerformanceResultsSchema,
  security_scan: SecurityScanSchema,
  test_optimization: z.object({
    prioritized_components: z.array(
      z.object({ name: z.string(), priority_score: z.number(), risk_level: z.string() })
    ),
    predicted_failures: z.array(z.object({ component: z.string(), pattern: z.string(), probability: z.number() })),
    estimated_execution_minutes: z.number(),
  }),
  automation_config: z.object({
    stages: z.array(z.string()),
    test_commands: z.record(z.string()),
    reporting: z.record(z.string()),
  }),
  overall_coverage_percent: z.number(),
});
export type TestResultsPayload = z.infer<typeof TestResultsPayloadSchema>;

// ─── qa_tester → quality_reviewer ────────────────────────

export const QaTestResultsSchema = z.object({
  coverage_percent: z.number(),
  tests_passed: z.number(),
  total_tests: z.number(),
  unit_tests: z.boolean(),
  integration_tests: z.boolean(),
});

export const QaPerformanceMetricsSchema = z.object({
  lighthouse_score: z.number(),
  api_response_time_ms: z.number(),
  page_load_time_ms: z.number(),
});

export const AccessibilityAuditSchema = z.object({
  wcag_compliance_percent: z.number(),
  violations: z.array(z.string()),
  keyboard_accessible: z.boolean(),
});
export type AccessibilityAudit = z.infer<typeof AccessibilityAuditSchema>;

export const FlowResultSchema = z.object({
  flow: z.string(),
  completed: z.boolean(),
  duration_minutes: z.number(),
  issues: z.array(z.string()),
});
export type FlowResult = z.infer<typeof FlowResultSchema>;

export const UserFlowValidationSchema = z.object({
  flow_completion_rate: z.number(),
  user_satisfaction_score: z.number(),
  average_task_completion_minutes: z.number(),
  target_completion_minutes: z.number(),
  flows: z.array(FlowResultSchema),
});
export type UserFlowValidation = z.infer<typeof UserFlowValidationSchema>;

export const CodeQualityMetricsSchema = z.object({
  typescript_errors: z.number(),
  eslint_violations: z.number(),
  complexity_score: z.number(),
  documentation_coverage_percent: z.number(),
});

export const DnaMetricsSchema = z.object({
  pedagogical_effectiveness_score: z.number(),
  policy_practice_alignment_score: z.number(),
  time_efficiency_score: z.number(),
  holistic_design_score: z.number(),
  professional_tone_score: z.number(),
  architecture_compliance_percent: z.number(),
});
export type DnaMetrics = z.infer<typeof DnaMetricsSchema>;

export const SecurityAuditSchema = z.object({
  critical_vulnerabilities: z.number(),
  high_vulnerabilities: z.number(),
  medium_vulnerabilities: z.number(),
  authentication_implemented: z.boolean(),
  input_validation_score: z.number(),
  secure_headers_implemented: z.boolean(),
});
export type SecurityAudit = z.infer<typeof SecurityAuditSchema>;

export const CompatibilitySchema = z.object({
  browser_compatibility: z.object({ supported_browsers: z.array(z.string()) }),
  mobile_compatibility: z.object({ responsive_design: z.boolean(), devices_tested: z.number() }),
});
export type Compatibility = z.infer<typeof CompatibilitySchema>;

export const PersonaResultSchema = z.object({
  persona: z.string(),
  satisfaction_score: z.number(),
  completion_rate_percent: z.number(),
  completion_minutes: z.number(),
  confidence: z.enum(['high', 'medium', 'low']),
  feedback: z.array(z.string()),
});
export type PersonaResult = z.infer<typeof PersonaResultSchema>;

export const ContentQualitySchema = z.object({
  professional_tone_score: z.number(),
  pedagogical_score: z.number(),
  policy_relevance_score: z.number(),
});
export type ContentQuality = z.infer<typeof ContentQualitySchema>;

export const QaResultsPayloadSchema = z.object({
  payload_type: z.literal('qa_results'),
  story_context: StoryContextSchema,
  test_results: QaTestResultsSchema,
  performance_metrics: QaPerformanceMetricsSchema,
  accessibility_audit: AccessibilityAuditSchema,
  user_flow_validation: UserFlowValidationSchema,
  code_quality_metrics: CodeQualityMetricsSchema,
  dna_metrics: DnaMetricsSchema,
  security_audit: SecurityAuditSchema,
  compatibility: CompatibilitySchema,
  persona_results: PersonaResultSchema,
  content_quality: ContentQualitySchema,
});
export type QaResultsPayload = z.infer<typeof QaResultsPayloadSchema>;

// ─── quality_reviewer → deployment | developer ───────────

export const QualityIssueSchema = z.object({
  type: z.enum(['critical', 'warning']),
  category: z.string(),
  message: z.string(),
  impact: z.enum(['high', 'medium', 'low']),
  blocking: z.boolean(),
});
export type QualityIssue = z.infer<typeof QualityIssueSchema>;

export const QualityAnalysisSchema = z.object({
  overall_score: z.number(),
  dimension_scores: z.record(z.number()),
  quality_issues: z.array(QualityIssueSchema),
  recommendations: z.array(z.string()),
  meets_threshold: z.boolean(),
});
export type QualityAnalysis = z.infer<typeof QualityAnalysisSchema>;

export const ReadinessCheckSchema = z.object({
  passed: z.boolean(),
  requirement: z.string(),
  issues: z.array(z.string()),
  metrics: z.record(z.unknown()),
  issue: z.string().nullable(),
});
export type ReadinessCheck = z.infer<typeof ReadinessCheckSchema>;

export const DeploymentReadinessSchema = z.object({
  deployment_ready: z.boolean(),
  readiness_score: z.number(),
  readiness_checks: z.record(ReadinessCheckSchema),
  blocking_issues: z.array(z.string()),
});
export type DeploymentReadiness = z.infer<typeof DeploymentReadinessSchema>;

export const DecisionFactorSchema = z.object({
  value: z.number(),
  threshold: z.number(),
  meets_threshold: z.boolean(),
  impact: z.enum(['high', 'medium', 'low']),
});
export type DecisionFactor = z.infer<typeof DecisionFactorSchema>;

export const ApprovalDecisionSchema = z.object({
  approved: z.boolean(),
  decision_score: z.number(),
  decision_factors: z.record(DecisionFactorSchema),
  reasoning: z.string(),
  recommendations: z.array(z.string()),
  confidence_level: z.enum(['high', 'medium', 'low']),
  approval_conditions: z.array(z.string()),
  next_actions: z.array(z.string()),
  blocking_issues: z.array(z.string()),
  decided_at: z.string(),
});
export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;

export const ClientCommunicationSchema = z.object({
  title: z.string(),
  body: z.string(),
  labels: z.array(z.string()),
});
export type ClientCommunication = z.infer<typeof ClientCommunicationSchema>;

export const QualityReviewPayloadSchema = z.object({
  payload_type: z.literal('quality_review'),
  story_context: StoryContextSchema,
  quality_analysis: QualityAnalysisSchema,
  deployment_readiness: DeploymentReadinessSchema,
  approval_decision: ApprovalDecisionSchema,
  client_communication: ClientCommunicationSchema,
});
export type QualityReviewPayload = z.infer<typeof QualityReviewPayloadSchema>;

// ─── Union ───────────────────────────────────────────────

export const StagePayloadSchema = z.discriminatedUnion('payload_type', [
  FeatureRequestPayloadSchema,
  StoryBreakdownPayloadSchema,
  DesignSpecificationPayloadSchema,
  ImplementationPayloadSchema,
  TestResultsPayloadSchema,
  QaResultsPayloadSchema,
  QualityReviewPayloadSchema,
]);
export type StagePayload = z.infer<typeof StagePayloadSchema>;
export type PayloadType = StagePayload['payload_type'];

/** The payload a contract carries is fixed by who produced it. */
export const PAYLOAD_TYPE_BY_SOURCE: Readonly<Record<AgentName, PayloadType | null>> = {
  github: 'feature_request',
  project_manager: 'story_breakdown',
  game_designer: 'design_specification',
  developer: 'implementation',
  test_engineer: 'test_results',
  qa_tester: 'qa_results',
  quality_reviewer: 'quality_review',
  deployment: null,
};
