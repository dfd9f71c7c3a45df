import type {
  ComplexityAssessment,
  ComplexityLevel,
  DesignRequirements,
  FeatureRequestPayload,
  ImplementationTask,
  StoryBreakdown,
  TechnicalRequirements,
  UserStory,
} from '../../contracts/schemas.js';
import { getKeywordCatalog, matchKeywordMap } from '../../scoring/keywords.js';
import { BusinessLogicError } from '../../errors/types.js';
import type { DnaAnalysis } from './dna-compliance-checker.js';

export type StoryFeatureInput = Pick<
  FeatureRequestPayload,
  | 'feature_description'
  | 'user_persona'
  | 'priority_level'
  | 'time_constraint_minutes'
  | 'learning_objectives'
  | 'acceptance_criteria'
>;

const FULL_STORY_PATTERN = /As\s+(?:a|an)\s+(.+?),\s*I\s+want\s+(.+?)\s+so\s+that\s+(.+?)(?:\.|$)/gim;
const SHORT_STORY_PATTERN = /As\s+(.+?),\s*I\s+want\s+(.+?)(?:\.|$)/gim;

const DEFAULT_BENEFIT = 'I can accomplish my learning goals';
const MINIMUM_CRITERIA = 5;

const LEVEL_POINTS: Record<ComplexityLevel, number> = {
  Low: 1,
  Medium: 3,
  High: 5,
  'Very High': 8,
};

const EFFORT_TO_HOURS: ReadonlyArray<[number, number]> = [
  [1, 2],
  [2, 4],
  [3, 8],
  [5, 16],
  [8, 32],
  [13, 64],
];

const MAX_EFFORT_POINTS = 13;

type TaskDraft = Omit<ImplementationTask, 'task_id' | 'category'>;

// ─── User stories ────────────────────────────────────────

interface ParsedStory {
  role: string;
  action: string;
  benefit: string;
}

function parseStories(description: string): ParsedStory[] {
  const stories: ParsedStory[] = [];

  for (const match of description.matchAll(FULL_STORY_PATTERN)) {
    stories.push({ role: match[1].trim(), action: match[2].trim(), benefit: match[3].trim() });
  }

  // Short form only where the full form did not already match
  const remainder = description.replace(FULL_STORY_PATTERN, ' ');
  for (const match of remainder.matchAll(SHORT_STORY_PATTERN)) {
    stories.push({ role: match[1].trim(), action: match[2].trim(), benefit: DEFAULT_BENEFIT });
  }

  return stories;
}

function generateUserStories(feature: StoryFeatureInput): UserStory[] {
  let parsed = parseStories(feature.feature_description);

  if (parsed.length === 0) {
    parsed = [
      {
        role: feature.user_persona,
        action: 'use this feature',
        benefit: 'I can achieve my learning objectives',
      },
    ];
  }

  return parsed.map((story, index) => ({
    story_id: `US-${String(index + 1).padStart(3, '0')}`,
    role: story.role,
    action: story.action,
    benefit: story.benefit,
    story: `As ${story.role}, I want ${story.action} so that ${story.benefit}`,
    priority: index === 0 ? 'high' : 'medium',
    estimation: 3,
    acceptance_criteria: [
      `User can ${story.action} successfully`,
      'Feature works correctly for the target persona',
      'Feature meets performance requirements',
    ],
  }));
}

// ─── Requirements ────────────────────────────────────────

function toModelName(endpoint: string): string {
  const resource = endpoint.split('/').filter(Boolean).pop() ?? 'resource';
  return resource.charAt(0).toUpperCase() + resource.slice(1);
}

function analyzeTechnicalRequirements(feature: StoryFeatureInput): TechnicalRequirements {
  const { story } = getKeywordCatalog();
  const description = feature.feature_description;

  const components = matchKeywordMap(description, story.components);
  const endpoints = matchKeywordMap(description, story.endpoints);
  const apiEndpoints = endpoints.length > 0 ? endpoints : ['/api/content'];

  return {
    frontend: {
      required_components: components.length > 0 ? components : ['card', 'button'],
      animations: matchKeywordMap(description, story.animations),
      responsive_design: true,
    },
    backend: {
      api_endpoints: apiEndpoints,
      business_logic: matchKeywordMap(description, story.business_logic),
      data_models: apiEndpoints.map(toModelName),
    },
    integrations: {
      external_apis: matchKeywordMap(description, story.external_apis),
    },
    performance_requirements: {
      response_time_ms: 200,
      concurrent_users: 100,
    },
  };
}

function analyzeDesignRequirements(technical: TechnicalRequirements, stories: UserStory[]): DesignRequirements {
  const wireframes = ['main_view', 'mobile_view'];
  if (technical.backend.business_logic.includes('scoring')) {
    wireframes.push('results_view');
  }

  return {
    ui_components: technical.frontend.required_components,
    user_flows: stories.map(story => story.action),
    wireframe_requirements: wireframes,
    accessibility: { wcag_compliance: 'AA', screen_reader: true },
    responsive: { mobile_first: true, breakpoints: ['mobile', 'tablet', 'desktop'] },
  };
}

function breakDownImplementationTasks(technical: TechnicalRequirements): ImplementationTask[] {
  const categories: ReadonlyArray<[string, TaskDraft[]]> = [
    ['Frontend Development', [{ name: 'Create UI components', effort: 3 }]],
    ['Backend Development', [{ name: 'Create API endpoints', effort: 2 }]],
    [
      'Integration Work',
      technical.integrations.external_apis.map(api => ({ name: `Integrate ${api}`, effort: 2 })),
    ],
    [
      'Testing',
      [
        { name: 'Unit tests', effort: 1 },
        { name: 'Integration tests', effort: 2 },
      ],
    ],
    ['Documentation', [{ name: 'API documentation', effort: 1 }]],
    ['Deployment', [{ name: 'Deploy to staging', effort: 1 }]],
  ];

  const tasks: ImplementationTask[] = [];
  for (const [category, drafts] of categories) {
    for (const draft of drafts) {
      tasks.push({
        task_id: `TASK-${String(tasks.length + 1).padStart(3, '0')}`,
        category,
        ...draft,
      });
    }
  }
  return tasks;
}

// ─── Acceptance criteria ─────────────────────────────────

/**
 * Original criteria first, then per-story, DNA, technical and quality
 * criteria; blanks dropped, first occurrence kept, padded to five.
 */
export function generateAcceptanceCriteria(
  feature: StoryFeatureInput,
  breakdown: Pick<StoryBreakdown, 'user_stories'>
): string[] {
  const candidates = [
    ...feature.acceptance_criteria,
    ...breakdown.user_stories.map(story => `User can ${story.action} as expected`),
    'Feature maintains pedagogical value',
    'Feature respects 10-minute time constraint',
    `Feature uses professional tone appropriate for ${feature.user_persona} persona`,
    'All API endpoints respond within 200ms',
    'Frontend components are accessible (WCAG AA)',
    'Feature works on mobile devices',
    'Code coverage is above 90%',
    'No critical security vulnerabilities',
    'Performance score above 90',
  ];

  const criteria: string[] = [];
  for (const candidate of candidates) {
    const trimmed = candidate.trim();
    if (trimmed && !criteria.includes(trimmed)) {
      criteria.push(trimmed);
    }
  }

  if (criteria.length < MINIMUM_CRITERIA) {
    criteria.push(
      'Feature is implemented according to specifications',
      'Feature works correctly for target user persona',
      'Feature meets all performance requirements'
    );
  }

  return criteria;
}

// ─── Breakdown ───────────────────────────────────────────

export function createStoryBreakdown(feature: StoryFeatureInput, dna: DnaAnalysis): StoryBreakdown {
  const description = feature.feature_description.trim();
  if (!description) {
    throw new BusinessLogicError('Feature description cannot be empty', 'feature_description_requirements');
  }

  const userStories = generateUserStories(feature);
  const technical = analyzeTechnicalRequirements(feature);
  const design = analyzeDesignRequirements(technical, userStories);

  const risks = [{ risk: 'Scope creep', mitigation: 'Clear requirements', severity: 'medium' }];
  if (!dna.compliant) {
    risks.push({
      risk: 'DNA compliance gaps',
      mitigation: dna.recommendations.join('; '),
      severity: 'high',
    });
  }

  return {
    feature_summary: {
      title: description.split('\n')[0].trim(),
      description,
      user_persona: feature.user_persona,
      priority: feature.priority_level,
      time_constraint_minutes: feature.time_constraint_minutes,
      learning_objectives: feature.learning_objectives,
      business_value: 'Improves user learning experience and engagement',
      success_metrics: [
        'Feature completion within time constraint',
        'User satisfaction score > 4.0',
        'Zero critical bugs in production',
        'Performance meets specified requirements',
      ],
    },
    user_stories: userStories,
    technical_requirements: technical,
    design_requirements: design,
    implementation_tasks: breakDownImplementationTasks(technical),
    acceptance_criteria: generateAcceptanceCriteria(feature, { user_stories: userStories }),
    risks,
  };
}

// ─── Complexity ──────────────────────────────────────────

export function technicalComplexityScore(technical: TechnicalRequirements): number {
  return (
    technical.frontend.required_components.length +
    technical.frontend.animations.length * 2 +
    technical.backend.api_endpoints.length +
    technical.backend.business_logic.length * 2 +
    technical.integrations.external_apis.length * 3
  );
}

export function designComplexityScore(design: DesignRequirements): number {
  return design.ui_components.length + design.user_flows.length * 2 + design.wireframe_requirements.length;
}

function band(score: number, limits: [number, number, number]): ComplexityLevel {
  if (score <= limits[0]) return 'Low';
  if (score <= limits[1]) return 'Medium';
  if (score <= limits[2]) return 'High';
  return 'Very High';
}

export function estimateHours(effortPoints: number): number {
  for (const [points, hours] of EFFORT_TO_HOURS) {
    if (effortPoints <= points) return hours;
  }
  return 64;
}

function categorize(effortPoints: number): ComplexityAssessment['overall_complexity'] {
  if (effortPoints <= 2) return 'Simple';
  if (effortPoints <= 5) return 'Medium';
  if (effortPoints <= 8) return 'Complex';
  return 'Very Complex';
}

export function assessComplexity(breakdown: StoryBreakdown): ComplexityAssessment {
  const technicalScore = technicalComplexityScore(breakdown.technical_requirements);
  const designScore = designComplexityScore(breakdown.design_requirements);
  const externalApis = breakdown.technical_requirements.integrations.external_apis.length;
  const testingTasks = breakdown.implementation_tasks.filter(task => task.category === 'Testing').length;

  const technical = band(technicalScore, [5, 15, 25]);
  const design = band(designScore, [3, 8, 15]);
  const integration: ComplexityLevel = externalApis === 0 ? 'Low' : externalApis <= 2 ? 'Medium' : 'High';
  const testing: ComplexityLevel = testingTasks <= 3 ? 'Low' : testingTasks <= 6 ? 'Medium' : 'High';

  const effortPoints = Math.min(
    LEVEL_POINTS[technical] + LEVEL_POINTS[design] + LEVEL_POINTS[integration] + LEVEL_POINTS[testing],
    MAX_EFFORT_POINTS
  );
  const hours = estimateHours(effortPoints);

  let confidence = 0.8;
  if (effortPoints > 8) confidence -= 0.2;
  if (breakdown.user_stories.length < 3) confidence -= 0.1;
  confidence = Math.max(Math.round(confidence * 10) / 10, 0.3);

  const riskFactors = ['Technical complexity', 'Timeline constraints'];
  if (externalApis > 0) {
    riskFactors.push('External integration dependencies');
  }

  return {
    overall_complexity: categorize(effortPoints),
    effort_points: effortPoints,
    technical_complexity: technical,
    design_complexity: design,
    integration_complexity: integration,
    testing_complexity: testing,
    estimated_duration_hours: hours,
    estimated_duration_days: Math.round((hours / 8) * 10) / 10,
    risk_factors: riskFactors,
    confidence_level: confidence,
    implementation_notes: `Implementation involves ${technical.toLowerCase()} technical complexity and ${design.toLowerCase()} design complexity.`,
    complexity_breakdown: {
      technical_score: technicalScore,
      design_score: designScore,
    },
  };
}
