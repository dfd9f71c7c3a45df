import type {
  ApiEndpointSpec,
  DesignSpecificationPayload,
  GameMechanic,
  GameMechanics,
  InteractionFlow,
  LibrarySource,
  StoryBreakdownPayload,
  StoryContext,
  UiComponentSpec,
} from '../../contracts/schemas.js';
import { containsAny, getKeywordCatalog } from '../../scoring/keywords.js';

type MechanicType = GameMechanic['type'];

interface ComponentTemplate {
  name: string;
  library: Exclude<LibrarySource, 'custom'>;
  purpose: string;
  label: string;
  props: string[];
}

const BREAKPOINTS = ['sm', 'md', 'lg'];

const MAIN_CONTAINER: ComponentTemplate = {
  name: 'MainContainer',
  library: 'shadcn_ui',
  purpose: 'main_container',
  label: 'Learning module',
  props: ['title', 'children'],
};

const STATUS_ALERT: ComponentTemplate = {
  name: 'StatusAlert',
  library: 'shadcn_ui',
  purpose: 'user_feedback',
  label: 'Result and guidance',
  props: ['variant', 'message'],
};

/** Requirement component kinds (from the story breakdown) to library components. */
const COMPONENT_LIBRARY: Record<string, ComponentTemplate[]> = {
  form: [
    { name: 'InputField', library: 'shadcn_ui', purpose: 'user_input', label: 'Your answer', props: ['value', 'onChange'] },
    { name: 'SubmitButton', library: 'shadcn_ui', purpose: 'form_submission', label: 'Submit answer', props: ['onSubmit', 'disabled'] },
  ],
  button: [
    { name: 'ActionButton', library: 'shadcn_ui', purpose: 'primary_action', label: 'Continue', props: ['onClick', 'disabled'] },
  ],
  quiz: [
    { name: 'QuizWidget', library: 'kenney_ui', purpose: 'knowledge_check', label: 'Knowledge check', props: ['questions', 'onAnswer'] },
  ],
  dashboard: [
    { name: 'DashboardCard', library: 'shadcn_ui', purpose: 'overview', label: 'Learning overview', props: ['summary'] },
  ],
  progress_tracker: [
    { name: 'ProgressIndicator', library: 'shadcn_ui', purpose: 'progress_display', label: 'Module progress', props: ['value', 'max'] },
  ],
  list: [
    { name: 'ItemList', library: 'shadcn_ui', purpose: 'content_list', label: 'Learning steps', props: ['items'] },
  ],
  data_table: [
    { name: 'DataTable', library: 'shadcn_ui', purpose: 'data_display', label: 'Results table', props: ['rows', 'columns'] },
  ],
  chart: [
    { name: 'ChartPanel', library: 'shadcn_ui', purpose: 'data_visualization', label: 'Results chart', props: ['series'] },
  ],
  card: [
    { name: 'ContentCard', library: 'shadcn_ui', purpose: 'content_display', label: 'Learning content', props: ['title', 'body'] },
  ],
  modal: [
    { name: 'DetailDialog', library: 'shadcn_ui', purpose: 'detail_overlay', label: 'Further details', props: ['open', 'onClose'] },
  ],
  navigation: [
    { name: 'NavigationTabs', library: 'shadcn_ui', purpose: 'navigation', label: 'Module sections', props: ['tabs', 'defaultValue'] },
  ],
};

const MECHANIC_COMPONENTS: Record<MechanicType, ComponentTemplate | null> = {
  knowledge_exploration: {
    name: 'InteractiveDiagram',
    library: 'kenney_ui',
    purpose: 'concept_exploration',
    label: 'Explore the concept',
    props: ['nodes', 'onSelect'],
  },
  practical_simulation: {
    name: 'SimulationArea',
    library: 'kenney_ui',
    purpose: 'scenario_practice',
    label: 'Workplace scenario',
    props: ['scenario', 'onDecision'],
  },
  skill_building: {
    name: 'ScoreDisplay',
    library: 'kenney_ui',
    purpose: 'skill_feedback',
    label: 'Your score',
    props: ['score', 'max'],
  },
  interactive_learning: null,
};

const INTERACTION_PATTERNS: Record<MechanicType, string[]> = {
  knowledge_exploration: ['click_to_reveal', 'hover_for_details', 'progressive_disclosure'],
  practical_simulation: ['drag_and_drop', 'scenario_selection', 'step_by_step_guidance'],
  skill_building: ['practice_exercises', 'immediate_feedback', 'incremental_challenges'],
  interactive_learning: ['guided_tour', 'contextual_help', 'self_paced_navigation'],
};

const FLOW_ACTIONS = ['open_view', 'read_instructions', 'complete_task', 'review_feedback'];
const FLOW_RESPONSES = ['render_view', 'show_guidance', 'validate_input', 'display_feedback'];
const SECONDS_PER_ACTION = 45;

// ─── Game mechanics ──────────────────────────────────────

export function inferLearningObjectives(description: string): string[] {
  const text = description.toLowerCase();
  const objectives: string[] = [];

  if (text.includes('policy') || text.includes('policies')) {
    objectives.push('Understand the policy framework and apply it in daily work');
  }
  if (text.includes('onboarding') || text.includes('introduction')) {
    objectives.push('Learn to use the digital tools of daily work');
  }
  if (text.includes('digital')) {
    objectives.push('Develop competence in planning digital services');
  }

  return objectives.length > 0
    ? objectives
    : ['Understand the core functionality of the service', 'Apply what was learned in a practical context'];
}

export function determineMechanicType(objective: string): MechanicType {
  const text = objective.toLowerCase();
  if (text.includes('understand')) return 'knowledge_exploration';
  if (text.includes('apply')) return 'practical_simulation';
  if (text.includes('develop')) return 'skill_building';
  return 'interactive_learning';
}

function determinePedagogicalApproach(objective: string): string {
  const text = objective.toLowerCase();
  if (text.includes('practical') || text.includes('apply')) return 'experiential_learning';
  if (text.includes('policy')) return 'case_based_learning';
  return 'guided_discovery';
}

/**
 * One mechanic per learning objective; objectives are inferred from the
 * description when the request carries none. Effectiveness is on a 1-5 scale.
 */
export function createGameMechanics(context: StoryContext): GameMechanics {
  const explicit = context.learning_objectives.length > 0;
  const objectives = explicit ? context.learning_objectives : inferLearningObjectives(context.feature_description);

  const mechanics = objectives.map((objective, index): GameMechanic => {
    const type = determineMechanicType(objective);
    return {
      name: `learning_mechanic_${index + 1}`,
      type,
      objective,
      pedagogical_approach: determinePedagogicalApproach(objective),
      interaction_patterns: INTERACTION_PATTERNS[type],
    };
  });

  let score = 3.5;
  if (mechanics.every(m => m.interaction_patterns.length >= 3)) score += 0.5;
  if (explicit) score += 0.5;
  if (containsAny(context.feature_description, getKeywordCatalog().dna.assessment)) score += 0.5;

  return {
    mechanics,
    learning_objectives_addressed: objectives,
    pedagogical_effectiveness_score: Math.min(score, 5),
    estimated_engagement_minutes: context.time_constraint_minutes,
  };
}

// ─── UI components ───────────────────────────────────────

function toSpec(template: ComponentTemplate): UiComponentSpec {
  return {
    name: template.name,
    library_source: template.library,
    library_compliant: true,
    purpose: template.purpose,
    label: template.label,
    responsive_design: true,
    breakpoints: BREAKPOINTS,
    props: template.props,
    accessibility: {
      aria_label: template.label,
      keyboard_navigable: true,
    },
  };
}

export function mapUiComponents(requiredComponents: string[], mechanics: GameMechanic[]): UiComponentSpec[] {
  const templates: ComponentTemplate[] = [MAIN_CONTAINER];

  for (const kind of requiredComponents) {
    templates.push(...(COMPONENT_LIBRARY[kind] ?? []));
  }
  for (const mechanic of mechanics) {
    const template = MECHANIC_COMPONENTS[mechanic.type];
    if (template) templates.push(template);
  }
  templates.push(STATUS_ALERT);

  const seen = new Set<string>();
  return templates
    .filter(template => {
      if (seen.has(template.name)) return false;
      seen.add(template.name);
      return true;
    })
    .map(toSpec);
}

// ─── Flows, wireframes, endpoints ────────────────────────

export function createInteractionFlows(userFlows: string[]): InteractionFlow[] {
  return userFlows.map((flow, index) => ({
    name: `flow_${index + 1}: ${flow}`,
    start_state: 'landing',
    end_state: 'completed',
    user_actions: FLOW_ACTIONS,
    system_responses: FLOW_RESPONSES,
    estimated_seconds: FLOW_ACTIONS.length * SECONDS_PER_ACTION,
  }));
}

function resourceName(path: string): string {
  return path.split('/').filter(Boolean).pop() ?? 'resource';
}

export function createApiEndpoints(paths: string[]): ApiEndpointSpec[] {
  return paths.flatMap((path): ApiEndpointSpec[] => {
    const resource = resourceName(path);
    return [
      {
        name: `get_${resource}`,
        method: 'GET',
        path,
        description: `Fetch ${resource} for the current learner`,
        validation_rules: [],
        authentication_required: true,
        stateless: true,
      },
      {
        name: `submit_${resource}`,
        method: 'POST',
        path,
        description: `Submit ${resource} for the current learner`,
        validation_rules: ['payload_required', 'payload_schema_valid'],
        authentication_required: true,
        stateless: true,
      },
    ];
  });
}

export function buildDesignSpecification(
  input: StoryBreakdownPayload
): Omit<DesignSpecificationPayload, 'ux_validation'> {
  const context = input.story_context;
  const breakdown = input.story_breakdown;

  const gameMechanics = createGameMechanics(context);
  const uiComponents = mapUiComponents(
    breakdown.technical_requirements.frontend.required_components,
    gameMechanics.mechanics
  );
  const componentNames = uiComponents.map(c => c.name);
  const apiEndpoints = createApiEndpoints(breakdown.technical_requirements.backend.api_endpoints);

  return {
    payload_type: 'design_specification',
    story_context: context,
    game_mechanics: gameMechanics,
    ui_components: uiComponents,
    interaction_flows: createInteractionFlows(breakdown.design_requirements.user_flows),
    wireframes: breakdown.design_requirements.wireframe_requirements.map(name => ({
      name,
      layout: name === 'mobile_view' ? 'single_column' : 'two_column',
      components: componentNames,
    })),
    api_endpoints: apiEndpoints,
    state_management: {
      approach: 'server_state_via_api_with_local_ui_state',
      client_state: ['current_step', 'user_answers'],
      api_synced: [...new Set(apiEndpoints.map(e => e.path))],
    },
    asset_requirements: [
      { type: 'icon_set', source: 'shadcn_ui', reference: 'lucide-react' },
      ...uiComponents
        .filter(c => c.library_source === 'kenney_ui')
        .map(c => ({ type: 'game_ui_asset', source: c.library_source, reference: c.name })),
    ],
    performance_considerations: {
      lighthouse_target: 90,
      load_time_target: 2000,
      api_response_target: 200,
    },
  };
}
