export const AGENT_NAMES = [
  'github',
  'project_manager',
  'game_designer',
  'developer',
  'test_engineer',
  'qa_tester',
  'quality_reviewer',
  'deployment',
] as const;

export type AgentName = (typeof AGENT_NAMES)[number];

/** Agents that process contracts. `github` only originates them, `deployment` only receives them. */
export type StageName = Exclude<AgentName, 'github' | 'deployment'>;

export const PIPELINE_STAGES: readonly StageName[] = [
  'project_manager',
  'game_designer',
  'developer',
  'test_engineer',
  'qa_tester',
  'quality_reviewer',
];

/**
 * Every permitted handoff. quality_reviewer is the only branch point:
 * deployment on approval, developer for rework.
 */
export const AGENT_GRAPH: Readonly<Record<AgentName, readonly AgentName[]>> = {
  github: ['project_manager'],
  project_manager: ['game_designer'],
  game_designer: ['developer'],
  developer: ['test_engineer'],
  test_engineer: ['qa_tester'],
  qa_tester: ['quality_reviewer'],
  quality_reviewer: ['deployment', 'developer'],
  deployment: [],
};

export function isAgentName(value: string): value is AgentName {
  return (AGENT_NAMES as readonly string[]).includes(value);
}

export function isStageName(value: string): value is StageName {
  return (PIPELINE_STAGES as readonly string[]).includes(value);
}

export function getValidNextAgents(source: AgentName): readonly AgentName[] {
  return AGENT_GRAPH[source];
}

export function isValidHandoff(source: AgentName, target: AgentName): boolean {
  return AGENT_GRAPH[source].includes(target);
}

/** The forward (non-rework) successor of a stage. */
export function getForwardTarget(source: StageName): AgentName {
  return AGENT_GRAPH[source][0];
}
