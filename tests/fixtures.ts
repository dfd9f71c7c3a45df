import type { StageName } from '../src/contracts/agent-graph.js';
import { PIPELINE_STAGES } from '../src/contracts/agent-graph.js';
import { createFeatureRequestContract } from '../src/contracts/builder.js';
import { QaResultsPayloadSchema } from '../src/contracts/schemas.js';
import type { Contract, FeatureRequestPayload, QaResultsPayload } from '../src/contracts/schemas.js';
import { createAgents } from '../src/agents/factory.js';
import { logger } from '../src/observability/logger.js';

logger.setLevel('silent');

export const STORY_ID = 'STORY-TEST-001';

export const FEATURE_DESCRIPTION =
  'Interactive learning exercise where each team member can practice applying the procurement policy ' +
  'and guideline to a workplace scenario. A quick, focused quiz gives feedback on each answer and shows ' +
  'how the policy connects to everyday practice, so participants understand the impact on the organization ' +
  'and the value for every user. The module is simple and clear, uses an api for results, and fits within ' +
  'the time of a coffee break.';

export const ACCEPTANCE_CRITERIA = [
  'Participants complete the scenario in under ten minutes',
  'Feedback explains the relevant policy section',
  'Results are saved through the api for the whole team',
];

export const LEARNING_OBJECTIVES = [
  'Understand the procurement policy',
  'Apply the policy in workplace practice',
];

export function featureRequest(overrides: Partial<FeatureRequestPayload> = {}): FeatureRequestPayload {
  return {
    payload_type: 'feature_request',
    feature_description: FEATURE_DESCRIPTION,
    acceptance_criteria: [...ACCEPTANCE_CRITERIA],
    user_persona: 'Anna',
    priority_level: 'high',
    time_constraint_minutes: 8,
    learning_objectives: [...LEARNING_OBJECTIVES],
    requested_by: 'test-user',
    ...overrides,
  };
}

export function featureContract(
  overrides: Partial<FeatureRequestPayload> = {},
  storyId: string = STORY_ID
): Contract {
  return createFeatureRequestContract(storyId, featureRequest(overrides));
}

/** Contracts produced by the real stages, up to and including `last`. */
export async function runStagesThrough(last: StageName, initial: Contract = featureContract()): Promise<Contract[]> {
  const agents = createAgents();
  const produced: Contract[] = [];
  let current = initial;

  for (const stage of PIPELINE_STAGES) {
    current = await agents[stage].processContract(current);
    produced.push(current);
    if (stage === last) break;
  }

  return produced;
}

export async function lastContractOf(stage: StageName): Promise<Contract> {
  const contracts = await runStagesThrough(stage);
  const last = contracts[contracts.length - 1];
  if (!last) throw new Error(`No contract produced through ${stage}`);
  return last;
}

export async function qaResults(): Promise<QaResultsPayload> {
  const contract = await lastContractOf('qa_tester');
  return QaResultsPayloadSchema.parse(contract.input_requirements.required_data);
}

/** Copy of a contract with its payload replaced. */
export function withPayload(contract: Contract, payload: Record<string, unknown>): Contract {
  return {
    ...contract,
    input_requirements: { ...contract.input_requirements, required_data: payload },
  };
}
