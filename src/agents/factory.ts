import type { StageName } from '../contracts/agent-graph.js';
import type { Contract } from '../contracts/schemas.js';
import type { StageStateMachine } from '../pipeline/state/machine.js';
import type { AgentOptions } from './base-agent.js';
import { ProjectManagerAgent } from './project-manager.js';
import { GameDesignerAgent } from './game-designer.js';
import { DeveloperAgent } from './developer.js';
import { TestEngineerAgent } from './test-engineer.js';
import { QaTesterAgent } from './qa-tester.js';
import { QualityReviewerAgent } from './quality-reviewer.js';

/** What the runner needs from a stage, whatever its payload types. */
export interface StageAgent {
  readonly stage: StageName;
  processContract(input: unknown): Promise<Contract>;
  getStateMachine(storyId: string): StageStateMachine | undefined;
}

export type AgentRoster = Readonly<Record<StageName, StageAgent>>;

/** A fresh roster per run, so state machines are never shared between runs. */
export function createAgents(options: AgentOptions = {}): AgentRoster {
  return {
    project_manager: new ProjectManagerAgent(options),
    game_designer: new GameDesignerAgent(options),
    developer: new DeveloperAgent(options),
    test_engineer: new TestEngineerAgent(options),
    qa_tester: new QaTesterAgent(options),
    quality_reviewer: new QualityReviewerAgent(options),
  };
}
