import type { FlowResult, InteractionFlow, SuiteResult, UserFlowValidation } from '../../contracts/schemas.js';
import { mean, round1 } from '../../scoring/keywords.js';

export function validateFlow(flow: InteractionFlow, integration: SuiteResult, e2e: SuiteResult): FlowResult {
  const issues: string[] = [];

  if (flow.user_actions.length !== flow.system_responses.length) {
    issues.push(
      `${flow.user_actions.length} actions but ${flow.system_responses.length} responses in ${flow.name}`
    );
  }
  if (integration.failed > 0) {
    issues.push(`${integration.failed} integration tests failing`);
  }
  if (e2e.failed > 0) {
    issues.push(`${e2e.failed} end-to-end tests failing`);
  }

  return {
    flow: flow.name,
    completed: issues.length === 0,
    duration_minutes: round1(flow.estimated_seconds / 60),
    issues,
  };
}

export function validateUserFlows(
  flows: InteractionFlow[],
  integration: SuiteResult,
  e2e: SuiteResult,
  targetMinutes: number,
  satisfaction: number
): UserFlowValidation {
  const results = flows.map(flow => validateFlow(flow, integration, e2e));
  const completed = results.filter(r => r.completed).length;

  return {
    flow_completion_rate: results.length > 0 ? round1((completed / results.length) * 100) : 0,
    user_satisfaction_score: satisfaction,
    average_task_completion_minutes: round1(mean(results.map(r => r.duration_minutes))),
    target_completion_minutes: targetMinutes,
    flows: results,
  };
}

export function totalCompletionMinutes(flows: InteractionFlow[]): number {
  return round1(flows.reduce((sum, f) => sum + f.estimated_seconds, 0) / 60);
}
