import type { StageName } from '../contracts/agent-graph.js';
import { PIPELINE_STAGES } from '../contracts/agent-graph.js';
import { QualityReviewPayloadSchema } from '../contracts/schemas.js';
import type { Contract, QualityReviewPayload } from '../contracts/schemas.js';
import { contractFingerprint } from '../contracts/fingerprint.js';
import { validateContractChain } from '../contracts/validator.js';
import { createAgents } from '../agents/factory.js';
import type { AgentRoster } from '../agents/factory.js';
import type { GateErrorPolicy } from '../gates/types.js';
import type { EventBus } from '../events/bus.js';
import type { Metrics } from '../metrics/metrics.js';
import type { RunHistory, RunRecord, RunStatus, StageSummary } from '../runs/types.js';
import {
  ContractValidationError,
  ExternalServiceError,
  QualityGateError,
  errorMessage,
  isRetryableError,
} from '../errors/types.js';
import { generateRunId, logger } from '../observability/logger.js';

export interface PipelineDeps {
  history: RunHistory;
  bus: EventBus;
  metrics: Metrics;
  gatePolicy?: GateErrorPolicy;
  /** Called with the final review when the run reaches a decision. */
  publish?: (review: QualityReviewPayload) => Promise<void>;
  agents?: AgentRoster;
  runId?: string;
}

export interface PipelineResult {
  record: RunRecord;
  contracts: Contract[];
}

class StageFailure extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly original: unknown
  ) {
    super(errorMessage(original));
    this.name = 'StageFailure';
  }
}

function summarizeStage(
  agents: AgentRoster,
  stage: StageName,
  storyId: string,
  startedAt: number,
  output: Contract | null
): StageSummary {
  const machine = agents[stage].getStateMachine(storyId);
  return {
    stage,
    finalState: machine ? machine.getCurrentState() : null,
    durationMs: Date.now() - startedAt,
    contractFingerprint: output ? contractFingerprint(output) : null,
    transitions: machine ? machine.getStateHistorySummary() : [],
  };
}

function reviewOf(contract: Contract): QualityReviewPayload | null {
  const parsed = QualityReviewPayloadSchema.safeParse(contract.input_requirements.required_data);
  return parsed.success ? parsed.data : null;
}

function statusOf(contract: Contract): RunStatus {
  if (contract.source_agent === 'quality_reviewer' && contract.target_agent === 'deployment') return 'approved';
  if (contract.source_agent === 'quality_reviewer' && contract.target_agent === 'developer') return 'rework_required';
  return 'failed';
}

/**
 * Runs the six stages in order over one feature request contract. A rework
 * contract ends the run; resubmitting is up to the caller.
 */
export async function runPipeline(initial: Contract, deps: PipelineDeps): Promise<PipelineResult> {
  const runId = deps.runId ?? generateRunId();
  const storyId = initial.story_id;
  const agents = deps.agents ?? createAgents({ gatePolicy: deps.gatePolicy });
  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();

  const contracts: Contract[] = [initial];
  const stages: StageSummary[] = [];

  logger.setContext({ runId, storyId });
  deps.metrics.recordRunStarted();
  deps.bus.publish('pipeline.started', { runId, storyId, data: { source: initial.source_agent } });
  logger.info('pipeline_start', 'Pipeline run started', { initialFingerprint: contractFingerprint(initial) });

  try {
    let current = initial;

    for (const stage of PIPELINE_STAGES) {
      const stageStart = Date.now();
      logger.updateContext({ stage });
      deps.bus.publish('stage.started', { runId, storyId, stage, data: { input: contractFingerprint(current) } });

      let output: Contract;
      try {
        output = await agents[stage].processContract(current);
      } catch (error) {
        stages.push(summarizeStage(agents, stage, storyId, stageStart, null));
        deps.bus.publish('stage.failed', { runId, storyId, stage, data: { error: errorMessage(error) } });
        throw new StageFailure(stage, error);
      }

      stages.push(summarizeStage(agents, stage, storyId, stageStart, output));
      deps.metrics.recordContractValidation(true);
      contracts.push(output);
      deps.bus.publish('stage.completed', {
        runId,
        storyId,
        stage,
        data: { target: output.target_agent, fingerprint: contractFingerprint(output) },
      });

      current = output;
    }

    const chain = validateContractChain(contracts);
    if (!chain.isValid) {
      logger.warn('contract_chain_invalid', 'Handoff chain is not additive', { errors: chain.errors });
    }

    const status = statusOf(current);
    const review = reviewOf(current);
    const published = review && deps.publish ? await publishReview(deps, review) : false;
    const durationMs = Date.now() - startTime;

    const record: RunRecord = {
      runId,
      storyId,
      status,
      finalTarget: current.target_agent,
      stages,
      fingerprints: contracts.map(contractFingerprint),
      qualityScore: review ? review.quality_analysis.overall_score : null,
      startedAt,
      durationMs,
      published,
    };

    deps.metrics.recordRunCompleted(status === 'approved', durationMs);
    await deps.history.append(record);
    deps.bus.publish('pipeline.completed', { runId, storyId, data: { status, finalTarget: record.finalTarget } });
    logger.info('pipeline_complete', `Pipeline finished: ${status}`, { durationMs, stages: stages.length });

    return { record, contracts };
  } catch (error) {
    const stage = error instanceof StageFailure ? error.stage : undefined;
    const cause = error instanceof StageFailure ? error.original : error;
    const durationMs = Date.now() - startTime;

    if (cause instanceof QualityGateError && stage) {
      deps.metrics.recordGateFailure(stage);
    }
    if (cause instanceof ContractValidationError) {
      deps.metrics.recordContractValidation(false);
    }

    const record: RunRecord = {
      runId,
      storyId,
      status: 'failed',
      finalTarget: null,
      stages,
      fingerprints: contracts.map(contractFingerprint),
      qualityScore: null,
      startedAt,
      durationMs,
      published: false,
      error: {
        name: cause instanceof Error ? cause.name : 'Error',
        message: errorMessage(cause),
        stage,
      },
    };

    deps.metrics.recordRunFailed(durationMs);
    await deps.history.append(record);
    deps.bus.publish('pipeline.failed', { runId, storyId, stage, data: { error: record.error } });
    logger.error('pipeline_failed', 'Pipeline run failed', { stage, error: errorMessage(cause) });

    return { record, contracts };
  } finally {
    logger.clearContext();
  }
}

async function publishReview(deps: PipelineDeps, review: QualityReviewPayload): Promise<boolean> {
  if (!deps.publish) return false;

  try {
    await deps.publish(review);
    deps.metrics.recordPublish(true);
    return true;
  } catch (error) {
    deps.metrics.recordPublish(false);
    logger.error('publish_failed', 'Failed to publish review decision', {
      error: errorMessage(error),
      retryable: isRetryableError(error),
      retryAfter: error instanceof ExternalServiceError ? error.retryAfter : undefined,
    });
    return false;
  }
}
