import type { StageName } from '../contracts/agent-graph.js';
import { PIPELINE_STAGES } from '../contracts/agent-graph.js';
import { getRedisState, isRedisHealthy } from '../persistence/redis-client.js';
import type { RedisState } from '../persistence/redis-client.js';
import type { RunHistory } from '../runs/types.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  redis: {
    enabled: boolean;
    healthy: boolean;
    state: RedisState;
    mode: 'distributed' | 'degraded' | 'single-instance';
  };
  runs: {
    started: number;
    completed: number;
    failed: number;
    approved: number;
    reworkRequired: number;
    approvalRate: number;
    averageDurationMs: number;
  };
  gates: {
    failuresByStage: Record<StageName, number>;
    totalFailures: number;
  };
  contracts: {
    validated: number;
    validationFailures: number;
  };
  webhooks: {
    received: number;
    rejectedSignature: number;
    ignored: number;
  };
  publishing: {
    published: number;
    failed: number;
  };
  history: {
    count: number;
    maxSize: number;
    type: 'memory' | 'redis';
  };
}

function emptyStageCounts(): Record<StageName, number> {
  return {
    project_manager: 0,
    game_designer: 0,
    developer: 0,
    test_engineer: 0,
    qa_tester: 0,
    quality_reviewer: 0,
  };
}

function emptyCounters() {
  return {
    runsStarted: 0,
    runsCompleted: 0,
    runsFailed: 0,
    approvals: 0,
    rejections: 0,
    totalDurationMs: 0,
    contractsValidated: 0,
    contractValidationFailures: 0,
    webhooksReceived: 0,
    webhooksRejectedSignature: 0,
    webhooksIgnored: 0,
    published: 0,
    publishFailures: 0,
  };
}

export class Metrics {
  private startTime: Date = new Date();

  private counters = emptyCounters();

  private gateFailures = emptyStageCounts();

  recordRunStarted(): void {
    this.counters.runsStarted++;
  }

  recordRunCompleted(approved: boolean, durationMs: number): void {
    this.counters.runsCompleted++;
    this.counters.totalDurationMs += durationMs;
    if (approved) {
      this.counters.approvals++;
    } else {
      this.counters.rejections++;
    }
  }

  recordRunFailed(durationMs: number): void {
    this.counters.runsFailed++;
    this.counters.totalDurationMs += durationMs;
  }

  recordGateFailure(stage: StageName): void {
    this.gateFailures[stage]++;
  }

  recordContractValidation(valid: boolean): void {
    this.counters.contractsValidated++;
    if (!valid) {
      this.counters.contractValidationFailures++;
    }
  }

  recordWebhook(outcome: 'accepted' | 'rejected_signature' | 'ignored'): void {
    this.counters.webhooksReceived++;
    if (outcome === 'rejected_signature') this.counters.webhooksRejectedSignature++;
    if (outcome === 'ignored') this.counters.webhooksIgnored++;
  }

  recordPublish(success: boolean): void {
    if (success) {
      this.counters.published++;
    } else {
      this.counters.publishFailures++;
    }
  }

  reset(): void {
    this.startTime = new Date();
    this.counters = emptyCounters();
    this.gateFailures = emptyStageCounts();
  }

  async snapshot(history?: RunHistory, redisEnabled?: boolean): Promise<MetricsSnapshot> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime.getTime()) / 1000);
    const finished = this.counters.runsCompleted + this.counters.runsFailed;

    const approvalRate = this.counters.runsCompleted > 0 ? this.counters.approvals / this.counters.runsCompleted : 0;
    const averageDurationMs = finished > 0 ? this.counters.totalDurationMs / finished : 0;

    const redisHealthy = isRedisHealthy();
    let redisMode: 'distributed' | 'degraded' | 'single-instance' = 'single-instance';
    if (redisEnabled) {
      redisMode = redisHealthy ? 'distributed' : 'degraded';
    }

    const historyStats = history ? await history.getStats() : { count: 0, maxSize: 0, type: 'memory' as const };

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds,
      redis: {
        enabled: redisEnabled ?? false,
        healthy: redisHealthy,
        state: getRedisState(),
        mode: redisMode,
      },
      runs: {
        started: this.counters.runsStarted,
        completed: this.counters.runsCompleted,
        failed: this.counters.runsFailed,
        approved: this.counters.approvals,
        reworkRequired: this.counters.rejections,
        approvalRate: parseFloat(approvalRate.toFixed(4)),
        averageDurationMs: Math.round(averageDurationMs),
      },
      gates: {
        failuresByStage: { ...this.gateFailures },
        totalFailures: PIPELINE_STAGES.reduce((sum, stage) => sum + this.gateFailures[stage], 0),
      },
      contracts: {
        validated: this.counters.contractsValidated,
        validationFailures: this.counters.contractValidationFailures,
      },
      webhooks: {
        received: this.counters.webhooksReceived,
        rejectedSignature: this.counters.webhooksRejectedSignature,
        ignored: this.counters.webhooksIgnored,
      },
      publishing: {
        published: this.counters.published,
        failed: this.counters.publishFailures,
      },
      history: historyStats,
    };
  }
}

export const metrics = new Metrics();
