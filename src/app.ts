import express from 'express';
import type { Express } from 'express';
import { z } from 'zod';
import type { AppConfig } from './config/index.js';
import { FeatureRequestPayloadSchema } from './contracts/schemas.js';
import { createFeatureRequestContract } from './contracts/builder.js';
import { CONTRACT_CHANGELOG, CONTRACT_VERSION } from './contracts/version.js';
import { STORY_ID_PATTERN, validateContract } from './contracts/validator.js';
import type { EventBus } from './events/bus.js';
import { createInstallationClient } from './github/client.js';
import { fetchFeatureRequest, publishDecision } from './github/issues.js';
import type { Metrics } from './metrics/metrics.js';
import { runPipeline } from './pipeline/runner.js';
import type { RunHistory } from './runs/types.js';
import { createWebhookHandler } from './webhook/handler.js';
import type { FeatureRequestJob } from './webhook/handler.js';
import { errorMessage } from './errors/types.js';
import { logger } from './observability/logger.js';

export interface AppDeps {
  config: AppConfig;
  history: RunHistory;
  bus: EventBus;
  metrics: Metrics;
  redisEnabled: boolean;
}

const RunRequestSchema = FeatureRequestPayloadSchema.omit({ payload_type: true }).extend({
  story_id: z.string().regex(STORY_ID_PATTERN).optional(),
});

let apiStoryCounter = 0;

function nextApiStoryId(): string {
  apiStoryCounter++;
  return `STORY-API-${Date.now()}${apiStoryCounter}`;
}

function parseLimit(value: unknown): number {
  const limit = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Math.min(Math.max(1, Number.isFinite(limit) ? limit : 50), 100);
}

export function createApp(deps: AppDeps): Express {
  const { config, history, bus, metrics } = deps;
  const app = express();

  const startRun = async ({ ref, installationId }: FeatureRequestJob): Promise<void> => {
    const octokit = await createInstallationClient(config.github, installationId);
    const initial = await fetchFeatureRequest(octokit, ref);

    await runPipeline(initial, {
      history,
      bus,
      metrics,
      gatePolicy: config.gateErrorPolicy,
      publish: config.publishResults ? review => publishDecision(octokit, ref, review) : undefined,
    });
  };

  // Raw body: the signature is computed over the bytes GitHub sent.
  app.post('/webhook', express.raw({ type: 'application/json' }), createWebhookHandler({
    github: config.github,
    metrics,
    startRun,
  }));

  app.use(express.json({ limit: '1mb' }));

  app.post('/pipeline/run', async (req, res) => {
    const parsed = RunRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid feature request',
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
    }

    const { story_id: storyId, ...request } = parsed.data;

    try {
      const initial = createFeatureRequestContract(storyId ?? nextApiStoryId(), {
        payload_type: 'feature_request',
        ...request,
      });
      const { record } = await runPipeline(initial, {
        history,
        bus,
        metrics,
        gatePolicy: config.gateErrorPolicy,
      });
      return res.status(record.status === 'failed' ? 422 : 200).json(record);
    } catch (error) {
      logger.error('pipeline_run_endpoint_error', 'Unexpected error in pipeline run endpoint', {
        error: errorMessage(error),
      });
      return res.status(500).json({ error: 'Internal server error' });
    }
  });

  app.post('/contracts/validate', (req, res) => {
    const result = validateContract(req.body);
    res.status(result.isValid ? 200 : 422).json(result);
  });

  app.get('/runs', async (req, res) => {
    try {
      const limit = parseLimit(req.query.limit);
      const runs = await history.getRecent(limit);
      const stats = await history.getStats();

      res.status(200).json({
        runs,
        meta: {
          count: runs.length,
          limit,
          total: stats.count,
          maxSize: stats.maxSize,
          storageType: stats.type,
        },
      });
    } catch (error) {
      logger.error('runs_error', 'Failed to retrieve run history', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to retrieve runs' });
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      contractVersion: CONTRACT_VERSION,
      changes: CONTRACT_CHANGELOG[CONTRACT_VERSION],
    });
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const snapshot = await metrics.snapshot(history, deps.redisEnabled);
      res.status(200).json({ ...snapshot, gateErrorPolicy: config.gateErrorPolicy });
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  });

  return app;
}
