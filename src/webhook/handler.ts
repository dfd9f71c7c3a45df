import type { Request, Response } from 'express';
import crypto from 'crypto';
import { z } from 'zod';
import type { GitHubConfig } from '../config/index.js';
import type { IssueRef } from '../github/issues.js';
import type { Metrics } from '../metrics/metrics.js';
import { errorMessage } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export interface WebhookRequest {
  signature?: string;
  event?: string;
  deliveryId?: string;
  /** The exact bytes GitHub signed. */
  rawBody: string | Buffer;
}

export interface WebhookResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface FeatureRequestJob {
  ref: IssueRef;
  installationId: number;
  deliveryId?: string;
}

export interface WebhookDeps {
  github: Pick<GitHubConfig, 'webhookSecret' | 'featureLabel'>;
  metrics: Metrics;
  /** Starts a pipeline run for an accepted issue; runs after the response is sent. */
  startRun: (job: FeatureRequestJob) => Promise<unknown>;
}

const IssueEventSchema = z.object({
  action: z.string(),
  installation: z.object({ id: z.number().int() }).optional(),
  repository: z.object({
    name: z.string(),
    owner: z.object({ login: z.string() }),
  }),
  issue: z.object({
    number: z.number().int().positive(),
    labels: z.array(z.object({ name: z.string() })).default([]),
  }),
  label: z.object({ name: z.string() }).optional(),
});

type IssueEvent = z.infer<typeof IssueEventSchema>;

export function signPayload(payload: string | Buffer, secret: string): string {
  return 'sha256=' + crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

export function verifySignature(payload: string | Buffer, signature: string, secret: string): boolean {
  const expected = Buffer.from(signPayload(payload, secret));
  const received = Buffer.from(signature);
  if (expected.length !== received.length) return false;
  return crypto.timingSafeEqual(received, expected);
}

/** `opened` with the label already set, or the label being added later. */
export function requestsFeature(event: IssueEvent, featureLabel: string): boolean {
  if (event.action === 'opened') {
    return event.issue.labels.some(label => label.name === featureLabel);
  }
  if (event.action === 'labeled') {
    return event.label?.name === featureLabel;
  }
  return false;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    logger.warn('webhook_validation', 'Webhook body is not JSON', { error: errorMessage(error) });
    return null;
  }
}

export function handleWebhook(request: WebhookRequest, deps: WebhookDeps): WebhookResponse {
  const { signature, event, deliveryId } = request;

  if (!signature) {
    logger.warn('webhook_validation', 'Missing signature header');
    deps.metrics.recordWebhook('rejected_signature');
    return { status: 401, body: { error: 'Missing signature' } };
  }

  const secret = deps.github.webhookSecret;
  if (!secret) {
    logger.error('webhook_validation', 'GITHUB_WEBHOOK_SECRET not configured');
    return { status: 500, body: { error: 'Server misconfiguration' } };
  }

  if (!verifySignature(request.rawBody, signature, secret)) {
    logger.warn('webhook_validation', 'Invalid signature', { deliveryId });
    deps.metrics.recordWebhook('rejected_signature');
    return { status: 401, body: { error: 'Invalid signature' } };
  }

  if (event !== 'issues') {
    logger.info('webhook_filtering', 'Non-issue event ignored', { event });
    deps.metrics.recordWebhook('ignored');
    return { status: 200, body: { message: 'Event ignored' } };
  }

  const body = typeof request.rawBody === 'string' ? request.rawBody : request.rawBody.toString('utf8');
  const parsed = IssueEventSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    logger.warn('webhook_validation', 'Malformed issue event', { issues: parsed.error.issues.length });
    return { status: 400, body: { error: 'Malformed issue event' } };
  }

  const payload = parsed.data;
  if (!requestsFeature(payload, deps.github.featureLabel)) {
    logger.info('webhook_filtering', 'Issue action ignored', { action: payload.action });
    deps.metrics.recordWebhook('ignored');
    return { status: 200, body: { message: 'Action ignored' } };
  }

  if (!payload.installation) {
    logger.error('webhook_validation', 'Missing installation ID in payload');
    return { status: 400, body: { error: 'Missing installation ID' } };
  }

  const job: FeatureRequestJob = {
    ref: { owner: payload.repository.owner.login, repo: payload.repository.name, number: payload.issue.number },
    installationId: payload.installation.id,
    deliveryId,
  };

  deps.metrics.recordWebhook('accepted');
  logger.info('webhook_received', 'Feature request accepted', {
    deliveryId,
    issue: job.ref.number,
    action: payload.action,
  });

  deps.startRun(job).catch(err => {
    logger.error('pipeline_fatal', 'Unhandled pipeline error', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  });

  return { status: 202, body: { message: 'Processing', issue: job.ref.number } };
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Express adapter; expects `express.raw` so the signature covers the exact bytes sent. */
export function createWebhookHandler(deps: WebhookDeps): (req: Request, res: Response) => void {
  return (req, res) => {
    const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const result = handleWebhook(
      {
        signature: headerValue(req, 'x-hub-signature-256'),
        event: headerValue(req, 'x-github-event'),
        deliveryId: headerValue(req, 'x-github-delivery'),
        rawBody,
      },
      deps
    );
    res.status(result.status).json(result.body);
  };
}
