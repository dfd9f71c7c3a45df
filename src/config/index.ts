import { z } from 'zod';
import { ConfigurationError } from '../errors/types.js';
import type { LogThreshold } from '../observability/logger.js';
import type { GateErrorPolicy } from '../gates/types.js';

export interface GitHubConfig {
  appId?: string;
  privateKey?: string;
  webhookSecret?: string;
  featureLabel: string;
}

export interface AppConfig {
  port: number;
  redisUrl?: string;
  redisKeyPrefix: string;
  github: GitHubConfig;
  gateErrorPolicy: GateErrorPolicy;
  logLevel: LogThreshold;
  publishResults: boolean;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  REDIS_URL: z.string().url().optional(),
  REDIS_KEY_PREFIX: z.string().min(1).default('contract-pipeline:'),
  GITHUB_APP_ID: z.string().min(1).optional(),
  GITHUB_PRIVATE_KEY: z.string().min(1).optional(),
  GITHUB_WEBHOOK_SECRET: z.string().min(1).optional(),
  FEATURE_LABEL: z.string().min(1).default('feature-request'),
  GATE_ERROR_POLICY: z.enum(['fail_soft', 'fail_fast']).default('fail_soft'),
  LOG_LEVEL: z.enum(['info', 'warn', 'error', 'silent']).default('info'),
  PUBLISH_RESULTS: z.enum(['true', 'false']).default('false'),
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'unknown';
    throw new ConfigurationError(
      `Invalid configuration for ${variable}: ${issue?.message ?? 'invalid value'}`,
      variable
    );
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    redisUrl: values.REDIS_URL,
    redisKeyPrefix: values.REDIS_KEY_PREFIX,
    github: {
      appId: values.GITHUB_APP_ID,
      privateKey: values.GITHUB_PRIVATE_KEY?.replace(/\\n/g, '\n'),
      webhookSecret: values.GITHUB_WEBHOOK_SECRET,
      featureLabel: values.FEATURE_LABEL,
    },
    gateErrorPolicy: values.GATE_ERROR_POLICY,
    logLevel: values.LOG_LEVEL,
    publishResults: values.PUBLISH_RESULTS === 'true',
  };
}
