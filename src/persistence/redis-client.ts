import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { errorMessage } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export interface RedisSettings {
  url: string;
  /** Prepended to every key, so several pipelines can share one Redis. */
  keyPrefix: string;
  maxRetries?: number;
}

/** `disabled` means no REDIS_URL was configured; the process runs on memory alone. */
export type RedisState = 'disabled' | 'connecting' | 'ready' | 'unavailable';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const DEFAULT_MAX_RETRIES = 3;

let redisClient: Redis | null = null;
let state: RedisState = 'disabled';

/** Linear backoff capped at two seconds; null stops reconnecting. */
export function reconnectDelay(attempt: number, maxRetries: number = DEFAULT_MAX_RETRIES): number | null {
  if (attempt > maxRetries) return null;
  return Math.min(attempt * 200, 2000);
}

export function buildRedisOptions(settings: RedisSettings): RedisOptions {
  const maxRetries = settings.maxRetries ?? DEFAULT_MAX_RETRIES;

  return {
    keyPrefix: settings.keyPrefix,
    connectTimeout: CONNECT_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
    retryStrategy: (attempt: number) => {
      const delay = reconnectDelay(attempt, maxRetries);
      if (delay === null) {
        logger.error('redis_connection', 'Giving up on Redis, run history stays in memory', { attempt });
      } else {
        logger.warn('redis_connection', 'Retrying Redis connection', { attempt, delay });
      }
      return delay;
    },
  };
}

function watchConnection(client: Redis): void {
  client.on('ready', () => {
    state = 'ready';
    logger.info('redis_lifecycle', 'Redis ready');
  });

  client.on('reconnecting', () => {
    state = 'connecting';
  });

  client.on('error', (error: Error) => {
    state = 'unavailable';
    logger.error('redis_lifecycle', 'Redis error', { error: error.message });
  });

  client.on('end', () => {
    state = 'unavailable';
    logger.warn('redis_lifecycle', 'Redis connection ended');
  });
}

/** Opens the shared connection. Without settings the process stays in memory-only mode. */
export function initializeRedis(settings?: RedisSettings): Redis | null {
  if (!settings) {
    logger.info('redis_initialization', 'REDIS_URL not set, run history is in-memory only');
    state = 'disabled';
    return null;
  }

  try {
    redisClient = new Redis(settings.url, buildRedisOptions(settings));
    state = 'connecting';
    watchConnection(redisClient);
    logger.info('redis_initialization', 'Redis client created', { keyPrefix: settings.keyPrefix });
  } catch (error) {
    logger.error('redis_initialization', 'Failed to create Redis client', { error: errorMessage(error) });
    redisClient = null;
    state = 'unavailable';
  }

  return redisClient;
}

export function getRedisClient(): Redis | null {
  return redisClient;
}

export function getRedisState(): RedisState {
  return state;
}

export function isRedisHealthy(): boolean {
  return redisClient !== null && state === 'ready';
}

export async function shutdownRedis(): Promise<void> {
  if (!redisClient) return;

  logger.info('redis_shutdown', 'Closing Redis connection');
  const client = redisClient;
  redisClient = null;
  state = 'disabled';
  await client.quit();
}
