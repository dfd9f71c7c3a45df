import type { RunHistory, RunHistoryStats, RunRecord } from './types.js';
import { RunRecordSchema } from './types.js';
import { getRedisClient, isRedisHealthy } from '../persistence/redis-client.js';
import { errorMessage } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export const MAX_IN_MEMORY_RUNS = 100;
export const MAX_REDIS_RUNS = 500;
/** Namespaced by the client's key prefix. */
const REDIS_KEY = 'runs';

export class InMemoryRunHistory {
  private runs: RunRecord[] = [];

  append(record: RunRecord): void {
    this.runs.push(record);

    if (this.runs.length > MAX_IN_MEMORY_RUNS) {
      this.runs.shift();
    }
  }

  /** Newest first. */
  getRecent(limit: number = 50): RunRecord[] {
    if (limit <= 0) return [];
    const actualLimit = Math.min(limit, this.runs.length);
    return this.runs.slice(-actualLimit).reverse();
  }

  getStats(): RunHistoryStats {
    return {
      count: this.runs.length,
      maxSize: MAX_IN_MEMORY_RUNS,
      type: 'memory',
    };
  }
}

function parseStoredRun(serialized: string): RunRecord | null {
  try {
    const parsed = RunRecordSchema.safeParse(JSON.parse(serialized));
    if (parsed.success) return parsed.data;
    logger.warn('run_history_error', 'Skipping stored run with unexpected shape', {
      issues: parsed.error.issues.length,
    });
    return null;
  } catch (error) {
    logger.warn('run_history_error', 'Skipping unreadable stored run', { error: errorMessage(error) });
    return null;
  }
}

export class RedisRunHistory {
  async append(record: RunRecord): Promise<void> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      logger.warn('run_history_degraded', 'Redis unavailable, run not persisted', {
        runId: record.runId,
      });
      return;
    }

    try {
      await redis.lpush(REDIS_KEY, JSON.stringify(record));
      await redis.ltrim(REDIS_KEY, 0, MAX_REDIS_RUNS - 1);
    } catch (error) {
      logger.error('run_history_error', 'Failed to append run to Redis', {
        error: errorMessage(error),
        runId: record.runId,
      });
    }
  }

  async getRecent(limit: number = 50): Promise<RunRecord[]> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy() || limit <= 0) {
      return [];
    }

    try {
      const actualLimit = Math.min(limit, MAX_REDIS_RUNS);
      const serialized = await redis.lrange(REDIS_KEY, 0, actualLimit - 1);
      return serialized.map(parseStoredRun).filter((run): run is RunRecord => run !== null);
    } catch (error) {
      logger.error('run_history_error', 'Failed to retrieve runs from Redis', {
        error: errorMessage(error),
      });
      return [];
    }
  }

  async getStats(): Promise<RunHistoryStats> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      return { count: 0, maxSize: MAX_REDIS_RUNS, type: 'redis' };
    }

    try {
      const count = await redis.llen(REDIS_KEY);
      return { count, maxSize: MAX_REDIS_RUNS, type: 'redis' };
    } catch (error) {
      logger.warn('run_history_error', 'Failed to count runs in Redis', { error: errorMessage(error) });
      return { count: 0, maxSize: MAX_REDIS_RUNS, type: 'redis' };
    }
  }
}

/** Always writes to memory; reads from Redis only while it is healthy. */
export class HybridRunHistory implements RunHistory {
  private readonly inMemory = new InMemoryRunHistory();
  private readonly redis = new RedisRunHistory();

  constructor(private readonly useRedis: boolean) {}

  async append(record: RunRecord): Promise<void> {
    this.inMemory.append(record);

    if (this.useRedis) {
      await this.redis.append(record);
    }
  }

  async getRecent(limit: number = 50): Promise<RunRecord[]> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getRecent(limit);
    }
    return this.inMemory.getRecent(limit);
  }

  async getStats(): Promise<RunHistoryStats> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getStats();
    }
    return this.inMemory.getStats();
  }
}

export function createRunHistory(useRedis: boolean): RunHistory {
  logger.info('run_history_init', 'Run history initialized', {
    type: useRedis ? 'hybrid (redis + memory)' : 'memory',
    maxSize: useRedis ? MAX_REDIS_RUNS : MAX_IN_MEMORY_RUNS,
  });

  return new HybridRunHistory(useRedis);
}
