import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import './fixtures.js';
import { HybridRunHistory, InMemoryRunHistory, MAX_IN_MEMORY_RUNS } from '../src/runs/history.js';
import { RunRecordSchema } from '../src/runs/types.js';
import type { RunRecord } from '../src/runs/types.js';
import {
  buildRedisOptions,
  getRedisState,
  initializeRedis,
  isRedisHealthy,
  reconnectDelay,
} from '../src/persistence/redis-client.js';

function run(index: number): RunRecord {
  return {
    runId: `run-${index}`,
    storyId: 'STORY-TEST-001',
    status: 'approved',
    finalTarget: 'deployment',
    stages: [],
    fingerprints: [],
    qualityScore: 100,
    startedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 10,
    published: false,
  };
}

describe('InMemoryRunHistory', () => {
  it('returns the newest runs first', () => {
    const history = new InMemoryRunHistory();
    [1, 2, 3].forEach(i => history.append(run(i)));

    assert.deepEqual(
      history.getRecent(2).map(r => r.runId),
      ['run-3', 'run-2']
    );
    assert.deepEqual(history.getRecent(0), []);
  });

  it('drops the oldest runs past its capacity', () => {
    const history = new InMemoryRunHistory();
    for (let i = 0; i < MAX_IN_MEMORY_RUNS + 5; i++) history.append(run(i));

    const recent = history.getRecent(MAX_IN_MEMORY_RUNS);
    assert.equal(recent.length, MAX_IN_MEMORY_RUNS);
    assert.equal(recent[recent.length - 1]?.runId, 'run-5');
    assert.deepEqual(history.getStats(), { count: MAX_IN_MEMORY_RUNS, maxSize: MAX_IN_MEMORY_RUNS, type: 'memory' });
  });
});

describe('HybridRunHistory', () => {
  it('falls back to memory while Redis is unavailable', async () => {
    const history = new HybridRunHistory(true);
    await history.append(run(1));

    assert.deepEqual(await history.getRecent(), [run(1)]);
    assert.deepEqual(await history.getStats(), { count: 1, maxSize: MAX_IN_MEMORY_RUNS, type: 'memory' });
  });
});

describe('RunRecordSchema', () => {
  it('accepts a stored run and rejects an unknown status', () => {
    assert.equal(RunRecordSchema.safeParse(JSON.parse(JSON.stringify(run(1)))).success, true);
    assert.equal(RunRecordSchema.safeParse({ ...run(1), status: 'pending' }).success, false);
  });
});

describe('redis client', () => {
  it('stays disabled without settings', () => {
    assert.equal(initializeRedis(undefined), null);
    assert.equal(getRedisState(), 'disabled');
    assert.equal(isRedisHealthy(), false);
  });

  it('backs off linearly and gives up after the retry limit', () => {
    assert.equal(reconnectDelay(1), 200);
    assert.equal(reconnectDelay(3), 600);
    assert.equal(reconnectDelay(4), null);
    assert.equal(reconnectDelay(15, 20), 2000);
  });

  it('namespaces keys with the configured prefix', () => {
    const options = buildRedisOptions({ url: 'redis://localhost:6379', keyPrefix: 'staging:' });

    assert.equal(options.keyPrefix, 'staging:');
    assert.equal(options.maxRetriesPerRequest, 2);
    assert.equal(options.retryStrategy?.(1), 200);
    assert.equal(options.retryStrategy?.(4), null);
  });
});
