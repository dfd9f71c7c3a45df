import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { STORY_ID, featureContract, featureRequest } from './fixtures.js';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config/index.js';
import { EventBus } from '../src/events/bus.js';
import { Metrics } from '../src/metrics/metrics.js';
import { createRunHistory } from '../src/runs/history.js';
import { signPayload } from '../src/webhook/handler.js';

function testApp() {
  return createApp({
    config: loadConfig({ GITHUB_WEBHOOK_SECRET: 'test-secret' }),
    history: createRunHistory(false),
    bus: new EventBus(),
    metrics: new Metrics(),
    redisEnabled: false,
  });
}

describe('HTTP API', () => {
  it('reports health', async () => {
    const response = await request(testApp()).get('/health');

    assert.equal(response.status, 200);
    assert.deepEqual(response.body, {
      status: 'ok',
      contractVersion: '1.0',
      changes: 'Initial contract - 7 agents, 7 stage payloads, 32 quality gates',
    });
  });

  it('validates contracts', async () => {
    const app = testApp();

    const valid = await request(app).post('/contracts/validate').send(featureContract());
    assert.equal(valid.status, 200);
    assert.equal(valid.body.isValid, true);

    const invalid = await request(app).post('/contracts/validate').send({ story_id: 'STORY-1' });
    assert.equal(invalid.status, 422);
    assert.equal(invalid.body.isValid, false);
  });

  it('runs a feature request and lists the run', async () => {
    const app = testApp();
    const { payload_type: _type, ...body } = featureRequest();

    const run = await request(app)
      .post('/pipeline/run')
      .send({ ...body, story_id: STORY_ID });

    assert.equal(run.status, 200);
    assert.equal(run.body.status, 'approved');
    assert.equal(run.body.storyId, STORY_ID);
    assert.equal(run.body.finalTarget, 'deployment');

    const runs = await request(app).get('/runs?limit=5');
    assert.equal(runs.status, 200);
    assert.equal(runs.body.runs.length, 1);
    assert.deepEqual(runs.body.meta, { count: 1, limit: 5, total: 1, maxSize: 100, storageType: 'memory' });
  });

  it('rejects a malformed feature request', async () => {
    const response = await request(testApp()).post('/pipeline/run').send({ user_persona: 'Anna' });

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'Invalid feature request');
  });

  it('exposes metrics with the gate policy', async () => {
    const response = await request(testApp()).get('/metrics');

    assert.equal(response.status, 200);
    assert.equal(response.body.gateErrorPolicy, 'fail_soft');
    assert.deepEqual(response.body.redis, {
      enabled: false,
      healthy: false,
      state: 'disabled',
      mode: 'single-instance',
    });
  });

  it('checks webhook signatures over the raw body', async () => {
    const app = testApp();
    const payload = JSON.stringify({ zen: 'Keep it logically awesome.' });

    const unsigned = await request(app)
      .post('/webhook')
      .set('content-type', 'application/json')
      .set('x-github-event', 'ping')
      .send(payload);
    assert.equal(unsigned.status, 401);

    const signed = await request(app)
      .post('/webhook')
      .set('content-type', 'application/json')
      .set('x-github-event', 'ping')
      .set('x-hub-signature-256', signPayload(payload, 'test-secret'))
      .send(payload);
    assert.equal(signed.status, 200);
    assert.deepEqual(signed.body, { message: 'Event ignored' });
  });
});
