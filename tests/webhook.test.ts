import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import './fixtures.js';
import { handleWebhook, signPayload, verifySignature } from '../src/webhook/handler.js';
import type { FeatureRequestJob, WebhookDeps, WebhookRequest } from '../src/webhook/handler.js';
import { Metrics } from '../src/metrics/metrics.js';

const SECRET = 'test-secret';

function issueEvent(action: string, labels: string[], extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    action,
    installation: { id: 7 },
    repository: { name: 'learning', owner: { login: 'acme' } },
    issue: { number: 42, labels: labels.map(name => ({ name })) },
    ...extra,
  });
}

function signed(rawBody: string, event: string = 'issues'): WebhookRequest {
  return { rawBody, event, signature: signPayload(rawBody, SECRET), deliveryId: 'delivery-1' };
}

function setup({ secret }: { secret: string | undefined } = { secret: SECRET }) {
  const jobs: FeatureRequestJob[] = [];
  const deps: WebhookDeps = {
    github: { webhookSecret: secret, featureLabel: 'feature-request' },
    metrics: new Metrics(),
    startRun: async job => {
      jobs.push(job);
    },
  };
  return { deps, jobs };
}

describe('signatures', () => {
  it('verifies a matching HMAC', () => {
    const body = '{"ok":true}';
    const signature = signPayload(body, SECRET);

    assert.match(signature, /^sha256=[0-9a-f]{64}$/);
    assert.equal(verifySignature(body, signature, SECRET), true);
    assert.equal(verifySignature(body, signature, 'other-secret'), false);
    assert.equal(verifySignature(body, 'sha256=short', SECRET), false);
  });

  it('signs the raw bytes rather than their text decoding', () => {
    const body = Buffer.from([0x7b, 0xff, 0xfe, 0x7d]);
    const signature = signPayload(body, SECRET);

    assert.equal(verifySignature(body, signature, SECRET), true);
    assert.equal(verifySignature(body.toString('utf8'), signature, SECRET), false);
  });

  it('accepts a signed body that is not valid UTF-8', () => {
    const rawBody = Buffer.from([0x7b, 0xff, 0x7d]);
    const { deps } = setup();

    const response = handleWebhook(
      { rawBody, event: 'push', signature: signPayload(rawBody, SECRET), deliveryId: 'delivery-2' },
      deps
    );
    assert.deepEqual(response, { status: 200, body: { message: 'Event ignored' } });
  });
});

describe('handleWebhook', () => {
  it('starts a run for an issue opened with the feature label', () => {
    const { deps, jobs } = setup();

    const response = handleWebhook(signed(issueEvent('opened', ['bug', 'feature-request'])), deps);

    assert.deepEqual(response, { status: 202, body: { message: 'Processing', issue: 42 } });
    assert.deepEqual(jobs, [
      { ref: { owner: 'acme', repo: 'learning', number: 42 }, installationId: 7, deliveryId: 'delivery-1' },
    ]);
  });

  it('starts a run when the feature label is added', () => {
    const { deps, jobs } = setup();

    const response = handleWebhook(
      signed(issueEvent('labeled', ['feature-request'], { label: { name: 'feature-request' } })),
      deps
    );

    assert.equal(response.status, 202);
    assert.equal(jobs.length, 1);
  });

  it('ignores other labels and actions', () => {
    const { deps, jobs } = setup();

    assert.deepEqual(
      handleWebhook(signed(issueEvent('labeled', [], { label: { name: 'bug' } })), deps),
      { status: 200, body: { message: 'Action ignored' } }
    );
    assert.deepEqual(handleWebhook(signed(issueEvent('closed', ['feature-request'])), deps), {
      status: 200,
      body: { message: 'Action ignored' },
    });
    assert.deepEqual(jobs, []);
  });

  it('ignores events other than issues', () => {
    const { deps } = setup();
    const response = handleWebhook(signed('{}', 'push'), deps);

    assert.deepEqual(response, { status: 200, body: { message: 'Event ignored' } });
  });

  it('rejects missing and invalid signatures', async () => {
    const { deps, jobs } = setup();
    const body = issueEvent('opened', ['feature-request']);

    assert.deepEqual(handleWebhook({ rawBody: body, event: 'issues' }, deps), {
      status: 401,
      body: { error: 'Missing signature' },
    });
    assert.deepEqual(
      handleWebhook({ rawBody: body, event: 'issues', signature: signPayload(body, 'wrong-secret') }, deps),
      { status: 401, body: { error: 'Invalid signature' } }
    );
    assert.deepEqual(jobs, []);

    const snapshot = await deps.metrics.snapshot();
    assert.deepEqual(snapshot.webhooks, { received: 2, rejectedSignature: 2, ignored: 0 });
  });

  it('fails closed without a configured secret', () => {
    const { deps, jobs } = setup({ secret: undefined });
    const response = handleWebhook(signed(issueEvent('opened', ['feature-request'])), deps);

    assert.deepEqual(response, { status: 500, body: { error: 'Server misconfiguration' } });
    assert.deepEqual(jobs, []);
  });

  it('rejects malformed issue events', () => {
    const { deps } = setup();

    assert.deepEqual(handleWebhook(signed('not json'), deps), {
      status: 400,
      body: { error: 'Malformed issue event' },
    });
    assert.deepEqual(handleWebhook(signed(JSON.stringify({ action: 'opened' })), deps), {
      status: 400,
      body: { error: 'Malformed issue event' },
    });
  });

  it('requires an installation id', () => {
    const { deps } = setup();
    const response = handleWebhook(signed(issueEvent('opened', ['feature-request'], { installation: undefined })), deps);

    assert.deepEqual(response, { status: 400, body: { error: 'Missing installation ID' } });
  });

  it('answers before a failing run settles', () => {
    const { deps } = setup();
    deps.startRun = async () => {
      throw new Error('pipeline exploded');
    };

    const response = handleWebhook(signed(issueEvent('opened', ['feature-request'])), deps);
    assert.equal(response.status, 202);
  });
});
