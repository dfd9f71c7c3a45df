import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { lastContractOf } from './fixtures.js';
import {
  fetchFeatureRequest,
  issueStoryId,
  parseFeatureRequest,
  parseIssueSections,
  publishDecision,
  retryAfterOf,
} from '../src/github/issues.js';
import type { IssueClient, IssueData, IssueRef } from '../src/github/issues.js';
import { QualityReviewPayloadSchema } from '../src/contracts/schemas.js';
import { ExternalServiceError, isRetryableError } from '../src/errors/types.js';

const REF: IssueRef = { owner: 'acme', repo: 'learning', number: 12 };

async function lastReview() {
  const contract = await lastContractOf('quality_reviewer');
  return QualityReviewPayloadSchema.parse(contract.input_requirements.required_data);
}

const ISSUE_BODY = [
  '## Feature Description',
  'Quiz on the travel policy for new staff.',
  '',
  '## Acceptance Criteria',
  '- [ ] Shows feedback on every answer',
  '- Saves results through the api',
  '1. Finishes in under ten minutes',
  '',
  '## User Persona',
  'Erik',
  'works in finance',
  '',
  '## Priority',
  'High',
  '',
  '## Time Constraint',
  '7 minutes',
  '',
  '### Learning Objectives',
  '* Know the travel policy',
].join('\n');

function issue(body: string | null, title: string = 'Travel quiz'): IssueData {
  return {
    number: 12,
    title,
    body,
    html_url: 'https://github.example.test/acme/learning/issues/12',
    user: { login: 'test-user' },
  };
}

interface Calls {
  comments: string[];
  labels: string[][];
}

function stubClient(data: IssueData, failOn?: 'get' | 'comment' | 'labels' | 'rate-limit'): { client: IssueClient; calls: Calls } {
  const calls: Calls = { comments: [], labels: [] };
  const notFound = Object.assign(new Error('Not Found'), { status: 404 });
  const rateLimited = Object.assign(new Error('Rate limited'), {
    status: 429,
    response: { headers: { 'retry-after': '30' } },
  });

  const client: IssueClient = {
    issues: {
      get: async () => {
        if (failOn === 'get') throw notFound;
        return { data };
      },
      createComment: async ({ body }) => {
        if (failOn === 'comment') throw notFound;
        if (failOn === 'rate-limit') throw rateLimited;
        calls.comments.push(body);
      },
      addLabels: async ({ labels }) => {
        if (failOn === 'labels') throw new Error('label service down');
        calls.labels.push(labels);
      },
    },
  };

  return { client, calls };
}

describe('parseIssueSections', () => {
  it('keys sections by lower-cased heading', () => {
    const sections = parseIssueSections('intro\n## Priority\nLow\n### Time Constraint\n5');

    assert.deepEqual([...sections.entries()], [
      ['priority', 'Low'],
      ['time constraint', '5'],
    ]);
  });
});

describe('parseFeatureRequest', () => {
  it('reads every section of a templated issue', () => {
    assert.deepEqual(parseFeatureRequest(issue(ISSUE_BODY), REF), {
      payload_type: 'feature_request',
      feature_description: 'Quiz on the travel policy for new staff.',
      acceptance_criteria: [
        'Shows feedback on every answer',
        'Saves results through the api',
        'Finishes in under ten minutes',
      ],
      user_persona: 'Erik',
      priority_level: 'high',
      time_constraint_minutes: 7,
      learning_objectives: ['Know the travel policy'],
      requested_by: 'test-user',
      github_issue: {
        owner: 'acme',
        repo: 'learning',
        number: 12,
        title: 'Travel quiz',
        url: 'https://github.example.test/acme/learning/issues/12',
      },
    });
  });

  it('falls back to defaults for a free-form issue', () => {
    const payload = parseFeatureRequest(issue('Just a short idea'), REF);

    assert.equal(payload.feature_description, 'Just a short idea');
    assert.deepEqual(payload.acceptance_criteria, []);
    assert.equal(payload.user_persona, 'Anna');
    assert.equal(payload.priority_level, 'medium');
    assert.equal(payload.time_constraint_minutes, 10);
  });

  it('uses the title when there is no description', () => {
    assert.equal(parseFeatureRequest(issue(null), REF).feature_description, 'Travel quiz');
    assert.equal(parseFeatureRequest(issue('## Priority\nLow'), REF).feature_description, 'Travel quiz');
  });
});

describe('fetchFeatureRequest', () => {
  it('builds the contract that starts a run', async () => {
    const { client } = stubClient(issue(ISSUE_BODY));
    const contract = await fetchFeatureRequest(client, REF);

    assert.equal(issueStoryId(REF), 'STORY-GH-12');
    assert.equal(contract.story_id, 'STORY-GH-12');
    assert.equal(contract.source_agent, 'github');
    assert.equal(contract.target_agent, 'project_manager');
    assert.equal(contract.input_requirements.required_data.feature_description, 'Quiz on the travel policy for new staff.');
  });

  it('wraps GitHub failures', async () => {
    const { client } = stubClient(issue(ISSUE_BODY), 'get');

    await assert.rejects(fetchFeatureRequest(client, REF), (error: unknown) => {
      assert.ok(error instanceof ExternalServiceError);
      assert.equal(error.message, 'GitHub issue fetch failed: Not Found');
      assert.equal(error.serviceName, 'github');
      assert.equal(error.statusCode, 404);
      assert.equal(error.retryAfter, undefined);
      assert.equal(isRetryableError(error), false);
      return true;
    });
  });
});

describe('publishDecision', () => {
  it('comments the decision and labels the issue', async () => {
    const decision = await lastReview();
    const { client, calls } = stubClient(issue(ISSUE_BODY));

    await publishDecision(client, REF, decision);

    assert.deepEqual(calls.comments, [decision.client_communication.body]);
    assert.deepEqual(calls.labels, [['approved', 'score-100']]);
  });

  it('reports a labeling failure after commenting', async () => {
    const { client, calls } = stubClient(issue(ISSUE_BODY), 'labels');

    await assert.rejects(publishDecision(client, REF, await lastReview()), {
      message: 'GitHub labeling failed: label service down',
    });
    assert.equal(calls.comments.length, 1);
  });
});

describe('retry hints', () => {
  it('carries the retry-after header of a rate-limited call', async () => {
    const { client } = stubClient(issue(ISSUE_BODY), 'rate-limit');

    await assert.rejects(publishDecision(client, REF, await lastReview()), (error: unknown) => {
      assert.ok(error instanceof ExternalServiceError);
      assert.equal(error.statusCode, 429);
      assert.equal(error.retryAfter, 30);
      assert.equal(isRetryableError(error), true);
      return true;
    });
  });

  it('reads retry-after only when it is a number of seconds', () => {
    assert.equal(retryAfterOf({ response: { headers: { 'retry-after': '120' } } }), 120);
    assert.equal(retryAfterOf({ response: { headers: { 'retry-after': 'soon' } } }), undefined);
    assert.equal(retryAfterOf({ response: { headers: {} } }), undefined);
    assert.equal(retryAfterOf(new Error('boom')), undefined);
  });

  it('retries rate limits and server errors only', () => {
    assert.equal(isRetryableError(new ExternalServiceError('limited', 'github', 429)), true);
    assert.equal(isRetryableError(new ExternalServiceError('down', 'github', 502)), true);
    assert.equal(isRetryableError(new ExternalServiceError('gone', 'github', 404)), false);
    assert.equal(isRetryableError(new ExternalServiceError('no status', 'github')), false);
    assert.equal(isRetryableError(new Error('plain')), false);
  });
});
