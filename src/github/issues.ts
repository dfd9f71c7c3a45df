import type { Contract, FeatureRequestPayload, QualityReviewPayload } from '../contracts/schemas.js';
import { createFeatureRequestContract } from '../contracts/builder.js';
import { DEFAULT_PERSONA } from '../tools/qa-tester/persona-simulator.js';
import { ExternalServiceError, errorMessage } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export interface IssueRef {
  owner: string;
  repo: string;
  number: number;
}

export interface IssueData {
  number: number;
  title: string;
  body?: string | null;
  html_url: string;
  user: { login: string } | null;
}

/** The slice of Octokit's `issues` namespace the pipeline calls. */
export interface IssueClient {
  issues: {
    get(params: { owner: string; repo: string; issue_number: number }): Promise<{ data: IssueData }>;
    createComment(params: { owner: string; repo: string; issue_number: number; body: string }): Promise<unknown>;
    addLabels(params: { owner: string; repo: string; issue_number: number; labels: string[] }): Promise<unknown>;
  };
}

const DEFAULT_TIME_CONSTRAINT = 10;
const DEFAULT_PRIORITY = 'medium';

export function issueStoryId(ref: IssueRef): string {
  return `STORY-GH-${ref.number}`;
}

/** `## Heading` → section text, keyed by lower-cased heading. */
export function parseIssueSections(body: string): Map<string, string> {
  const sections = new Map<string, string>();
  let heading: string | null = null;
  let lines: string[] = [];

  const flush = (): void => {
    if (heading !== null) sections.set(heading, lines.join('\n').trim());
  };

  for (const line of body.split(/\r?\n/)) {
    const match = /^#{2,3}\s+(.+?)\s*$/.exec(line);
    if (match) {
      flush();
      heading = match[1].toLowerCase();
      lines = [];
    } else {
      lines.push(line);
    }
  }
  flush();

  return sections;
}

function listItems(text: string | undefined): string[] {
  if (!text) return [];
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/^\s*(?:[-*]|\d+\.)\s+(?:\[[ xX]\]\s+)?/, '').trim())
    .filter(line => line.length > 0);
}

function parseMinutes(text: string | undefined): number {
  const match = text ? /(\d+)/.exec(text) : null;
  const minutes = match ? parseInt(match[1], 10) : NaN;
  return Number.isFinite(minutes) && minutes > 0 ? minutes : DEFAULT_TIME_CONSTRAINT;
}

export function parseFeatureRequest(issue: IssueData, ref: IssueRef): FeatureRequestPayload {
  const body = issue.body ?? '';
  const sections = parseIssueSections(body);
  const description = sections.get('feature description') ?? (sections.size === 0 ? body.trim() : '');

  return {
    payload_type: 'feature_request',
    feature_description: description || issue.title,
    acceptance_criteria: listItems(sections.get('acceptance criteria')),
    user_persona: sections.get('user persona')?.split(/\r?\n/)[0].trim() || DEFAULT_PERSONA,
    priority_level: sections.get('priority')?.split(/\r?\n/)[0].trim().toLowerCase() || DEFAULT_PRIORITY,
    time_constraint_minutes: parseMinutes(sections.get('time constraint')),
    learning_objectives: listItems(sections.get('learning objectives')),
    requested_by: issue.user?.login ?? 'unknown',
    github_issue: {
      owner: ref.owner,
      repo: ref.repo,
      number: ref.number,
      title: issue.title,
      url: issue.html_url,
    },
  };
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** Seconds from the `retry-after` header GitHub sends with secondary rate limits. */
export function retryAfterOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) return undefined;
  const { response } = error;
  if (typeof response !== 'object' || response === null || !('headers' in response)) return undefined;
  const { headers } = response;
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) return undefined;
  const seconds = Number(headers['retry-after']);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function wrapGitHubError(operation: string, ref: IssueRef, error: unknown): ExternalServiceError {
  const status = statusOf(error);
  const retryAfter = retryAfterOf(error);
  logger.error('github_api_error', `GitHub ${operation} failed`, {
    owner: ref.owner,
    repo: ref.repo,
    issue: ref.number,
    status,
    retryAfter,
    error: errorMessage(error),
  });
  return new ExternalServiceError(`GitHub ${operation} failed: ${errorMessage(error)}`, 'github', status, retryAfter);
}

/** Reads the issue and turns it into the contract that starts a run. */
export async function fetchFeatureRequest(client: IssueClient, ref: IssueRef): Promise<Contract> {
  let issue: IssueData;
  try {
    const response = await client.issues.get({ owner: ref.owner, repo: ref.repo, issue_number: ref.number });
    issue = response.data;
  } catch (error) {
    throw wrapGitHubError('issue fetch', ref, error);
  }

  const payload = parseFeatureRequest(issue, ref);
  logger.info('feature_request_fetched', 'Feature request read from issue', {
    issue: ref.number,
    criteria: payload.acceptance_criteria.length,
    objectives: payload.learning_objectives.length,
  });

  return createFeatureRequestContract(issueStoryId(ref), payload);
}

/** Comments the Swedish decision on the issue and labels it. */
export async function publishDecision(client: IssueClient, ref: IssueRef, review: QualityReviewPayload): Promise<void> {
  const communication = review.client_communication;

  try {
    await client.issues.createComment({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.number,
      body: communication.body,
    });
  } catch (error) {
    throw wrapGitHubError('comment', ref, error);
  }

  try {
    await client.issues.addLabels({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.number,
      labels: communication.labels,
    });
  } catch (error) {
    throw wrapGitHubError('labeling', ref, error);
  }

  logger.info('decision_published', 'Review decision published to issue', {
    issue: ref.number,
    labels: communication.labels,
  });
}
