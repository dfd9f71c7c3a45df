import type { AgentName } from '../contracts/agent-graph.js';

export interface ErrorPayload {
  name: string;
  message: string;
  details: Record<string, unknown>;
  timestamp: string;
}

export class PipelineError extends Error {
  public readonly timestamp: string;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'PipelineError';
    this.timestamp = new Date().toISOString();
  }

  toJSON(): ErrorPayload {
    return {
      name: this.name,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

export class ContractValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly errors: string[]
  ) {
    super(message, { errors });
    this.name = 'ContractValidationError';
  }
}

export class BusinessLogicError extends PipelineError {
  constructor(
    message: string,
    public readonly businessRule: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message, { businessRule, ...context });
    this.name = 'BusinessLogicError';
  }
}

export class DNAComplianceError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: AgentName,
    public readonly violations: string[] = []
  ) {
    super(message, { stage, violations });
    this.name = 'DNAComplianceError';
  }
}

export class QualityGateError extends PipelineError {
  constructor(
    message: string,
    public readonly gateName: string,
    public readonly stage: AgentName,
    public readonly gateDetails: Record<string, unknown> = {}
  ) {
    super(message, { gateName, stage, ...gateDetails });
    this.name = 'QualityGateError';
  }
}

export class AgentExecutionError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: AgentName,
    public readonly storyId: string,
    public readonly causeMessage?: string
  ) {
    super(message, { stage, storyId, cause: causeMessage });
    this.name = 'AgentExecutionError';
  }
}

export class ExternalServiceError extends PipelineError {
  constructor(
    message: string,
    public readonly serviceName: string,
    public readonly statusCode?: number,
    public readonly retryAfter?: number
  ) {
    super(message, { serviceName, statusCode, retryAfter });
    this.name = 'ExternalServiceError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message, { variable });
    this.name = 'ConfigurationError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof ExternalServiceError)) return false;
  if (error.statusCode === undefined) return false;
  return error.statusCode === 429 || error.statusCode >= 500;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
