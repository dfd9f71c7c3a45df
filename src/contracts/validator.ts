import { z } from 'zod';
import {
  ARCHITECTURE_PRINCIPLES,
  ContractEnvelopeSchema,
  ContractSchema,
  DESIGN_PRINCIPLES,
  PAYLOAD_TYPE_BY_SOURCE,
} from './schemas.js';
import type { Contract } from './schemas.js';
import { isAgentName, isValidHandoff } from './agent-graph.js';
import type { AgentName } from './agent-graph.js';
import { isQualityGateID } from '../gates/registry.js';
import { ContractValidationError } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export interface ContractValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  validatedAt: string;
}

export const STORY_ID_PATTERN = /^STORY-[A-Za-z0-9-]+-\d+$/;

const STORY_ID_TEMPLATE = '{story_id}';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  const location = path ? `at field '${path}'` : 'at root level';

  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    const field = String(issue.path[issue.path.length - 1] ?? 'unknown');
    const parent = issue.path.slice(0, -1).join('.');
    return `Missing required field '${field}' ${parent ? `at field '${parent}'` : 'at root level'}`;
  }

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return `Field ${location} has wrong type: ${issue.message}`;
    case z.ZodIssueCode.invalid_literal:
    case z.ZodIssueCode.invalid_enum_value:
      return `Invalid value ${location}: ${issue.message}`;
    case z.ZodIssueCode.too_small:
      return `Field ${location} must not be empty`;
    default:
      return `Schema validation error ${location}: ${issue.message}`;
  }
}

function validateStructure(contract: unknown): string[] {
  const parsed = ContractEnvelopeSchema.safeParse(contract);
  return parsed.success ? [] : parsed.error.issues.map(describeIssue);
}

function validatePrincipleMap(
  section: unknown,
  sectionName: string,
  required: readonly string[],
  missingLabel: string
): string[] {
  const errors: string[] = [];

  if (!isRecord(section)) {
    return [`Missing DNA compliance section: ${sectionName}`];
  }

  for (const principle of required) {
    if (!(principle in section)) {
      errors.push(`${missingLabel}: ${principle}`);
    } else if (typeof section[principle] !== 'boolean') {
      errors.push(`DNA principle '${principle}' in ${sectionName} must be boolean`);
    }
  }

  for (const key of Object.keys(section)) {
    if (!required.includes(key)) {
      errors.push(`Unknown key '${key}' in ${sectionName}`);
    }
  }

  return errors;
}

function validateDnaCompliance(contract: Record<string, unknown>): string[] {
  const dna = contract.dna_compliance;
  if (!isRecord(dna)) return [];

  return [
    ...validatePrincipleMap(
      dna.design_principles_validation,
      'design_principles_validation',
      DESIGN_PRINCIPLES,
      'Missing design principle validation'
    ),
    ...validatePrincipleMap(
      dna.architecture_compliance,
      'architecture_compliance',
      ARCHITECTURE_PRINCIPLES,
      'Missing architecture principle'
    ),
  ];
}

function collectFilePaths(contract: Record<string, unknown>): string[] {
  const paths: string[] = [];
  const input = contract.input_requirements;
  const output = contract.output_specifications;

  if (isRecord(input) && Array.isArray(input.required_files)) {
    paths.push(...input.required_files.filter((p): p is string => typeof p === 'string'));
  }
  if (isRecord(output) && Array.isArray(output.deliverable_files)) {
    paths.push(...output.deliverable_files.filter((p): p is string => typeof p === 'string'));
  }

  return paths;
}

export function validateAgentSequence(source: AgentName, target: AgentName): boolean {
  return isValidHandoff(source, target);
}

function validateBusinessRules(contract: Record<string, unknown>): string[] {
  const errors: string[] = [];
  const source = typeof contract.source_agent === 'string' ? contract.source_agent : undefined;
  const target = typeof contract.target_agent === 'string' ? contract.target_agent : undefined;

  if (source && target && isAgentName(source) && isAgentName(target)) {
    if (!validateAgentSequence(source, target)) {
      errors.push(`Invalid agent sequence: ${source} → ${target}`);
    }
  }

  const storyId = typeof contract.story_id === 'string' ? contract.story_id : '';
  if (storyId && !STORY_ID_PATTERN.test(storyId)) {
    errors.push(`Invalid story ID format: ${storyId}`);
  }

  if (storyId) {
    const untraceable = collectFilePaths(contract).some(
      p => !p.includes(STORY_ID_TEMPLATE) && !p.includes(storyId)
    );
    if (untraceable) {
      errors.push('File paths must contain story_id for traceability');
    }
  }

  if (source && isAgentName(source)) {
    const expected = PAYLOAD_TYPE_BY_SOURCE[source];
    const input = contract.input_requirements;
    const data = isRecord(input) ? input.required_data : undefined;

    if (expected && isRecord(data)) {
      if (data.payload_type === undefined) {
        errors.push(`Missing required field 'payload_type' at field 'input_requirements.required_data'`);
      } else if (data.payload_type !== expected) {
        errors.push(
          `Unexpected payload type '${String(data.payload_type)}' for source agent ${source} (expected ${expected})`
        );
      }
    }
  }

  return errors;
}

function validateQualityGates(contract: Record<string, unknown>): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const gates = Array.isArray(contract.quality_gates) ? contract.quality_gates : [];

  if (gates.length === 0) {
    warnings.push('No quality gates defined - consider adding automated checks');
  }

  for (const gate of gates) {
    if (typeof gate === 'string' && !isQualityGateID(gate)) {
      errors.push(`Unknown quality gate: ${gate}`);
    }
  }

  return { errors, warnings };
}

/**
 * Structure, DNA, business rules and gate names are all checked; any error
 * invalidates the whole contract.
 */
export function validateContract(contract: unknown): ContractValidationResult {
  const validatedAt = new Date().toISOString();

  if (!isRecord(contract)) {
    return {
      isValid: false,
      errors: ['Contract must be a JSON object'],
      warnings: [],
      validatedAt,
    };
  }

  const errors: string[] = [];
  const warnings: string[] = [];

  errors.push(...validateStructure(contract));
  errors.push(...validateDnaCompliance(contract));
  errors.push(...validateBusinessRules(contract));

  const gateResult = validateQualityGates(contract);
  errors.push(...gateResult.errors);
  warnings.push(...gateResult.warnings);

  if (errors.length > 0) {
    logger.warn('contract_validation_failed', `Contract validation failed with ${errors.length} errors`, {
      storyId: contract.story_id,
      sourceAgent: contract.source_agent,
      targetAgent: contract.target_agent,
      errors,
    });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    validatedAt,
  };
}

/** Validates and returns the typed contract, or throws ContractValidationError. */
export function enforceContract(contract: unknown, label: string = 'Contract'): Contract {
  const result = validateContract(contract);

  if (!result.isValid) {
    throw new ContractValidationError(`${label} validation failed: ${result.errors.join('; ')}`, result.errors);
  }

  const parsed = ContractSchema.safeParse(contract);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(describeIssue);
    throw new ContractValidationError(`${label} validation failed: ${errors.join('; ')}`, errors);
  }

  return parsed.data;
}

/**
 * Checks a handoff chain: one story, connected agents, and quality gates
 * and handoff criteria that only ever grow.
 */
export function validateContractChain(contracts: Contract[]): ContractValidationResult {
  const errors: string[] = [];

  for (let i = 1; i < contracts.length; i++) {
    const previous = contracts[i - 1];
    const current = contracts[i];
    const step = `${previous.source_agent} → ${current.source_agent}`;

    if (current.story_id !== previous.story_id) {
      errors.push(`Story ID changed across ${step}: ${previous.story_id} → ${current.story_id}`);
    }

    if (previous.target_agent !== current.source_agent) {
      errors.push(`Broken handoff at ${step}: contract was addressed to ${previous.target_agent}`);
    }

    for (const gate of previous.quality_gates) {
      if (!current.quality_gates.includes(gate)) {
        errors.push(`Quality gate dropped at ${step}: ${gate}`);
      }
    }

    for (const criterion of previous.handoff_criteria) {
      if (!current.handoff_criteria.includes(criterion)) {
        errors.push(`Handoff criterion dropped at ${step}: ${criterion}`);
      }
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings: [],
    validatedAt: new Date().toISOString(),
  };
}
