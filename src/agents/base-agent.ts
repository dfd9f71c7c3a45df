import type { z } from 'zod';
import type { StageName } from '../contracts/agent-graph.js';
import { ARCHITECTURE_PRINCIPLES, DESIGN_PRINCIPLES } from '../contracts/schemas.js';
import type { Contract } from '../contracts/schemas.js';
import { enforceContract } from '../contracts/validator.js';
import { isReworkHandoff } from '../contracts/builder.js';
import { enforceQualityGates } from '../gates/checker.js';
import type { GateErrorPolicy, GateInput } from '../gates/types.js';
import { StageStateMachine } from '../pipeline/state/machine.js';
import {
  AgentExecutionError,
  BusinessLogicError,
  ContractValidationError,
  DNAComplianceError,
  errorMessage,
  isPipelineError,
} from '../errors/types.js';
import { logger } from '../observability/logger.js';

export interface AgentOptions {
  gatePolicy?: GateErrorPolicy;
}

/**
 * One pipeline stage. Subclasses supply payload extraction, the tool run,
 * the gate input and the output contract; the contract checks, state
 * tracking and error wrapping live here.
 */
export abstract class BaseAgent<TInput, TDeliverables> {
  abstract readonly stage: StageName;

  protected readonly gatePolicy: GateErrorPolicy;
  private readonly machines = new Map<string, StageStateMachine>();

  constructor(options: AgentOptions = {}) {
    this.gatePolicy = options.gatePolicy ?? 'fail_soft';
  }

  protected abstract extractPayload(contract: Contract): TInput;

  protected abstract runTools(input: TInput, contract: Contract): TDeliverables;

  protected abstract gateInput(deliverables: TDeliverables): GateInput;

  protected abstract buildOutputContract(input: Contract, deliverables: TDeliverables): Contract;

  getStateMachine(storyId: string): StageStateMachine | undefined {
    return this.machines.get(storyId);
  }

  /** Parses `required_data` as the payload this stage consumes. */
  protected parsePayload<T>(contract: Contract, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(contract.input_requirements.required_data);

    if (!parsed.success) {
      const errors = parsed.error.issues.map(issue => issue.path.join('.') || 'required_data');
      throw new BusinessLogicError(`Missing required field: ${errors[0]}`, 'payload_required_fields', {
        errors,
        stage: this.stage,
      });
    }

    return parsed.data;
  }

  async processContract(input: unknown): Promise<Contract> {
    const contract = enforceContract(input, 'Input contract');
    const storyId = contract.story_id;

    const machine = new StageStateMachine(this.stage, storyId);
    this.machines.set(storyId, machine);
    logger.updateContext({ storyId, stage: this.stage });

    try {
      if (contract.target_agent !== this.stage) {
        throw new ContractValidationError(
          `Contract addressed to ${contract.target_agent}, not ${this.stage}`,
          [`Unexpected target agent: ${contract.target_agent}`]
        );
      }

      const payload = this.extractPayload(contract);

      const deliverables = this.runTools(payload, contract);
      machine.transition('TOOLS_RUN');

      enforceQualityGates(this.gateInput(deliverables), this.gatePolicy);
      machine.transition('QUALITY_GATES_CHECKED');

      const draft = this.buildOutputContract(contract, deliverables);
      machine.transition('CONTRACT_BUILT');

      const rework = isReworkHandoff(this.stage, draft.target_agent);
      if (!rework) {
        this.requireFullCompliance(draft);
      }

      const output = enforceContract(draft, 'Output contract');
      machine.transition(rework ? 'REJECTED' : 'HANDED_OFF', `→ ${output.target_agent}`);

      logger.info('stage_complete', `${this.stage} handed off to ${output.target_agent}`, {
        gates: output.quality_gates.length,
        rework,
      });

      return output;
    } catch (error) {
      const message = errorMessage(error);
      machine.fail(message);

      logger.error('stage_failed', `${this.stage} failed`, {
        error: message,
        errorType: error instanceof Error ? error.name : 'Unknown',
      });

      if (isPipelineError(error)) throw error;
      throw new AgentExecutionError(`${this.stage} failed for ${storyId}: ${message}`, this.stage, storyId, message);
    }
  }

  private requireFullCompliance(contract: Contract): void {
    const dna = contract.dna_compliance;
    const violations = [
      ...DESIGN_PRINCIPLES.filter(p => !dna.design_principles_validation[p]),
      ...ARCHITECTURE_PRINCIPLES.filter(p => !dna.architecture_compliance[p]),
    ];

    if (violations.length > 0) {
      throw new DNAComplianceError(
        `DNA compliance failed for handoff to ${contract.target_agent}: ${violations.join(', ')}`,
        this.stage,
        violations
      );
    }
  }
}
