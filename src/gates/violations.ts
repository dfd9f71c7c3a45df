import type { GateOutcome } from './types.js';

export interface GateFailureSummary {
  total: number;
  failed: number;
  errored: number;
}

export function summarizeFailures(failures: GateOutcome[]): GateFailureSummary {
  return {
    total: failures.length,
    failed: failures.filter(f => f.error === undefined).length,
    errored: failures.filter(f => f.error !== undefined).length,
  };
}

export function describeFailures(failures: GateOutcome[]): string[] {
  return failures.map(f =>
    f.error === undefined ? `${f.gateId}: ${f.description}` : `${f.gateId}: evaluator error (${f.error})`
  );
}
