import { z } from 'zod';
import { AgentNameSchema } from '../contracts/schemas.js';

export const RUN_STATUSES = ['approved', 'rework_required', 'failed'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const StageSummarySchema = z.object({
  stage: AgentNameSchema,
  finalState: z
    .enum(['RECEIVED', 'TOOLS_RUN', 'QUALITY_GATES_CHECKED', 'CONTRACT_BUILT', 'HANDED_OFF', 'REJECTED', 'FAILED'])
    .nullable(),
  durationMs: z.number(),
  contractFingerprint: z.string().nullable(),
  transitions: z.array(z.string()),
});
export type StageSummary = z.infer<typeof StageSummarySchema>;

/** One pipeline run, as kept in run history and returned by the HTTP API. */
export const RunRecordSchema = z.object({
  runId: z.string(),
  storyId: z.string(),
  status: z.enum(RUN_STATUSES),
  finalTarget: AgentNameSchema.nullable(),
  stages: z.array(StageSummarySchema),
  fingerprints: z.array(z.string()),
  qualityScore: z.number().nullable(),
  startedAt: z.string(),
  durationMs: z.number(),
  published: z.boolean(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stage: AgentNameSchema.optional(),
    })
    .optional(),
});
export type RunRecord = z.infer<typeof RunRecordSchema>;

export interface RunHistoryStats {
  count: number;
  maxSize: number;
  type: 'memory' | 'redis';
}

export interface RunHistory {
  append(record: RunRecord): Promise<void>;
  getRecent(limit?: number): Promise<RunRecord[]>;
  getStats(): Promise<RunHistoryStats>;
}
