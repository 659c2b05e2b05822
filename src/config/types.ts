import { z } from 'zod';

import { WeightPolicySchema } from '../core/graph/weight.js';

export const RiskLevel = z.enum(['low', 'medium', 'high']);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const EnforcementMode = z.enum(['block', 'warn']);
export type EnforcementMode = z.infer<typeof EnforcementMode>;

export const GateConfig = z
  .object({
    /** Session risk at or above which file writes need a critic review first. */
    criticRiskThreshold: RiskLevel.default('high'),
    qaExemptWorkflows: z.array(z.string()).default(['question', 'triage', 'simple-answer']),
    hydrationMode: EnforcementMode.default('block'),
    protectedPaths: z.array(z.string().min(1)).default(['.trellis/**'])
  })
  .strict();
export type GateConfig = z.infer<typeof GateConfig>;

export const CustodietConfig = z
  .object({
    mode: EnforcementMode.default('block'),
    threshold: z.number().int().positive().default(7),
    thresholdByWorkflow: z.record(z.string(), z.number().int().positive()).default({ 'high-risk': 4 }),
    reminderProbability: z.number().min(0).max(1).default(0.3)
  })
  .strict();
export type CustodietConfig = z.infer<typeof CustodietConfig>;

export const MIN_TEST_TIMEOUT_MS = 1_000;
export const DEFAULT_TEST_TIMEOUT_MS = 600_000;

export const MergeConfig = z
  .object({
    mainBranch: z.string().min(1).default('main'),
    /** `null` disables pushing main and deleting remote branches. */
    remote: z.string().min(1).nullable().default('origin'),
    /** `{id}` is replaced by the task id. */
    branchPatterns: z
      .array(z.string().includes('{id}', { message: 'branch pattern must contain {id}' }))
      .default(['trellis/{id}', 'task/{id}']),
    testCommand: z.string().min(1).default('npm test'),
    testTimeoutMs: z.number().int().min(MIN_TEST_TIMEOUT_MS).default(DEFAULT_TEST_TIMEOUT_MS)
  })
  .strict();
export type MergeConfig = z.infer<typeof MergeConfig>;

export const TrellisConfig = z
  .object({
    merge: MergeConfig.default({}),
    weights: WeightPolicySchema.default({}),
    gates: GateConfig.default({}),
    custodiet: CustodietConfig.default({})
  })
  .strict();
export type TrellisConfig = z.infer<typeof TrellisConfig>;
export type TrellisConfigInput = z.input<typeof TrellisConfig>;
