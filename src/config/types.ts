import { z } from 'zod';
import type { RiskKind } from '../domain/types.js';

const count = z.number().int().min(0);

export const NamespaceUsageSchema = z
  .object({
    namespace: z.string().min(1),
    cpuRequested: z.number().min(0),
    memoryGbRequested: z.number().min(0),
    podCount: count,
    idlePods: count.default(0),
    spotEligiblePods: count.default(0),
  })
  .refine((ns) => ns.idlePods <= ns.podCount, { message: 'idlePods cannot exceed podCount', path: ['idlePods'] })
  .refine((ns) => ns.spotEligiblePods <= ns.podCount, {
    message: 'spotEligiblePods cannot exceed podCount',
    path: ['spotEligiblePods'],
  });

export const CapacitySchema = z.object({
  totalCpuCores: z.number().min(0),
  totalMemoryGb: z.number().min(0),
});

export const SecurityRisksSchema = z
  .object({
    privilegedContainers: count.default(0),
    hostPathVolumes: count.default(0),
    hostPid: count.default(0),
    hostIpc: count.default(0),
    hostNetwork: count.default(0),
    runningAsRoot: count.default(0),
    missingResourceLimits: count.default(0),
    defaultServiceAccount: count.default(0),
    addedCapabilities: count.default(0),
    privilegeEscalation: count.default(0),
  } satisfies Record<RiskKind, z.ZodTypeAny>)
  .strict()
  .default({});

export const SnapshotSchema = z.object({
  cluster: z.string().min(1).default('current-context'),
  // Non-positive values surface as a cost pipeline InvalidInput.
  monthlyCost: z.number().finite().optional(),
  industry: z.string().min(1).default('generic'),
  exposure: z.enum(['internal', 'public-facing', 'internet-exposed']).default('internal'),
  compoundRisks: z.boolean().default(false),
  securityScore: z.number().int().min(0).max(100).default(100),
  capacity: CapacitySchema.optional(),
  namespaces: z
    .array(NamespaceUsageSchema)
    .default([])
    .refine((rows) => new Set(rows.map((row) => row.namespace)).size === rows.length, {
      message: 'namespace names must be unique',
    }),
  securityRisks: SecurityRisksSchema,
  outputPath: z.string().min(1).optional(),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

export interface SnapshotOverrides {
  monthlyCost?: number;
  industry?: string;
  outputPath?: string;
}
