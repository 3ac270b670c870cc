import { isEstimationError } from '../src/domain/errors.js';
import type { NamespaceUtilization } from '../src/domain/types.js';

export const utilization = (overrides: Partial<NamespaceUtilization> & { namespace: string }): NamespaceUtilization => ({
  cpuRequested: 1,
  memoryGbRequested: 1,
  podCount: 10,
  idlePods: 0,
  spotEligiblePods: 0,
  cpuPercent: 0,
  memPercent: 0,
  weightedShare: 0,
  wasteScore: 0,
  flags: [],
  ...overrides,
});

/** Kind of the EstimationError thrown by fn, 'other' for any other error, undefined when nothing is thrown. */
export const errorKind = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (error) {
    return isEstimationError(error) ? error.kind : 'other';
  }
  return undefined;
};
