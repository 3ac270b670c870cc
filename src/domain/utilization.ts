import { debug } from '../debug.js';
import { IDLE_DAYS_PER_POD, OVER_PROVISIONED_CPU_PER_POD, SPOT_OK_RATIO, WASTE } from './constants.js';
import { EstimationError } from './errors.js';
import { clamp, ratio } from './math.js';
import { detectOptimizationHints } from './optimizations.js';
import type {
  ClusterCapacityFact,
  NamespaceFlag,
  NamespaceUsageFact,
  NamespaceUtilization,
  ResourceAnalysis,
} from './types.js';

const requireCapacity = (value: number, field: string): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new EstimationError('InvalidInput', field, `${field} must be a non-negative number (got ${value})`);
  }
  if (value === 0) {
    throw new EstimationError('DivisionByZero', field, `${field} is 0; cannot compute cluster percentages`);
  }
  return value;
};

export const cpuPerPod = (ns: Pick<NamespaceUsageFact, 'cpuRequested' | 'podCount'>): number =>
  ratio(ns.cpuRequested, ns.podCount);

export const spotRatio = (ns: Pick<NamespaceUsageFact, 'spotEligiblePods' | 'podCount'>): number =>
  ratio(ns.spotEligiblePods, ns.podCount);

export const calculateWasteScore = (ns: NamespaceUsageFact): number => {
  const idle = ratio(ns.idlePods, ns.podCount) * WASTE.idleWeight;
  const overProvisioned =
    ns.podCount > 0 && ns.podCount < WASTE.overProvisionedMaxPods && cpuPerPod(ns) > OVER_PROVISIONED_CPU_PER_POD
      ? WASTE.overProvisionedPoints
      : 0;
  const spot = spotRatio(ns) * WASTE.spotWeight;
  return clamp(idle + overProvisioned + spot, WASTE.min, WASTE.max);
};

export const generateFlags = (ns: NamespaceUsageFact): NamespaceFlag[] => {
  const flags: NamespaceFlag[] = [];
  if (ns.idlePods > 0) {
    flags.push(`IDLE-${ns.idlePods * IDLE_DAYS_PER_POD}d`);
  }
  if (spotRatio(ns) > SPOT_OK_RATIO) {
    flags.push('SPOT-OK');
  }
  if (cpuPerPod(ns) > OVER_PROVISIONED_CPU_PER_POD) {
    flags.push('OVER-PROV');
  }
  return flags;
};

export const analyzeNamespace = (ns: NamespaceUsageFact, capacity: ClusterCapacityFact): NamespaceUtilization => {
  const cpuPercent = (ns.cpuRequested / requireCapacity(capacity.totalCpuCores, 'totalCpuCores')) * 100;
  const memPercent = (ns.memoryGbRequested / requireCapacity(capacity.totalMemoryGb, 'totalMemoryGb')) * 100;
  return {
    ...ns,
    cpuPercent,
    memPercent,
    weightedShare: (cpuPercent + memPercent) / 200,
    wasteScore: calculateWasteScore(ns),
    flags: generateFlags(ns),
  };
};

export const analyzeResources = (
  namespaces: readonly NamespaceUsageFact[],
  capacity: ClusterCapacityFact,
): ResourceAnalysis => {
  debug('analyzeResources start', { namespaces: namespaces.length, capacity });
  const totalCpuCores = requireCapacity(capacity.totalCpuCores, 'totalCpuCores');
  const totalMemoryGb = requireCapacity(capacity.totalMemoryGb, 'totalMemoryGb');

  const analyzed = namespaces
    .map((ns) => analyzeNamespace(ns, capacity))
    .sort((a, b) => b.weightedShare - a.weightedShare || a.namespace.localeCompare(b.namespace));

  const totalCpuRequested = analyzed.reduce((sum, ns) => sum + ns.cpuRequested, 0);
  const totalMemoryRequested = analyzed.reduce((sum, ns) => sum + ns.memoryGbRequested, 0);

  const analysis: ResourceAnalysis = {
    totalCpuCores,
    totalMemoryGb,
    totalCpuRequested,
    totalMemoryRequested,
    cpuUtilization: (totalCpuRequested / totalCpuCores) * 100,
    memoryUtilization: (totalMemoryRequested / totalMemoryGb) * 100,
    namespaces: analyzed,
    optimizations: detectOptimizationHints(analyzed),
  };

  debug('analyzeResources end', {
    namespaces: analyzed.length,
    cpuUtilization: analysis.cpuUtilization,
    memoryUtilization: analysis.memoryUtilization,
    hints: analysis.optimizations.length,
  });
  return analysis;
};
