import { debug } from '../debug.js';
import { IDLE_DAYS_PER_POD, OVER_PROVISIONED_CPU_PER_POD, WASTE } from './constants.js';
import { ratio } from './math.js';
import type { NamespaceUtilization, OptimizationHint } from './types.js';

const IDLE_HINT_MIN_WASTE = 50;
const SPOT_HINT_MIN_PODS = 2;

const fmt = (n: number): string => n.toFixed(1);

export const detectOptimizationHints = (namespaces: readonly NamespaceUtilization[]): OptimizationHint[] => {
  debug('detectOptimizationHints start', { namespaces: namespaces.length });
  const hints: OptimizationHint[] = [];

  for (const ns of namespaces) {
    if (ns.idlePods > 0 && ns.wasteScore > IDLE_HINT_MIN_WASTE) {
      hints.push({
        priority: 'high',
        type: 'idle_namespace',
        namespace: ns.namespace,
        description: `${ns.namespace} idle for ${ns.idlePods * IDLE_DAYS_PER_POD}+ days (${fmt(ns.cpuRequested)} CPU, ${fmt(ns.memoryGbRequested)} GB)`,
        action: `kubectl delete namespace ${ns.namespace}`,
        impact: `Frees ${fmt(ns.cpuRequested)} CPU, ${fmt(ns.memoryGbRequested)} GB (${fmt(ns.cpuPercent)}% of cluster)`,
      });
    }

    if (ns.spotEligiblePods > SPOT_HINT_MIN_PODS) {
      const spotCpu = ns.cpuRequested * ratio(ns.spotEligiblePods, ns.podCount);
      hints.push({
        priority: 'medium',
        type: 'spot_migration',
        namespace: ns.namespace,
        description: `${ns.namespace} has ${ns.spotEligiblePods} pods eligible for spot`,
        action: 'Add spot node toleration and nodeSelector',
        impact: `Save ~70% on ${fmt(spotCpu)} CPU cores`,
      });
    }

    if (ns.podCount > 0 && ns.podCount < WASTE.overProvisionedMaxPods) {
      const avgCpu = ns.cpuRequested / ns.podCount;
      if (avgCpu > OVER_PROVISIONED_CPU_PER_POD) {
        hints.push({
          priority: 'medium',
          type: 'rightsizing',
          namespace: ns.namespace,
          description: `${ns.namespace} appears over-provisioned (avg ${fmt(avgCpu)} CPU/pod)`,
          action: 'Review actual usage and adjust resource requests',
          impact: 'Potentially free up 50-70% of requested resources',
        });
      }
    }
  }

  debug('detectOptimizationHints end', { hints: hints.length });
  return hints;
};
