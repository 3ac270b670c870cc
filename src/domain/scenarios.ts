import { debug } from '../debug.js';
import {
  LARGE_CLUSTER_COST,
  OVER_PROVISIONED_CPU_PER_POD,
  SCENARIO_ELIGIBILITY,
  SCENARIO_RULES,
  SYSTEM_NAMESPACES,
} from './constants.js';
import { allocatedCost } from './costEstimator.js';
import { ratio, requirePositive, scaleRange, subtractRanges, sumRanges } from './math.js';
import { cpuPerPod, spotRatio } from './utilization.js';
import type { CostRange, NamespaceUtilization, OptimizationScenario, ScenarioKind } from './types.js';

interface ScenarioBody {
  description: string;
  impact: string;
  actions: string[];
}

const fmt = (n: number, digits = 1): string => n.toFixed(digits);

/** Joins names for an action line, collapsing long lists to "a, b, and N more". */
export const formatList = (items: readonly string[]): string => {
  if (items.length <= 3) return items.join(', ');
  return `${items[0]}, ${items[1]}, and ${items.length - 2} more`;
};

/**
 * Minimum monthly slice worth acting on. Large clusters use fixed floors; smaller
 * ones scale with total cost so tiny clusters still get recommendations.
 */
export const minimumSavingsThreshold = (kind: ScenarioKind, totalCost: number): number => {
  const rule = SCENARIO_RULES[kind];
  if (totalCost >= LARGE_CLUSTER_COST) return rule.largeClusterMinimum;
  return Math.max(totalCost * rule.smallClusterShare, rule.smallClusterFloor);
};

const buildScenario = (
  kind: ScenarioKind,
  slice: number,
  totalCost: number,
  body: (savings: CostRange) => ScenarioBody,
): OptimizationScenario | null => {
  const threshold = minimumSavingsThreshold(kind, totalCost);
  if (slice < threshold) {
    debug('scenario below threshold', { kind, slice, threshold });
    return null;
  }

  const rule = SCENARIO_RULES[kind];
  const currentCost = scaleRange(slice, rule.currentBand);
  const afterCost = scaleRange(slice, rule.afterBand);
  const savings = subtractRanges(currentCost, afterCost);

  return {
    kind,
    name: rule.name,
    currentCost,
    afterCost,
    savings,
    effort: rule.effort,
    risk: rule.risk,
    timeline: rule.timeline,
    ...body(savings),
  };
};

export const generateSpotScenario = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
): OptimizationScenario | null => {
  const rule = SCENARIO_ELIGIBILITY.spot;
  let cost = 0;
  let cpu = 0;
  let memory = 0;
  const affected: string[] = [];

  for (const ns of namespaces) {
    const share = spotRatio(ns);
    if (share > rule.minRatio && ns.spotEligiblePods >= rule.minPods) {
      cost += allocatedCost(totalCost, ns) * share;
      cpu += ns.cpuRequested * share;
      memory += ns.memoryGbRequested * share;
      affected.push(`${ns.namespace} (${ns.spotEligiblePods}/${ns.podCount} pods)`);
    }
  }

  return buildScenario('spot', cost, totalCost, (savings) => ({
    description: `Move ${affected.length} namespaces to spot node pools (${fmt(cpu)} CPU cores, ${fmt(memory)} GB memory)`,
    impact: `${fmt(cpu)} CPU cores, ${fmt(memory)} GB memory eligible for spot (${fmt(ratio(savings.best, cost) * 100, 0)}% cost reduction)`,
    actions: [
      'Create a spot node pool with an appropriate VM size',
      `Add tolerations to deployments in: ${affected.join(', ')}`,
      'Add a node selector matching the spot node pool label',
      'Test application tolerance for evictions (spot instances can be reclaimed)',
      'Set PodDisruptionBudgets to handle evictions',
    ],
  }));
};

export const generateIdleScenario = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
  totalCpuCores: number,
): OptimizationScenario | null => {
  const rule = SCENARIO_ELIGIBILITY.idle;
  let cost = 0;
  let cpu = 0;
  let memory = 0;
  const idle: string[] = [];

  for (const ns of namespaces) {
    if (ns.wasteScore <= rule.minWasteScore) continue;
    const nsCost = allocatedCost(totalCost, ns);
    if (nsCost <= rule.minCost) continue;

    cost += nsCost;
    cpu += ns.cpuRequested;
    memory += ns.memoryGbRequested;
    const reason = ns.idlePods > 0 ? `${ns.idlePods} idle pods` : 'high waste score';
    idle.push(`${ns.namespace} (${reason})`);
  }

  return buildScenario('idle', cost, totalCost, () => ({
    description: `Remove ${idle.length} idle namespaces (${fmt(cpu)} CPU, ${fmt(memory)} GB memory)`,
    impact: `Free ${fmt(cpu)} CPU cores, ${fmt(memory)} GB memory (${fmt(ratio(cpu, totalCpuCores) * 100, 0)}% of cluster)`,
    actions: [
      `Verify these namespaces are truly unused: ${idle.join(', ')}`,
      'Back up any data or configuration that must be kept',
      'Delete idle namespaces: kubectl delete namespace <name>',
      'Monitor for application dependencies',
    ],
  }));
};

export const generateRightsizeScenario = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
): OptimizationScenario | null => {
  const rule = SCENARIO_ELIGIBILITY.rightsize;
  let cost = 0;
  let cpu = 0;
  const oversized: string[] = [];

  for (const ns of namespaces) {
    const inRange = ns.podCount >= rule.minPods && ns.podCount < rule.maxPodsExclusive;
    if (inRange && cpuPerPod(ns) > OVER_PROVISIONED_CPU_PER_POD) {
      cost += allocatedCost(totalCost, ns);
      cpu += ns.cpuRequested;
      oversized.push(ns.namespace);
    }
  }

  return buildScenario('rightsize', cost, totalCost, () => ({
    description: `Reduce resource requests for ${oversized.length} over-provisioned namespaces`,
    impact: `Free ${fmt(cpu * 0.5)} CPU cores through right-sizing`,
    actions: [
      'Install metrics-server to track actual usage',
      'Monitor actual CPU/memory usage for 1-2 weeks',
      `Adjust resource requests in: ${formatList(oversized)}`,
      'Test performance after changes',
    ],
  }));
};

export const generateAutoscalingScenario = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
): OptimizationScenario | null => {
  const rule = SCENARIO_ELIGIBILITY.autoscaling;
  let cost = 0;
  let cpu = 0;
  const candidates: string[] = [];

  for (const ns of namespaces) {
    if (SYSTEM_NAMESPACES.includes(ns.namespace)) continue;
    if (ns.podCount < rule.minPods || ns.podCount > rule.maxPods) continue;
    const nsCost = allocatedCost(totalCost, ns);
    if (nsCost <= rule.minCost) continue;

    cost += nsCost;
    cpu += ns.cpuRequested;
    candidates.push(`${ns.namespace} (${ns.podCount} pods)`);
  }

  if (candidates.length === 0) return null;

  return buildScenario('autoscaling', cost, totalCost, () => ({
    description: `Configure HPA for ${candidates.length} namespaces to scale based on load`,
    impact: `Dynamic scaling for ${fmt(cpu)} CPU cores (save ~25% during off-peak)`,
    actions: [
      'Install metrics-server if not already present: kubectl apply -f https://github.com/kubernetes-sigs/metrics-server/releases/latest/download/components.yaml',
      `Configure HPA for deployments in: ${candidates.join(', ')}`,
      'Example: kubectl autoscale deployment <name> --cpu-percent=70 --min=2 --max=10',
      'Monitor scaling behavior and adjust thresholds as needed',
      'Set PodDisruptionBudgets to maintain availability during scale-down',
    ],
  }));
};

export const generateOptimizationScenarios = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
  totalCpuCores: number,
): OptimizationScenario[] => {
  debug('generateOptimizationScenarios start', { namespaces: namespaces.length, totalCost });
  requirePositive(totalCost, 'totalCost');

  const scenarios = [
    generateSpotScenario(namespaces, totalCost),
    generateIdleScenario(namespaces, totalCost, totalCpuCores),
    generateRightsizeScenario(namespaces, totalCost),
    generateAutoscalingScenario(namespaces, totalCost),
  ].filter((scenario): scenario is OptimizationScenario => scenario !== null);

  debug('generateOptimizationScenarios end', { scenarios: scenarios.map((s) => s.kind) });
  return scenarios;
};

export const sumSavings = (scenarios: readonly OptimizationScenario[]): CostRange =>
  sumRanges(scenarios.map((scenario) => scenario.savings));
