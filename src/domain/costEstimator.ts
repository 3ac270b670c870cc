import { debug } from '../debug.js';
import { CONFIDENCE, COST_RANGE } from './constants.js';
import { clamp, requirePositive } from './math.js';
import { spotRatio } from './utilization.js';
import type { ConfidenceLabel, CostRange, NamespaceCostEstimate, NamespaceUtilization } from './types.js';

type ConfidenceInput = Pick<NamespaceUtilization, 'weightedShare' | 'wasteScore' | 'podCount'>;

const shareAdjustment = (share: number): number => {
  const { share: rule } = CONFIDENCE;
  if (share > rule.large) return rule.largeBonus;
  if (share > rule.medium) return rule.mediumBonus;
  if (share < rule.tiny) return rule.tinyPenalty;
  return 0;
};

const wasteAdjustment = (wasteScore: number): number => {
  const { waste: rule } = CONFIDENCE;
  if (wasteScore > rule.high) return rule.highPenalty;
  if (wasteScore > rule.medium) return rule.mediumPenalty;
  return 0;
};

const podAdjustment = (podCount: number): number => {
  const { pods: rule } = CONFIDENCE;
  if (podCount > rule.many) return rule.manyBonus;
  if (podCount < rule.few) return rule.fewPenalty;
  return 0;
};

/**
 * Confidence in [0.3, 0.9]: larger and busier namespaces allocate more predictably,
 * wasteful ones less so.
 */
export const calculateConfidence = (ns: ConfidenceInput): number =>
  clamp(
    CONFIDENCE.start + shareAdjustment(ns.weightedShare) + wasteAdjustment(ns.wasteScore) + podAdjustment(ns.podCount),
    CONFIDENCE.min,
    CONFIDENCE.max,
  );

// Only Low and Medium are ever produced; High stays reserved for billing-backed inputs.
export const confidenceLabel = (weightedShare: number): ConfidenceLabel => {
  if (weightedShare > CONFIDENCE.label.medium) return 'Medium';
  if (weightedShare < CONFIDENCE.label.low) return 'Low';
  return 'Medium';
};

const wasteFactor = (wasteScore: number): number => {
  const { wasteFactor: rule } = COST_RANGE;
  if (wasteScore > rule.high) return rule.highFactor;
  if (wasteScore > rule.medium) return rule.mediumFactor;
  return 0;
};

export const calculateCostRange = (baseCost: number, ns: NamespaceUtilization): CostRange => {
  const uncertainty = 1 - calculateConfidence(ns);
  const spotPotential = spotRatio(ns) * COST_RANGE.spotDiscount;
  return {
    low: baseCost * (1 - spotPotential) * (1 - uncertainty * COST_RANGE.uncertaintySpread),
    best: baseCost,
    high: baseCost * (1 + wasteFactor(ns.wasteScore)) * (1 + uncertainty * COST_RANGE.uncertaintySpread),
  };
};

export const allocatedCost = (totalCost: number, ns: Pick<NamespaceUtilization, 'weightedShare'>): number =>
  totalCost * ns.weightedShare;

export const estimateNamespaceCosts = (
  namespaces: readonly NamespaceUtilization[],
  totalCost: number,
): NamespaceCostEstimate[] => {
  debug('estimateNamespaceCosts start', { namespaces: namespaces.length, totalCost });
  requirePositive(totalCost, 'totalCost');

  const estimates = namespaces.map((ns) => ({
    namespace: ns.namespace,
    estimatedCost: calculateCostRange(allocatedCost(totalCost, ns), ns),
    cpuShare: ns.cpuPercent / 100,
    memoryShare: ns.memPercent / 100,
    weightedShare: ns.weightedShare,
    confidenceScore: calculateConfidence(ns),
    confidence: confidenceLabel(ns.weightedShare),
  }));

  debug('estimateNamespaceCosts end', { estimates: estimates.length });
  return estimates;
};
