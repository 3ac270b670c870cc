import { debug } from '../debug.js';
import { estimateNamespaceCosts } from './costEstimator.js';
import { resolveIndustryProfile, type IndustryProfile } from './industry.js';
import { requirePositive } from './math.js';
import { buildPriorityRecommendations } from './recommendations.js';
import { buildRemediationPlan } from './remediation.js';
import { mapRiskExposure, sumExposure, type RiskExposureOptions } from './riskExposure.js';
import { generateOptimizationScenarios, sumSavings } from './scenarios.js';
import type {
  ClusterCapacityFact,
  CostEstimate,
  NamespaceUsageFact,
  ResourceAnalysis,
  RiskCostAnalysis,
  SecurityRiskCounts,
} from './types.js';
import { analyzeResources } from './utilization.js';

export const COST_ASSUMPTIONS: readonly string[] = [
  'Cost allocation based on CPU + Memory resource requests (not actual usage)',
  'Does NOT include: storage costs, networking egress, load balancers, public IPs',
  'Spot instance savings assume 70% discount vs on-demand',
  'Assumes proportional sharing of node costs across pods',
  'Cluster cost provided by user - not validated against actual cloud billing',
];

export const COST_DISCLAIMERS: readonly string[] = [
  'These are ESTIMATES with ranges - not exact costs',
  'Actual costs depend on: VM sizes, reserved instances, spot pricing, node utilization',
  "Use your cloud provider's cost management tools for actual billing data",
  'Optimization savings are potential - results may vary',
];

export const analyzeCosts = (analysis: ResourceAnalysis, totalClusterCost: number): CostEstimate => {
  debug('analyzeCosts start', { totalClusterCost, namespaces: analysis.namespaces.length });
  requirePositive(totalClusterCost, 'totalClusterCost');

  const optimizationScenarios = generateOptimizationScenarios(
    analysis.namespaces,
    totalClusterCost,
    analysis.totalCpuCores,
  );

  const estimate: CostEstimate = {
    totalClusterCost,
    method: 'request_proportional',
    confidence: 'Medium',
    namespaceCosts: estimateNamespaceCosts(analysis.namespaces, totalClusterCost),
    optimizationScenarios,
    totalSavingsPotential: sumSavings(optimizationScenarios),
    assumptions: [...COST_ASSUMPTIONS],
    disclaimers: [...COST_DISCLAIMERS],
  };

  debug('analyzeCosts end', {
    scenarios: optimizationScenarios.length,
    savingsBest: estimate.totalSavingsPotential.best,
  });
  return estimate;
};

export interface ClusterFacts {
  namespaces: readonly NamespaceUsageFact[];
  capacity: ClusterCapacityFact;
}

/** Resource analysis and cost estimate from one fact snapshot. */
export const estimateCluster = (
  facts: ClusterFacts,
  totalClusterCost: number,
): { resources: ResourceAnalysis; costs: CostEstimate } => {
  requirePositive(totalClusterCost, 'totalClusterCost');
  const resources = analyzeResources(facts.namespaces, facts.capacity);
  return { resources, costs: analyzeCosts(resources, totalClusterCost) };
};

export interface RiskCostInput {
  securityScore: number;
  counts: SecurityRiskCounts;
  /** Industry name or alias, or an already resolved profile. */
  industry?: string | IndustryProfile;
  options?: RiskExposureOptions;
}

export const analyzeRiskCost = (input: RiskCostInput): RiskCostAnalysis => {
  const profile = typeof input.industry === 'object' ? input.industry : resolveIndustryProfile(input.industry);
  debug('analyzeRiskCost start', { securityScore: input.securityScore, industry: profile.industry });

  const riskCategories = mapRiskExposure(input.counts, profile, input.options);
  const analysis: RiskCostAnalysis = {
    securityScore: input.securityScore,
    industry: profile.industry,
    totalRiskExposure: sumExposure(riskCategories),
    riskCategories,
    remediationPlan: buildRemediationPlan(riskCategories, profile),
    priorityRecommendations: buildPriorityRecommendations(riskCategories),
  };

  debug('analyzeRiskCost end', {
    categories: riskCategories.length,
    exposureBest: analysis.totalRiskExposure.best,
  });
  return analysis;
};
