import type { CostEstimate, CostRange, OptimizationScenario, RiskCostAnalysis } from '../domain/types.js';

export const formatCurrency = (amount: number): string =>
  Number.isFinite(amount) ? amount.toFixed(amount < 10 ? 2 : 0) : 'N/A';

export const formatCostRange = (range: CostRange): string => {
  if (range.low === range.high) return `$${formatCurrency(range.best)}`;
  return `$${formatCurrency(range.low)} - $${formatCurrency(range.high)} (best: $${formatCurrency(range.best)})`;
};

const pad = (value: string, width: number): string => value.padEnd(width);

const renderScenario = (index: number, scenario: OptimizationScenario): string[] => [
  `SCENARIO ${index}: ${scenario.name}`,
  `  Description: ${scenario.description}`,
  `  Savings:     ${formatCostRange(scenario.savings)}/month`,
  `  Impact:      ${scenario.impact}`,
  `  Effort: ${scenario.effort} | Risk: ${scenario.risk} | Timeline: ${scenario.timeline}`,
  ...scenario.actions.map((action) => `     - ${action}`),
  '',
];

export const renderCostSummary = (estimate: CostEstimate): string[] => {
  const lines = [
    'ESTIMATED COST ANALYSIS',
    '',
    ...estimate.disclaimers.map((line) => `  ! ${line}`),
    '',
    `Total Cluster Cost (provided): $${formatCurrency(estimate.totalClusterCost)}/month`,
    `Allocation Method: ${estimate.method}`,
    `Confidence Level: ${estimate.confidence}`,
    '',
    `${pad('NAMESPACE', 24)}${pad('EST. COST/MONTH', 44)}${pad('BASIS', 14)}CONFIDENCE`,
    ...estimate.namespaceCosts.map(
      (ns) =>
        `${pad(ns.namespace, 24)}${pad(formatCostRange(ns.estimatedCost), 44)}${pad(`${(ns.weightedShare * 100).toFixed(1)}% share`, 14)}${ns.confidence}`,
    ),
    '',
  ];

  if (estimate.optimizationScenarios.length === 0) {
    lines.push('No major optimization opportunities found.', '');
  } else {
    estimate.optimizationScenarios.forEach((scenario, i) => lines.push(...renderScenario(i + 1, scenario)));
    const after = estimate.totalClusterCost - estimate.totalSavingsPotential.best;
    const pct = (estimate.totalSavingsPotential.best / estimate.totalClusterCost) * 100;
    lines.push(
      `TOTAL OPTIMIZATION POTENTIAL: ${formatCostRange(estimate.totalSavingsPotential)}/month`,
      `  After all optimizations: $${formatCurrency(after)}/month (save ${pct.toFixed(0)}%)`,
      '',
    );
  }

  lines.push('ASSUMPTIONS:', ...estimate.assumptions.map((line, i) => `  ${i + 1}. ${line}`));
  return lines;
};

export const renderRiskSummary = (analysis: RiskCostAnalysis): string[] => {
  const plan = analysis.remediationPlan;
  return [
    'SECURITY RISK EXPOSURE',
    '',
    `Security Score: ${analysis.securityScore}/100 (industry profile: ${analysis.industry})`,
    `Total Annual Risk Exposure: ${formatCostRange(analysis.totalRiskExposure)}`,
    '',
    ...analysis.riskCategories.map(
      (category) =>
        `  [${category.severity.toUpperCase()}] ${category.name} x${category.count}: ${formatCostRange(category.riskExposure)}`,
    ),
    '',
    `Remediation: ${plan.totalHours} hours, $${formatCurrency(plan.estimatedCost)} (${plan.timeline})`,
    `ROI: ${plan.roi.toFixed(1)}x | Payback: ${plan.paybackMonths.toFixed(1)} months`,
    ...plan.phases.map(
      (phase) => `  ${phase.name} [${phase.priority}]: ${phase.hours}h, $${formatCurrency(phase.cost)}, ${phase.duration}`,
    ),
    '',
    'PRIORITY RECOMMENDATIONS:',
    ...analysis.priorityRecommendations.map((line, i) => `  ${i + 1}. ${line}`),
  ];
};
