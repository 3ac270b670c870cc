import { debug } from '../debug.js';
import { CRITICAL_HEADLINE_MIN_EXPOSURE } from './constants.js';
import type { RiskCategory } from './types.js';

export const HARDENING_RECOMMENDATIONS: readonly string[] = [
  'Implement Kubernetes Pod Security Standards (PSS) at namespace level',
  'Configure network policies to segment workloads and limit lateral movement',
  'Enable audit logging to detect exploitation attempts',
  'Add security scanning in CI/CD pipeline to prevent future issues',
];

const dollars = (amount: number): string => amount.toFixed(0);

export const buildPriorityRecommendations = (categories: readonly RiskCategory[]): string[] => {
  debug('buildPriorityRecommendations start', { categories: categories.length });

  const urgent = categories
    .filter((category) => category.severity === 'critical' && category.riskExposure.best > CRITICAL_HEADLINE_MIN_EXPOSURE)
    .sort((a, b) => b.riskExposure.best - a.riskExposure.best || a.name.localeCompare(b.name));

  const recommendations: string[] = [];
  if (urgent.length > 0) {
    const exposure = urgent.reduce((sum, category) => sum + category.riskExposure.best, 0);
    recommendations.push(
      `IMMEDIATE: Fix ${urgent.length} critical security issues (exposure: $${dollars(exposure / 1000)}K)`,
    );
  }

  recommendations.push(...HARDENING_RECOMMENDATIONS);
  debug('buildPriorityRecommendations end', { recommendations: recommendations.length, urgent: urgent.length });
  return recommendations;
};
