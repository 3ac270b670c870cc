import { debug } from '../debug.js';
import { HOURS_PER_ISSUE, HOURS_PER_WEEK, MONTHS_PER_YEAR, TIMELINE_BUCKETS } from './constants.js';
import { EstimationError } from './errors.js';
import type { IndustryProfile } from './industry.js';
import { roundHalfEven } from './math.js';
import type { RemediationPhase, RemediationPlan, RiskCategory } from './types.js';

export const estimateTimeline = (hours: number): string => {
  for (const [maxHours, label] of TIMELINE_BUCKETS) {
    if (hours <= maxHours) return label;
  }
  return `${roundHalfEven(hours / HOURS_PER_WEEK)} weeks`;
};

export const calculateRoi = (riskReduction: number, estimatedCost: number): number => {
  if (estimatedCost === 0) {
    throw new EstimationError('UndefinedROI', 'estimatedCost', 'ROI is undefined: remediation cost is 0');
  }
  return riskReduction / estimatedCost;
};

/** Months until the annualized risk reduction, taken monthly, covers the remediation cost. */
export const calculatePaybackMonths = (estimatedCost: number, riskReduction: number): number => {
  if (riskReduction === 0) {
    throw new EstimationError('UndefinedPayback', 'riskReduction', 'Payback is undefined: risk reduction is 0');
  }
  return estimatedCost / (riskReduction / MONTHS_PER_YEAR);
};

const phase = (
  name: string,
  hours: number,
  rate: number,
  priority: RemediationPhase['priority'],
): RemediationPhase => ({
  name,
  duration: estimateTimeline(hours),
  hours,
  cost: hours * rate,
  priority,
});

export const buildRemediationPlan = (
  categories: readonly RiskCategory[],
  profile: IndustryProfile,
): RemediationPlan => {
  debug('buildRemediationPlan start', { categories: categories.length, rate: profile.engineerHourlyRate });

  const hours = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const category of categories) {
    hours[category.severity] += category.count * HOURS_PER_ISSUE[category.severity];
  }

  const totalHours = hours.critical + hours.high + hours.medium + hours.low;
  const rate = profile.engineerHourlyRate;
  const estimatedCost = totalHours * rate;
  const riskReduction = categories.reduce((sum, category) => sum + category.riskExposure.best, 0);

  const plan: RemediationPlan = {
    totalHours,
    criticalHours: hours.critical,
    highHours: hours.high,
    mediumHours: hours.medium,
    estimatedCost,
    riskReduction,
    roi: calculateRoi(riskReduction, estimatedCost),
    paybackMonths: calculatePaybackMonths(estimatedCost, riskReduction),
    timeline: estimateTimeline(totalHours),
    phases: [
      phase('Phase 1: Critical Issues', hours.critical, rate, 'IMMEDIATE'),
      phase('Phase 2: High Priority', hours.high, rate, 'THIS WEEK'),
      phase('Phase 3: Medium Priority', hours.medium, rate, 'THIS MONTH'),
    ],
  };

  debug('buildRemediationPlan end', { totalHours, estimatedCost, roi: plan.roi, paybackMonths: plan.paybackMonths });
  return plan;
};
