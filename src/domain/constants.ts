import type { Level, ScenarioKind, Severity } from './types.js';

type Band = readonly [number, number, number];

export const SYSTEM_NAMESPACES: readonly string[] = ['kube-system', 'istio-system'];

/** Pods unchanged for this many days count as idle; flags report idlePods * this. */
export const IDLE_DAYS_PER_POD = 7;

export const OVER_PROVISIONED_CPU_PER_POD = 2.0;
export const SPOT_OK_RATIO = 0.5;

export const WASTE = {
  idleWeight: 40,
  overProvisionedPoints: 30,
  overProvisionedMaxPods: 5,
  spotWeight: 30,
  min: 0,
  max: 100,
} as const;

export const CONFIDENCE = {
  start: 0.5,
  min: 0.3,
  max: 0.9,
  share: { large: 0.15, largeBonus: 0.2, medium: 0.05, mediumBonus: 0.1, tiny: 0.02, tinyPenalty: -0.1 },
  waste: { high: 50, highPenalty: -0.2, medium: 30, mediumPenalty: -0.1 },
  pods: { many: 10, manyBonus: 0.1, few: 3, fewPenalty: -0.1 },
  label: { medium: 0.1, low: 0.02 },
} as const;

export const COST_RANGE = {
  spotDiscount: 0.7,
  uncertaintySpread: 0.5,
  wasteFactor: { high: 50, highFactor: 0.3, medium: 30, mediumFactor: 0.15 },
} as const;

/** Clusters at or above this monthly cost use the absolute scenario floors. */
export const LARGE_CLUSTER_COST = 2000;

export interface ScenarioRule {
  name: string;
  /** Absolute minimum monthly slice for clusters >= LARGE_CLUSTER_COST. */
  largeClusterMinimum: number;
  /** Share of total cost used as minimum for smaller clusters. */
  smallClusterShare: number;
  /** Floor under smallClusterShare. */
  smallClusterFloor: number;
  currentBand: Band;
  /** Remaining cost after the change; savings = current - after. */
  afterBand: Band;
  effort: Level;
  risk: Level;
  timeline: string;
}

const CURRENT_BAND: Band = [0.9, 1.0, 1.1];

// savings bands: spot 60/70/80, idle 90/100/110, rightsize 40/50/60, autoscaling 15/25/35
export const SCENARIO_RULES: Readonly<Record<ScenarioKind, ScenarioRule>> = {
  spot: {
    name: 'Migrate to Spot Instances',
    largeClusterMinimum: 50,
    smallClusterShare: 0.05,
    smallClusterFloor: 20,
    currentBand: CURRENT_BAND,
    afterBand: [0.3, 0.3, 0.3],
    effort: 'Medium',
    risk: 'Low',
    timeline: '1-2 weeks',
  },
  idle: {
    name: 'Delete Idle Namespaces',
    largeClusterMinimum: 30,
    smallClusterShare: 0.03,
    smallClusterFloor: 15,
    currentBand: CURRENT_BAND,
    afterBand: [0, 0, 0],
    effort: 'Low',
    risk: 'Low',
    timeline: '1 day',
  },
  rightsize: {
    name: 'Right-size Over-provisioned Workloads',
    largeClusterMinimum: 50,
    smallClusterShare: 0.05,
    smallClusterFloor: 20,
    currentBand: CURRENT_BAND,
    afterBand: [0.5, 0.5, 0.5],
    effort: 'Medium',
    risk: 'Medium',
    timeline: '2-3 weeks',
  },
  autoscaling: {
    name: 'Add Horizontal Pod Autoscalers',
    largeClusterMinimum: 100,
    smallClusterShare: 0.1,
    smallClusterFloor: 30,
    currentBand: CURRENT_BAND,
    afterBand: [0.75, 0.75, 0.75],
    effort: 'Medium',
    risk: 'Low',
    timeline: '1-2 weeks',
  },
};

export const SCENARIO_ELIGIBILITY = {
  spot: { minRatio: 0.5, minPods: 2 },
  idle: { minWasteScore: 70, minCost: 20 },
  rightsize: { minPods: 1, maxPodsExclusive: 5, minCpuPerPod: 2.0 },
  autoscaling: { minPods: 3, maxPods: 20, minCost: 100 },
} as const;

export const HOURS_PER_ISSUE: Readonly<Record<Severity, number>> = {
  critical: 2.0,
  high: 1.0,
  medium: 0.5,
  low: 0,
};

export const EXPOSURE_BANDS: Readonly<Record<Severity, Band>> = {
  critical: [0.5, 1.0, 2.0],
  high: [0.5, 1.0, 2.0],
  medium: [0.5, 1.0, 1.5],
  low: [0.5, 1.0, 1.5],
};

export const TIMELINE_BUCKETS: ReadonlyArray<readonly [maxHours: number, label: string]> = [
  [8, '1 day'],
  [16, '2 days'],
  [40, '1 week'],
  [80, '2 weeks'],
  [160, '1 month'],
];

export const HOURS_PER_WEEK = 40;
export const MONTHS_PER_YEAR = 12;

export const CRITICAL_HEADLINE_MIN_EXPOSURE = 1000;
