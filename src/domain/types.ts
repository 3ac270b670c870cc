export interface NamespaceUsageFact {
  readonly namespace: string;
  readonly cpuRequested: number;
  readonly memoryGbRequested: number;
  readonly podCount: number;
  readonly idlePods: number;
  readonly spotEligiblePods: number;
}

export interface ClusterCapacityFact {
  readonly totalCpuCores: number;
  readonly totalMemoryGb: number;
}

export const RISK_KINDS = [
  'privilegedContainers',
  'hostPathVolumes',
  'hostPid',
  'hostIpc',
  'hostNetwork',
  'runningAsRoot',
  'missingResourceLimits',
  'defaultServiceAccount',
  'addedCapabilities',
  'privilegeEscalation',
] as const;

export type RiskKind = (typeof RISK_KINDS)[number];

export type SecurityRiskCounts = Readonly<Record<RiskKind, number>>;

export type NamespaceFlag = `IDLE-${number}d` | 'SPOT-OK' | 'OVER-PROV';

export interface NamespaceUtilization extends NamespaceUsageFact {
  readonly cpuPercent: number;
  readonly memPercent: number;
  /** (cpuPercent + memPercent) / 200, a fraction of the whole cluster. */
  readonly weightedShare: number;
  readonly wasteScore: number;
  readonly flags: readonly NamespaceFlag[];
}

export type HintType = 'idle_namespace' | 'spot_migration' | 'rightsizing';

export interface OptimizationHint {
  priority: 'high' | 'medium' | 'low';
  type: HintType;
  namespace: string;
  description: string;
  action: string;
  impact: string;
}

export interface ResourceAnalysis {
  totalCpuCores: number;
  totalMemoryGb: number;
  totalCpuRequested: number;
  totalMemoryRequested: number;
  cpuUtilization: number;
  memoryUtilization: number;
  namespaces: NamespaceUtilization[];
  optimizations: OptimizationHint[];
}

export interface CostRange {
  low: number;
  best: number;
  high: number;
}

export type ConfidenceLabel = 'Low' | 'Medium' | 'High';

export interface NamespaceCostEstimate {
  namespace: string;
  estimatedCost: CostRange;
  cpuShare: number;
  memoryShare: number;
  weightedShare: number;
  confidenceScore: number;
  confidence: ConfidenceLabel;
}

export type Level = 'Low' | 'Medium' | 'High';

export type ScenarioKind = 'spot' | 'idle' | 'rightsize' | 'autoscaling';

export interface OptimizationScenario {
  kind: ScenarioKind;
  name: string;
  description: string;
  currentCost: CostRange;
  afterCost: CostRange;
  savings: CostRange;
  impact: string;
  effort: Level;
  risk: Level;
  timeline: string;
  actions: string[];
}

export interface CostEstimate {
  totalClusterCost: number;
  method: 'request_proportional';
  confidence: ConfidenceLabel;
  namespaceCosts: NamespaceCostEstimate[];
  optimizationScenarios: OptimizationScenario[];
  totalSavingsPotential: CostRange;
  assumptions: string[];
  disclaimers: string[];
}

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export interface RiskCategory {
  kind: RiskKind;
  name: string;
  severity: Severity;
  count: number;
  description: string;
  riskExposure: CostRange;
  typicalIncidents: string[];
  industryExamples: string[];
}

export interface RemediationPhase {
  name: string;
  duration: string;
  hours: number;
  cost: number;
  priority: 'IMMEDIATE' | 'THIS WEEK' | 'THIS MONTH';
}

export interface RemediationPlan {
  totalHours: number;
  criticalHours: number;
  highHours: number;
  mediumHours: number;
  estimatedCost: number;
  riskReduction: number;
  roi: number;
  paybackMonths: number;
  timeline: string;
  phases: [RemediationPhase, RemediationPhase, RemediationPhase];
}

export interface RiskCostAnalysis {
  securityScore: number;
  industry: string;
  totalRiskExposure: CostRange;
  riskCategories: RiskCategory[];
  remediationPlan: RemediationPlan;
  priorityRecommendations: string[];
}
