import { describe, expect, it } from 'vitest';
import { analyzeRiskCost, estimateCluster } from '../../src/domain/engine.js';
import type { NamespaceUsageFact, SecurityRiskCounts } from '../../src/domain/types.js';
import { formatCostRange, formatCurrency, renderCostSummary, renderRiskSummary } from '../../src/report/table.js';

const staging: NamespaceUsageFact = {
  namespace: 'staging',
  cpuRequested: 12,
  memoryGbRequested: 0,
  podCount: 4,
  idlePods: 3,
  spotEligiblePods: 2,
};

const prod: NamespaceUsageFact = {
  namespace: 'prod',
  cpuRequested: 80,
  memoryGbRequested: 300,
  podCount: 40,
  idlePods: 0,
  spotEligiblePods: 0,
};

const capacity = { totalCpuCores: 100, totalMemoryGb: 400 };

const noRisks: SecurityRiskCounts = {
  privilegedContainers: 0,
  hostPathVolumes: 0,
  hostPid: 0,
  hostIpc: 0,
  hostNetwork: 0,
  runningAsRoot: 0,
  missingResourceLimits: 0,
  defaultServiceAccount: 0,
  addedCapabilities: 0,
  privilegeEscalation: 0,
};

describe('formatCurrency', () => {
  it('keeps cents only for small amounts', () => {
    expect(formatCurrency(5)).toBe('5.00');
    expect(formatCurrency(1234.4)).toBe('1234');
    expect(formatCurrency(Number.POSITIVE_INFINITY)).toBe('N/A');
  });
});

describe('formatCostRange', () => {
  it('collapses a flat range', () => {
    expect(formatCostRange({ low: 0, best: 0, high: 0 })).toBe('$0.00');
  });

  it('shows bounds and best estimate', () => {
    expect(formatCostRange({ low: 100, best: 200, high: 300 })).toBe('$100 - $300 (best: $200)');
  });
});

describe('renderRiskSummary', () => {
  it('renders exposure, plan and recommendations', () => {
    const analysis = analyzeRiskCost({
      securityScore: 62,
      counts: { ...noRisks, privilegedContainers: 1 },
      industry: 'pharma',
    });

    const lines = renderRiskSummary(analysis);
    expect(lines.slice(0, 8)).toEqual([
      'SECURITY RISK EXPOSURE',
      '',
      'Security Score: 62/100 (industry profile: pharma)',
      'Total Annual Risk Exposure: $3750 - $15000 (best: $7500)',
      '',
      '  [CRITICAL] Privileged Containers x1: $3750 - $15000 (best: $7500)',
      '',
      'Remediation: 2 hours, $400 (1 day)',
    ]);
    expect(lines[8]).toBe('ROI: 18.8x | Payback: 0.6 months');
    expect(lines[9]).toBe('  Phase 1: Critical Issues [IMMEDIATE]: 2h, $400, 1 day');
    expect(lines.at(-1)).toBe('  5. Add security scanning in CI/CD pipeline to prevent future issues');
  });
});

describe('renderCostSummary', () => {
  it('renders the header, scenario blocks and totals', () => {
    const { costs } = estimateCluster({ namespaces: [staging, prod], capacity }, 5000);

    const lines = renderCostSummary(costs);
    expect(lines[0]).toBe('ESTIMATED COST ANALYSIS');
    expect(lines.slice(7, 10)).toEqual([
      'Total Cluster Cost (provided): $5000/month',
      'Allocation Method: request_proportional',
      'Confidence Level: Medium',
    ]);
    expect(lines[12].startsWith('prod')).toBe(true);
    expect(lines[13].startsWith('staging')).toBe(true);

    const start = lines.indexOf('SCENARIO 1: Delete Idle Namespaces');
    expect(start).toBe(15);
    expect(lines.slice(start + 1, start + 6)).toEqual([
      '  Description: Remove 1 idle namespaces (12.0 CPU, 0.0 GB memory)',
      '  Savings:     $270 - $330 (best: $300)/month',
      '  Impact:      Free 12.0 CPU cores, 0.0 GB memory (12% of cluster)',
      '  Effort: Low | Risk: Low | Timeline: 1 day',
      '     - Verify these namespaces are truly unused: staging (3 idle pods)',
    ]);
    expect(lines).toContain('SCENARIO 2: Right-size Over-provisioned Workloads');
    expect(lines).toContain('SCENARIO 3: Add Horizontal Pod Autoscalers');

    // savings best: 300 + 150 + 75
    expect(lines).toContain('TOTAL OPTIMIZATION POTENTIAL: $435 - $615 (best: $525)/month');
    const after = lines.find((line) => line.startsWith('  After all optimizations:'));
    expect(after?.startsWith('  After all optimizations: $4475/month (save ')).toBe(true);
    expect(lines).not.toContain('No major optimization opportunities found.');
  });

  it('says so when no scenario qualifies', () => {
    const { costs } = estimateCluster({ namespaces: [prod], capacity }, 5000);

    const lines = renderCostSummary(costs);
    expect(lines).toContain('No major optimization opportunities found.');
    expect(lines.some((line) => line.startsWith('TOTAL OPTIMIZATION POTENTIAL'))).toBe(false);
    expect(lines.slice(-6)).toEqual([
      'ASSUMPTIONS:',
      '  1. Cost allocation based on CPU + Memory resource requests (not actual usage)',
      '  2. Does NOT include: storage costs, networking egress, load balancers, public IPs',
      '  3. Spot instance savings assume 70% discount vs on-demand',
      '  4. Assumes proportional sharing of node costs across pods',
      '  5. Cluster cost provided by user - not validated against actual cloud billing',
    ]);
  });
});
