import { describe, expect, it } from 'vitest';
import { resolveIndustryProfile } from '../../src/domain/industry.js';
import { isMonotonic } from '../../src/domain/math.js';
import { mapRiskExposure, sumExposure } from '../../src/domain/riskExposure.js';
import type { RiskKind, SecurityRiskCounts } from '../../src/domain/types.js';

const counts = (values: Partial<Record<RiskKind, number>>): SecurityRiskCounts => ({
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
  ...values,
});

describe('mapRiskExposure', () => {
  it('prices privileged containers for pharma', () => {
    const [category] = mapRiskExposure(counts({ privilegedContainers: 3 }), resolveIndustryProfile('pharma'));
    expect(category.name).toBe('Privileged Containers');
    expect(category.severity).toBe('critical');
    expect(category.count).toBe(3);
    expect(category.riskExposure.low).toBeCloseTo(11_250, 6);
    expect(category.riskExposure.best).toBeCloseTo(22_500, 6);
    expect(category.riskExposure.high).toBeCloseTo(45_000, 6);
  });

  it('uses a narrower band for medium severity', () => {
    const [category] = mapRiskExposure(counts({ missingResourceLimits: 4 }), resolveIndustryProfile('generic'));
    expect(category.severity).toBe('medium');
    expect(category.riskExposure.low).toBeCloseTo(2500, 6);
    expect(category.riskExposure.best).toBeCloseTo(5000, 6);
    expect(category.riskExposure.high).toBeCloseTo(7500, 6);
  });

  it('skips zero and unpriced counts and keeps catalog order', () => {
    const categories = mapRiskExposure(
      counts({ defaultServiceAccount: 1, hostIpc: 5, addedCapabilities: 2, runningAsRoot: 2, hostPathVolumes: 1 }),
      resolveIndustryProfile('generic'),
    );
    expect(categories.map((c) => c.kind)).toEqual(['hostPathVolumes', 'runningAsRoot', 'defaultServiceAccount']);
    expect(categories.every((c) => isMonotonic(c.riskExposure))).toBe(true);
  });

  it('fills industry examples from the profile unit cost', () => {
    const [category] = mapRiskExposure(counts({ hostPid: 1 }), resolveIndustryProfile('generic'));
    expect(category.industryExamples).toEqual(['Host PID exploitation: $20K average incident cost']);
  });

  it('scales by the exposure multiplier when asked', () => {
    const [category] = mapRiskExposure(counts({ privilegedContainers: 3 }), resolveIndustryProfile('pharma'), {
      exposure: 'internet-exposed',
    });
    expect(category.riskExposure.best).toBeCloseTo(67_500, 6);
  });

  it('applies compound multipliers only to paired risks', () => {
    const input = counts({ privilegedContainers: 1, hostPathVolumes: 1, hostNetwork: 1 });
    const generic = resolveIndustryProfile('generic');

    const plain = mapRiskExposure(input, generic);
    const compound = mapRiskExposure(input, generic, { compoundRisks: true });

    expect(plain[1].riskExposure.best).toBeCloseTo(7000, 6);
    expect(compound[0].riskExposure.best).toBeCloseTo(6750, 6);
    expect(compound[1].riskExposure.best).toBeCloseTo(12_600, 6);
    expect(compound[2].riskExposure).toEqual(plain[2].riskExposure);
  });
});

describe('sumExposure', () => {
  it('adds ranges componentwise', () => {
    const categories = mapRiskExposure(
      counts({ privilegedContainers: 3, missingResourceLimits: 4 }),
      resolveIndustryProfile('generic'),
    );
    const total = sumExposure(categories);
    // 3 * 25000 * 0.15 = 11250; 4 * 5000 * 0.25 = 5000
    expect(total.best).toBeCloseTo(16_250, 6);
    expect(total.low).toBeCloseTo(5625 + 2500, 6);
    expect(total.high).toBeCloseTo(22_500 + 7500, 6);
  });

  it('is zero for no categories', () => {
    expect(sumExposure([])).toEqual({ low: 0, best: 0, high: 0 });
  });
});
