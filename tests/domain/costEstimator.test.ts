import { describe, expect, it } from 'vitest';
import {
  calculateConfidence,
  calculateCostRange,
  confidenceLabel,
  estimateNamespaceCosts,
} from '../../src/domain/costEstimator.js';
import { isMonotonic } from '../../src/domain/math.js';
import { errorKind, utilization } from '../helpers.js';

describe('calculateConfidence', () => {
  it('rewards large, busy namespaces', () => {
    expect(calculateConfidence({ weightedShare: 0.2, wasteScore: 0, podCount: 12 })).toBeCloseTo(0.8, 10);
  });

  it('is floored at 0.3', () => {
    expect(calculateConfidence({ weightedShare: 0.01, wasteScore: 60, podCount: 1 })).toBe(0.3);
  });

  it('offsets a medium share against medium waste', () => {
    expect(calculateConfidence({ weightedShare: 0.1, wasteScore: 40, podCount: 5 })).toBeCloseTo(0.5, 10);
  });
});

describe('confidenceLabel', () => {
  it('uses the coarse two-bucket rule', () => {
    expect(confidenceLabel(0.2)).toBe('Medium');
    expect(confidenceLabel(0.05)).toBe('Medium');
    expect(confidenceLabel(0.02)).toBe('Medium');
    expect(confidenceLabel(0.01)).toBe('Low');
  });
});

describe('calculateCostRange', () => {
  it('spreads a confident namespace by +/-10%', () => {
    const ns = utilization({ namespace: 'prod', weightedShare: 0.2, podCount: 12 });
    const range = calculateCostRange(1000, ns);
    expect(range.low).toBeCloseTo(900, 6);
    expect(range.best).toBe(1000);
    expect(range.high).toBeCloseTo(1100, 6);
  });

  it('discounts spot-eligible pods on the low side and inflates waste on the high side', () => {
    const ns = utilization({
      namespace: 'sandbox',
      weightedShare: 0.01,
      wasteScore: 60,
      podCount: 1,
      spotEligiblePods: 1,
    });
    const range = calculateCostRange(1000, ns);
    // confidence 0.3 -> uncertainty 0.7; spot potential 0.7; waste factor 0.3
    expect(range.low).toBeCloseTo(1000 * 0.3 * 0.65, 6);
    expect(range.best).toBe(1000);
    expect(range.high).toBeCloseTo(1000 * 1.3 * 1.35, 6);
  });
});

describe('estimateNamespaceCosts', () => {
  it('splits the total by weighted share', () => {
    const estimates = estimateNamespaceCosts(
      [
        utilization({ namespace: 'a', weightedShare: 0.5, cpuPercent: 50, memPercent: 50 }),
        utilization({ namespace: 'b', weightedShare: 0.5, cpuPercent: 40, memPercent: 60 }),
      ],
      10_000,
    );

    expect(estimates.map((e) => e.estimatedCost.best)).toEqual([5000, 5000]);
    expect(estimates[1].cpuShare).toBeCloseTo(0.4, 10);
    expect(estimates[1].memoryShare).toBeCloseTo(0.6, 10);
    expect(estimates[0].confidence).toBe('Medium');
    expect(estimates.every((e) => isMonotonic(e.estimatedCost))).toBe(true);
  });

  it('keeps confidence scores inside their bounds', () => {
    const estimates = estimateNamespaceCosts(
      [
        utilization({ namespace: 'tiny', weightedShare: 0.001, wasteScore: 90, podCount: 1 }),
        utilization({ namespace: 'big', weightedShare: 0.9, podCount: 50 }),
      ],
      2500,
    );
    for (const estimate of estimates) {
      expect(estimate.confidenceScore).toBeGreaterThanOrEqual(0.3);
      expect(estimate.confidenceScore).toBeLessThanOrEqual(0.9);
    }
  });

  it('rejects a non-positive total cost', () => {
    expect(errorKind(() => estimateNamespaceCosts([], 0))).toBe('InvalidInput');
    expect(errorKind(() => estimateNamespaceCosts([], -100))).toBe('InvalidInput');
    expect(errorKind(() => estimateNamespaceCosts([], Number.NaN))).toBe('InvalidInput');
  });
});
