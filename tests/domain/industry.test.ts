import { describe, expect, it } from 'vitest';
import { normalizeIndustry, resolveIndustryProfile } from '../../src/domain/industry.js';

describe('resolveIndustryProfile', () => {
  it('accepts aliases case-insensitively', () => {
    expect(normalizeIndustry('Healthcare')).toBe('pharma');
    expect(normalizeIndustry(' FINANCE ')).toBe('fintech');
    expect(normalizeIndustry('banking')).toBe('fintech');
    expect(normalizeIndustry('early-stage')).toBe('startup');
  });

  it('falls back to generic', () => {
    expect(normalizeIndustry('retail')).toBe('generic');
    expect(normalizeIndustry(undefined)).toBe('generic');
    expect(normalizeIndustry('toString')).toBe('generic');
    expect(resolveIndustryProfile('').industry).toBe('generic');
  });

  it('carries industry-specific rates and unit costs', () => {
    expect(resolveIndustryProfile('fintech').engineerHourlyRate).toBe(250);
    expect(resolveIndustryProfile('startup').engineerHourlyRate).toBe(150);
    expect(resolveIndustryProfile('pharma').unitCosts.privilegedContainers).toBe(50_000);
    expect(resolveIndustryProfile('pharma').internetExposedMultiplier).toBe(3);
    expect(resolveIndustryProfile().unitCosts.hostPathVolumes).toBe(35_000);
  });

  it('returns frozen profiles that cannot leak mutations between calls', () => {
    const profile = resolveIndustryProfile('generic');
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.unitCosts)).toBe(true);
    expect(resolveIndustryProfile('generic')).not.toBe(profile);
    expect(resolveIndustryProfile('generic')).toEqual(profile);
  });
});
