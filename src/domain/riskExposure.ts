import { debug } from '../debug.js';
import { EXPOSURE_BANDS } from './constants.js';
import type { IndustryProfile, PricedRiskKind } from './industry.js';
import { multiplyRange, scaleRange, sumRanges } from './math.js';
import { RISK_CATALOG, type RiskDefinition } from './riskCatalog.js';
import type { CostRange, RiskCategory, SecurityRiskCounts } from './types.js';

export type ClusterExposure = 'internal' | 'public-facing' | 'internet-exposed';

export interface RiskExposureOptions {
  /** Scales every range by the profile's public/internet multiplier. Default `internal` (×1). */
  exposure?: ClusterExposure;
  /** Applies the profile's compound multipliers when paired risks are both present. Default off. */
  compoundRisks?: boolean;
}

const exposureMultiplier = (profile: IndustryProfile, exposure: ClusterExposure): number => {
  switch (exposure) {
    case 'public-facing':
      return profile.publicFacingMultiplier;
    case 'internet-exposed':
      return profile.internetExposedMultiplier;
    default:
      return 1;
  }
};

const compoundMultiplier = (kind: PricedRiskKind, counts: SecurityRiskCounts, profile: IndustryProfile): number => {
  const privilegedPair = counts.privilegedContainers > 0 && counts.hostPathVolumes > 0;
  const rootPair = counts.runningAsRoot > 0 && counts.hostNetwork > 0;
  if (privilegedPair && (kind === 'privilegedContainers' || kind === 'hostPathVolumes')) {
    return profile.privilegedAndHostPathMultiplier;
  }
  if (rootPair && (kind === 'runningAsRoot' || kind === 'hostNetwork')) {
    return profile.rootAndHostNetworkMultiplier;
  }
  return 1;
};

const renderExample = (template: string, unitCost: number): string =>
  template.replace('{unitCostK}', (unitCost / 1000).toFixed(0));

/** count × unit breach cost × annual probability, spread by the severity band. */
export const calculateExposure = (definition: RiskDefinition, count: number, unitCost: number): CostRange => {
  const band = EXPOSURE_BANDS[definition.severity];
  return scaleRange(count * unitCost, [
    definition.probability * band[0],
    definition.probability * band[1],
    definition.probability * band[2],
  ]);
};

export const mapRiskExposure = (
  counts: SecurityRiskCounts,
  profile: IndustryProfile,
  options: RiskExposureOptions = {},
): RiskCategory[] => {
  const exposure = options.exposure ?? 'internal';
  const compound = options.compoundRisks ?? false;
  debug('mapRiskExposure start', { industry: profile.industry, exposure, compound });

  const categories: RiskCategory[] = [];
  for (const definition of RISK_CATALOG) {
    const count = counts[definition.kind];
    if (count <= 0) continue;

    const unitCost = profile.unitCosts[definition.kind];
    const factor = exposureMultiplier(profile, exposure) * (compound ? compoundMultiplier(definition.kind, counts, profile) : 1);
    const base = calculateExposure(definition, count, unitCost);

    categories.push({
      kind: definition.kind,
      name: definition.name,
      severity: definition.severity,
      count,
      description: definition.description,
      riskExposure: factor === 1 ? base : multiplyRange(base, factor),
      typicalIncidents: [...definition.typicalIncidents],
      industryExamples: definition.industryExamples.map((example) => renderExample(example, unitCost)),
    });
  }

  debug('mapRiskExposure end', { categories: categories.map((c) => c.kind) });
  return categories;
};

export const sumExposure = (categories: readonly RiskCategory[]): CostRange =>
  sumRanges(categories.map((category) => category.riskExposure));
