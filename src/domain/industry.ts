import { debug } from '../debug.js';
import type { RiskKind } from './types.js';

export type Industry = 'generic' | 'pharma' | 'fintech' | 'startup';

/** Risk kinds that carry an incident probability and therefore a unit breach cost. */
export type PricedRiskKind = Extract<
  RiskKind,
  | 'privilegedContainers'
  | 'hostPathVolumes'
  | 'hostPid'
  | 'runningAsRoot'
  | 'hostNetwork'
  | 'missingResourceLimits'
  | 'defaultServiceAccount'
>;

export interface IndustryProfile {
  readonly industry: Industry;
  readonly engineerHourlyRate: number;
  readonly unitCosts: Readonly<Record<PricedRiskKind, number>>;
  readonly publicFacingMultiplier: number;
  readonly internetExposedMultiplier: number;
  /** Applied when privileged containers and hostPath volumes are both present. */
  readonly privilegedAndHostPathMultiplier: number;
  /** Applied when root containers and hostNetwork pods are both present. */
  readonly rootAndHostNetworkMultiplier: number;
}

const PRESETS: Readonly<Record<Industry, IndustryProfile>> = {
  generic: {
    industry: 'generic',
    engineerHourlyRate: 200,
    unitCosts: {
      privilegedContainers: 25_000,
      hostPathVolumes: 35_000,
      hostPid: 20_000,
      runningAsRoot: 8_000,
      hostNetwork: 12_000,
      missingResourceLimits: 5_000,
      defaultServiceAccount: 6_000,
    },
    publicFacingMultiplier: 1.5,
    internetExposedMultiplier: 2.0,
    privilegedAndHostPathMultiplier: 1.8,
    rootAndHostNetworkMultiplier: 1.4,
  },
  // PHI exposure and HIPAA penalties roughly double breach costs
  pharma: {
    industry: 'pharma',
    engineerHourlyRate: 200,
    unitCosts: {
      privilegedContainers: 50_000,
      hostPathVolumes: 70_000,
      hostPid: 40_000,
      runningAsRoot: 15_000,
      hostNetwork: 20_000,
      missingResourceLimits: 8_000,
      defaultServiceAccount: 10_000,
    },
    publicFacingMultiplier: 2.0,
    internetExposedMultiplier: 3.0,
    privilegedAndHostPathMultiplier: 2.2,
    rootAndHostNetworkMultiplier: 1.6,
  },
  // PCI-DSS scope and uptime SLAs
  fintech: {
    industry: 'fintech',
    engineerHourlyRate: 250,
    unitCosts: {
      privilegedContainers: 40_000,
      hostPathVolumes: 60_000,
      hostPid: 35_000,
      runningAsRoot: 12_000,
      hostNetwork: 18_000,
      missingResourceLimits: 10_000,
      defaultServiceAccount: 9_000,
    },
    publicFacingMultiplier: 1.8,
    internetExposedMultiplier: 2.5,
    privilegedAndHostPathMultiplier: 2.0,
    rootAndHostNetworkMultiplier: 1.5,
  },
  startup: {
    industry: 'startup',
    engineerHourlyRate: 150,
    unitCosts: {
      privilegedContainers: 15_000,
      hostPathVolumes: 20_000,
      hostPid: 12_000,
      runningAsRoot: 5_000,
      hostNetwork: 8_000,
      missingResourceLimits: 3_000,
      defaultServiceAccount: 4_000,
    },
    publicFacingMultiplier: 1.3,
    internetExposedMultiplier: 1.5,
    privilegedAndHostPathMultiplier: 1.5,
    rootAndHostNetworkMultiplier: 1.3,
  },
};

const ALIASES: Readonly<Record<string, Industry>> = {
  generic: 'generic',
  pharma: 'pharma',
  pharmaceutical: 'pharma',
  healthcare: 'pharma',
  medical: 'pharma',
  fintech: 'fintech',
  finance: 'fintech',
  banking: 'fintech',
  payment: 'fintech',
  startup: 'startup',
  'early-stage': 'startup',
};

const freezeProfile = (profile: IndustryProfile): IndustryProfile =>
  Object.freeze({ ...profile, unitCosts: Object.freeze({ ...profile.unitCosts }) });

export const normalizeIndustry = (name?: string): Industry => {
  const key = (name ?? '').trim().toLowerCase();
  return Object.hasOwn(ALIASES, key) ? ALIASES[key] : 'generic';
};

/** Returns a fresh, frozen profile; unknown names fall back to generic. */
export const resolveIndustryProfile = (name?: string): IndustryProfile => {
  const industry = normalizeIndustry(name);
  debug('resolveIndustryProfile', { requested: name, industry });
  return freezeProfile(PRESETS[industry]);
};
