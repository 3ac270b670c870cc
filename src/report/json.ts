import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { debug } from '../debug.js';
import type { CostEstimate, ResourceAnalysis, RiskCostAnalysis } from '../domain/types.js';

export interface EstimationReport {
  cluster: string;
  industry: string;
  resourceAnalysis: ResourceAnalysis | null;
  costEstimate: CostEstimate | null;
  costError: string | null;
  riskCostAnalysis: RiskCostAnalysis | null;
  riskError: string | null;
}

export const serializeReport = (report: EstimationReport): string => `${JSON.stringify(report, null, 2)}\n`;

export const writeJsonReport = async (outputPath: string, report: EstimationReport): Promise<string> => {
  debug('writeJsonReport start', { outputPath });
  const abs = resolve(outputPath);
  await writeFile(abs, serializeReport(report), 'utf8');
  debug('writeJsonReport end', { abs });
  return abs;
};
