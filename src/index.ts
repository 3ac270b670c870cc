#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { loadSnapshot } from './config/loader.js';
import type { Snapshot } from './config/types.js';
import { debug, setDebugEnabled } from './debug.js';
import { analyzeRiskCost, estimateCluster } from './domain/engine.js';
import { isEstimationError } from './domain/errors.js';
import { normalizeIndustry } from './domain/industry.js';
import { serializeReport, writeJsonReport, type EstimationReport } from './report/json.js';
import { renderCostSummary, renderRiskSummary } from './report/table.js';

const VERSION = '0.1.0';

type OutputFormat = 'table' | 'json';
type Pipeline = 'all' | 'cost' | 'risk';

interface CliOptions {
  snapshot: string;
  monthlyCost?: number;
  industry?: string;
  format: OutputFormat;
  output?: string;
  only: Pipeline;
  debug?: boolean;
}

const parseAmount = (value: string): number => {
  const amount = Number(value);
  if (!Number.isFinite(amount)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return amount;
};

type Outcome<T> = { value: T; error: null } | { value: null; error: string };

/** Estimation errors make one pipeline unavailable; anything else is a real failure. */
const attempt = <T>(label: string, compute: () => T): Outcome<T> => {
  try {
    return { value: compute(), error: null };
  } catch (error) {
    if (!isEstimationError(error)) throw error;
    debug(`${label} unavailable`, { kind: error.kind, field: error.field });
    return { value: null, error: `${error.kind}: ${error.message}` };
  }
};

const runCostPipeline = (snapshot: Snapshot): Pick<EstimationReport, 'resourceAnalysis' | 'costEstimate' | 'costError'> => {
  const { capacity, namespaces, monthlyCost } = snapshot;
  if (!capacity || namespaces.length === 0) {
    return { resourceAnalysis: null, costEstimate: null, costError: 'snapshot has no namespace usage or capacity facts' };
  }
  if (monthlyCost === undefined) {
    return { resourceAnalysis: null, costEstimate: null, costError: 'monthly cost not provided (--monthly-cost)' };
  }

  const outcome = attempt('cost analysis', () => estimateCluster({ namespaces, capacity }, monthlyCost));
  if (outcome.error !== null) {
    return { resourceAnalysis: null, costEstimate: null, costError: outcome.error };
  }
  return { resourceAnalysis: outcome.value.resources, costEstimate: outcome.value.costs, costError: null };
};

const runRiskPipeline = (snapshot: Snapshot): Pick<EstimationReport, 'riskCostAnalysis' | 'riskError'> => {
  const outcome = attempt('risk analysis', () =>
    analyzeRiskCost({
      securityScore: snapshot.securityScore,
      counts: snapshot.securityRisks,
      industry: snapshot.industry,
      options: { exposure: snapshot.exposure, compoundRisks: snapshot.compoundRisks },
    }),
  );
  return { riskCostAnalysis: outcome.value, riskError: outcome.error };
};

export const buildEstimationReport = (snapshot: Snapshot, only: Pipeline = 'all'): EstimationReport => {
  debug('buildEstimationReport start', { cluster: snapshot.cluster, only });
  const cost =
    only === 'risk' ? { resourceAnalysis: null, costEstimate: null, costError: null } : runCostPipeline(snapshot);
  const risk = only === 'cost' ? { riskCostAnalysis: null, riskError: null } : runRiskPipeline(snapshot);

  const report: EstimationReport = {
    cluster: snapshot.cluster,
    industry: normalizeIndustry(snapshot.industry),
    ...cost,
    ...risk,
  };
  debug('buildEstimationReport end', { costError: report.costError, riskError: report.riskError });
  return report;
};

const renderTable = (report: EstimationReport, only: Pipeline): string[] => {
  const lines = [`Cluster: ${report.cluster}`, ''];
  if (only !== 'risk') {
    if (report.costEstimate) lines.push(...renderCostSummary(report.costEstimate));
    else lines.push(`Cost analysis unavailable: ${report.costError ?? 'not run'}`);
    lines.push('');
  }
  if (only !== 'cost') {
    if (report.riskCostAnalysis) lines.push(...renderRiskSummary(report.riskCostAnalysis));
    else lines.push(`Risk analysis unavailable: ${report.riskError ?? 'not run'}`);
  }
  return lines;
};

export const run = async (argv: string[]): Promise<void> => {
  if (argv.includes('--debug') || argv.includes('-d')) {
    setDebugEnabled(true);
  }
  debug('run start', { argv });
  const program = new Command();

  program
    .name('kube-estimator')
    .description('Cost ranges, savings scenarios and security risk exposure from a cluster snapshot')
    .version(VERSION)
    .option('-s, --snapshot <path>', 'cluster snapshot file (yaml or json)', 'snapshot.yaml')
    .option('-m, --monthly-cost <amount>', 'total cluster cost per month', parseAmount)
    .option('-i, --industry <name>', 'risk profile: generic | pharma | fintech | startup')
    .option('-f, --format <format>', 'output format: table | json', 'table')
    .option('-o, --output <path>', 'also write the JSON report to this path')
    .option('--only <pipeline>', 'run only one analysis: all | cost | risk', 'all')
    .option('-d, --debug', 'enable debug logging');

  program.parse(argv);
  const opts = program.opts<CliOptions>();
  if (opts.debug) {
    setDebugEnabled(true);
  }
  debug('cli options parsed', opts);

  if (opts.format !== 'table' && opts.format !== 'json') {
    debug('invalid format received', { format: opts.format });
    throw new Error(`Invalid --format value: ${opts.format}`);
  }
  if (opts.only !== 'all' && opts.only !== 'cost' && opts.only !== 'risk') {
    debug('invalid pipeline received', { only: opts.only });
    throw new Error(`Invalid --only value: ${opts.only}`);
  }

  const snapshot = await loadSnapshot(opts.snapshot, {
    monthlyCost: opts.monthlyCost,
    industry: opts.industry,
    outputPath: opts.output,
  });

  const report = buildEstimationReport(snapshot, opts.only);

  if (opts.format === 'json') {
    process.stdout.write(serializeReport(report));
  } else {
    console.log(renderTable(report, opts.only).join('\n'));
  }

  if (snapshot.outputPath) {
    const reportPath = await writeJsonReport(snapshot.outputPath, report);
    console.error(`Report written to: ${reportPath}`);
  }
  debug('run end', { cluster: report.cluster });
};

export const main = async (): Promise<void> => {
  debug('main start');
  try {
    await run(process.argv);
    debug('main end success');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    debug('main end failure', { message });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
};

const entry = process.argv[1];
const isMain = entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
if (isMain) {
  void main();
}
