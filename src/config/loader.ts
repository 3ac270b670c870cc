import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { env } from 'node:process';
import yaml from 'js-yaml';
import { debug } from '../debug.js';
import { SnapshotSchema, type Snapshot, type SnapshotOverrides } from './types.js';

const parseByExtension = (raw: string, path: string): unknown => {
  debug('parseByExtension start', { path });
  if (path.endsWith('.json')) {
    const parsed: unknown = JSON.parse(raw);
    debug('parseByExtension end', { format: 'json' });
    return parsed;
  }
  const parsed = yaml.load(raw);
  debug('parseByExtension end', { format: 'yaml' });
  return parsed;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const envMonthlyCost = (): number | undefined => {
  const raw = env.CLUSTER_MONTHLY_COST?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`CLUSTER_MONTHLY_COST must be a number (got "${raw}")`);
  }
  return value;
};

export const loadSnapshot = async (snapshotPath: string, overrides?: SnapshotOverrides): Promise<Snapshot> => {
  debug('loadSnapshot start', { snapshotPath, overrides });
  const absPath = resolve(snapshotPath);

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf8');
  } catch (error) {
    debug('loadSnapshot readFile failed', { absPath, error });
    throw new Error(`Snapshot file not found: ${absPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseByExtension(raw, absPath);
  } catch (error) {
    debug('loadSnapshot parse failed', { absPath, error });
    throw new Error(`Invalid snapshot format in ${absPath}`);
  }

  if (!isRecord(parsed)) {
    debug('loadSnapshot invalid parsed type', { parsedType: typeof parsed });
    throw new Error(`Invalid snapshot format in ${absPath}`);
  }

  const input: Record<string, unknown> = { ...parsed };

  const fromEnv = envMonthlyCost();
  if (fromEnv !== undefined) {
    debug('CLUSTER_MONTHLY_COST env override applied');
    input.monthlyCost = fromEnv;
  }

  if (overrides?.monthlyCost !== undefined) {
    debug('loadSnapshot applying monthlyCost override', { monthlyCost: overrides.monthlyCost });
    input.monthlyCost = overrides.monthlyCost;
  }

  if (overrides?.industry) {
    debug('loadSnapshot applying industry override', { industry: overrides.industry });
    input.industry = overrides.industry;
  }

  if (overrides?.outputPath) {
    debug('loadSnapshot applying outputPath override', { outputPath: overrides.outputPath });
    input.outputPath = overrides.outputPath;
  }

  let snapshot: Snapshot;
  try {
    snapshot = SnapshotSchema.parse(input);
  } catch (error) {
    debug('loadSnapshot schema validation failed', { error });
    throw error;
  }

  debug('loadSnapshot end', {
    cluster: snapshot.cluster,
    namespaces: snapshot.namespaces.length,
    hasCapacity: snapshot.capacity !== undefined,
    monthlyCost: snapshot.monthlyCost ?? null,
  });
  return snapshot;
};
