import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FeatureRecord } from '../../src/forecast/feature-record.model';

export const TRAINING_COLUMNS = [
  'temperature',
  'humidity',
  'ghi',
  'hour_sin',
  'hour_cos',
  'power_t_1',
  'power_t_2',
];

/** Request body used throughout the docs and tests. */
export const EXAMPLE_PAYLOAD = {
  temperature: 25.5,
  humidity: 45.0,
  ghi: 600.5,
  hour_sin: -0.5,
  hour_cos: -0.866,
  power_t_1: 150.0,
  power_t_2: 140.0,
};

export const EXAMPLE_RECORD: FeatureRecord = {
  temperature: 25.5,
  humidity: 45.0,
  ghi: 600.5,
  hourSin: -0.5,
  hourCos: -0.866,
  powerT1: 150.0,
  powerT2: 140.0,
};

// EXAMPLE_RECORD scales to [0.55, -0.2, 0.402, -0.5, -0.866, 1, 0.8]
export const TEST_SCALER = {
  kind: 'standard_scaler',
  feature_names: TRAINING_COLUMNS,
  mean: [20, 50, 500, 0, 0, 100, 100],
  scale: [10, 25, 250, 1, 1, 50, 50],
};

// 200 + 2*ghi' + 100*p1' + 50*p2'  ->  340.804 for EXAMPLE_RECORD
export const TEST_LINEAR = {
  kind: 'linear',
  coefficients: [0, 0, 2, 0, 0, 100, 50],
  intercept: 200,
};

// Tree 1 splits on scaled ghi, tree 2 on scaled power_t_1.
// EXAMPLE_RECORD lands right in both: (300 + 500) / 2 = 400
export const TEST_FOREST = {
  kind: 'random_forest',
  n_features: 7,
  trees: [
    {
      children_left: [1, -1, -1],
      children_right: [2, -1, -1],
      feature: [2, -2, -2],
      threshold: [0, -2, -2],
      value: [155, 10, 300],
    },
    {
      children_left: [1, -1, -1],
      children_right: [2, -1, -1],
      feature: [5, -2, -2],
      threshold: [0.5, -2, -2],
      value: [300, 100, 500],
    },
  ],
};

// Loads fine, but only takes six features
export const SIX_FEATURE_SCALER = {
  kind: 'standard_scaler',
  mean: [0, 0, 0, 0, 0, 0],
  scale: [1, 1, 1, 1, 1, 1],
};

export async function makeTempDir(prefix = 'solar-forecast-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeArtifacts(
  dir: string,
  version: string,
  artifacts: { scaler?: unknown; model?: unknown },
): Promise<void> {
  await mkdir(dir, { recursive: true });
  if (artifacts.scaler !== undefined) {
    await writeFile(
      join(dir, `scaler_${version}.json`),
      JSON.stringify(artifacts.scaler),
    );
  }
  if (artifacts.model !== undefined) {
    await writeFile(
      join(dir, `model_${version}.json`),
      JSON.stringify(artifacts.model),
    );
  }
}
