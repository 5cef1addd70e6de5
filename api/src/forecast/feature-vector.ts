// api/src/forecast/feature-vector.ts
import { FeatureRecord, FeatureVector } from './feature-record.model';

export interface FeatureColumn {
  /** FeatureRecord field */
  key: keyof FeatureRecord;
  /** Training column name, also the request body key */
  column: string;
}

/**
 * Column order the scaler and regressor were fitted with.
 * Reordering this list silently corrupts every prediction: the model
 * only sees positions, never names.
 */
export const FEATURE_COLUMNS: readonly FeatureColumn[] = [
  { key: 'temperature', column: 'temperature' },
  { key: 'humidity', column: 'humidity' },
  { key: 'ghi', column: 'ghi' },
  { key: 'hourSin', column: 'hour_sin' },
  { key: 'hourCos', column: 'hour_cos' },
  { key: 'powerT1', column: 'power_t_1' },
  { key: 'powerT2', column: 'power_t_2' },
];

export const FEATURE_COUNT = FEATURE_COLUMNS.length;

export function assembleFeatureVector(record: FeatureRecord): FeatureVector {
  return FEATURE_COLUMNS.map(({ key }) => record[key]);
}
