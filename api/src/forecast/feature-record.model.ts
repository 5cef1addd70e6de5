/**
 * One request's inputs after validation. Field bounds are enforced by
 * PredictRequestDto; hourSin/hourCos are accepted as given.
 */
export interface FeatureRecord {
  temperature: number; // °C, [-10, 60]
  humidity: number; // %, [0, 100]
  ghi: number; // global horizontal irradiance, W/m², >= 0
  hourSin: number;
  hourCos: number;
  powerT1: number; // output one hour ago, W, >= 0
  powerT2: number; // output two hours ago, W, >= 0
}

/** Model input, ordered exactly like the training columns (FEATURE_COLUMNS). */
export type FeatureVector = readonly number[];
