/**
 * Model output for one request.
 */
export interface PredictionResult {
  value: number;
  unit: 'Watts';
  modelVersion: string; // version tag of the artifact pair that produced it
}
