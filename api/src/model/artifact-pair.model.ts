import { Regressor } from './artifacts/regressor';
import { StandardScaler } from './artifacts/standard-scaler';

/**
 * A scaler and regressor fitted together, tagged with their version.
 * Frozen on construction; the registry swaps whole pairs, never fields.
 */
export interface ArtifactPair {
  readonly scaler: StandardScaler;
  readonly regressor: Regressor;
  readonly version: string;
}

export function createArtifactPair(
  scaler: StandardScaler,
  regressor: Regressor,
  version: string,
): ArtifactPair {
  return Object.freeze({ scaler, regressor, version });
}
