// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.
import { resolve } from 'path';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  artifacts: {
    dir: string;
    version: string;
  };
  audit: {
    path: string;
    enabled: boolean;
  };
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '8000', 10),

  artifacts: {
    // scaler_<version>.json and model_<version>.json live here
    dir: resolve(process.env.ARTIFACTS_DIR ?? 'artifacts'),
    version: process.env.MODEL_VERSION ?? 'v2',
  },

  audit: {
    path: resolve(process.env.PREDICTION_LOG_PATH ?? 'logs/predictions.csv'),
    enabled: parseFlag(process.env.PREDICTION_LOG_ENABLED, true),
  },
});
