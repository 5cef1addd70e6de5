// api/src/forecast/forecast.service.ts
import { Injectable, Logger } from '@nestjs/common';
import {
  InferenceFailureError,
  errorMessage,
} from '../common/errors/serving.errors';
import { ModelRegistryService } from '../model/model-registry.service';
import { FeatureVector } from './feature-record.model';
import { PredictionResult } from './prediction.model';

/**
 * Inference engine: scale, then regress, one row at a time.
 */
@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(private readonly registry: ModelRegistryService) {}

  /**
   * @throws ServiceUnavailableError when no artifact pair is installed
   * @throws InferenceFailureError when scaling or regression fails
   */
  predict(vector: FeatureVector): PredictionResult {
    // Hold one pair for the whole call, even if a reload swaps it meanwhile
    const pair = this.registry.current();

    try {
      const scaled = pair.scaler.transform(vector);
      const value = pair.regressor.predict(scaled);
      return { value, unit: 'Watts', modelVersion: pair.version };
    } catch (e: unknown) {
      const failure =
        e instanceof InferenceFailureError
          ? e
          : new InferenceFailureError(errorMessage(e), { cause: e });
      this.logger.error(
        `Inference failed on model ${pair.version}: ${failure.message}`,
      );
      throw failure;
    }
  }
}
