import { InferenceFailureError } from '../../common/errors/serving.errors';

/**
 * Fitted standardisation: x' = (x - mean) / scale, per position.
 */
export class StandardScaler {
  readonly kind = 'standard_scaler' as const;

  constructor(
    private readonly mean: readonly number[],
    private readonly scale: readonly number[],
    readonly featureNames?: readonly string[],
  ) {}

  get width(): number {
    return this.mean.length;
  }

  transform(x: readonly number[]): number[] {
    if (x.length !== this.width) {
      throw new InferenceFailureError(
        `scaler expects ${this.width} features, got ${x.length}`,
      );
    }
    return x.map((v, i) => {
      const out = (v - this.mean[i]) / this.scale[i];
      if (!Number.isFinite(out)) {
        throw new InferenceFailureError(
          `scaled feature ${i} is not finite (scale=${this.scale[i]})`,
        );
      }
      return out;
    });
  }
}
