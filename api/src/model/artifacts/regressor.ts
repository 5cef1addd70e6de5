import { InferenceFailureError } from '../../common/errors/serving.errors';
import { TreeArtifactDto } from '../dto/artifact.dto';

/** A fitted model mapping one scaled feature row to a scalar. */
export interface Regressor {
  readonly kind: 'linear' | 'random_forest';
  readonly width: number;
  predict(x: readonly number[]): number;
}

function checkWidth(expected: number, x: readonly number[]): void {
  if (x.length !== expected) {
    throw new InferenceFailureError(
      `regressor expects ${expected} features, got ${x.length}`,
    );
  }
}

function checkFinite(y: number): number {
  if (!Number.isFinite(y)) {
    throw new InferenceFailureError(`prediction is not finite: ${y}`);
  }
  return y;
}

export class LinearRegressor implements Regressor {
  readonly kind = 'linear' as const;

  constructor(
    private readonly coefficients: readonly number[],
    private readonly intercept: number,
  ) {}

  get width(): number {
    return this.coefficients.length;
  }

  predict(x: readonly number[]): number {
    checkWidth(this.width, x);
    const y = x.reduce(
      (acc, v, i) => acc + v * this.coefficients[i],
      this.intercept,
    );
    return checkFinite(y);
  }
}

/**
 * Averaged ensemble of regression trees, each stored in parallel arrays.
 */
export class ForestRegressor implements Regressor {
  readonly kind = 'random_forest' as const;

  constructor(
    readonly width: number,
    private readonly trees: readonly TreeArtifactDto[],
  ) {}

  get treeCount(): number {
    return this.trees.length;
  }

  predict(x: readonly number[]): number {
    checkWidth(this.width, x);
    let sum = 0;
    for (let t = 0; t < this.trees.length; t++) {
      sum += this.walk(this.trees[t], t, x);
    }
    return checkFinite(sum / this.trees.length);
  }

  private walk(tree: TreeArtifactDto, t: number, x: readonly number[]): number {
    const size = tree.children_left.length;
    let node = 0;
    // A well-formed tree reaches a leaf in fewer than `size` steps
    for (let step = 0; step < size; step++) {
      const left = tree.children_left[node];
      if (left === -1) {
        const leaf = tree.value[node];
        if (leaf === undefined) {
          throw new InferenceFailureError(`tree ${t}: leaf ${node} has no value`);
        }
        return leaf;
      }
      const f = tree.feature[node];
      const threshold = tree.threshold[node];
      if (f === undefined || f < 0 || f >= x.length || threshold === undefined) {
        throw new InferenceFailureError(
          `tree ${t}: node ${node} splits on invalid feature ${f}`,
        );
      }
      // Trees were fitted on float32 inputs; compare at that precision
      const next =
        Math.fround(x[f]) <= threshold ? left : tree.children_right[node];
      if (next === undefined || next < 0 || next >= size) {
        throw new InferenceFailureError(
          `tree ${t}: node ${node} points to missing child ${next}`,
        );
      }
      node = next;
    }
    throw new InferenceFailureError(`tree ${t}: no leaf reached (cycle)`);
  }
}
