import { EXAMPLE_RECORD, TRAINING_COLUMNS } from '../../test/fixtures/artifacts';
import { FEATURE_COLUMNS, FEATURE_COUNT, assembleFeatureVector } from './feature-vector';

describe('assembleFeatureVector', () => {
  it('emits the seven features in training order', () => {
    expect(assembleFeatureVector(EXAMPLE_RECORD)).toEqual([
      25.5, 45.0, 600.5, -0.5, -0.866, 150.0, 140.0,
    ]);
  });

  it('places each field at its own position', () => {
    const v = assembleFeatureVector({
      temperature: 1,
      humidity: 2,
      ghi: 3,
      hourSin: 4,
      hourCos: 5,
      powerT1: 6,
      powerT2: 7,
    });
    expect(v).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('names columns exactly as the training data does', () => {
    expect(FEATURE_COUNT).toBe(7);
    expect(FEATURE_COLUMNS.map((c) => c.column)).toEqual(TRAINING_COLUMNS);
  });
});
