import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

const FINITE = { allowNaN: false, allowInfinity: false } as const;

/**
 * scaler_<version>.json: a fitted per-feature standardisation.
 */
export class ScalerArtifactDto {
  @IsIn(['standard_scaler'])
  kind!: 'standard_scaler';

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  feature_names?: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsNumber(FINITE, { each: true })
  mean!: number[];

  @IsArray()
  @ArrayNotEmpty()
  @IsNumber(FINITE, { each: true })
  scale!: number[];
}

/**
 * model_<version>.json with kind "linear".
 */
export class LinearRegressorArtifactDto {
  @IsIn(['linear'])
  kind!: 'linear';

  @IsArray()
  @ArrayNotEmpty()
  @IsNumber(FINITE, { each: true })
  coefficients!: number[];

  @IsNumber(FINITE)
  intercept!: number;
}

/**
 * One fitted regression tree in parallel-array layout.
 * Node i is a leaf iff children_left[i] === -1.
 */
export class TreeArtifactDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  children_left!: number[];

  @IsArray()
  @IsInt({ each: true })
  children_right!: number[];

  @IsArray()
  @IsInt({ each: true })
  feature!: number[];

  @IsArray()
  @IsNumber(FINITE, { each: true })
  threshold!: number[];

  @IsArray()
  @IsNumber(FINITE, { each: true })
  value!: number[];
}

/**
 * model_<version>.json with kind "random_forest".
 */
export class ForestRegressorArtifactDto {
  @IsIn(['random_forest'])
  kind!: 'random_forest';

  @IsInt()
  @Min(1)
  n_features!: number;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TreeArtifactDto)
  trees!: TreeArtifactDto[];
}

export type RegressorArtifactDto =
  | LinearRegressorArtifactDto
  | ForestRegressorArtifactDto;
