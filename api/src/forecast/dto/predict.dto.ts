import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, Max, Min } from 'class-validator';

const FINITE = { allowNaN: false, allowInfinity: false } as const;

/**
 * Body of POST /predict. Keys follow the training column names.
 */
export class PredictRequestDto {
  @ApiProperty({ description: 'Ambient temperature in Celsius', example: 25.5, minimum: -10, maximum: 60 })
  @IsNumber(FINITE)
  @Min(-10)
  @Max(60)
  temperature!: number;

  @ApiProperty({ description: 'Relative humidity %', example: 45.0, minimum: 0, maximum: 100 })
  @IsNumber(FINITE)
  @Min(0)
  @Max(100)
  humidity!: number;

  @ApiProperty({ description: 'Global Horizontal Irradiance', example: 600.5, minimum: 0 })
  @IsNumber(FINITE)
  @Min(0)
  ghi!: number;

  // Cyclical hour encoding; expected in [-1, 1] but not range-checked
  @ApiProperty({ description: 'Cyclical hour feature (Sine)', example: -0.5 })
  @IsNumber(FINITE)
  hour_sin!: number;

  @ApiProperty({ description: 'Cyclical hour feature (Cosine)', example: -0.866 })
  @IsNumber(FINITE)
  hour_cos!: number;

  @ApiProperty({ description: 'Power output 1 hour ago', example: 150.0, minimum: 0 })
  @IsNumber(FINITE)
  @Min(0)
  power_t_1!: number;

  @ApiProperty({ description: 'Power output 2 hours ago', example: 140.0, minimum: 0 })
  @IsNumber(FINITE)
  @Min(0)
  power_t_2!: number;
}

export class PredictResponseDto {
  @ApiProperty({ example: 400 })
  predicted_power!: number;

  @ApiProperty({ enum: ['Watts'] })
  unit!: 'Watts';

  @ApiProperty({ example: 'v2' })
  model_version!: string;
}
