// api/src/forecast/forecast.controller.ts
import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBody, ApiOkResponse, ApiResponse } from '@nestjs/swagger';
import { AuditLogService } from '../audit/audit-log.service';
import { PredictRequestDto, PredictResponseDto } from './dto/predict.dto';
import { FeaturePayloadPipe } from './feature-payload.pipe';
import { FeatureRecord } from './feature-record.model';
import { assembleFeatureVector } from './feature-vector';
import { ForecastService } from './forecast.service';
import { ModelReadyGuard } from './model-ready.guard';

@Controller()
export class ForecastController {
  constructor(
    private readonly forecast: ForecastService,
    private readonly audit: AuditLogService,
  ) {}

  /**
   * POST /predict
   * Body: { temperature, humidity, ghi, hour_sin, hour_cos, power_t_1, power_t_2 }
   * Returns: { predicted_power, unit, model_version }
   */
  @Post('predict')
  @HttpCode(200)
  @UseGuards(ModelReadyGuard)
  @ApiBody({ type: PredictRequestDto })
  @ApiOkResponse({ type: PredictResponseDto })
  @ApiResponse({ status: 422, description: 'Malformed or out-of-range features' })
  @ApiResponse({ status: 503, description: 'No model loaded' })
  predict(@Body(FeaturePayloadPipe) record: FeatureRecord): PredictResponseDto {
    const result = this.forecast.predict(assembleFeatureVector(record));

    // Response is fixed at this point; the audit write is queued, not awaited
    this.audit.record(record, result);

    return {
      predicted_power: result.value,
      unit: result.unit,
      model_version: result.modelVersion,
    };
  }
}
