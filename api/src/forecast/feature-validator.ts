// api/src/forecast/feature-validator.ts
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { PredictRequestDto } from './dto/predict.dto';
import { FeatureRecord } from './feature-record.model';

export type ViolationReason = 'MalformedInput' | 'ValidationBounds';

export interface Violation {
  field: string;
  reason: ViolationReason;
  message: string;
}

export interface FeatureValidationError {
  kind: 'FeatureValidation';
  violations: Violation[];
}

export type FeatureValidationResult =
  | { ok: true; record: FeatureRecord }
  | { ok: false; error: FeatureValidationError };

// Constraints that mean "not a usable number at all" rather than "out of range"
const TYPE_CONSTRAINTS = new Set(['isNumber']);

function toViolation(err: ValidationError): Violation {
  const constraints = err.constraints ?? {};
  const typeFailure = Object.keys(constraints).find((c) =>
    TYPE_CONSTRAINTS.has(c),
  );
  if (typeFailure) {
    return {
      field: err.property,
      reason: 'MalformedInput',
      message: constraints[typeFailure],
    };
  }
  return {
    field: err.property,
    reason: 'ValidationBounds',
    message: Object.values(constraints).join('; '),
  };
}

export function malformedBodyViolation(message: string): Violation {
  return { field: 'body', reason: 'MalformedInput', message };
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Checks a raw request body against PredictRequestDto and reports every
 * violating field at once. Never throws.
 */
export function validateFeaturePayload(
  payload: unknown,
): FeatureValidationResult {
  if (!isPlainObject(payload)) {
    return {
      ok: false,
      error: {
        kind: 'FeatureValidation',
        violations: [
          malformedBodyViolation('body must be a JSON object'),
        ],
      },
    };
  }

  const dto = plainToInstance(PredictRequestDto, payload);
  const errors = validateSync(dto);
  if (errors.length) {
    return {
      ok: false,
      error: { kind: 'FeatureValidation', violations: errors.map(toViolation) },
    };
  }

  return {
    ok: true,
    record: {
      temperature: dto.temperature,
      humidity: dto.humidity,
      ghi: dto.ghi,
      hourSin: dto.hour_sin,
      hourCos: dto.hour_cos,
      powerT1: dto.power_t_1,
      powerT2: dto.power_t_2,
    },
  };
}
