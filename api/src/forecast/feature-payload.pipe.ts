import {
  HttpStatus,
  Injectable,
  PipeTransform,
  UnprocessableEntityException,
} from '@nestjs/common';
import { FeatureRecord } from './feature-record.model';
import { Violation, validateFeaturePayload } from './feature-validator';

export function unprocessableBody(violations: Violation[]) {
  return {
    statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    error: 'Unprocessable Entity',
    detail: violations,
  };
}

/**
 * Turns a POST /predict body into a FeatureRecord, or rejects the request
 * with 422 and the full violation list.
 */
@Injectable()
export class FeaturePayloadPipe
  implements PipeTransform<unknown, FeatureRecord>
{
  transform(value: unknown): FeatureRecord {
    const result = validateFeaturePayload(value);
    if (!result.ok) {
      throw new UnprocessableEntityException(
        unprocessableBody(result.error.violations),
      );
    }
    return result.record;
  }
}
