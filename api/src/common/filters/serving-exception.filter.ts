import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';
import { unprocessableBody } from '../../forecast/feature-payload.pipe';
import { malformedBodyViolation } from '../../forecast/feature-validator';
import type { ModelRegistryService } from '../../model/model-registry.service';
import {
  InferenceFailureError,
  MalformedBodyError,
  ServiceUnavailableError,
} from '../errors/serving.errors';

export const NOT_LOADED_DETAIL = 'ML Model is not loaded available';
export const INTERNAL_ERROR_DETAIL = 'Internal processing error';
export const MALFORMED_BODY_MESSAGE = 'body must be valid JSON';

/**
 * Maps serving failures to their public status and an opaque detail
 * string. Internal messages stay in the server log.
 *
 * An unparseable body is rejected before any guard runs, so readiness is
 * checked here as well: an unloaded service answers 503 whatever it got.
 */
@Catch(ServiceUnavailableError, InferenceFailureError, MalformedBodyError)
export class ServingExceptionFilter implements ExceptionFilter {
  constructor(private readonly registry: Pick<ModelRegistryService, 'isReady'>) {}

  catch(
    exception: ServiceUnavailableError | InferenceFailureError | MalformedBodyError,
    host: ArgumentsHost,
  ): void {
    const res = host.switchToHttp().getResponse<Response>();

    switch (exception.kind) {
      case 'ServiceUnavailable':
        res
          .status(HttpStatus.SERVICE_UNAVAILABLE)
          .json({ detail: NOT_LOADED_DETAIL });
        return;
      case 'InferenceFailure':
        res
          .status(HttpStatus.INTERNAL_SERVER_ERROR)
          .json({ detail: INTERNAL_ERROR_DETAIL });
        return;
      case 'MalformedBody':
        if (!this.registry.isReady()) {
          res
            .status(HttpStatus.SERVICE_UNAVAILABLE)
            .json({ detail: NOT_LOADED_DETAIL });
          return;
        }
        res
          .status(HttpStatus.UNPROCESSABLE_ENTITY)
          .json(unprocessableBody([malformedBodyViolation(MALFORMED_BODY_MESSAGE)]));
        return;
    }
  }
}
