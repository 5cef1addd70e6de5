import { CanActivate, Injectable } from '@nestjs/common';
import { ServiceUnavailableError } from '../common/errors/serving.errors';
import { ModelRegistryService } from '../model/model-registry.service';

/**
 * Rejects scoring requests while no model is installed. Guards run before
 * pipes, so an unloaded service answers 503 whatever the body contains.
 */
@Injectable()
export class ModelReadyGuard implements CanActivate {
  constructor(private readonly registry: ModelRegistryService) {}

  canActivate(): boolean {
    if (!this.registry.isReady()) throw new ServiceUnavailableError();
    return true;
  }
}
