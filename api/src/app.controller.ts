import { Controller, Get } from '@nestjs/common';
import { ModelRegistryService } from './model/model-registry.service';

@Controller()
export class AppController {
  constructor(private readonly registry: ModelRegistryService) {}

  @Get()
  root() {
    if (!this.registry.isReady()) {
      return {
        status: 'warning',
        message: 'Service running but models not loaded',
        documentation_url: '/docs',
      };
    }
    return {
      status: 'ok',
      message: 'Solar Forecasting API is ready',
      documentation_url: '/docs',
    };
  }

  @Get('health')
  health() {
    return {
      status: 'ok',
      model_version: this.registry.status().version ?? 'none',
    };
  }
}
