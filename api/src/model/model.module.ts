import { Module } from '@nestjs/common';
import { ArtifactStoreService } from './artifact-store.service';
import { ModelRegistryService } from './model-registry.service';

@Module({
  providers: [ArtifactStoreService, ModelRegistryService],
  exports: [ModelRegistryService],
})
export class ModelModule {}
