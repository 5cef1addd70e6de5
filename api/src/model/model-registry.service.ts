// api/src/model/model-registry.service.ts
import {
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ArtifactLoadError,
  ArtifactLoadReason,
  ServiceUnavailableError,
  errorMessage,
} from '../common/errors/serving.errors';
import { ArtifactPair } from './artifact-pair.model';
import { ArtifactStoreService } from './artifact-store.service';

export type RegistryState = 'empty' | 'loading' | 'ready' | 'unloaded';

export interface LoadFailure {
  version: string;
  reason: ArtifactLoadReason | 'Unknown';
  message: string;
  at: string; // ISO UTC
}

export interface RegistryStatus {
  state: RegistryState;
  version: string | null;
  lastLoadError: LoadFailure | null;
}

/**
 * Holds at most one ArtifactPair for the whole process.
 *
 * Readers call current() per request and keep the returned pair for the
 * duration of that request; installation and removal are single reference
 * assignments, so a reader sees either nothing or a complete pair.
 * load() calls are queued so only one load runs at a time.
 */
@Injectable()
export class ModelRegistryService
  implements OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(ModelRegistryService.name);

  private pair: ArtifactPair | null = null;
  private state: RegistryState = 'empty';
  private lastLoadError: LoadFailure | null = null;
  private loadQueue: Promise<unknown> = Promise.resolve();
  // Bumped by unload(); a load started under an older generation is discarded
  private generation = 0;

  constructor(
    private readonly store: ArtifactStoreService,
    private readonly config: ConfigService,
  ) {}

  /* ------------------------------ Lifecycle ----------------------------- */

  async onModuleInit(): Promise<void> {
    const version = this.config.get<string>('artifacts.version') ?? 'v2';
    await this.load(version);
  }

  onApplicationShutdown(signal?: string): void {
    this.unload(signal ? `shutdown (${signal})` : 'shutdown');
  }

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Loads and installs the pair for `version`. Resolves to whether the
   * registry is ready afterwards; never rejects, so a bad artifact leaves
   * the service up in degraded mode. A load still pending when unload()
   * runs is discarded instead of reinstalling its pair.
   */
  load(version: string): Promise<boolean> {
    const generation = this.generation;
    const run = this.loadQueue.then(() => this.doLoad(version, generation));
    this.loadQueue = run;
    return run;
  }

  isReady(): boolean {
    return this.pair !== null;
  }

  current(): ArtifactPair {
    const pair = this.pair;
    if (!pair) throw new ServiceUnavailableError();
    return pair;
  }

  unload(reason = 'unload'): void {
    this.generation++;
    const had = this.pair;
    this.pair = null;
    this.state = 'unloaded';
    if (had) this.logger.log(`Model ${had.version} unloaded: ${reason}`);
  }

  status(): RegistryStatus {
    return {
      state: this.state,
      version: this.pair?.version ?? null,
      lastLoadError: this.lastLoadError,
    };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async doLoad(version: string, generation: number): Promise<boolean> {
    if (generation !== this.generation) {
      this.logger.log(`Skipping load of ${version}: registry was unloaded`);
      return false;
    }
    const previous: RegistryState = this.state === 'ready' ? 'ready' : 'empty';
    this.state = 'loading';
    this.logger.log(`Loading model artifacts ${version}...`);

    try {
      const next = await this.store.load(version);
      if (generation !== this.generation) {
        this.logger.log(`Discarding model ${version}: unloaded while loading`);
        return false;
      }
      this.pair = next;
      this.state = 'ready';
      this.lastLoadError = null;
      this.logger.log(
        `Model ${version} ready (scaler: ${next.scaler.width} features, regressor: ${next.regressor.kind})`,
      );
      return true;
    } catch (e: unknown) {
      if (generation !== this.generation) return false;
      this.lastLoadError = {
        version,
        reason: e instanceof ArtifactLoadError ? e.reason : 'Unknown',
        message: errorMessage(e),
        at: new Date().toISOString(),
      };
      this.state = previous;
      this.logger.error(
        `Failed to load model ${version}: ${errorMessage(e)}` +
          (previous === 'ready' ? ` (keeping ${this.pair?.version})` : ''),
      );
      return this.isReady();
    }
  }
}
