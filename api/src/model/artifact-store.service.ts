// api/src/model/artifact-store.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  ArtifactLoadError,
  errorMessage,
} from '../common/errors/serving.errors';
import { FEATURE_COLUMNS } from '../forecast/feature-vector';
import { ArtifactPair, createArtifactPair } from './artifact-pair.model';
import { ForestRegressor, LinearRegressor, Regressor } from './artifacts/regressor';
import { StandardScaler } from './artifacts/standard-scaler';
import {
  ForestRegressorArtifactDto,
  LinearRegressorArtifactDto,
  ScalerArtifactDto,
} from './dto/artifact.dto';

const VERSION_TAG = /^[A-Za-z0-9._-]{1,64}$/;

export interface ArtifactPaths {
  scaler: string;
  model: string;
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((e) => {
    const path = prefix ? `${prefix}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map((m) => `${path}: ${m}`);
    return [...own, ...flattenErrors(e.children ?? [], path)];
  });
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Resolves and deserializes the versioned scaler/model files under the
 * configured artifacts directory.
 */
@Injectable()
export class ArtifactStoreService {
  private readonly logger = new Logger(ArtifactStoreService.name);
  private readonly baseDir: string;

  constructor(private readonly config: ConfigService) {
    this.baseDir = this.config.get<string>('artifacts.dir') ?? 'artifacts';
  }

  pathsFor(version: string): ArtifactPaths {
    if (!VERSION_TAG.test(version)) {
      throw new ArtifactLoadError(
        'InvalidFormat',
        `Invalid artifact version tag: ${JSON.stringify(version)}`,
      );
    }
    return {
      scaler: join(this.baseDir, `scaler_${version}.json`),
      model: join(this.baseDir, `model_${version}.json`),
    };
  }

  async load(version: string): Promise<ArtifactPair> {
    const paths = this.pathsFor(version);
    const [rawScaler, rawModel] = await Promise.all([
      this.readJson(paths.scaler),
      this.readJson(paths.model),
    ]);

    const scaler = this.toScaler(rawScaler, paths.scaler);
    const regressor = this.toRegressor(rawModel, paths.model);

    this.logger.debug(
      `Parsed ${paths.scaler} (${scaler.width} features) and ${paths.model} (${regressor.kind})`,
    );
    return createArtifactPair(scaler, regressor, version);
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async readJson(path: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (e: unknown) {
      const code = isPlainObject(e) ? e.code : undefined;
      if (code === 'ENOENT') {
        throw new ArtifactLoadError('NotFound', `Artifact not found: ${path}`, {
          cause: e,
        });
      }
      throw new ArtifactLoadError(
        'Unreadable',
        `Cannot read ${path}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
    try {
      return JSON.parse(text);
    } catch (e: unknown) {
      throw new ArtifactLoadError(
        'InvalidFormat',
        `${path} is not valid JSON: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  private parse<T extends object>(
    cls: ClassConstructor<T>,
    raw: unknown,
    path: string,
  ): T {
    if (!isPlainObject(raw)) {
      throw new ArtifactLoadError(
        'InvalidFormat',
        `${path} must contain a JSON object`,
      );
    }
    const dto = plainToInstance(cls, raw);
    const errors = validateSync(dto);
    if (errors.length) {
      throw new ArtifactLoadError(
        'InvalidFormat',
        `${path} failed validation: ${flattenErrors(errors).join('; ')}`,
      );
    }
    return dto;
  }

  private toScaler(raw: unknown, path: string): StandardScaler {
    const dto = this.parse(ScalerArtifactDto, raw, path);
    if (dto.mean.length !== dto.scale.length) {
      throw new ArtifactLoadError(
        'InvalidFormat',
        `${path}: mean has ${dto.mean.length} entries but scale has ${dto.scale.length}`,
      );
    }
    if (dto.feature_names) {
      const expected = FEATURE_COLUMNS.map((c) => c.column);
      if (dto.feature_names.join(',') !== expected.join(',')) {
        throw new ArtifactLoadError(
          'FeatureMismatch',
          `${path}: fitted on [${dto.feature_names.join(', ')}], serving order is [${expected.join(', ')}]`,
        );
      }
    }
    return new StandardScaler(dto.mean, dto.scale, dto.feature_names);
  }

  private toRegressor(raw: unknown, path: string): Regressor {
    const kind = isPlainObject(raw) ? raw.kind : undefined;
    switch (kind) {
      case 'linear': {
        const dto = this.parse(LinearRegressorArtifactDto, raw, path);
        return new LinearRegressor(dto.coefficients, dto.intercept);
      }
      case 'random_forest': {
        const dto = this.parse(ForestRegressorArtifactDto, raw, path);
        dto.trees.forEach((tree, i) => {
          const n = tree.children_left.length;
          const lengths = [
            tree.children_right.length,
            tree.feature.length,
            tree.threshold.length,
            tree.value.length,
          ];
          if (lengths.some((len) => len !== n)) {
            throw new ArtifactLoadError(
              'InvalidFormat',
              `${path}: tree ${i} has node arrays of unequal length`,
            );
          }
        });
        return new ForestRegressor(dto.n_features, dto.trees);
      }
      default:
        throw new ArtifactLoadError(
          'InvalidFormat',
          `${path}: unsupported model kind ${JSON.stringify(kind)}`,
        );
    }
  }
}
