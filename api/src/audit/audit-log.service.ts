// api/src/audit/audit-log.service.ts
import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { stringify } from 'csv-stringify/sync';
import { appendFile, mkdir, stat } from 'fs/promises';
import { dirname } from 'path';
import {
  AuditWriteFailureError,
  errorMessage,
} from '../common/errors/serving.errors';
import { FeatureRecord } from '../forecast/feature-record.model';
import { PredictionResult } from '../forecast/prediction.model';

export const AUDIT_COLUMNS = [
  'timestamp',
  'temperature',
  'humidity',
  'ghi',
  'power_t_1',
  'power_t_2',
  'predicted_power',
] as const;

export interface AuditRecord {
  timestampUTC: string;
  temperature: number;
  humidity: number;
  ghi: number;
  powerT1: number;
  powerT2: number;
  predictedValue: number;
}

export function toAuditRecord(
  req: FeatureRecord,
  result: PredictionResult,
  now: Date = new Date(),
): AuditRecord {
  return {
    timestampUTC: now.toISOString(),
    temperature: req.temperature,
    humidity: req.humidity,
    ghi: req.ghi,
    powerT1: req.powerT1,
    powerT2: req.powerT2,
    predictedValue: result.value,
  };
}

function toRow(r: AuditRecord): (string | number)[] {
  return [
    r.timestampUTC,
    r.temperature,
    r.humidity,
    r.ghi,
    r.powerT1,
    r.powerT2,
    r.predictedValue,
  ];
}

async function isMissingOrEmpty(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size === 0;
  } catch {
    // stat failing means there is nothing to append to yet
    return true;
  }
}

/**
 * Append-only CSV log of served predictions.
 *
 * record() never throws and never waits: rows go onto a single promise
 * chain, so exactly one append runs at a time and rows never interleave.
 * Write failures are logged and dropped.
 */
@Injectable()
export class AuditLogService implements OnApplicationShutdown {
  private readonly logger = new Logger(AuditLogService.name);
  private readonly path: string;
  private readonly enabled: boolean;
  private tail: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(private readonly config: ConfigService) {
    this.path =
      this.config.get<string>('audit.path') ?? 'logs/predictions.csv';
    this.enabled = this.config.get<boolean>('audit.enabled') ?? true;
  }

  get filePath(): string {
    return this.path;
  }

  /** Number of rows dropped because the append failed. */
  get failureCount(): number {
    return this.failures;
  }

  record(req: FeatureRecord, result: PredictionResult): void {
    if (!this.enabled) return;
    const entry = toAuditRecord(req, result);
    this.tail = this.tail.then(() => this.write(entry));
  }

  /** Resolves once every row queued so far has been attempted. */
  flush(): Promise<void> {
    return this.tail;
  }

  async onApplicationShutdown(): Promise<void> {
    await this.flush();
  }

  private async write(entry: AuditRecord): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const rows: (readonly (string | number)[])[] = [];
      if (await isMissingOrEmpty(this.path)) rows.push(AUDIT_COLUMNS);
      rows.push(toRow(entry));
      await appendFile(this.path, stringify(rows));
    } catch (e: unknown) {
      this.failures++;
      const failure = new AuditWriteFailureError(
        `Could not append prediction to ${this.path}: ${errorMessage(e)}`,
        { cause: e },
      );
      this.logger.error(failure.message);
    }
  }
}
