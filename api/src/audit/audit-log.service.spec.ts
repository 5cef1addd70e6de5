import { Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { ConfigService } from '@nestjs/config';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { EXAMPLE_RECORD, makeTempDir, removeDir } from '../../test/fixtures/artifacts';
import { PredictionResult } from '../forecast/prediction.model';
import { AuditLogService, toAuditRecord } from './audit-log.service';

const HEADER_LINE = 'timestamp,temperature,humidity,ghi,power_t_1,power_t_2,predicted_power';
const HEADER = HEADER_LINE.split(',');

function result(value: number): PredictionResult {
  return { value, unit: 'Watts', modelVersion: 'v2' };
}

async function readRows(path: string): Promise<string[][]> {
  const rows: string[][] = parse(await readFile(path, 'utf8'));
  return rows;
}

describe('AuditLogService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  function serviceAt(path: string, enabled = true): AuditLogService {
    return new AuditLogService(new ConfigService({ audit: { path, enabled } }));
  }

  it('builds a record from the request and the prediction', () => {
    const now = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));
    expect(toAuditRecord(EXAMPLE_RECORD, result(400), now)).toEqual({
      timestampUTC: '2024-06-01T12:00:00.000Z',
      temperature: 25.5,
      humidity: 45,
      ghi: 600.5,
      powerT1: 150,
      powerT2: 140,
      predictedValue: 400,
    });
  });

  it('writes the header once, then one row per prediction', async () => {
    const path = join(dir, 'nested', 'predictions.csv');
    const audit = serviceAt(path);

    audit.record(EXAMPLE_RECORD, result(400));
    audit.record(EXAMPLE_RECORD, result(401.25));
    await audit.flush();

    const rows = await readRows(path);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual(HEADER);
    expect(rows[1][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(rows[1].slice(1)).toEqual(['25.5', '45', '600.5', '150', '140', '400']);
    expect(rows[2].slice(1)).toEqual(['25.5', '45', '600.5', '150', '140', '401.25']);
  });

  it('does not repeat the header when appending to an existing log', async () => {
    const path = join(dir, 'predictions.csv');
    await writeFile(path, `${HEADER_LINE}\n2024-01-01T00:00:00.000Z,1,2,3,4,5,6\n`);
    const audit = serviceAt(path);

    audit.record(EXAMPLE_RECORD, result(7));
    await audit.flush();

    const rows = await readRows(path);
    expect(rows.filter((r) => r[0] === 'timestamp')).toHaveLength(1);
    expect(rows).toHaveLength(3);
  });

  it('writes a header into an existing empty file', async () => {
    const path = join(dir, 'predictions.csv');
    await writeFile(path, '');
    const audit = serviceAt(path);

    audit.record(EXAMPLE_RECORD, result(7));
    await audit.flush();

    expect((await readRows(path))[0]).toEqual(HEADER);
  });

  it('keeps every row intact under many simultaneous records', async () => {
    const path = join(dir, 'predictions.csv');
    const audit = serviceAt(path);
    const n = 50;

    for (let i = 0; i < n; i++) {
      audit.record({ ...EXAMPLE_RECORD, powerT2: i }, result(1000 + i));
    }
    await audit.flush();

    const [header, ...rows] = await readRows(path);
    expect(header).toEqual(HEADER);
    expect(rows).toHaveLength(n);
    rows.forEach((cells, i) => {
      expect(cells).toHaveLength(7);
      expect(cells[5]).toBe(String(i));
      expect(cells[6]).toBe(String(1000 + i));
    });
  });

  it('absorbs write failures and logs them', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const audit = serviceAt(join(blocker, 'predictions.csv'));

    expect(() => audit.record(EXAMPLE_RECORD, result(1))).not.toThrow();
    await expect(audit.flush()).resolves.toBeUndefined();

    expect(audit.failureCount).toBe(1);
    expect(Logger.prototype.error).toHaveBeenCalledTimes(1);
  });

  it('writes nothing when disabled', async () => {
    const path = join(dir, 'predictions.csv');
    const audit = serviceAt(path, false);

    audit.record(EXAMPLE_RECORD, result(1));
    await audit.flush();

    await expect(readFile(path, 'utf8')).rejects.toThrow();
  });

  it('drains the queue on shutdown', async () => {
    const path = join(dir, 'predictions.csv');
    const audit = serviceAt(path);

    audit.record(EXAMPLE_RECORD, result(1));
    await audit.onApplicationShutdown();

    expect(await readRows(path)).toHaveLength(2);
  });
});
