import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import * as zlib from 'zlib';
import { Options, parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { z } from 'zod';
import pipelineConfig from '../config/pipeline.config';
import {
  CUSTOMER_SEGMENTS,
  DELAY_BUCKETS,
  PROCESSED_COLUMNS,
  PROCESSED_FILENAME,
  RAW_COLUMNS,
  RAW_FILENAME,
  TRANSACTION_STATUSES,
} from '../common/constants';
import { PartitionDate, partitionSegments } from '../common/dates';
import {
  IntegrityError,
  PartitionMissingError,
  classifyFsError,
  errorCode,
} from '../common/errors';
import {
  PartitionKind,
  ProcessedPartition,
  ProcessedTransaction,
  RawPartition,
  RawTransaction,
} from './partition.types';

const gzip = promisify(zlib.gzip);

const FILENAMES: Record<PartitionKind, string> = {
  raw: RAW_FILENAME,
  processed: PROCESSED_FILENAME,
};

const cell = z.string().default('');

// Raw rows are read leniently; the cleaner decides what is valid
const rawRowSchema = z.object({
  transaction_id: cell,
  timestamp: cell,
  customer_id: cell,
  channel: cell,
  city: cell,
  amount: cell,
  status: cell,
  processing_time: cell,
});

// csv-parse `info` output; invalid_field_length counts ragged rows seen so far
const rawEntrySchema = z.object({
  record: z.record(z.string(), z.string()),
  info: z.object({ invalid_field_length: z.number() }),
});

const processedRowSchema = z.object({
  transaction_id: z.string().min(1),
  timestamp: z.string(),
  customer_id: z.string().min(1),
  channel: z.string().min(1),
  city: z.string().min(1),
  amount: z.coerce.number().positive(),
  status: z.enum(TRANSACTION_STATUSES),
  processing_time: z.coerce.number().nonnegative(),
  fee_percent: z.coerce.number(),
  revenue: z.coerce.number(),
  processing_delay_bucket: z.enum(DELAY_BUCKETS),
  customer_segment: z.enum(CUSTOMER_SEGMENTS),
});

const toNumber = (value: string): number => (value.trim() === '' ? NaN : Number(value));

/**
 * Date-partitioned file store for raw and processed partitions.
 *
 * Layout: <dataDir>/<kind>/YYYY/MM/DD/<file>. Files are published by writing a
 * temporary sibling and renaming it into place, so a partition either exists in
 * full under its final name or not at all.
 */
@Injectable()
export class PartitionStore {
  private readonly logger = new Logger(PartitionStore.name);

  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  pathFor(kind: PartitionKind, date: PartitionDate): string {
    return path.resolve(this.config.dataDir, kind, ...partitionSegments(date), FILENAMES[kind]);
  }

  /** A partition is complete once its file exists under the final name */
  async isComplete(kind: PartitionKind, date: PartitionDate): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(this.pathFor(kind, date));
      return stat.isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw classifyFsError(err, `stat ${kind} partition ${date}`);
    }
  }

  /** sha-256 of the published file */
  async checksum(kind: PartitionKind, date: PartitionDate): Promise<string> {
    await this.assertComplete(kind, date);
    const contents = await fs.promises.readFile(this.pathFor(kind, date));
    return createHash('sha256').update(contents).digest('hex');
  }

  async writeRaw(partition: RawPartition): Promise<string> {
    const csv = await toCsv(partition.records, RAW_COLUMNS);
    return this.publish('raw', partition.date, Buffer.from(csv, 'utf8'));
  }

  async readRaw(date: PartitionDate): Promise<RawPartition> {
    await this.assertComplete('raw', date);
    const records: RawTransaction[] = [];

    const parser = fs
      .createReadStream(this.pathFor('raw', date))
      .pipe(csvParser({ relax_column_count: true, info: true }));

    let ragged = 0;
    for await (const entry of parser) {
      const { record, info } = rawEntrySchema.parse(entry);
      const row = rawRowSchema.parse(record);
      const malformed = info.invalid_field_length > ragged;
      ragged = info.invalid_field_length;

      records.push({
        ...row,
        amount: toNumber(row.amount),
        processing_time: toNumber(row.processing_time),
        ...(malformed ? { malformed } : {}),
      });
    }

    if (ragged > 0) {
      this.logger.warn(`Raw partition ${date} has ${ragged} row(s) with the wrong number of fields`);
    }

    return { date, records };
  }

  async writeProcessed(partition: ProcessedPartition): Promise<string> {
    const csv = await toCsv(partition.records, PROCESSED_COLUMNS);
    return this.publish('processed', partition.date, await gzip(Buffer.from(csv, 'utf8')));
  }

  async readProcessed(date: PartitionDate): Promise<ProcessedPartition> {
    await this.assertComplete('processed', date);
    const records: ProcessedTransaction[] = [];

    const parser = fs
      .createReadStream(this.pathFor('processed', date))
      .pipe(zlib.createGunzip())
      .pipe(csvParser());

    let rowNumber = 0;
    for await (const record of parser) {
      rowNumber++;
      const parsed = processedRowSchema.safeParse(record);
      if (!parsed.success) {
        throw new IntegrityError(
          `Processed partition ${date} is corrupt at row ${rowNumber}`,
          parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
      }
      records.push(parsed.data);
    }

    return { date, records };
  }

  private async assertComplete(kind: PartitionKind, date: PartitionDate): Promise<void> {
    if (!(await this.isComplete(kind, date))) {
      throw new PartitionMissingError(`No ${kind} partition for ${date} at ${this.pathFor(kind, date)}`);
    }
  }

  /** Writes a temporary sibling and renames it over the final path */
  private async publish(kind: PartitionKind, date: PartitionDate, contents: Buffer): Promise<string> {
    const target = this.pathFor(kind, date);
    const dir = path.dirname(target);
    const temp = path.join(dir, `.${path.basename(target)}.${randomUUID()}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(temp, contents);
      await fs.promises.rename(temp, target);
    } catch (err) {
      await fs.promises.rm(temp, { force: true });
      throw classifyFsError(err, `publish ${kind} partition ${date}`);
    }

    this.logger.debug(`Published ${kind} partition ${date} → ${target} (${contents.length} bytes)`);
    return target;
  }
}

function csvParser(options: Options = {}) {
  return parse({
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
    ...options,
  });
}

function toCsv<T extends object>(records: T[], columns: readonly string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(records, { header: true, columns: [...columns] }, (err, output) =>
      err ? reject(err) : resolve(output),
    );
  });
}

function isNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT';
}
