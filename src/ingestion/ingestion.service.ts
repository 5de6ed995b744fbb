import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pipelineConfig from '../config/pipeline.config';
import { CHANNEL_FEES } from '../common/constants';
import { PartitionDate } from '../common/dates';
import { ConfigurationError } from '../common/errors';
import { withRetry } from '../common/retry';
import { StageReport } from '../common/stage.types';
import { PartitionStore } from '../storage/partition-store.service';
import { GeneratorOptions, createFaker, generateTransactions, seedForDate } from './generator';

export type GenerateOverrides = Partial<Pick<GeneratorOptions, 'count' | 'channels' | 'failureRate'>>;

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly store: PartitionStore,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  /**
   * Generates the raw partition for `date` and publishes it atomically.
   * The write is retried on transient I/O errors; once retries are exhausted
   * the error propagates and no partition file exists.
   */
  async generate(date: PartitionDate, overrides: GenerateOverrides = {}): Promise<StageReport> {
    const options = this.resolveOptions(overrides);
    const start = Date.now();

    this.logger.log(
      `Starting ingestion | date=${date} count=${options.count} failureRate=${options.failureRate}`,
    );

    const faker = createFaker(seedForDate(date, this.config.generatorSeed));
    const records = generateTransactions(date, options, faker);

    const output = await withRetry(
      () => this.store.writeRaw({ date, records }),
      this.config.retry.generate,
      { logger: this.logger, label: `Raw write for ${date}` },
    );

    const failed = records.filter((r) => r.status === 'failed').length;
    const durationMs = Date.now() - start;

    this.logger.log(
      `Ingestion complete | date=${date} generated=${records.length} failed=${failed}` +
        ` file=${output} durationMs=${durationMs}`,
    );

    return {
      stage: 'generate',
      date,
      status: 'succeeded',
      warnings: [],
      metrics: { generated: records.length, failed },
      durationMs,
      output,
    };
  }

  /** Fills defaults from config and rejects unusable parameters before any work */
  private resolveOptions(overrides: GenerateOverrides): GeneratorOptions {
    const count = overrides.count ?? this.config.recordsPerDay;
    const failureRate = overrides.failureRate ?? this.config.failureRate;
    const channels = overrides.channels ?? Object.keys(CHANNEL_FEES);

    if (!Number.isInteger(count) || count < 1) {
      throw new ConfigurationError(`count must be a positive integer, got ${count}`);
    }
    if (!(failureRate >= 0 && failureRate <= 1)) {
      throw new ConfigurationError(`failureRate must be between 0 and 1, got ${failureRate}`);
    }
    if (channels.length === 0) {
      throw new ConfigurationError('channel set must not be empty');
    }
    const unknown = channels.filter((c) => !Object.prototype.hasOwnProperty.call(CHANNEL_FEES, c));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown channel(s): ${unknown.join(', ')}`);
    }

    return { count, failureRate, channels };
  }
}
