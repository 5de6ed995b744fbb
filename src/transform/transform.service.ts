import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pipelineConfig from '../config/pipeline.config';
import { CHANNEL_FEES } from '../common/constants';
import { PartitionDate } from '../common/dates';
import { DataQualityError } from '../common/errors';
import { withRetry } from '../common/retry';
import { StageReport, completedStatus } from '../common/stage.types';
import { PartitionStore } from '../storage/partition-store.service';
import { ProcessedPartition, RawPartition } from '../storage/partition.types';
import { deduplicate, derive, enrich } from './transform.steps';
import { ValidationService, ValidationStats, droppedCount } from './validation.service';

export interface CleanResult {
  partition: ProcessedPartition;
  duplicatesRemoved: number;
  validation: ValidationStats;
  unknownChannel: number;
  /** Records dropped by validation or enrichment, over records left after dedup */
  dropRate: number;
}

@Injectable()
export class TransformService {
  private readonly logger = new Logger(TransformService.name);

  constructor(
    private readonly store: PartitionStore,
    private readonly validationService: ValidationService,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  /**
   * Reads the raw partition for `date`, cleans it and publishes the processed
   * partition. Same raw input always yields the same processed file.
   */
  async transform(date: PartitionDate): Promise<StageReport> {
    const start = Date.now();
    this.logger.log(`Starting transformation | date=${date}`);

    const raw = await withRetry(() => this.store.readRaw(date), this.config.retry.transform, {
      logger: this.logger,
      label: `Raw read for ${date}`,
    });

    const result = this.clean(raw);
    const warnings = this.assessDrops(result);

    const output = await withRetry(
      () => this.store.writeProcessed(result.partition),
      this.config.retry.transform,
      { logger: this.logger, label: `Processed write for ${date}` },
    );

    const durationMs = Date.now() - start;
    const dropped = droppedCount(result.validation) + result.unknownChannel;

    this.logger.log(
      `Transformation complete | date=${date} input=${raw.records.length}` +
        ` duplicates=${result.duplicatesRemoved} dropped=${dropped}` +
        ` output=${result.partition.records.length} file=${output} durationMs=${durationMs}`,
    );

    return {
      stage: 'transform',
      date,
      status: completedStatus(warnings),
      warnings,
      metrics: {
        input: raw.records.length,
        duplicatesRemoved: result.duplicatesRemoved,
        malformedRow: result.validation.malformedRow,
        missingFields: result.validation.missingFields,
        invalidAmount: result.validation.invalidAmount,
        invalidStatus: result.validation.invalidStatus,
        invalidProcessingTime: result.validation.invalidProcessingTime,
        unknownChannel: result.unknownChannel,
        dropped,
        output: result.partition.records.length,
      },
      durationMs,
      output,
    };
  }

  /** Dedup → validate → enrich → derive, entirely in memory */
  clean(raw: RawPartition): CleanResult {
    const { unique, duplicatesRemoved } = deduplicate(raw.records);
    const { valid, stats } = this.validationService.validate(unique);
    const { enriched, unknownChannel } = enrich(valid, CHANNEL_FEES);

    for (const record of unknownChannel) {
      this.logger.warn(
        `Unknown channel "${record.channel}" (transaction_id="${record.transaction_id}") — dropping`,
      );
    }

    const records = derive(enriched, this.config.delayThresholds);
    const dropped = droppedCount(stats) + unknownChannel.length;

    return {
      partition: { date: raw.date, records },
      duplicatesRemoved,
      validation: stats,
      unknownChannel: unknownChannel.length,
      dropRate: unique.length === 0 ? 0 : dropped / unique.length,
    };
  }

  /** Drops are warnings unless nothing survives or the configured rate is exceeded */
  private assessDrops(result: CleanResult): string[] {
    const { date, records } = result.partition;
    const threshold = this.config.dropRateFatalThreshold;
    const dropped = droppedCount(result.validation) + result.unknownChannel;
    const rate = (result.dropRate * 100).toFixed(1);

    if (records.length === 0) {
      throw new DataQualityError(`No valid records survived cleaning for ${date} (dropped ${dropped})`);
    }

    if (threshold !== null && result.dropRate > threshold) {
      throw new DataQualityError(
        `Drop rate ${rate}% for ${date} exceeds the fatal threshold of ${(threshold * 100).toFixed(1)}%`,
      );
    }

    const warnings: string[] = [];
    if (dropped > 0) {
      const warning = `Dropped ${dropped} invalid record(s) (${rate}%)`;
      this.logger.warn(`${warning} | date=${date}`);
      warnings.push(warning);
    }
    return warnings;
  }
}
