import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pipelineConfig from '../config/pipeline.config';
import { PartitionDate } from '../common/dates';
import { IntegrityError } from '../common/errors';
import { withRetry } from '../common/retry';
import { StageReport, completedStatus } from '../common/stage.types';
import { PartitionStore } from '../storage/partition-store.service';
import { ProcessedPartition } from '../storage/partition.types';
import { buildDimensions, buildFacts } from './dimensions';
import { LoadResult, WAREHOUSE, Warehouse } from './warehouse.types';

@Injectable()
export class LoaderService {
  private readonly logger = new Logger(LoaderService.name);

  constructor(
    private readonly store: PartitionStore,
    @Inject(WAREHOUSE) private readonly warehouse: Warehouse,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  /** Loads the processed partition for `date` into the warehouse */
  async load(date: PartitionDate): Promise<StageReport> {
    const start = Date.now();
    this.logger.log(`Starting load | date=${date}`);

    const { partition, checksum } = await withRetry(
      async () => ({
        partition: await this.store.readProcessed(date),
        checksum: await this.store.checksum('processed', date),
      }),
      this.config.retry.load,
      { logger: this.logger, label: `Processed read for ${date}` },
    );

    const warnings: string[] = [];
    if (partition.records.length === 0) {
      const warning = 'Processed partition is empty; nothing loaded';
      this.logger.warn(`${warning} | date=${date}`);
      warnings.push(warning);
    }

    const result = await this.loadPartition(partition, checksum);
    const durationMs = Date.now() - start;

    this.logger.log(
      `Load complete | date=${date} factsWritten=${result.factsWritten}` +
        ` dimsUpserted=${result.dimsUpserted} durationMs=${durationMs}`,
    );

    return {
      stage: 'load',
      date,
      status: completedStatus(warnings),
      warnings,
      metrics: { factsWritten: result.factsWritten, dimsUpserted: result.dimsUpserted },
      durationMs,
    };
  }

  /**
   * Upserts dimensions, then facts, then the audit row, all in one transaction.
   * A transient failure retries the whole transaction; anything else is fatal.
   */
  async loadPartition(partition: ProcessedPartition, checksum: string): Promise<LoadResult> {
    const { date } = partition;
    const dims = buildDimensions(partition);
    const facts = buildFacts(partition);

    return withRetry(
      () =>
        this.warehouse.transaction(async (session) => {
          if (facts.length === 0) {
            await session.recordLoad({
              full_date: date,
              source_checksum: checksum,
              facts_written: 0,
              dims_upserted: 0,
            });
            return { factsWritten: 0, dimsUpserted: 0 };
          }

          const dimsUpserted =
            (await session.upsertDates(dims.dates)) +
            (await session.upsertChannels(dims.channels)) +
            (await session.upsertCustomers(dims.customers)) +
            (await session.upsertCities(dims.cities));

          await session.stageFacts(facts);

          const foreign = await session.findForeignTransactionIds(date);
          if (foreign.length > 0) {
            throw new IntegrityError(
              `transaction_id(s) in ${date} already loaded under another date: ${foreign.join(', ')}`,
              foreign,
            );
          }

          const factsWritten = await session.mergeFacts();
          await session.recordLoad({
            full_date: date,
            source_checksum: checksum,
            facts_written: factsWritten,
            dims_upserted: dimsUpserted,
          });

          return { factsWritten, dimsUpserted };
        }),
      this.config.retry.load,
      { logger: this.logger, label: `Warehouse load for ${date}` },
    );
  }

  /** True when the warehouse already holds exactly this version of the partition */
  async isLoaded(date: PartitionDate, checksum: string): Promise<boolean> {
    const audit = await this.warehouse.findLoadAudit(date);
    return audit !== null && audit.source_checksum === checksum;
  }
}
