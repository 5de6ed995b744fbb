import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pipelineConfig from '../config/pipeline.config';
import { PartitionDate, dateRange } from '../common/dates';
import {
  ConfigurationError,
  PipelineCancelledError,
  errorKind,
  errorMessage,
} from '../common/errors';
import { STAGE_ORDER, StageName, StageReport } from '../common/stage.types';
import { IngestionService } from '../ingestion/ingestion.service';
import { PartitionStore } from '../storage/partition-store.service';
import { TransformService } from '../transform/transform.service';
import { LoaderService } from '../warehouse/loader.service';
import { PipelineResult, RangeOptions, RunOptions, StageFailure } from './pipeline.types';

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly ingestion: IngestionService,
    private readonly transformer: TransformService,
    private readonly loader: LoaderService,
    private readonly store: PartitionStore,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  /**
   * Runs generate → transform → load for one date. Stages whose output is
   * already complete are skipped unless `force` is set. The first failure
   * stops the run and is reported in `error` rather than thrown.
   */
  async run(date: PartitionDate, options: RunOptions = {}): Promise<PipelineResult> {
    const stages = selectStages(options.stages);
    const result: PipelineResult = { date, stagesCompleted: [], stages: [] };
    const start = Date.now();

    this.logger.log(`Pipeline started | date=${date} stages=${stages.join(',')} force=${!!options.force}`);

    for (const stage of stages) {
      if (options.signal?.aborted) {
        result.error = failure(stage, new PipelineCancelledError(`Run for ${date} cancelled before ${stage}`));
        this.logger.warn(`Pipeline cancelled | date=${date} next=${stage}`);
        break;
      }

      try {
        const report = await this.runStage(stage, date, options);
        result.stages.push(report);
        result.stagesCompleted.push(stage);
      } catch (err) {
        result.error = failure(stage, err);
        this.logger.error(
          `Stage failed | date=${date} stage=${stage} kind=${result.error.kind}: ${result.error.message}`,
        );
        break;
      }
    }

    const durationMs = Date.now() - start;
    if (!result.error) {
      this.logger.log(
        `Pipeline complete | date=${date} stages=${result.stagesCompleted.join(',')} durationMs=${durationMs}`,
      );
    }
    return result;
  }

  /**
   * Runs every date in [from, to], a bounded number of dates at a time.
   * Results come back in date order; one date failing does not stop the others.
   */
  async runRange(
    from: PartitionDate,
    to: PartitionDate,
    { concurrency = this.config.concurrency, ...options }: RangeOptions = {},
  ): Promise<PipelineResult[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const dates = dateRange(from, to);
    const results: PipelineResult[] = [];
    this.logger.log(`Backfill started | from=${from} to=${to} dates=${dates.length} concurrency=${concurrency}`);

    for (let i = 0; i < dates.length; i += concurrency) {
      const batch = dates.slice(i, i + concurrency);
      results.push(...(await Promise.all(batch.map((date) => this.run(date, options)))));
    }

    const failed = results.filter((r) => r.error).map((r) => r.date);
    this.logger.log(
      `Backfill complete | dates=${results.length} failed=${failed.length}` +
        (failed.length > 0 ? ` (${failed.join(', ')})` : ''),
    );
    return results;
  }

  private async runStage(stage: StageName, date: PartitionDate, options: RunOptions): Promise<StageReport> {
    if (!options.force && (await this.isStageComplete(stage, date))) {
      this.logger.log(`Stage skipped, output already complete | date=${date} stage=${stage}`);
      return { stage, date, status: 'skipped', warnings: [], metrics: {}, durationMs: 0 };
    }

    switch (stage) {
      case 'generate':
        return this.ingestion.generate(date, options.generate);
      case 'transform':
        return this.transformer.transform(date);
      case 'load':
        return this.loader.load(date);
    }
  }

  private async isStageComplete(stage: StageName, date: PartitionDate): Promise<boolean> {
    switch (stage) {
      case 'generate':
        return this.store.isComplete('raw', date);
      case 'transform':
        return this.store.isComplete('processed', date);
      case 'load':
        if (!(await this.store.isComplete('processed', date))) return false;
        return this.loader.isLoaded(date, await this.store.checksum('processed', date));
    }
  }
}

/** Requested stages in pipeline order, without repeats */
export function selectStages(requested?: StageName[]): StageName[] {
  if (!requested) return [...STAGE_ORDER];
  if (requested.length === 0) {
    throw new ConfigurationError('At least one stage must be selected');
  }
  return STAGE_ORDER.filter((stage) => requested.includes(stage));
}

function failure(stage: StageName, err: unknown): StageFailure {
  return { stage, kind: errorKind(err), message: errorMessage(err) };
}
