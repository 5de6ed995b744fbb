import { PartitionDate } from '../common/dates';
import { PipelineErrorKind } from '../common/errors';
import { StageName, StageReport } from '../common/stage.types';
import { GenerateOverrides } from '../ingestion/ingestion.service';

export interface StageFailure {
  /** Stage that failed, or the stage about to start when the run was cancelled */
  stage: StageName;
  kind: PipelineErrorKind;
  message: string;
}

export interface PipelineResult {
  date: PartitionDate;
  /** Stages that succeeded or were skipped, in execution order */
  stagesCompleted: StageName[];
  stages: StageReport[];
  error?: StageFailure;
}

export interface RunOptions {
  /** Subset of stages to run; always executed in pipeline order */
  stages?: StageName[];
  /** Re-run stages whose output already exists */
  force?: boolean;
  signal?: AbortSignal;
  generate?: GenerateOverrides;
}

export interface RangeOptions extends RunOptions {
  /** Dates processed at once; defaults to PIPELINE_CONCURRENCY */
  concurrency?: number;
}

export const succeeded = (result: PipelineResult): boolean => result.error === undefined;
