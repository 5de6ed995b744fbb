import { PartitionDate } from './dates';

export type StageName = 'generate' | 'transform' | 'load';

export const STAGE_ORDER: readonly StageName[] = ['generate', 'transform', 'load'];

export type StageStatus = 'succeeded' | 'succeeded_with_warnings' | 'skipped';

/** What a stage hands back to the runner when it did not fail */
export interface StageReport {
  stage: StageName;
  date: PartitionDate;
  status: StageStatus;
  warnings: string[];
  metrics: Record<string, number>;
  durationMs: number;
  /** File written, when the stage produces a partition */
  output?: string;
}

export function completedStatus(warnings: string[]): StageStatus {
  return warnings.length > 0 ? 'succeeded_with_warnings' : 'succeeded';
}
